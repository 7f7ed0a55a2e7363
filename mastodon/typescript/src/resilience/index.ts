/**
 * Resilience components - public exports.
 */

export {
  RetryExecutor,
  computeBackoff,
  createRetryExecutor,
  sleep,
} from './retry.js';
export type { RetryHooks, Sleep } from './retry.js';
