/**
 * Endpoint registry.
 */

export { ENDPOINTS, one, many, paged } from './definitions.js';
export type {
  AuthMode,
  EndpointDefinition,
  HttpMethod,
  ResponseKind,
  ResponseSpec,
} from './definitions.js';
export {
  activeEndpoints,
  assertRegistryConsistent,
  endpointDefinition,
  expandPath,
  isEndpointName,
  pathParamNames,
} from './registry.js';
export type * from './types.js';
