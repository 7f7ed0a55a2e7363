/**
 * Versioned request parameters and their wire encoding.
 */

export { REQUEST_DEFINITIONS, nested } from './definitions.js';
export type { NestedRequest, RequestCodec, RequestDefinition, BodyEncoding } from './definitions.js';
export { RequestEncoder, flattenPairs, isRequestName, requestDefinition } from './encode.js';
export type { EncodedBody, WireValue } from './encode.js';
export type { RequestName, RequestInput, InputValue } from './types.js';
