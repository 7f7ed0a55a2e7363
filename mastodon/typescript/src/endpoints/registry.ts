/**
 * Runtime side of the endpoint registry.
 */

import type { Generation } from '../capabilities/generations.js';
import { resolveActiveFlags } from '../capabilities/matrix.js';
import { entityDefinition, isEntityName, referencedEntities } from '../entities/model.js';
import { CapabilityMatrixError, ValidationError } from '../errors/index.js';
import { requestDefinition } from '../requests/encode.js';
import { ENDPOINTS, EndpointDefinition } from './definitions.js';
import type { ActiveEndpointName, EndpointName } from './types.js';

export function isEndpointName(value: string): value is EndpointName {
  return Object.prototype.hasOwnProperty.call(ENDPOINTS, value);
}

export function endpointDefinition(name: EndpointName): EndpointDefinition {
  return ENDPOINTS[name];
}

/**
 * Names of the endpoints available at `generation`, in declaration order.
 */
export function activeEndpoints<G extends Generation>(generation: G): ActiveEndpointName<G>[];
export function activeEndpoints(generation: Generation): EndpointName[] {
  return activeEndpointNames(generation);
}

function activeEndpointNames(generation: Generation): EndpointName[] {
  const active = resolveActiveFlags(generation);
  return Object.keys(ENDPOINTS)
    .filter(isEndpointName)
    .filter((name) => active.has(endpointDefinition(name).flag));
}

/**
 * `:name` segments of a path template, in order.
 */
export function pathParamNames(path: string): string[] {
  return Array.from(path.matchAll(/:([a-z_]+)/g), (match) => match[1]);
}

/**
 * Substitutes path parameters, URL-encoding each value.
 *
 * @throws ValidationError when a parameter is missing, empty, `.` or `..`
 */
export function expandPath(
  name: string,
  path: string,
  params: Readonly<Record<string, unknown>>
): string {
  const missing: string[] = [];

  const expanded = path.replace(/:([a-z_]+)/g, (_, param: string) => {
    const value = params[param];
    if ((typeof value !== 'string' && typeof value !== 'number') || value === '') {
      missing.push(`${name}.${param}: Required`);
      return '';
    }
    // Left as is by encodeURIComponent, and resolved away by URL parsing.
    if (value === '.' || value === '..') {
      missing.push(`${name}.${param}: Invalid path segment "${value}"`);
      return '';
    }
    return encodeURIComponent(String(value));
  });

  if (missing.length > 0) {
    throw new ValidationError(missing);
  }
  return expanded;
}

/**
 * Checks that every endpoint active at `generation` only depends on active
 * entities and request definitions.
 *
 * @throws CapabilityMatrixError naming the first inconsistent endpoint
 */
export function assertRegistryConsistent(generation: Generation): void {
  const active = resolveActiveFlags(generation);

  for (const name of activeEndpointNames(generation)) {
    const definition = endpointDefinition(name);

    for (const target of referencedEntities(definition.response.codec)) {
      if (!isEntityName(target) || !active.has(entityDefinition(target).flag)) {
        throw new CapabilityMatrixError(
          `Endpoint "${name}" is active at ${generation} but its response entity "${target}" is not`,
          { endpoint: name, generation }
        );
      }
    }

    for (const request of [definition.query, definition.body]) {
      if (request !== undefined && !active.has(requestDefinition(request).flag)) {
        throw new CapabilityMatrixError(
          `Endpoint "${name}" is active at ${generation} but request "${request}" is not`,
          { endpoint: name, generation }
        );
      }
    }
  }
}
