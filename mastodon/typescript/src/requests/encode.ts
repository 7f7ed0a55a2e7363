/**
 * Request encoding.
 *
 * Input is validated against the per-generation schema of its request
 * definition, which also strips parameters the generation does not accept.
 * Only values the caller set reach the wire: `undefined` is omitted and
 * `null` survives only where the parameter is declared nullable.
 */

import { z } from 'zod';
import type { Generation } from '../capabilities/generations.js';
import { resolveActiveFlags } from '../capabilities/matrix.js';
import { zodIssueLines } from '../entities/model.js';
import { VariantsCodec, isListCodec, isVariantsCodec } from '../entities/schema.js';
import { ConfigurationError, ValidationError } from '../errors/index.js';
import {
  BodyEncoding,
  NestedRequest,
  REQUEST_DEFINITIONS,
  RequestCodec,
  RequestDefinition,
} from './definitions.js';
import type { RequestName } from './types.js';

export type WireValue = string | Blob;

/**
 * Encoded request body, ready for the transport.
 */
export type EncodedBody =
  | { readonly encoding: 'json'; readonly contentType: string; readonly payload: string }
  | { readonly encoding: 'multipart'; readonly payload: FormData };

export function isRequestName(value: string): value is RequestName {
  return Object.prototype.hasOwnProperty.call(REQUEST_DEFINITIONS, value);
}

export function requestDefinition(name: RequestName): RequestDefinition {
  return REQUEST_DEFINITIONS[name];
}

function isNestedRequest(codec: object): codec is NestedRequest {
  return 'kind' in codec && codec.kind === 'request';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Blob)
  );
}

/**
 * Flattens a value into bracketed form pairs: `source[privacy]=public`,
 * `media_ids[]=1`, `fields_attributes[0][name]=x`.
 */
export function flattenPairs(
  value: Record<string, unknown>,
  pairs: Array<[string, WireValue]> = []
): Array<[string, WireValue]> {
  for (const [key, entry] of Object.entries(value)) {
    appendPair(key, entry, pairs);
  }
  return pairs;
}

function appendPair(key: string, value: unknown, pairs: Array<[string, WireValue]>): void {
  if (value === undefined) {
    return;
  }
  if (value === null) {
    pairs.push([key, '']);
    return;
  }
  if (value instanceof Blob) {
    pairs.push([key, value]);
    return;
  }
  if (Array.isArray(value)) {
    value.forEach((item, index) => {
      appendPair(isRecord(item) ? `${key}[${index}]` : `${key}[]`, item, pairs);
    });
    return;
  }
  if (isRecord(value)) {
    for (const [child, entry] of Object.entries(value)) {
      appendPair(`${key}[${child}]`, entry, pairs);
    }
    return;
  }
  pairs.push([key, String(value)]);
}

/**
 * Encoder specialised to one generation.
 */
export class RequestEncoder<G extends Generation> {
  readonly generation: G;
  private readonly activeFlags: ReadonlySet<string>;
  private readonly schemas = new Map<string, z.ZodTypeAny>();

  constructor(generation: G) {
    this.generation = generation;
    this.activeFlags = resolveActiveFlags(generation);
  }

  /**
   * Validates input and returns the parameters that will be sent.
   *
   * @throws ValidationError when a value does not fit its parameter
   */
  prepare(name: RequestName, input: unknown): Record<string, unknown> {
    const result = this.requestSchema(name).safeParse(input ?? {});
    if (!result.success) {
      throw new ValidationError(zodIssueLines(name, result.error));
    }
    const value: unknown = result.data;
    return isRecord(value) ? value : {};
  }

  /**
   * Encodes query parameters; arrays become `key[]=value`.
   */
  toQuery(name: RequestName, input: unknown): URLSearchParams {
    const params = new URLSearchParams();
    for (const [key, value] of flattenPairs(this.prepare(name, input))) {
      if (typeof value !== 'string') {
        throw new ValidationError([`${name}.${key}: files cannot be sent in a query string`]);
      }
      params.append(key, value);
    }
    return params;
  }

  /**
   * Encodes a request body using the definition's encoding.
   */
  toBody(name: RequestName, input: unknown): EncodedBody {
    const prepared = this.prepare(name, input);
    const encoding: BodyEncoding = requestDefinition(name).encoding ?? 'json';

    if (encoding === 'multipart') {
      const form = new FormData();
      for (const [key, value] of flattenPairs(prepared)) {
        form.append(key, value);
      }
      return { encoding, payload: form };
    }

    return { encoding, contentType: 'application/json', payload: JSON.stringify(prepared) };
  }

  private requestSchema(name: RequestName): z.ZodTypeAny {
    const cached = this.schemas.get(name);
    if (cached) {
      return cached;
    }

    const definition = requestDefinition(name);
    if (!this.activeFlags.has(definition.flag)) {
      throw new ConfigurationError(
        `Request "${name}" is not available at generation ${this.generation}`
      );
    }

    const shape: Record<string, z.ZodTypeAny> = {};
    for (const [field, spec] of Object.entries(definition.fields)) {
      if (!this.activeFlags.has(spec.flag)) {
        continue;
      }
      const value = this.schemaFor(spec.codec);
      switch (spec.kind) {
        case 'required':
          shape[field] = value;
          break;
        case 'optional':
          shape[field] = value.optional();
          break;
        case 'nullable':
          shape[field] = value.nullable().optional();
          break;
      }
    }

    const schema = z.object(shape);
    this.schemas.set(name, schema);
    return schema;
  }

  private schemaFor(codec: RequestCodec): z.ZodTypeAny {
    if (isNestedRequest(codec)) {
      if (!isRequestName(codec.name)) {
        throw new ConfigurationError(`Unknown request definition "${codec.name}"`);
      }
      return this.requestSchema(codec.name);
    }
    if (isListCodec(codec)) {
      return z.array(this.schemaFor(codec.item));
    }
    if (isVariantsCodec(codec)) {
      return this.variantsSchema(codec);
    }
    return codec;
  }

  private variantsSchema(codec: VariantsCodec): z.ZodTypeAny {
    const members = Object.entries(codec.variants)
      .filter(([, owner]) => this.activeFlags.has(owner))
      .map(([member]) => member);
    return z.string().refine((value) => members.includes(value), {
      message: `Expected one of: ${members.join(', ')}`,
    });
  }
}
