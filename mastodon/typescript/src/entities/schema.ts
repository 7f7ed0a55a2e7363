/**
 * Building blocks for versioned declarations.
 *
 * A field pairs a value codec with the capability flag that owns it and a
 * presence kind. Codecs are plain zod schemas for scalars, or one of the
 * structural forms below, which the entity model and the request encoder
 * compile per generation.
 */

import { z } from 'zod';
import type { Generation } from '../capabilities/generations.js';
import type { CapabilityFlag, IsActive } from '../capabilities/matrix.js';

/**
 * Reference to another entity, decoded under the same generation.
 */
export interface EntityRef<N extends string = string> {
  readonly kind: 'entity';
  readonly name: N;
}

/**
 * JSON array of another codec.
 */
export interface ListCodec<C = unknown> {
  readonly kind: 'list';
  readonly item: C;
}

/**
 * String enumeration whose members are gated by capability flags.
 */
export interface VariantsCodec<
  V extends Readonly<Record<string, CapabilityFlag>> = Readonly<Record<string, CapabilityFlag>>,
> {
  readonly kind: 'variants';
  readonly variants: V;
}

export type Codec = z.ZodTypeAny | EntityRef | ListCodec<Codec> | VariantsCodec;

/**
 * Presence rule of a field once its flag is active.
 *
 * - `required`: always sent; absence is a decode failure.
 * - `nullable`: always sent, possibly as `null`.
 * - `optional`: may be missing or `null`; missing decodes to an absent
 *   property, `null` stays `null`.
 */
export type FieldKind = 'required' | 'nullable' | 'optional';

export interface FieldSpec<
  C = unknown,
  F extends CapabilityFlag = CapabilityFlag,
  K extends FieldKind = FieldKind,
> {
  readonly codec: C;
  readonly flag: F;
  readonly kind: K;
}

export interface EntityDefinition {
  /** Flag that makes the entity itself available. */
  readonly flag: CapabilityFlag;
  readonly fields: Readonly<Record<string, FieldSpec<Codec>>>;
}

/**
 * Value used for enumeration members the target generation does not know.
 */
export interface Unrecognized {
  readonly unrecognized: string;
}

export function isUnrecognized(value: unknown): value is Unrecognized {
  return typeof value === 'object' && value !== null && 'unrecognized' in value;
}

export function entity<const N extends string>(name: N): EntityRef<N> {
  return { kind: 'entity', name };
}

export function listOf<const C>(item: C): ListCodec<C> {
  return { kind: 'list', item };
}

export function variants<const V extends Readonly<Record<string, CapabilityFlag>>>(
  members: V
): VariantsCodec<V> {
  return { kind: 'variants', variants: members };
}

export function required<const C, const F extends CapabilityFlag>(
  codec: C,
  flag: F
): FieldSpec<C, F, 'required'> {
  return { codec, flag, kind: 'required' };
}

export function nullable<const C, const F extends CapabilityFlag>(
  codec: C,
  flag: F
): FieldSpec<C, F, 'nullable'> {
  return { codec, flag, kind: 'nullable' };
}

export function optional<const C, const F extends CapabilityFlag>(
  codec: C,
  flag: F
): FieldSpec<C, F, 'optional'> {
  return { codec, flag, kind: 'optional' };
}

function hasKind(codec: object, kind: string): boolean {
  return 'kind' in codec && codec.kind === kind;
}

export function isEntityRef(codec: object): codec is EntityRef {
  return hasKind(codec, 'entity');
}

export function isListCodec(codec: object): codec is ListCodec<unknown> {
  return hasKind(codec, 'list');
}

export function isVariantsCodec(codec: object): codec is VariantsCodec {
  return hasKind(codec, 'variants');
}

/**
 * Names of enumeration members that exist at `G`.
 */
export type ActiveVariant<V, G extends Generation> = {
  [K in keyof V & string]: V[K] extends CapabilityFlag
    ? IsActive<V[K], G> extends true
      ? K
      : never
    : never;
}[keyof V & string];

/**
 * Keys of a field record whose kind is `K` and whose flag is active at `G`.
 */
export type ActiveFieldKeys<Fields, G extends Generation, K extends FieldKind> = {
  [P in keyof Fields]: Fields[P] extends FieldSpec<unknown, infer F extends CapabilityFlag, K>
    ? IsActive<F, G> extends true
      ? P
      : never
    : never;
}[keyof Fields];

export type Simplify<T> = { [K in keyof T]: T[K] } & {};

// Shared scalar codecs

export const id = z.string();
export const text = z.string();
export const url = z.string();
export const flag = z.boolean();
export const count = z.number().int().nonnegative();
export const number = z.number();
export const timestamp = z.string().datetime({ offset: true });
export const date = z.string();

/**
 * Boolean that older servers sent as the strings `"true"` / `"false"`.
 */
export const looseBoolean = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true'),
]);

/**
 * Free-form JSON object, kept as is.
 */
export const jsonObject = z.record(z.unknown());
