import type { z } from 'zod';
import type { Generation } from '../capabilities/generations.js';
import type {
  ActiveFieldKeys,
  ActiveVariant,
  FieldSpec,
  ListCodec,
  Simplify,
  VariantsCodec,
} from '../entities/schema.js';
import type { NestedRequest, REQUEST_DEFINITIONS } from './definitions.js';

type Definitions = typeof REQUEST_DEFINITIONS;

export type RequestName = keyof Definitions & string;

type FieldsOf<N extends RequestName> = Definitions[N]['fields'];

/**
 * Value a caller may pass for a request codec at generation `G`.
 */
export type InputValue<C, G extends Generation> =
  C extends NestedRequest<infer N>
    ? N extends RequestName
      ? RequestInput<N, G>
      : never
    : C extends ListCodec<infer I>
      ? readonly InputValue<I, G>[]
      : C extends VariantsCodec<infer V>
        ? ActiveVariant<V, G>
        : C extends z.ZodTypeAny
          ? z.input<C>
          : never;

type FieldInput<S, G extends Generation> = S extends FieldSpec<infer C> ? InputValue<C, G> : never;

/**
 * Parameters of request `N` accepted at generation `G`. Required parameters
 * are mandatory; the rest may be left out, and only `nullable` ones may be
 * sent as an explicit `null`.
 */
export type RequestInput<N extends RequestName, G extends Generation> = Simplify<
  {
    readonly [P in ActiveFieldKeys<FieldsOf<N>, G, 'required'>]: FieldInput<FieldsOf<N>[P], G>;
  } & {
    readonly [P in ActiveFieldKeys<FieldsOf<N>, G, 'optional'>]?: FieldInput<FieldsOf<N>[P], G>;
  } & {
    readonly [P in ActiveFieldKeys<FieldsOf<N>, G, 'nullable'>]?: FieldInput<
      FieldsOf<N>[P],
      G
    > | null;
  }
>;
