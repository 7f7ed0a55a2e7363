/**
 * Type-level projection of the endpoint declarations onto a generation.
 *
 * Only `ActiveEndpointName<G>` can be passed to a client built for `G`, so
 * calling an operation the generation does not have fails type-checking.
 */

import type { Generation } from '../capabilities/generations.js';
import type { IsActive } from '../capabilities/matrix.js';
import type { Simplify } from '../entities/schema.js';
import type { CodecValue } from '../entities/types.js';
import type { PageCursor } from '../pagination/index.js';
import type { RequestInput, RequestName } from '../requests/types.js';
import type { ENDPOINTS, ResponseSpec } from './definitions.js';

type Definitions = typeof ENDPOINTS;

export type EndpointName = keyof Definitions & string;

type Def<E extends EndpointName> = Definitions[E];

/**
 * `:name` segments of a path template.
 */
export type PathParamNames<P extends string> = P extends `${string}:${infer Param}/${infer Rest}`
  ? Param | PathParamNames<`/${Rest}`>
  : P extends `${string}:${infer Param}`
    ? Param
    : never;

type EmptyArgs = Record<never, never>;

type OptionalWhenEmpty<K extends string, V> = {} extends V
  ? { readonly [P in K]?: V }
  : { readonly [P in K]: V };

type PathArgs<P extends string> = { readonly [K in PathParamNames<P>]: string };

type QueryArgs<D, G extends Generation> = D extends { readonly query: infer Q extends RequestName }
  ? OptionalWhenEmpty<'query', RequestInput<Q, G>>
  : EmptyArgs;

type BodyArgs<D, G extends Generation> = D extends { readonly body: infer B extends RequestName }
  ? OptionalWhenEmpty<'body', RequestInput<B, G>>
  : EmptyArgs;

/**
 * Call arguments of endpoint `E` at `G`: path parameters as top-level keys,
 * plus `query` and `body` where the endpoint declares them.
 */
export type EndpointArgs<E extends EndpointName, G extends Generation> = Simplify<
  PathArgs<Def<E>['path']> & QueryArgs<Def<E>, G> & BodyArgs<Def<E>, G>
>;

/**
 * Argument tuple of `execute`; the arguments object may be left out when
 * nothing in it is mandatory.
 */
export type EndpointCallArgs<E extends EndpointName, G extends Generation> =
  {} extends EndpointArgs<E, G> ? [args?: EndpointArgs<E, G>] : [args: EndpointArgs<E, G>];

/**
 * Argument tuple of `page`: the call arguments followed by an optional cursor.
 */
export type PageCallArgs<E extends EndpointName, G extends Generation> =
  {} extends EndpointArgs<E, G>
    ? [args?: EndpointArgs<E, G>, cursor?: PageCursor]
    : [args: EndpointArgs<E, G>, cursor?: PageCursor];

type ResponseValue<R, G extends Generation> =
  R extends ResponseSpec<infer C, 'one'>
    ? CodecValue<C, G>
    : R extends ResponseSpec<infer C, 'many' | 'paged'>
      ? CodecValue<C, G>[]
      : never;

/**
 * Decoded result of endpoint `E` at `G`.
 */
export type EndpointResult<E extends EndpointName, G extends Generation> = ResponseValue<
  Def<E>['response'],
  G
>;

/**
 * Item type of a paginated endpoint.
 */
export type PagedItem<E extends EndpointName, G extends Generation> =
  Def<E>['response'] extends ResponseSpec<infer C, 'paged'> ? CodecValue<C, G> : never;

/**
 * Endpoints whose flag is active at `G`.
 */
export type ActiveEndpointName<G extends Generation> = EndpointName &
  {
    [E in EndpointName]: IsActive<Def<E>['flag'], G> extends true ? E : never;
  }[EndpointName];

/**
 * Active endpoints that paginate through Link headers.
 */
export type PagedEndpointName<G extends Generation> = ActiveEndpointName<G> &
  {
    [E in EndpointName]: Def<E>['response'] extends ResponseSpec<unknown, 'paged'> ? E : never;
  }[EndpointName];
