import type { Generation } from '../capabilities/generations.js';
import type { IsActive } from '../capabilities/matrix.js';
import type { CodecValue } from '../entities/types.js';
import type { STREAM_EVENTS, STREAM_TIMELINES } from './definitions.js';

type Timelines = typeof STREAM_TIMELINES;
type Events = typeof STREAM_EVENTS;

export type StreamTimelineName = keyof Timelines & string;

/**
 * Timelines that can be streamed at `G`.
 */
export type ActiveStreamTimeline<G extends Generation> = StreamTimelineName &
  {
    [T in StreamTimelineName]: IsActive<Timelines[T]['flag'], G> extends true ? T : never;
  }[StreamTimelineName];

/**
 * Addressing parameters of a timeline, such as `{ tag: 'cats' }`.
 */
export type StreamParams<T extends StreamTimelineName> = Timelines[T] extends {
  readonly param: infer P extends string;
}
  ? { readonly [K in P]: string }
  : Record<never, never>;

export type StreamCallArgs<T extends StreamTimelineName> =
  {} extends StreamParams<T> ? [params?: StreamParams<T>] : [params: StreamParams<T>];

export type StreamEventTag = keyof Events & string;

/**
 * Event tags a reader built for `G` classifies.
 */
export type ActiveStreamEventTag<G extends Generation> = StreamEventTag &
  {
    [T in StreamEventTag]: IsActive<Events[T]['flag'], G> extends true ? T : never;
  }[StreamEventTag];

type PayloadValue<P, G extends Generation> = P extends { readonly kind: 'json'; readonly codec: infer C }
  ? CodecValue<C, G>
  : P extends { readonly kind: 'text' }
    ? string
    : undefined;

/**
 * A frame whose tag is unknown, or not part of the target generation.
 */
export interface UnrecognizedEvent {
  readonly type: 'unrecognized';
  readonly event: string;
  readonly payload?: string;
}

/**
 * One classified streaming event at `G`.
 */
export type StreamingEvent<G extends Generation> =
  | {
      [T in ActiveStreamEventTag<G>]: {
        readonly type: T;
        readonly payload: PayloadValue<Events[T]['payload'], G>;
      };
    }[ActiveStreamEventTag<G>]
  | UnrecognizedEvent;

/**
 * Marker yielded by the reconnecting reader after it re-established the
 * connection. Events sent while disconnected may have been missed.
 */
export interface ReconnectedEvent {
  readonly type: 'reconnected';
  readonly attempt: number;
}
