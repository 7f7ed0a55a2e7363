/**
 * Streaming API support.
 */

export { STREAM_EVENTS, STREAM_TIMELINES } from './definitions.js';
export type {
  PayloadSpec,
  StreamEventDefinition,
  StreamTimelineDefinition,
} from './definitions.js';
export { FrameParser } from './frames.js';
export type { RawFrame } from './frames.js';
export { EventReader } from './reader.js';
export type { EventReaderOptions, NextEventOptions, ReaderState } from './reader.js';
export { ReconnectingEventReader } from './reconnect.js';
export type { ReconnectOptions, ReconnectingStreamEvent } from './reconnect.js';
export { FetchStreamTransport, LineBuffer } from './transport.js';
export type { StreamConnection, StreamRequest, StreamTransport } from './transport.js';
export type * from './types.js';
