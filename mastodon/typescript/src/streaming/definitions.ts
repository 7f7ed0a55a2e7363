/**
 * Streaming timelines and event tags.
 */

import type { CapabilityFlag } from '../capabilities/matrix.js';
import type { AuthMode } from '../endpoints/definitions.js';
import { Codec, entity } from '../entities/schema.js';

export interface StreamTimelineDefinition {
  readonly path: string;
  readonly flag: CapabilityFlag;
  readonly auth: AuthMode;
  /** Query parameter the timeline is addressed by */
  readonly param?: string;
}

export const STREAM_TIMELINES = {
  user: { path: '/api/v1/streaming/user', flag: 'streaming', auth: 'required' },
  public: { path: '/api/v1/streaming/public', flag: 'streaming', auth: 'optional' },
  'public:local': { path: '/api/v1/streaming/public/local', flag: 'streaming', auth: 'optional' },
  hashtag: {
    path: '/api/v1/streaming/hashtag',
    flag: 'streaming',
    auth: 'optional',
    param: 'tag',
  },
  'hashtag:local': {
    path: '/api/v1/streaming/hashtag/local',
    flag: 'streaming',
    auth: 'optional',
    param: 'tag',
  },
  list: { path: '/api/v1/streaming/list', flag: 'list', auth: 'required', param: 'list' },
  direct: { path: '/api/v1/streaming/direct', flag: 'conversation', auth: 'required' },
} as const satisfies Readonly<Record<string, StreamTimelineDefinition>>;

/**
 * How an event's payload text is read: JSON decoded through a codec, kept
 * as plain text (an id), or ignored.
 */
export type PayloadSpec<C = Codec> =
  | { readonly kind: 'json'; readonly codec: C }
  | { readonly kind: 'text' }
  | { readonly kind: 'none' };

export interface StreamEventDefinition {
  readonly flag: CapabilityFlag;
  readonly payload: PayloadSpec;
}

function json<const C extends Codec>(codec: C): { readonly kind: 'json'; readonly codec: C } {
  return { kind: 'json', codec };
}

const plainText = { kind: 'text' } as const;
const noPayload = { kind: 'none' } as const;

export const STREAM_EVENTS = {
  update: { flag: 'streaming', payload: json(entity('status')) },
  notification: { flag: 'streaming', payload: json(entity('notification')) },
  delete: { flag: 'streaming', payload: plainText },
  filters_changed: { flag: 'filter', payload: noPayload },
  conversation: { flag: 'conversation', payload: json(entity('conversation')) },
  announcement: { flag: 'announcement', payload: json(entity('announcement')) },
  'announcement.reaction': {
    flag: 'announcement',
    payload: json(entity('announcement_reaction_event')),
  },
  'announcement.delete': { flag: 'announcement', payload: plainText },
} as const satisfies Readonly<Record<string, StreamEventDefinition>>;
