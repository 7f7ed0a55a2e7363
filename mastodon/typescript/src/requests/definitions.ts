/**
 * Versioned request payloads and query filters.
 *
 * Declared the same way as entities: every parameter names the flag that
 * owns it, so a parameter the target generation does not accept is absent
 * from the request type and dropped by the encoder.
 */

import { z } from 'zod';
import { FILTER_CONTEXT, NOTIFICATION_TYPE, REPLIES_POLICY, VISIBILITY } from '../entities/definitions.js';
import {
  FieldSpec,
  ListCodec,
  VariantsCodec,
  count,
  flag,
  id,
  listOf,
  nullable,
  optional,
  required,
  text,
  timestamp,
  url,
  variants,
} from '../entities/schema.js';
import type { CapabilityFlag } from '../capabilities/matrix.js';

/**
 * Reference to another request definition, encoded as a nested object.
 */
export interface NestedRequest<N extends string = string> {
  readonly kind: 'request';
  readonly name: N;
}

export type RequestCodec = z.ZodTypeAny | VariantsCodec | ListCodec<RequestCodec> | NestedRequest;

/**
 * How a body is put on the wire. Query definitions ignore it.
 */
export type BodyEncoding = 'json' | 'multipart';

export interface RequestDefinition {
  readonly flag: CapabilityFlag;
  readonly encoding?: BodyEncoding;
  readonly fields: Readonly<Record<string, FieldSpec<RequestCodec>>>;
}

export function nested<const N extends string>(name: N): NestedRequest<N> {
  return { kind: 'request', name };
}

/** File contents for multipart uploads. */
const file = z.instanceof(Blob);

/** Media focal point, sent as `"x,y"`. */
const focusPoint = z
  .object({ x: z.number().min(-1).max(1), y: z.number().min(-1).max(1) })
  .transform(({ x, y }) => `${x},${y}`);

const PAGE_FIELDS = {
  max_id: optional(id, 'pagination'),
  since_id: optional(id, 'pagination'),
  min_id: optional(id, 'pagination.min_id'),
  limit: optional(count, 'pagination'),
} as const;

export const REQUEST_DEFINITIONS = {
  // Queries

  page_query: {
    flag: 'pagination',
    fields: PAGE_FIELDS,
  },
  timeline_query: {
    flag: 'timelines',
    fields: {
      ...PAGE_FIELDS,
      local: optional(flag, 'timelines'),
      only_media: optional(flag, 'timelines.query.only_media'),
    },
  },
  account_statuses_query: {
    flag: 'accounts',
    fields: {
      ...PAGE_FIELDS,
      only_media: optional(flag, 'accounts'),
      exclude_replies: optional(flag, 'accounts'),
      pinned: optional(flag, 'statuses.query.pinned'),
      exclude_reblogs: optional(flag, 'statuses.query.exclude_reblogs'),
    },
  },
  notifications_query: {
    flag: 'notifications',
    fields: {
      ...PAGE_FIELDS,
      exclude_types: optional(listOf(NOTIFICATION_TYPE), 'notifications'),
      account_id: optional(id, 'notifications.query.account_id'),
    },
  },
  account_search_query: {
    flag: 'accounts.search',
    fields: {
      q: required(text, 'accounts.search'),
      limit: optional(count, 'accounts.search'),
      resolve: optional(flag, 'accounts.search'),
      following: optional(flag, 'accounts.search'),
    },
  },
  search_v1_query: {
    flag: 'search.v1',
    fields: {
      q: required(text, 'search.v1'),
      resolve: optional(flag, 'search.v1'),
    },
  },
  search_v2_query: {
    flag: 'search.v2',
    fields: {
      q: required(text, 'search.v2'),
      resolve: optional(flag, 'search.v2'),
      limit: optional(count, 'search.v2'),
      type: optional(
        variants({
          accounts: 'search.v2.filters',
          hashtags: 'search.v2.filters',
          statuses: 'search.v2.filters',
        }),
        'search.v2.filters'
      ),
      offset: optional(count, 'search.v2.filters'),
      account_id: optional(id, 'search.v2.filters'),
      following: optional(flag, 'search.v2.filters'),
      max_id: optional(id, 'search.v2.filters'),
      min_id: optional(id, 'search.v2.filters'),
      exclude_unreviewed: optional(flag, 'search.v2.exclude_unreviewed'),
    },
  },
  relationships_query: {
    flag: 'relationships',
    fields: {
      id: required(listOf(id), 'relationships'),
    },
  },
  directory_query: {
    flag: 'directory',
    fields: {
      offset: optional(count, 'directory'),
      limit: optional(count, 'directory'),
      order: optional(variants({ active: 'directory', new: 'directory' }), 'directory'),
      local: optional(flag, 'directory'),
    },
  },
  limit_query: {
    flag: 'pagination',
    fields: {
      limit: optional(count, 'pagination'),
    },
  },
  markers_query: {
    flag: 'marker',
    fields: {
      timeline: required(listOf(variants({ home: 'marker', notifications: 'marker' })), 'marker'),
    },
  },
  admin_accounts_query: {
    flag: 'admin',
    fields: {
      ...PAGE_FIELDS,
      local: optional(flag, 'admin'),
      remote: optional(flag, 'admin'),
      by_domain: optional(text, 'admin'),
      active: optional(flag, 'admin'),
      pending: optional(flag, 'admin'),
      disabled: optional(flag, 'admin'),
      silenced: optional(flag, 'admin'),
      suspended: optional(flag, 'admin'),
      username: optional(text, 'admin'),
      display_name: optional(text, 'admin'),
      email: optional(text, 'admin'),
      ip: optional(text, 'admin'),
      staff: optional(flag, 'admin'),
    },
  },
  admin_reports_query: {
    flag: 'admin',
    fields: {
      ...PAGE_FIELDS,
      resolved: optional(flag, 'admin'),
      account_id: optional(id, 'admin'),
      target_account_id: optional(id, 'admin'),
    },
  },

  // Bodies

  new_status: {
    flag: 'statuses',
    encoding: 'json',
    fields: {
      status: optional(text, 'statuses'),
      in_reply_to_id: optional(id, 'statuses'),
      media_ids: optional(listOf(id), 'statuses'),
      sensitive: optional(flag, 'statuses'),
      spoiler_text: optional(text, 'statuses'),
      visibility: optional(VISIBILITY, 'statuses'),
      language: optional(text, 'statuses'),
      poll: optional(nested('new_poll'), 'poll'),
      scheduled_at: optional(timestamp, 'scheduled_status'),
    },
  },
  new_poll: {
    flag: 'poll',
    fields: {
      options: required(listOf(text), 'poll'),
      expires_in: required(count, 'poll'),
      multiple: optional(flag, 'poll'),
      hide_totals: optional(flag, 'poll'),
    },
  },
  update_credentials: {
    flag: 'accounts',
    encoding: 'multipart',
    fields: {
      display_name: optional(text, 'accounts'),
      note: optional(text, 'accounts'),
      avatar: optional(file, 'accounts'),
      header: optional(file, 'accounts'),
      locked: optional(flag, 'accounts'),
      source: optional(nested('update_source'), 'accounts'),
      bot: optional(flag, 'account.bot'),
      fields_attributes: optional(listOf(nested('metadata_field_input')), 'account.fields'),
      discoverable: optional(flag, 'account.discoverable'),
    },
  },
  update_source: {
    flag: 'accounts',
    fields: {
      privacy: optional(VISIBILITY, 'accounts'),
      sensitive: optional(flag, 'accounts'),
      language: optional(text, 'source.language'),
    },
  },
  metadata_field_input: {
    flag: 'account.fields',
    fields: {
      name: required(text, 'account.fields'),
      value: required(text, 'account.fields'),
    },
  },
  follow_options: {
    flag: 'accounts',
    encoding: 'json',
    fields: {
      reblogs: optional(flag, 'follow.reblogs'),
      notify: optional(flag, 'follow.notify'),
    },
  },
  mute_options: {
    flag: 'mutes',
    encoding: 'json',
    fields: {
      notifications: optional(flag, 'mute.notifications'),
      duration: optional(count, 'mute.duration'),
    },
  },
  remote_follow: {
    flag: 'follows.remote',
    encoding: 'json',
    fields: {
      uri: required(text, 'follows.remote'),
    },
  },
  domain_block: {
    flag: 'domain_blocks',
    encoding: 'json',
    fields: {
      domain: required(text, 'domain_blocks'),
    },
  },
  add_filter: {
    flag: 'filter',
    encoding: 'json',
    fields: {
      phrase: required(text, 'filter'),
      context: required(listOf(FILTER_CONTEXT), 'filter'),
      irreversible: optional(flag, 'filter'),
      whole_word: optional(flag, 'filter'),
      expires_in: nullable(count, 'filter'),
    },
  },
  filter_update: {
    flag: 'filter',
    encoding: 'json',
    fields: {
      phrase: optional(text, 'filter'),
      context: optional(listOf(FILTER_CONTEXT), 'filter'),
      irreversible: optional(flag, 'filter'),
      whole_word: optional(flag, 'filter'),
      expires_in: nullable(count, 'filter'),
    },
  },
  list_request: {
    flag: 'list',
    encoding: 'json',
    fields: {
      title: required(text, 'list'),
      replies_policy: optional(REPLIES_POLICY, 'list.replies_policy'),
    },
  },
  list_accounts: {
    flag: 'list',
    encoding: 'json',
    fields: {
      account_ids: required(listOf(id), 'list'),
    },
  },
  media_upload: {
    flag: 'media',
    encoding: 'multipart',
    fields: {
      file: required(file, 'media'),
      description: optional(text, 'attachment.description'),
      focus: optional(focusPoint, 'attachment.focus'),
    },
  },
  media_update: {
    flag: 'media.update',
    encoding: 'json',
    fields: {
      description: optional(text, 'media.update'),
      focus: optional(focusPoint, 'media.update'),
    },
  },
  report_request: {
    flag: 'reports',
    encoding: 'json',
    fields: {
      account_id: required(id, 'reports'),
      status_ids: optional(listOf(id), 'reports'),
      comment: optional(text, 'reports'),
      forward: optional(flag, 'report.forward'),
    },
  },
  add_push_subscription: {
    flag: 'push',
    encoding: 'json',
    fields: {
      subscription: required(nested('push_subscription_input'), 'push'),
      data: optional(nested('push_data'), 'push'),
    },
  },
  push_subscription_input: {
    flag: 'push',
    fields: {
      endpoint: required(url, 'push'),
      keys: required(nested('push_keys'), 'push'),
    },
  },
  push_keys: {
    flag: 'push',
    fields: {
      p256dh: required(text, 'push'),
      auth: required(text, 'push'),
    },
  },
  push_data: {
    flag: 'push',
    fields: {
      alerts: optional(nested('push_alerts_input'), 'push'),
    },
  },
  push_alerts_input: {
    flag: 'push',
    fields: {
      follow: optional(flag, 'push'),
      favourite: optional(flag, 'push'),
      reblog: optional(flag, 'push'),
      mention: optional(flag, 'push'),
      poll: optional(flag, 'push.alerts.poll'),
      follow_request: optional(flag, 'push.alerts.follow_request'),
      status: optional(flag, 'push.alerts.status'),
    },
  },
  update_push_data: {
    flag: 'push',
    encoding: 'json',
    fields: {
      data: required(nested('push_data'), 'push'),
    },
  },
  poll_vote: {
    flag: 'poll',
    encoding: 'json',
    fields: {
      choices: required(listOf(count), 'poll'),
    },
  },
  scheduled_status_update: {
    flag: 'scheduled_status',
    encoding: 'json',
    fields: {
      scheduled_at: required(timestamp, 'scheduled_status'),
    },
  },
  markers_update: {
    flag: 'marker',
    encoding: 'json',
    fields: {
      home: optional(nested('marker_position'), 'marker'),
      notifications: optional(nested('marker_position'), 'marker'),
    },
  },
  marker_position: {
    flag: 'marker',
    fields: {
      last_read_id: required(id, 'marker'),
    },
  },
  featured_tag_request: {
    flag: 'featured_tag',
    encoding: 'json',
    fields: {
      name: required(text, 'featured_tag'),
    },
  },
  dismiss_notification: {
    flag: 'notifications.dismiss.legacy',
    encoding: 'json',
    fields: {
      id: required(id, 'notifications.dismiss.legacy'),
    },
  },
  admin_action: {
    flag: 'admin',
    encoding: 'json',
    fields: {
      type: required(
        variants({ none: 'admin', disable: 'admin', silence: 'admin', suspend: 'admin' }),
        'admin'
      ),
      report_id: optional(id, 'admin'),
      warning_preset_id: optional(id, 'admin'),
      text: optional(text, 'admin'),
      send_email_notification: optional(flag, 'admin'),
    },
  },
} as const satisfies Readonly<Record<string, RequestDefinition>>;
