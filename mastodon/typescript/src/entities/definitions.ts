/**
 * Versioned entity declarations.
 *
 * Every field names the capability flag that owns it. Fields present since
 * the baseline carry the entity's own flag.
 */

import { z } from 'zod';
import {
  EntityDefinition,
  count,
  date,
  entity,
  flag,
  id,
  jsonObject,
  listOf,
  looseBoolean,
  nullable,
  number,
  optional,
  required,
  text,
  timestamp,
  url,
  variants,
} from './schema.js';

export const VISIBILITY = variants({
  public: 'status',
  unlisted: 'status',
  private: 'status',
  direct: 'status',
});

export const MEDIA_TYPE = variants({
  image: 'attachment',
  video: 'attachment',
  gifv: 'attachment',
  unknown: 'attachment',
  audio: 'attachment.audio',
});

export const CARD_TYPE = variants({
  link: 'card',
  photo: 'card',
  video: 'card',
  rich: 'card',
});

export const NOTIFICATION_TYPE = variants({
  mention: 'notification',
  reblog: 'notification',
  favourite: 'notification',
  follow: 'notification',
  poll: 'notification.poll',
  follow_request: 'notification.follow_request',
  status: 'notification.status',
});

export const FILTER_CONTEXT = variants({
  home: 'filter',
  notifications: 'filter',
  public: 'filter',
  thread: 'filter',
  account: 'filter.account_context',
});

export const REPLIES_POLICY = variants({
  followed: 'list.replies_policy',
  list: 'list.replies_policy',
  none: 'list.replies_policy',
});

/** Push subscription ids were numeric on older servers. */
const subscriptionId = z.union([z.string(), z.number()]).transform(String);

export const ENTITY_DEFINITIONS = {
  account: {
    flag: 'account',
    fields: {
      id: required(id, 'account'),
      username: required(text, 'account'),
      acct: required(text, 'account'),
      url: required(url, 'account'),
      display_name: required(text, 'account'),
      note: required(text, 'account'),
      avatar: required(url, 'account'),
      avatar_static: required(url, 'account'),
      header: required(url, 'account'),
      header_static: required(url, 'account'),
      locked: required(flag, 'account'),
      created_at: required(timestamp, 'account'),
      statuses_count: required(count, 'account'),
      followers_count: required(count, 'account'),
      following_count: required(count, 'account'),
      emojis: required(listOf(entity('emoji')), 'account.emojis'),
      discoverable: nullable(flag, 'account.discoverable'),
      last_status_at: nullable(date, 'account.last_status_at'),
      moved: optional(entity('account'), 'account.moved'),
      fields: optional(listOf(entity('metadata_field')), 'account.fields'),
      bot: optional(flag, 'account.bot'),
      source: optional(entity('source'), 'account.source'),
      suspended: optional(flag, 'account.suspended'),
      mute_expires_at: optional(timestamp, 'account.mute_expires_at'),
    },
  },
  metadata_field: {
    flag: 'account.fields',
    fields: {
      name: required(text, 'account.fields'),
      value: required(text, 'account.fields'),
      verified_at: nullable(timestamp, 'field.verified_at'),
    },
  },
  source: {
    flag: 'source',
    fields: {
      note: required(text, 'source'),
      privacy: optional(VISIBILITY, 'source'),
      sensitive: optional(looseBoolean, 'source'),
      fields: required(listOf(entity('metadata_field')), 'account.fields'),
      language: optional(text, 'source.language'),
      follow_requests_count: optional(count, 'source.follow_requests_count'),
    },
  },
  emoji: {
    flag: 'emoji',
    fields: {
      shortcode: required(text, 'emoji'),
      url: required(url, 'emoji'),
      static_url: required(url, 'emoji'),
      visible_in_picker: required(flag, 'emoji'),
      category: optional(text, 'emoji.category'),
    },
  },
  status: {
    flag: 'status',
    fields: {
      id: required(id, 'status'),
      uri: required(text, 'status'),
      url: nullable(url, 'status'),
      account: required(entity('account'), 'status'),
      in_reply_to_id: nullable(id, 'status'),
      in_reply_to_account_id: nullable(id, 'status'),
      reblog: nullable(entity('status'), 'status'),
      content: required(text, 'status'),
      created_at: required(timestamp, 'status'),
      reblogs_count: required(count, 'status'),
      favourites_count: required(count, 'status'),
      reblogged: optional(flag, 'status'),
      favourited: optional(flag, 'status'),
      muted: optional(flag, 'status'),
      sensitive: required(flag, 'status'),
      spoiler_text: required(text, 'status'),
      visibility: required(VISIBILITY, 'status'),
      media_attachments: required(listOf(entity('attachment')), 'status'),
      mentions: required(listOf(entity('mention')), 'status'),
      tags: required(listOf(entity('tag')), 'status'),
      application: optional(entity('application'), 'status'),
      language: nullable(text, 'status'),
      emojis: required(listOf(entity('emoji')), 'status.emojis'),
      pinned: optional(flag, 'status.pinned'),
      replies_count: required(count, 'status.replies_count'),
      card: nullable(entity('card'), 'status.card'),
      poll: nullable(entity('poll'), 'poll'),
      bookmarked: optional(flag, 'bookmarks'),
    },
  },
  mention: {
    flag: 'mention',
    fields: {
      id: required(id, 'mention'),
      url: required(url, 'mention'),
      username: required(text, 'mention'),
      acct: required(text, 'mention'),
    },
  },
  tag: {
    flag: 'tag',
    fields: {
      name: required(text, 'tag'),
      url: required(url, 'tag'),
      history: optional(listOf(entity('tag_history')), 'tag.history'),
    },
  },
  tag_history: {
    flag: 'tag.history',
    fields: {
      day: required(text, 'tag.history'),
      uses: required(text, 'tag.history'),
      accounts: required(text, 'tag.history'),
    },
  },
  application: {
    flag: 'application',
    fields: {
      name: required(text, 'application'),
      website: optional(url, 'application'),
      client_id: optional(text, 'application'),
      client_secret: optional(text, 'application'),
      vapid_key: optional(text, 'application.vapid_key'),
    },
  },
  attachment: {
    flag: 'attachment',
    fields: {
      id: required(id, 'attachment'),
      type: required(MEDIA_TYPE, 'attachment'),
      url: required(url, 'attachment'),
      preview_url: required(url, 'attachment'),
      remote_url: nullable(url, 'attachment'),
      text_url: optional(url, 'attachment'),
      meta: optional(entity('attachment_meta'), 'attachment'),
      description: nullable(text, 'attachment.description'),
      blurhash: nullable(text, 'attachment.blurhash'),
    },
  },
  attachment_meta: {
    flag: 'attachment',
    fields: {
      original: optional(entity('image_details'), 'attachment'),
      small: optional(entity('image_details'), 'attachment'),
      focus: optional(entity('focus'), 'attachment.focus'),
    },
  },
  image_details: {
    flag: 'attachment',
    fields: {
      width: optional(count, 'attachment'),
      height: optional(count, 'attachment'),
      size: optional(text, 'attachment'),
      aspect: optional(number, 'attachment'),
      duration: optional(number, 'attachment.audio'),
      bitrate: optional(count, 'attachment.audio'),
    },
  },
  focus: {
    flag: 'attachment.focus',
    fields: {
      x: required(number, 'attachment.focus'),
      y: required(number, 'attachment.focus'),
    },
  },
  card: {
    flag: 'card',
    fields: {
      url: required(url, 'card'),
      title: required(text, 'card'),
      description: required(text, 'card'),
      type: required(CARD_TYPE, 'card'),
      author_name: optional(text, 'card'),
      author_url: optional(url, 'card'),
      provider_name: optional(text, 'card'),
      provider_url: optional(url, 'card'),
      html: optional(text, 'card'),
      width: optional(count, 'card'),
      height: optional(count, 'card'),
      image: nullable(url, 'card'),
      embed_url: optional(url, 'card.embed_url'),
      blurhash: optional(text, 'card.blurhash'),
    },
  },
  poll: {
    flag: 'poll',
    fields: {
      id: required(id, 'poll'),
      expires_at: nullable(timestamp, 'poll'),
      expired: required(flag, 'poll'),
      multiple: required(flag, 'poll'),
      votes_count: required(count, 'poll'),
      voters_count: optional(count, 'poll'),
      options: required(listOf(entity('poll_option')), 'poll'),
      voted: optional(flag, 'poll'),
      own_votes: optional(listOf(count), 'poll'),
      emojis: required(listOf(entity('emoji')), 'poll'),
    },
  },
  poll_option: {
    flag: 'poll',
    fields: {
      title: required(text, 'poll'),
      votes_count: nullable(count, 'poll'),
    },
  },
  notification: {
    flag: 'notification',
    fields: {
      id: required(id, 'notification'),
      type: required(NOTIFICATION_TYPE, 'notification'),
      created_at: required(timestamp, 'notification'),
      account: required(entity('account'), 'notification'),
      status: optional(entity('status'), 'notification'),
    },
  },
  relationship: {
    flag: 'relationship',
    fields: {
      id: required(id, 'relationship'),
      following: required(flag, 'relationship'),
      followed_by: required(flag, 'relationship'),
      blocking: required(flag, 'relationship'),
      muting: required(flag, 'relationship'),
      requested: required(flag, 'relationship'),
      domain_blocking: required(flag, 'relationship'),
      showing_reblogs: required(flag, 'relationship.showing_reblogs'),
      muting_notifications: required(flag, 'relationship.muting_notifications'),
      endorsed: required(flag, 'relationship.endorsed'),
      blocked_by: required(flag, 'relationship.blocked_by'),
      notifying: required(flag, 'relationship.notifying'),
    },
  },
  context: {
    flag: 'context',
    fields: {
      ancestors: required(listOf(entity('status')), 'context'),
      descendants: required(listOf(entity('status')), 'context'),
    },
  },
  search_result: {
    flag: 'search.v1',
    fields: {
      accounts: required(listOf(entity('account')), 'search.v1'),
      statuses: required(listOf(entity('status')), 'search.v1'),
      hashtags: required(listOf(text), 'search.v1'),
    },
  },
  search_result_v2: {
    flag: 'search.v2',
    fields: {
      accounts: required(listOf(entity('account')), 'search.v2'),
      statuses: required(listOf(entity('status')), 'search.v2'),
      hashtags: required(listOf(entity('tag')), 'search.v2'),
    },
  },
  filter: {
    flag: 'filter',
    fields: {
      id: required(id, 'filter'),
      phrase: required(text, 'filter'),
      context: required(listOf(FILTER_CONTEXT), 'filter'),
      expires_at: nullable(timestamp, 'filter'),
      irreversible: required(flag, 'filter'),
      whole_word: required(flag, 'filter'),
    },
  },
  list: {
    flag: 'list',
    fields: {
      id: required(id, 'list'),
      title: required(text, 'list'),
      replies_policy: optional(REPLIES_POLICY, 'list.replies_policy'),
    },
  },
  instance: {
    flag: 'instance',
    fields: {
      uri: required(text, 'instance'),
      title: required(text, 'instance'),
      description: required(text, 'instance'),
      email: required(text, 'instance'),
      version: required(text, 'instance'),
      urls: required(entity('instance_urls'), 'instance'),
      thumbnail: nullable(url, 'instance.thumbnail'),
      stats: required(entity('instance_stats'), 'instance.stats'),
      languages: required(listOf(text), 'instance.languages'),
      contact_account: nullable(entity('account'), 'instance.contact_account'),
      registrations: required(flag, 'instance.registrations'),
      short_description: required(text, 'instance.short_description'),
      approval_required: required(flag, 'instance.approval_required'),
    },
  },
  instance_urls: {
    flag: 'instance',
    fields: {
      streaming_api: required(url, 'instance'),
    },
  },
  instance_stats: {
    flag: 'instance.stats',
    fields: {
      user_count: required(count, 'instance.stats'),
      status_count: required(count, 'instance.stats'),
      domain_count: required(count, 'instance.stats'),
    },
  },
  instance_activity: {
    flag: 'instance.activity',
    fields: {
      week: required(text, 'instance.activity'),
      statuses: required(text, 'instance.activity'),
      logins: required(text, 'instance.activity'),
      registrations: required(text, 'instance.activity'),
    },
  },
  report: {
    flag: 'report',
    fields: {
      id: required(id, 'report'),
      action_taken: required(flag, 'report'),
    },
  },
  admin_account: {
    flag: 'admin',
    fields: {
      id: required(id, 'admin'),
      username: required(text, 'admin'),
      domain: nullable(text, 'admin'),
      created_at: required(timestamp, 'admin'),
      email: required(text, 'admin'),
      ip: nullable(text, 'admin'),
      locale: required(text, 'admin'),
      invite_request: nullable(text, 'admin'),
      role: required(text, 'admin'),
      confirmed: required(flag, 'admin'),
      approved: required(flag, 'admin'),
      disabled: required(flag, 'admin'),
      silenced: required(flag, 'admin'),
      suspended: required(flag, 'admin'),
      account: required(entity('account'), 'admin'),
      created_by_application_id: optional(id, 'admin'),
      invited_by_account_id: optional(id, 'admin'),
    },
  },
  admin_report: {
    flag: 'admin',
    fields: {
      id: required(id, 'admin'),
      action_taken: required(flag, 'admin'),
      comment: required(text, 'admin'),
      created_at: required(timestamp, 'admin'),
      updated_at: required(timestamp, 'admin'),
      account: required(entity('account'), 'admin'),
      target_account: required(entity('account'), 'admin'),
      assigned_account: nullable(entity('account'), 'admin'),
      action_taken_by_account: nullable(entity('account'), 'admin'),
      statuses: required(listOf(entity('status')), 'admin'),
    },
  },
  announcement: {
    flag: 'announcement',
    fields: {
      id: required(id, 'announcement'),
      content: required(text, 'announcement'),
      starts_at: nullable(timestamp, 'announcement'),
      ends_at: nullable(timestamp, 'announcement'),
      all_day: required(flag, 'announcement'),
      published_at: required(timestamp, 'announcement'),
      updated_at: required(timestamp, 'announcement'),
      read: optional(flag, 'announcement'),
      mentions: required(listOf(entity('mention')), 'announcement'),
      tags: required(listOf(entity('tag')), 'announcement'),
      emojis: required(listOf(entity('emoji')), 'announcement'),
      reactions: required(listOf(entity('announcement_reaction')), 'announcement'),
    },
  },
  announcement_reaction: {
    flag: 'announcement',
    fields: {
      name: required(text, 'announcement'),
      count: required(count, 'announcement'),
      me: optional(flag, 'announcement'),
      url: optional(url, 'announcement'),
      static_url: optional(url, 'announcement'),
    },
  },
  announcement_reaction_event: {
    flag: 'announcement',
    fields: {
      name: required(text, 'announcement'),
      count: required(count, 'announcement'),
      announcement_id: required(id, 'announcement'),
    },
  },
  push_subscription: {
    flag: 'push',
    fields: {
      id: required(subscriptionId, 'push'),
      endpoint: required(url, 'push'),
      server_key: required(text, 'push'),
      alerts: optional(entity('push_alerts'), 'push'),
    },
  },
  push_alerts: {
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
  marker: {
    flag: 'marker',
    fields: {
      last_read_id: required(id, 'marker'),
      version: required(count, 'marker'),
      updated_at: required(timestamp, 'marker'),
    },
  },
  marker_set: {
    flag: 'marker',
    fields: {
      home: optional(entity('marker'), 'marker'),
      notifications: optional(entity('marker'), 'marker'),
    },
  },
  scheduled_status: {
    flag: 'scheduled_status',
    fields: {
      id: required(id, 'scheduled_status'),
      scheduled_at: required(timestamp, 'scheduled_status'),
      params: required(jsonObject, 'scheduled_status'),
      media_attachments: required(listOf(entity('attachment')), 'scheduled_status'),
    },
  },
  conversation: {
    flag: 'conversation',
    fields: {
      id: required(id, 'conversation'),
      accounts: required(listOf(entity('account')), 'conversation'),
      unread: required(flag, 'conversation'),
      last_status: nullable(entity('status'), 'conversation'),
    },
  },
  featured_tag: {
    flag: 'featured_tag',
    fields: {
      id: required(id, 'featured_tag'),
      name: required(text, 'featured_tag'),
      statuses_count: required(count, 'featured_tag'),
      last_status_at: nullable(date, 'featured_tag'),
    },
  },
  preferences: {
    flag: 'preferences',
    fields: {
      'posting:default:visibility': required(VISIBILITY, 'preferences'),
      'posting:default:sensitive': required(flag, 'preferences'),
      'posting:default:language': nullable(text, 'preferences'),
      'reading:expand:media': required(text, 'preferences'),
      'reading:expand:spoilers': required(flag, 'preferences'),
    },
  },
  identity_proof: {
    flag: 'identity_proof',
    fields: {
      provider: required(text, 'identity_proof'),
      provider_username: required(text, 'identity_proof'),
      profile_url: required(url, 'identity_proof'),
      proof_url: required(url, 'identity_proof'),
      updated_at: required(timestamp, 'identity_proof'),
    },
  },
  empty: {
    flag: 'statuses',
    fields: {},
  },
} as const satisfies Readonly<Record<string, EntityDefinition>>;
