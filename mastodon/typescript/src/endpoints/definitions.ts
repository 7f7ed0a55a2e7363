/**
 * Endpoint declarations.
 *
 * Each operation names the flag that makes it available, the entity its
 * response decodes to, and the request definitions of its query string and
 * body. Path parameters are written `:name` and are part of the call
 * arguments.
 */

import type { CapabilityFlag } from '../capabilities/matrix.js';
import { Codec, entity, text } from '../entities/schema.js';
import type { RequestName } from '../requests/types.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * `required`: the call fails before sending without an access token.
 * `optional`: the token is attached when configured.
 */
export type AuthMode = 'required' | 'optional';

/**
 * `one`: a single value. `many`: a JSON array. `paged`: a JSON array
 * paginated through Link headers.
 */
export type ResponseKind = 'one' | 'many' | 'paged';

export interface ResponseSpec<C = Codec, K extends ResponseKind = ResponseKind> {
  readonly kind: K;
  readonly codec: C;
}

export interface EndpointDefinition {
  readonly method: HttpMethod;
  readonly path: string;
  readonly flag: CapabilityFlag;
  readonly auth: AuthMode;
  readonly response: ResponseSpec;
  readonly query?: RequestName;
  readonly body?: RequestName;
}

export function one<const C extends Codec>(codec: C): ResponseSpec<C, 'one'> {
  return { kind: 'one', codec };
}

export function many<const C extends Codec>(codec: C): ResponseSpec<C, 'many'> {
  return { kind: 'many', codec };
}

export function paged<const C extends Codec>(codec: C): ResponseSpec<C, 'paged'> {
  return { kind: 'paged', codec };
}

const account = entity('account');
const status = entity('status');
const relationship = entity('relationship');
const empty = entity('empty');

export const ENDPOINTS = {
  // Accounts

  'accounts.get': {
    method: 'GET',
    path: '/api/v1/accounts/:id',
    flag: 'accounts',
    auth: 'optional',
    response: one(account),
  },
  'accounts.verify_credentials': {
    method: 'GET',
    path: '/api/v1/accounts/verify_credentials',
    flag: 'accounts',
    auth: 'required',
    response: one(account),
  },
  'accounts.update_credentials': {
    method: 'PATCH',
    path: '/api/v1/accounts/update_credentials',
    flag: 'accounts',
    auth: 'required',
    response: one(account),
    body: 'update_credentials',
  },
  'accounts.followers': {
    method: 'GET',
    path: '/api/v1/accounts/:id/followers',
    flag: 'accounts',
    auth: 'optional',
    response: paged(account),
    query: 'page_query',
  },
  'accounts.following': {
    method: 'GET',
    path: '/api/v1/accounts/:id/following',
    flag: 'accounts',
    auth: 'optional',
    response: paged(account),
    query: 'page_query',
  },
  'accounts.statuses': {
    method: 'GET',
    path: '/api/v1/accounts/:id/statuses',
    flag: 'accounts',
    auth: 'optional',
    response: paged(status),
    query: 'account_statuses_query',
  },
  'accounts.follow': {
    method: 'POST',
    path: '/api/v1/accounts/:id/follow',
    flag: 'accounts',
    auth: 'required',
    response: one(relationship),
    body: 'follow_options',
  },
  'accounts.unfollow': {
    method: 'POST',
    path: '/api/v1/accounts/:id/unfollow',
    flag: 'accounts',
    auth: 'required',
    response: one(relationship),
  },
  'accounts.block': {
    method: 'POST',
    path: '/api/v1/accounts/:id/block',
    flag: 'blocks',
    auth: 'required',
    response: one(relationship),
  },
  'accounts.unblock': {
    method: 'POST',
    path: '/api/v1/accounts/:id/unblock',
    flag: 'blocks',
    auth: 'required',
    response: one(relationship),
  },
  'accounts.mute': {
    method: 'POST',
    path: '/api/v1/accounts/:id/mute',
    flag: 'mutes',
    auth: 'required',
    response: one(relationship),
    body: 'mute_options',
  },
  'accounts.unmute': {
    method: 'POST',
    path: '/api/v1/accounts/:id/unmute',
    flag: 'mutes',
    auth: 'required',
    response: one(relationship),
  },
  'accounts.pin': {
    method: 'POST',
    path: '/api/v1/accounts/:id/pin',
    flag: 'endorsements',
    auth: 'required',
    response: one(relationship),
  },
  'accounts.unpin': {
    method: 'POST',
    path: '/api/v1/accounts/:id/unpin',
    flag: 'endorsements',
    auth: 'required',
    response: one(relationship),
  },
  'accounts.lists': {
    method: 'GET',
    path: '/api/v1/accounts/:id/lists',
    flag: 'list',
    auth: 'required',
    response: many(entity('list')),
  },
  'accounts.identity_proofs': {
    method: 'GET',
    path: '/api/v1/accounts/:id/identity_proofs',
    flag: 'identity_proof',
    auth: 'required',
    response: many(entity('identity_proof')),
  },
  'accounts.search': {
    method: 'GET',
    path: '/api/v1/accounts/search',
    flag: 'accounts.search',
    auth: 'required',
    response: many(account),
    query: 'account_search_query',
  },
  'accounts.relationships': {
    method: 'GET',
    path: '/api/v1/accounts/relationships',
    flag: 'relationships',
    auth: 'required',
    response: many(relationship),
    query: 'relationships_query',
  },
  'follows.remote': {
    method: 'POST',
    path: '/api/v1/follows',
    flag: 'follows.remote',
    auth: 'required',
    response: one(account),
    body: 'remote_follow',
  },

  // Follow requests, blocks, mutes

  'follow_requests.list': {
    method: 'GET',
    path: '/api/v1/follow_requests',
    flag: 'follow_requests',
    auth: 'required',
    response: paged(account),
    query: 'page_query',
  },
  'follow_requests.authorize': {
    method: 'POST',
    path: '/api/v1/follow_requests/:id/authorize',
    flag: 'follow_requests',
    auth: 'required',
    response: one(empty),
  },
  'follow_requests.reject': {
    method: 'POST',
    path: '/api/v1/follow_requests/:id/reject',
    flag: 'follow_requests',
    auth: 'required',
    response: one(empty),
  },
  'blocks.list': {
    method: 'GET',
    path: '/api/v1/blocks',
    flag: 'blocks',
    auth: 'required',
    response: paged(account),
    query: 'page_query',
  },
  'mutes.list': {
    method: 'GET',
    path: '/api/v1/mutes',
    flag: 'mutes',
    auth: 'required',
    response: paged(account),
    query: 'page_query',
  },
  'domain_blocks.list': {
    method: 'GET',
    path: '/api/v1/domain_blocks',
    flag: 'domain_blocks',
    auth: 'required',
    response: paged(text),
    query: 'page_query',
  },
  'domain_blocks.block': {
    method: 'POST',
    path: '/api/v1/domain_blocks',
    flag: 'domain_blocks',
    auth: 'required',
    response: one(empty),
    body: 'domain_block',
  },
  'domain_blocks.unblock': {
    method: 'DELETE',
    path: '/api/v1/domain_blocks',
    flag: 'domain_blocks',
    auth: 'required',
    response: one(empty),
    query: 'domain_block',
  },

  // Endorsements, suggestions, featured tags

  'endorsements.list': {
    method: 'GET',
    path: '/api/v1/endorsements',
    flag: 'endorsements',
    auth: 'required',
    response: paged(account),
    query: 'page_query',
  },
  'suggestions.list': {
    method: 'GET',
    path: '/api/v1/suggestions',
    flag: 'suggestions',
    auth: 'required',
    response: many(account),
    query: 'limit_query',
  },
  'suggestions.remove': {
    method: 'DELETE',
    path: '/api/v1/suggestions/:account_id',
    flag: 'suggestions',
    auth: 'required',
    response: one(empty),
  },
  'featured_tags.list': {
    method: 'GET',
    path: '/api/v1/featured_tags',
    flag: 'featured_tag',
    auth: 'required',
    response: many(entity('featured_tag')),
  },
  'featured_tags.create': {
    method: 'POST',
    path: '/api/v1/featured_tags',
    flag: 'featured_tag',
    auth: 'required',
    response: one(entity('featured_tag')),
    body: 'featured_tag_request',
  },
  'featured_tags.delete': {
    method: 'DELETE',
    path: '/api/v1/featured_tags/:id',
    flag: 'featured_tag',
    auth: 'required',
    response: one(empty),
  },
  'featured_tags.suggestions': {
    method: 'GET',
    path: '/api/v1/featured_tags/suggestions',
    flag: 'featured_tag',
    auth: 'required',
    response: many(entity('tag')),
  },

  // Bookmarks and favourites

  'bookmarks.list': {
    method: 'GET',
    path: '/api/v1/bookmarks',
    flag: 'bookmarks',
    auth: 'required',
    response: paged(status),
    query: 'page_query',
  },
  'favourites.list': {
    method: 'GET',
    path: '/api/v1/favourites',
    flag: 'favourites',
    auth: 'required',
    response: paged(status),
    query: 'page_query',
  },

  // Filters

  'filters.list': {
    method: 'GET',
    path: '/api/v1/filters',
    flag: 'filter',
    auth: 'required',
    response: many(entity('filter')),
  },
  'filters.get': {
    method: 'GET',
    path: '/api/v1/filters/:id',
    flag: 'filter',
    auth: 'required',
    response: one(entity('filter')),
  },
  'filters.create': {
    method: 'POST',
    path: '/api/v1/filters',
    flag: 'filter',
    auth: 'required',
    response: one(entity('filter')),
    body: 'add_filter',
  },
  'filters.update': {
    method: 'PUT',
    path: '/api/v1/filters/:id',
    flag: 'filter',
    auth: 'required',
    response: one(entity('filter')),
    body: 'filter_update',
  },
  'filters.delete': {
    method: 'DELETE',
    path: '/api/v1/filters/:id',
    flag: 'filter',
    auth: 'required',
    response: one(empty),
  },

  // Lists

  'lists.list': {
    method: 'GET',
    path: '/api/v1/lists',
    flag: 'list',
    auth: 'required',
    response: many(entity('list')),
  },
  'lists.get': {
    method: 'GET',
    path: '/api/v1/lists/:id',
    flag: 'list',
    auth: 'required',
    response: one(entity('list')),
  },
  'lists.create': {
    method: 'POST',
    path: '/api/v1/lists',
    flag: 'list',
    auth: 'required',
    response: one(entity('list')),
    body: 'list_request',
  },
  'lists.update': {
    method: 'PUT',
    path: '/api/v1/lists/:id',
    flag: 'list',
    auth: 'required',
    response: one(entity('list')),
    body: 'list_request',
  },
  'lists.delete': {
    method: 'DELETE',
    path: '/api/v1/lists/:id',
    flag: 'list',
    auth: 'required',
    response: one(empty),
  },
  'lists.accounts': {
    method: 'GET',
    path: '/api/v1/lists/:id/accounts',
    flag: 'list',
    auth: 'required',
    response: paged(account),
    query: 'page_query',
  },
  'lists.add_accounts': {
    method: 'POST',
    path: '/api/v1/lists/:id/accounts',
    flag: 'list',
    auth: 'required',
    response: one(empty),
    body: 'list_accounts',
  },
  'lists.remove_accounts': {
    method: 'DELETE',
    path: '/api/v1/lists/:id/accounts',
    flag: 'list',
    auth: 'required',
    response: one(empty),
    query: 'list_accounts',
  },

  // Media

  'media.upload': {
    method: 'POST',
    path: '/api/v1/media',
    flag: 'media',
    auth: 'required',
    response: one(entity('attachment')),
    body: 'media_upload',
  },
  'media.update': {
    method: 'PUT',
    path: '/api/v1/media/:id',
    flag: 'media.update',
    auth: 'required',
    response: one(entity('attachment')),
    body: 'media_update',
  },

  // Notifications

  'notifications.list': {
    method: 'GET',
    path: '/api/v1/notifications',
    flag: 'notifications',
    auth: 'required',
    response: paged(entity('notification')),
    query: 'notifications_query',
  },
  'notifications.get': {
    method: 'GET',
    path: '/api/v1/notifications/:id',
    flag: 'notifications',
    auth: 'required',
    response: one(entity('notification')),
  },
  'notifications.clear': {
    method: 'POST',
    path: '/api/v1/notifications/clear',
    flag: 'notifications',
    auth: 'required',
    response: one(empty),
  },
  'notifications.dismiss_legacy': {
    method: 'POST',
    path: '/api/v1/notifications/dismiss',
    flag: 'notifications.dismiss.legacy',
    auth: 'required',
    response: one(empty),
    body: 'dismiss_notification',
  },
  'notifications.dismiss': {
    method: 'POST',
    path: '/api/v1/notifications/:id/dismiss',
    flag: 'notifications.dismiss',
    auth: 'required',
    response: one(empty),
  },

  // Web push subscription

  'push.subscribe': {
    method: 'POST',
    path: '/api/v1/push/subscription',
    flag: 'push',
    auth: 'required',
    response: one(entity('push_subscription')),
    body: 'add_push_subscription',
  },
  'push.get': {
    method: 'GET',
    path: '/api/v1/push/subscription',
    flag: 'push',
    auth: 'required',
    response: one(entity('push_subscription')),
  },
  'push.update': {
    method: 'PUT',
    path: '/api/v1/push/subscription',
    flag: 'push',
    auth: 'required',
    response: one(entity('push_subscription')),
    body: 'update_push_data',
  },
  'push.delete': {
    method: 'DELETE',
    path: '/api/v1/push/subscription',
    flag: 'push',
    auth: 'required',
    response: one(empty),
  },

  // Reports

  'reports.list': {
    method: 'GET',
    path: '/api/v1/reports',
    flag: 'reports',
    auth: 'required',
    response: many(entity('report')),
  },
  'reports.create': {
    method: 'POST',
    path: '/api/v1/reports',
    flag: 'reports',
    auth: 'required',
    response: one(entity('report')),
    body: 'report_request',
  },

  // Search

  'search.v1': {
    method: 'GET',
    path: '/api/v1/search',
    flag: 'search.v1',
    auth: 'required',
    response: one(entity('search_result')),
    query: 'search_v1_query',
  },
  'search.v2': {
    method: 'GET',
    path: '/api/v2/search',
    flag: 'search.v2',
    auth: 'required',
    response: one(entity('search_result_v2')),
    query: 'search_v2_query',
  },

  // Statuses

  'statuses.get': {
    method: 'GET',
    path: '/api/v1/statuses/:id',
    flag: 'statuses',
    auth: 'optional',
    response: one(status),
  },
  'statuses.context': {
    method: 'GET',
    path: '/api/v1/statuses/:id/context',
    flag: 'statuses',
    auth: 'optional',
    response: one(entity('context')),
  },
  'statuses.card': {
    method: 'GET',
    path: '/api/v1/statuses/:id/card',
    flag: 'statuses.card',
    auth: 'optional',
    response: one(entity('card')),
  },
  'statuses.reblogged_by': {
    method: 'GET',
    path: '/api/v1/statuses/:id/reblogged_by',
    flag: 'statuses',
    auth: 'optional',
    response: paged(account),
    query: 'page_query',
  },
  'statuses.favourited_by': {
    method: 'GET',
    path: '/api/v1/statuses/:id/favourited_by',
    flag: 'statuses',
    auth: 'optional',
    response: paged(account),
    query: 'page_query',
  },
  'statuses.create': {
    method: 'POST',
    path: '/api/v1/statuses',
    flag: 'statuses',
    auth: 'required',
    response: one(status),
    body: 'new_status',
  },
  'statuses.schedule': {
    method: 'POST',
    path: '/api/v1/statuses',
    flag: 'scheduled_status',
    auth: 'required',
    response: one(entity('scheduled_status')),
    body: 'new_status',
  },
  'statuses.delete': {
    method: 'DELETE',
    path: '/api/v1/statuses/:id',
    flag: 'statuses',
    auth: 'required',
    response: one(empty),
  },
  'statuses.reblog': {
    method: 'POST',
    path: '/api/v1/statuses/:id/reblog',
    flag: 'statuses',
    auth: 'required',
    response: one(status),
  },
  'statuses.unreblog': {
    method: 'POST',
    path: '/api/v1/statuses/:id/unreblog',
    flag: 'statuses',
    auth: 'required',
    response: one(status),
  },
  'statuses.favourite': {
    method: 'POST',
    path: '/api/v1/statuses/:id/favourite',
    flag: 'statuses',
    auth: 'required',
    response: one(status),
  },
  'statuses.unfavourite': {
    method: 'POST',
    path: '/api/v1/statuses/:id/unfavourite',
    flag: 'statuses',
    auth: 'required',
    response: one(status),
  },
  'statuses.pin': {
    method: 'POST',
    path: '/api/v1/statuses/:id/pin',
    flag: 'statuses.pin',
    auth: 'required',
    response: one(status),
  },
  'statuses.unpin': {
    method: 'POST',
    path: '/api/v1/statuses/:id/unpin',
    flag: 'statuses.pin',
    auth: 'required',
    response: one(status),
  },
  'statuses.mute': {
    method: 'POST',
    path: '/api/v1/statuses/:id/mute',
    flag: 'statuses.mute_conversation',
    auth: 'required',
    response: one(status),
  },
  'statuses.unmute': {
    method: 'POST',
    path: '/api/v1/statuses/:id/unmute',
    flag: 'statuses.mute_conversation',
    auth: 'required',
    response: one(status),
  },
  'statuses.bookmark': {
    method: 'POST',
    path: '/api/v1/statuses/:id/bookmark',
    flag: 'bookmarks',
    auth: 'required',
    response: one(status),
  },
  'statuses.unbookmark': {
    method: 'POST',
    path: '/api/v1/statuses/:id/unbookmark',
    flag: 'bookmarks',
    auth: 'required',
    response: one(status),
  },

  // Polls and scheduled statuses

  'polls.get': {
    method: 'GET',
    path: '/api/v1/polls/:id',
    flag: 'poll',
    auth: 'optional',
    response: one(entity('poll')),
  },
  'polls.vote': {
    method: 'POST',
    path: '/api/v1/polls/:id/votes',
    flag: 'poll',
    auth: 'required',
    response: one(entity('poll')),
    body: 'poll_vote',
  },
  'scheduled_statuses.list': {
    method: 'GET',
    path: '/api/v1/scheduled_statuses',
    flag: 'scheduled_status',
    auth: 'required',
    response: paged(entity('scheduled_status')),
    query: 'page_query',
  },
  'scheduled_statuses.get': {
    method: 'GET',
    path: '/api/v1/scheduled_statuses/:id',
    flag: 'scheduled_status',
    auth: 'required',
    response: one(entity('scheduled_status')),
  },
  'scheduled_statuses.update': {
    method: 'PUT',
    path: '/api/v1/scheduled_statuses/:id',
    flag: 'scheduled_status',
    auth: 'required',
    response: one(entity('scheduled_status')),
    body: 'scheduled_status_update',
  },
  'scheduled_statuses.delete': {
    method: 'DELETE',
    path: '/api/v1/scheduled_statuses/:id',
    flag: 'scheduled_status',
    auth: 'required',
    response: one(empty),
  },

  // Timelines and conversations

  'timelines.home': {
    method: 'GET',
    path: '/api/v1/timelines/home',
    flag: 'timelines',
    auth: 'required',
    response: paged(status),
    query: 'timeline_query',
  },
  'timelines.public': {
    method: 'GET',
    path: '/api/v1/timelines/public',
    flag: 'timelines',
    auth: 'optional',
    response: paged(status),
    query: 'timeline_query',
  },
  'timelines.tag': {
    method: 'GET',
    path: '/api/v1/timelines/tag/:hashtag',
    flag: 'timelines',
    auth: 'optional',
    response: paged(status),
    query: 'timeline_query',
  },
  'timelines.list': {
    method: 'GET',
    path: '/api/v1/timelines/list/:list_id',
    flag: 'list',
    auth: 'required',
    response: paged(status),
    query: 'page_query',
  },
  'timelines.direct': {
    method: 'GET',
    path: '/api/v1/timelines/direct',
    flag: 'timelines.direct',
    auth: 'required',
    response: paged(status),
    query: 'page_query',
  },
  'conversations.list': {
    method: 'GET',
    path: '/api/v1/conversations',
    flag: 'conversation',
    auth: 'required',
    response: paged(entity('conversation')),
    query: 'page_query',
  },
  'conversations.delete': {
    method: 'DELETE',
    path: '/api/v1/conversations/:id',
    flag: 'conversation',
    auth: 'required',
    response: one(empty),
  },
  'conversations.read': {
    method: 'POST',
    path: '/api/v1/conversations/:id/read',
    flag: 'conversation',
    auth: 'required',
    response: one(entity('conversation')),
  },

  // Markers, announcements, preferences

  'markers.get': {
    method: 'GET',
    path: '/api/v1/markers',
    flag: 'marker',
    auth: 'required',
    response: one(entity('marker_set')),
    query: 'markers_query',
  },
  'markers.update': {
    method: 'POST',
    path: '/api/v1/markers',
    flag: 'marker',
    auth: 'required',
    response: one(entity('marker_set')),
    body: 'markers_update',
  },
  'announcements.list': {
    method: 'GET',
    path: '/api/v1/announcements',
    flag: 'announcement',
    auth: 'required',
    response: many(entity('announcement')),
  },
  'announcements.dismiss': {
    method: 'POST',
    path: '/api/v1/announcements/:id/dismiss',
    flag: 'announcement',
    auth: 'required',
    response: one(empty),
  },
  'announcements.add_reaction': {
    method: 'PUT',
    path: '/api/v1/announcements/:id/reactions/:name',
    flag: 'announcement',
    auth: 'required',
    response: one(empty),
  },
  'announcements.remove_reaction': {
    method: 'DELETE',
    path: '/api/v1/announcements/:id/reactions/:name',
    flag: 'announcement',
    auth: 'required',
    response: one(empty),
  },
  'preferences.get': {
    method: 'GET',
    path: '/api/v1/preferences',
    flag: 'preferences',
    auth: 'required',
    response: one(entity('preferences')),
  },

  // Instance and discovery

  'instance.get': {
    method: 'GET',
    path: '/api/v1/instance',
    flag: 'instance',
    auth: 'optional',
    response: one(entity('instance')),
  },
  'instance.peers': {
    method: 'GET',
    path: '/api/v1/instance/peers',
    flag: 'instance',
    auth: 'optional',
    response: many(text),
  },
  'instance.activity': {
    method: 'GET',
    path: '/api/v1/instance/activity',
    flag: 'instance.activity',
    auth: 'optional',
    response: many(entity('instance_activity')),
  },
  'custom_emojis.list': {
    method: 'GET',
    path: '/api/v1/custom_emojis',
    flag: 'emoji',
    auth: 'optional',
    response: many(entity('emoji')),
  },
  'directory.list': {
    method: 'GET',
    path: '/api/v1/directory',
    flag: 'directory',
    auth: 'optional',
    response: many(account),
    query: 'directory_query',
  },
  'trends.list': {
    method: 'GET',
    path: '/api/v1/trends',
    flag: 'trends',
    auth: 'optional',
    response: many(entity('tag')),
    query: 'limit_query',
  },

  // Administration

  'admin.accounts.list': {
    method: 'GET',
    path: '/api/v1/admin/accounts',
    flag: 'admin',
    auth: 'required',
    response: paged(entity('admin_account')),
    query: 'admin_accounts_query',
  },
  'admin.accounts.get': {
    method: 'GET',
    path: '/api/v1/admin/accounts/:id',
    flag: 'admin',
    auth: 'required',
    response: one(entity('admin_account')),
  },
  'admin.accounts.action': {
    method: 'POST',
    path: '/api/v1/admin/accounts/:id/action',
    flag: 'admin',
    auth: 'required',
    response: one(empty),
    body: 'admin_action',
  },
  'admin.accounts.approve': {
    method: 'POST',
    path: '/api/v1/admin/accounts/:id/approve',
    flag: 'admin',
    auth: 'required',
    response: one(entity('admin_account')),
  },
  'admin.accounts.reject': {
    method: 'POST',
    path: '/api/v1/admin/accounts/:id/reject',
    flag: 'admin',
    auth: 'required',
    response: one(entity('admin_account')),
  },
  'admin.accounts.enable': {
    method: 'POST',
    path: '/api/v1/admin/accounts/:id/enable',
    flag: 'admin',
    auth: 'required',
    response: one(entity('admin_account')),
  },
  'admin.accounts.unsilence': {
    method: 'POST',
    path: '/api/v1/admin/accounts/:id/unsilence',
    flag: 'admin',
    auth: 'required',
    response: one(entity('admin_account')),
  },
  'admin.accounts.unsuspend': {
    method: 'POST',
    path: '/api/v1/admin/accounts/:id/unsuspend',
    flag: 'admin',
    auth: 'required',
    response: one(entity('admin_account')),
  },
  'admin.reports.list': {
    method: 'GET',
    path: '/api/v1/admin/reports',
    flag: 'admin',
    auth: 'required',
    response: paged(entity('admin_report')),
    query: 'admin_reports_query',
  },
  'admin.reports.get': {
    method: 'GET',
    path: '/api/v1/admin/reports/:id',
    flag: 'admin',
    auth: 'required',
    response: one(entity('admin_report')),
  },
  'admin.reports.assign_to_self': {
    method: 'POST',
    path: '/api/v1/admin/reports/:id/assign_to_self',
    flag: 'admin',
    auth: 'required',
    response: one(entity('admin_report')),
  },
  'admin.reports.unassign': {
    method: 'POST',
    path: '/api/v1/admin/reports/:id/unassign',
    flag: 'admin',
    auth: 'required',
    response: one(entity('admin_report')),
  },
  'admin.reports.resolve': {
    method: 'POST',
    path: '/api/v1/admin/reports/:id/resolve',
    flag: 'admin',
    auth: 'required',
    response: one(entity('admin_report')),
  },
  'admin.reports.reopen': {
    method: 'POST',
    path: '/api/v1/admin/reports/:id/reopen',
    flag: 'admin',
    auth: 'required',
    response: one(entity('admin_report')),
  },
} as const satisfies Readonly<Record<string, EndpointDefinition>>;
