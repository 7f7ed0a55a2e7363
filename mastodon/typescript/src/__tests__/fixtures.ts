/**
 * Raw payloads shared by the tests. Each carries the fields of the newest
 * generation; older generations drop what they do not know.
 */

export function rawAccount(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: '1',
    username: 'alice',
    acct: 'alice',
    url: 'https://social.example/@alice',
    display_name: 'Alice',
    note: '<p>Hi</p>',
    avatar: 'https://social.example/avatars/alice.png',
    avatar_static: 'https://social.example/avatars/alice.png',
    header: 'https://social.example/headers/alice.png',
    header_static: 'https://social.example/headers/alice.png',
    locked: false,
    created_at: '2019-01-01T00:00:00.000Z',
    statuses_count: 3,
    followers_count: 2,
    following_count: 1,
    emojis: [],
    discoverable: null,
    last_status_at: '2020-01-01',
    bot: false,
    fields: [],
    ...overrides,
  };
}

export function rawStatus(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: '100',
    uri: 'https://social.example/users/alice/statuses/100',
    url: 'https://social.example/@alice/100',
    account: rawAccount(),
    in_reply_to_id: null,
    in_reply_to_account_id: null,
    reblog: null,
    content: '<p>Hello</p>',
    created_at: '2020-01-01T12:00:00.000Z',
    reblogs_count: 0,
    favourites_count: 1,
    sensitive: false,
    spoiler_text: '',
    visibility: 'public',
    media_attachments: [],
    mentions: [],
    tags: [],
    language: 'en',
    emojis: [],
    replies_count: 0,
    card: null,
    poll: null,
    ...overrides,
  };
}

export function rawNotification(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: '5',
    type: 'mention',
    created_at: '2020-01-02T08:00:00.000Z',
    account: rawAccount(),
    status: rawStatus(),
    ...overrides,
  };
}

export function rawList(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { id: '12', title: 'Friends', ...overrides };
}
