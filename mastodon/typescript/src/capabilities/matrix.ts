/**
 * Capability matrix for the tracked Mastodon generations.
 *
 * Each generation lists the capability flags it introduces and the flags it
 * retires. A flag is active for a target generation when it was introduced
 * at or before the target and not retired at or before it. Entity fields,
 * enum variants, request parameters, endpoints and streaming event tags all
 * name the flag that owns them.
 *
 * Capabilities dated to an untracked server release are attached to the
 * earliest tracked generation at or after that release.
 */

import { CapabilityMatrixError } from '../errors/index.js';
import { GENERATIONS, Generation, GenerationsFrom, generationIndex } from './generations.js';

/**
 * Shape every matrix declaration must satisfy: one entry per generation.
 */
export type CapabilityMatrixDeclaration = {
  readonly [G in Generation]: {
    readonly introduces: readonly string[];
    readonly retires: readonly string[];
  };
};

export const CAPABILITY_MATRIX = {
  '1.5.0': {
    introduces: [
      // entities
      'account',
      'source',
      'status',
      'mention',
      'tag',
      'application',
      'attachment',
      'card',
      'notification',
      'relationship',
      'context',
      'instance',
      'report',
      'pagination',
      // endpoints
      'accounts',
      'accounts.search',
      'relationships',
      'follow_requests',
      'blocks',
      'mutes',
      'domain_blocks',
      'favourites',
      'media',
      'notifications',
      'notifications.dismiss.legacy',
      'reports',
      'search.v1',
      'statuses',
      'statuses.card',
      'statuses.mute_conversation',
      'timelines',
      'follows.remote',
      'streaming',
    ],
    retires: [],
  },
  '2.1.0': {
    introduces: [
      'emoji',
      'list',
      'account.moved',
      'attachment.description',
      'card.embed_url',
      'status.emojis',
      'status.pinned',
      'statuses.pin',
      'statuses.query.pinned',
      'relationship.showing_reblogs',
      'relationship.muting_notifications',
      'instance.thumbnail',
      'instance.stats',
    ],
    retires: [],
  },
  '2.1.2': {
    introduces: ['instance.activity'],
    retires: [],
  },
  '2.2.0': {
    introduces: ['report.forward'],
    retires: [],
  },
  '2.4.0': {
    introduces: [
      'push',
      'account.emojis',
      'account.fields',
      'account.bot',
      'account.source',
      'attachment.focus',
      'media.update',
      'instance.languages',
      'instance.contact_account',
      'timelines.query.only_media',
    ],
    retires: [],
  },
  '2.9.1': {
    introduces: [
      'filter',
      'suggestions',
      'endorsements',
      'conversation',
      'scheduled_status',
      'poll',
      'preferences',
      'identity_proof',
      'admin',
      'search.v2',
      'search.v2.filters',
      'timelines.direct',
      'pagination.min_id',
      'source.language',
      'tag.history',
      'field.verified_at',
      'status.replies_count',
      'status.card',
      'relationship.endorsed',
      'relationship.blocked_by',
      'application.vapid_key',
      'attachment.blurhash',
      'attachment.audio',
      'notification.poll',
      'notifications.query.account_id',
      'push.alerts.poll',
      'follow.reblogs',
      'mute.notifications',
      'statuses.query.exclude_reblogs',
      'instance.registrations',
    ],
    retires: [],
  },
  '3.0.0': {
    introduces: [
      'marker',
      'featured_tag',
      'directory',
      'trends',
      'account.last_status_at',
      'source.follow_requests_count',
      'emoji.category',
      'instance.short_description',
      'instance.approval_required',
      'search.v2.exclude_unreviewed',
    ],
    retires: ['search.v1', 'timelines.direct', 'statuses.card', 'follows.remote'],
  },
  '3.1.0': {
    introduces: [
      'announcement',
      'bookmarks',
      'account.discoverable',
      'notification.follow_request',
      'notifications.dismiss',
      'push.alerts.follow_request',
      'filter.account_context',
    ],
    retires: ['notifications.dismiss.legacy'],
  },
  '3.3.0': {
    introduces: [
      'account.suspended',
      'account.mute_expires_at',
      'card.blurhash',
      'list.replies_policy',
      'notification.status',
      'push.alerts.status',
      'relationship.notifying',
      'follow.notify',
      'mute.duration',
    ],
    retires: [],
  },
} as const satisfies CapabilityMatrixDeclaration;

type Matrix = typeof CAPABILITY_MATRIX;

/**
 * Every capability flag named in the matrix.
 */
export type CapabilityFlag = Matrix[Generation]['introduces'][number];

/**
 * Generation that introduces flag `F`.
 */
export type IntroducedAt<F extends CapabilityFlag> = {
  [G in Generation]: F extends Matrix[G]['introduces'][number] ? G : never;
}[Generation];

/**
 * Generation that retires flag `F`, or `never` while it is still current.
 */
export type RetiredAt<F extends CapabilityFlag> = {
  [G in Generation]: F extends Matrix[G]['retires'][number] ? G : never;
}[Generation];

/**
 * `true` when flag `F` is active at target generation `G`.
 */
export type IsActive<F extends CapabilityFlag, G extends Generation> = [G] extends [
  GenerationsFrom<IntroducedAt<F>>,
]
  ? [RetiredAt<F>] extends [never]
    ? true
    : [G] extends [GenerationsFrom<RetiredAt<F>>]
      ? false
      : true
  : false;

/**
 * Union of the flags active at target generation `G`.
 */
export type ActiveFlags<G extends Generation> = {
  [F in CapabilityFlag]: IsActive<F, G> extends true ? F : never;
}[CapabilityFlag];

/**
 * Where a flag starts and, optionally, stops being available.
 */
export interface FlagLifetime {
  readonly introducedAt: Generation;
  readonly retiredAt?: Generation;
}

/**
 * Validates a matrix declaration and indexes each flag's lifetime.
 *
 * @throws CapabilityMatrixError on a duplicate introduction, a dangling or
 * duplicate retirement, or a retirement at or before the introduction
 */
export function buildCapabilityIndex(
  matrix: CapabilityMatrixDeclaration
): ReadonlyMap<string, FlagLifetime> {
  const index = new Map<string, FlagLifetime>();

  for (const generation of GENERATIONS) {
    const entry = matrix[generation];

    for (const flag of entry.introduces) {
      const existing = index.get(flag);
      if (existing) {
        throw new CapabilityMatrixError(
          `Flag "${flag}" introduced at ${generation} was already introduced at ${existing.introducedAt}`,
          { flag, generation }
        );
      }
      index.set(flag, { introducedAt: generation });
    }

    for (const flag of entry.retires) {
      const existing = index.get(flag);
      if (!existing) {
        throw new CapabilityMatrixError(
          `Flag "${flag}" retired at ${generation} is not introduced by any earlier generation`,
          { flag, generation }
        );
      }
      if (existing.retiredAt) {
        throw new CapabilityMatrixError(
          `Flag "${flag}" retired at ${generation} was already retired at ${existing.retiredAt}`,
          { flag, generation }
        );
      }
      if (generationIndex(existing.introducedAt) >= generationIndex(generation)) {
        throw new CapabilityMatrixError(
          `Flag "${flag}" cannot be retired at ${generation}, the generation that introduces it`,
          { flag, generation }
        );
      }
      index.set(flag, { ...existing, retiredAt: generation });
    }
  }

  return index;
}

const CAPABILITY_INDEX = buildCapabilityIndex(CAPABILITY_MATRIX);

/**
 * Checks whether a string names a declared capability flag.
 */
export function isCapabilityFlag(value: string): value is CapabilityFlag {
  return CAPABILITY_INDEX.has(value);
}

/**
 * Lifetime of a declared flag.
 */
export function flagLifetime(flag: CapabilityFlag): FlagLifetime {
  const lifetime = CAPABILITY_INDEX.get(flag);
  if (!lifetime) {
    throw new CapabilityMatrixError(`Unknown capability flag "${flag}"`, { flag });
  }
  return lifetime;
}

/**
 * Runtime mirror of {@link IsActive}.
 */
export function isFlagActive(flag: CapabilityFlag, generation: Generation): boolean {
  const { introducedAt, retiredAt } = flagLifetime(flag);
  const target = generationIndex(generation);
  if (target < generationIndex(introducedAt)) {
    return false;
  }
  return retiredAt === undefined || target < generationIndex(retiredAt);
}

/**
 * Resolves the active flag set for a target generation by walking the
 * matrix from the oldest generation: add what each introduces, then drop
 * what it retires.
 */
export function resolveActiveFlags(
  generation: Generation,
  matrix: CapabilityMatrixDeclaration = CAPABILITY_MATRIX
): ReadonlySet<string> {
  const active = new Set<string>();
  const target = generationIndex(generation);

  for (const current of GENERATIONS) {
    if (generationIndex(current) > target) {
      break;
    }
    for (const flag of matrix[current].introduces) {
      active.add(flag);
    }
    for (const flag of matrix[current].retires) {
      active.delete(flag);
    }
  }

  return active;
}
