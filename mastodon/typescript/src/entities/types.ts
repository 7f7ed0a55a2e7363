/**
 * Type-level projection of the entity declarations onto a generation.
 *
 * `Entity<'status', '2.1.0'>` has exactly the fields whose flags are active
 * at 2.1.0: required and nullable fields are mandatory properties, optional
 * fields are `?` properties, everything else does not exist.
 */

import type { z } from 'zod';
import type { Generation } from '../capabilities/generations.js';
import type { IsActive } from '../capabilities/matrix.js';
import type { ENTITY_DEFINITIONS } from './definitions.js';
import type {
  ActiveFieldKeys,
  ActiveVariant,
  EntityRef,
  FieldKind,
  FieldSpec,
  ListCodec,
  Simplify,
  Unrecognized,
  VariantsCodec,
} from './schema.js';

type Definitions = typeof ENTITY_DEFINITIONS;

export type EntityName = keyof Definitions & string;

type FieldsOf<N extends EntityName> = Definitions[N]['fields'];

/**
 * Members of a gated enumeration that exist at `G`, plus the unrecognized
 * fallback.
 */
export type VariantValue<V, G extends Generation> = ActiveVariant<V, G> | Unrecognized;

/**
 * Decoded value of a codec at generation `G`.
 */
export type CodecValue<C, G extends Generation> =
  C extends EntityRef<infer N>
    ? N extends EntityName
      ? Entity<N, G>
      : never
    : C extends ListCodec<infer I>
      ? CodecValue<I, G>[]
      : C extends VariantsCodec<infer V>
        ? VariantValue<V, G>
        : C extends z.ZodTypeAny
          ? z.output<C>
          : never;

type ActiveKeys<N extends EntityName, G extends Generation, K extends FieldKind> = ActiveFieldKeys<
  FieldsOf<N>,
  G,
  K
>;

type FieldValue<S, G extends Generation> = S extends FieldSpec<infer C> ? CodecValue<C, G> : never;

/**
 * Shape of entity `N` at generation `G`.
 */
export type Entity<N extends EntityName, G extends Generation> = Simplify<
  {
    readonly [P in ActiveKeys<N, G, 'required'>]: FieldValue<FieldsOf<N>[P], G>;
  } & {
    readonly [P in ActiveKeys<N, G, 'nullable'>]: FieldValue<FieldsOf<N>[P], G> | null;
  } & {
    readonly [P in ActiveKeys<N, G, 'optional'>]?: FieldValue<FieldsOf<N>[P], G> | null;
  }
>;

/**
 * Entity names whose own flag is active at `G`.
 */
export type ActiveEntityName<G extends Generation> = EntityName &
  {
    [N in EntityName]: IsActive<Definitions[N]['flag'], G> extends true ? N : never;
  }[EntityName];

export type Account<G extends Generation> = Entity<'account', G>;
export type Source<G extends Generation> = Entity<'source', G>;
export type MetadataField<G extends Generation> = Entity<'metadata_field', G>;
export type Emoji<G extends Generation> = Entity<'emoji', G>;
export type Status<G extends Generation> = Entity<'status', G>;
export type Mention<G extends Generation> = Entity<'mention', G>;
export type Tag<G extends Generation> = Entity<'tag', G>;
export type Application<G extends Generation> = Entity<'application', G>;
export type Attachment<G extends Generation> = Entity<'attachment', G>;
export type Card<G extends Generation> = Entity<'card', G>;
export type Poll<G extends Generation> = Entity<'poll', G>;
export type Notification<G extends Generation> = Entity<'notification', G>;
export type Relationship<G extends Generation> = Entity<'relationship', G>;
export type Context<G extends Generation> = Entity<'context', G>;
export type SearchResult<G extends Generation> = Entity<'search_result', G>;
export type SearchResultV2<G extends Generation> = Entity<'search_result_v2', G>;
export type Filter<G extends Generation> = Entity<'filter', G>;
export type List<G extends Generation> = Entity<'list', G>;
export type Instance<G extends Generation> = Entity<'instance', G>;
export type InstanceActivity<G extends Generation> = Entity<'instance_activity', G>;
export type Report<G extends Generation> = Entity<'report', G>;
export type AdminAccount<G extends Generation> = Entity<'admin_account', G>;
export type AdminReport<G extends Generation> = Entity<'admin_report', G>;
export type Announcement<G extends Generation> = Entity<'announcement', G>;
export type PushSubscription<G extends Generation> = Entity<'push_subscription', G>;
export type Marker<G extends Generation> = Entity<'marker', G>;
export type MarkerSet<G extends Generation> = Entity<'marker_set', G>;
export type ScheduledStatus<G extends Generation> = Entity<'scheduled_status', G>;
export type Conversation<G extends Generation> = Entity<'conversation', G>;
export type FeaturedTag<G extends Generation> = Entity<'featured_tag', G>;
export type Preferences<G extends Generation> = Entity<'preferences', G>;
export type IdentityProof<G extends Generation> = Entity<'identity_proof', G>;
export type TagHistory<G extends Generation> = Entity<'tag_history', G>;
export type AttachmentMeta<G extends Generation> = Entity<'attachment_meta', G>;
export type PollOption<G extends Generation> = Entity<'poll_option', G>;
export type AnnouncementReaction<G extends Generation> = Entity<'announcement_reaction', G>;
export type AnnouncementReactionEvent<G extends Generation> = Entity<'announcement_reaction_event', G>;
export type PushAlerts<G extends Generation> = Entity<'push_alerts', G>;
