/**
 * Versioned entity model.
 */

export * from './schema.js';
export {
  ENTITY_DEFINITIONS,
  VISIBILITY,
  MEDIA_TYPE,
  CARD_TYPE,
  NOTIFICATION_TYPE,
  FILTER_CONTEXT,
  REPLIES_POLICY,
} from './definitions.js';
export {
  EntityModel,
  isEntityName,
  entityDefinition,
  referencedEntities,
  describeZodError,
  zodIssueLines,
} from './model.js';
export type * from './types.js';
