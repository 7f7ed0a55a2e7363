/**
 * Runtime side of the versioned entity model.
 */

import { z } from 'zod';
import type { Generation } from '../capabilities/generations.js';
import { resolveActiveFlags } from '../capabilities/matrix.js';
import { CapabilityMatrixError, ConfigurationError, MalformedResponseError } from '../errors/index.js';
import { ENTITY_DEFINITIONS } from './definitions.js';
import {
  Codec,
  EntityDefinition,
  VariantsCodec,
  isEntityRef,
  isListCodec,
  isVariantsCodec,
} from './schema.js';
import type { ActiveEntityName, CodecValue, Entity, EntityName } from './types.js';

/**
 * Checks whether a string names a declared entity.
 */
export function isEntityName(value: string): value is EntityName {
  return Object.prototype.hasOwnProperty.call(ENTITY_DEFINITIONS, value);
}

export function entityDefinition(name: EntityName): EntityDefinition {
  return ENTITY_DEFINITIONS[name];
}

/**
 * Entity names referenced anywhere inside a codec.
 */
export function referencedEntities(codec: Codec): string[] {
  if (isEntityRef(codec)) {
    return [codec.name];
  }
  if (isListCodec(codec)) {
    return referencedEntities(codec.item);
  }
  return [];
}

/**
 * One line per zod issue, such as `status.account.id: Required`.
 */
export function zodIssueLines(root: string, error: z.ZodError): string[] {
  return error.issues.map((issue) => `${[root, ...issue.path].join('.')}: ${issue.message}`);
}

export function describeZodError(root: string, error: z.ZodError): string {
  return zodIssueLines(root, error).join('; ');
}

/**
 * Entity model specialised to one generation.
 *
 * One zod object schema is compiled per entity whose flag is active. Object
 * schemas strip keys they do not declare, so fields of inactive flags and
 * fields unknown to every generation never reach the decoded value.
 */
export class EntityModel<G extends Generation> {
  readonly generation: G;
  private readonly activeFlags: ReadonlySet<string>;
  private readonly schemas = new Map<string, z.ZodTypeAny>();

  constructor(generation: G) {
    this.generation = generation;
    this.activeFlags = resolveActiveFlags(generation);

    for (const name of Object.keys(ENTITY_DEFINITIONS).filter(isEntityName)) {
      const definition = entityDefinition(name);
      if (this.activeFlags.has(definition.flag)) {
        this.assertReferencesActive(name, definition);
        this.schemas.set(name, this.compileEntity(definition));
      }
    }
  }

  /**
   * Whether entity `name` exists at this generation.
   */
  hasEntity(name: string): boolean {
    return this.schemas.has(name);
  }

  /**
   * Names of the fields entity `name` carries at this generation.
   */
  activeFields(name: EntityName): string[] {
    return Object.entries(entityDefinition(name).fields)
      .filter(([, spec]) => this.activeFlags.has(spec.flag))
      .map(([field]) => field);
  }

  /**
   * Decodes one entity.
   *
   * @throws MalformedResponseError when the value does not match the shape
   */
  decode<N extends ActiveEntityName<G>>(name: N, raw: unknown): Entity<N, G> {
    return this.parse(this.entitySchema(name), raw, name);
  }

  /**
   * Decodes any codec: a scalar, an entity, a list or an enumeration.
   */
  decodeAs<C extends Codec>(codec: C, raw: unknown, label: string = 'response'): CodecValue<C, G> {
    return this.parse(this.schemaFor(codec), raw, label);
  }

  /**
   * zod schema of a codec at this generation.
   */
  schemaFor(codec: Codec): z.ZodTypeAny {
    if (isEntityRef(codec)) {
      const { name } = codec;
      return z.lazy(() => this.entitySchema(name));
    }
    if (isListCodec(codec)) {
      return z.array(this.schemaFor(codec.item));
    }
    if (isVariantsCodec(codec)) {
      return this.variantsSchema(codec);
    }
    return codec;
  }

  private parse(schema: z.ZodTypeAny, raw: unknown, label: string) {
    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new MalformedResponseError(describeZodError(label, result.error), result.error);
    }
    return result.data;
  }

  private entitySchema(name: string): z.ZodTypeAny {
    const schema = this.schemas.get(name);
    if (!schema) {
      throw new ConfigurationError(
        `Entity "${name}" is not available at generation ${this.generation}`
      );
    }
    return schema;
  }

  private compileEntity(definition: EntityDefinition): z.ZodTypeAny {
    const shape: Record<string, z.ZodTypeAny> = {};

    for (const [field, spec] of Object.entries(definition.fields)) {
      if (!this.activeFlags.has(spec.flag)) {
        continue;
      }
      const value = this.schemaFor(spec.codec);
      switch (spec.kind) {
        case 'required':
          shape[field] = value;
          break;
        case 'nullable':
          shape[field] = value.nullable();
          break;
        case 'optional':
          shape[field] = value.nullable().optional();
          break;
      }
    }

    return z.object(shape);
  }

  private variantsSchema(codec: VariantsCodec): z.ZodTypeAny {
    const members = new Set(
      Object.entries(codec.variants)
        .filter(([, owner]) => this.activeFlags.has(owner))
        .map(([member]) => member)
    );
    return z.string().transform((raw) => (members.has(raw) ? raw : { unrecognized: raw }));
  }

  private assertReferencesActive(name: string, definition: EntityDefinition): void {
    for (const [field, spec] of Object.entries(definition.fields)) {
      if (!this.activeFlags.has(spec.flag)) {
        continue;
      }
      for (const target of referencedEntities(spec.codec)) {
        if (!isEntityName(target)) {
          throw new CapabilityMatrixError(`${name}.${field} references unknown entity "${target}"`, {
            entity: name,
            field,
          });
        }
        const targetFlag = entityDefinition(target).flag;
        if (!this.activeFlags.has(targetFlag)) {
          throw new CapabilityMatrixError(
            `${name}.${field} is active at ${this.generation} but entity "${target}" is not`,
            { entity: name, field, generation: this.generation }
          );
        }
      }
    }
  }
}
