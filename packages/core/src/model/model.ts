/**
 * Domain Model
 *
 * Main entry point: owns a resolved schema, the entity store and a logger,
 * and routes every write through the attribute and relation engines.
 *
 * @example
 * ```typescript
 * const model = DomainModel.fromPath("./schema")
 * model.addEntity("Node", "N1")
 * model.addEntity("Line", "L1")
 * model.addRelation("L1", "from_node", "N1")
 * model.validate() // -> Diagnostic[]
 * ```
 */

import { DuplicateIdError, EntityNotFoundError, UnknownClassError, UnknownFieldError, ValueError } from "../errors"
import { Logger } from "../logging"
import {
  loadSchemaDocuments,
  loadSchemaPath,
  resolveSchema,
  type AttributeScalar,
  type EntityClass,
  type ResolvedSchema,
} from "../schema"
import { resolveAttributeWrite, resolveRelationAdd, resolveRelationSet, relationTargets } from "../engine"
import { EntityStore, isAttributeValue, isRelationValue, type AttributeValue, type Entity } from "../store"
import { validateModel, type Diagnostic } from "../validation"

export interface ModelOptions {
  /** Receives advisory warnings and debug output (default: console, level "warn") */
  logger?: Logger
}

export interface AddEntityOptions {
  /** Write the attribute defaults of the class (default: true) */
  applyDefaults?: boolean
}

function isTargetList(value: unknown): value is string | readonly string[] {
  return typeof value === "string" || (Array.isArray(value) && value.every((v) => typeof v === "string"))
}

export class DomainModel {
  readonly schema: ResolvedSchema
  readonly store: EntityStore
  readonly logger: Logger

  constructor(schema: ResolvedSchema, options: ModelOptions = {}) {
    this.schema = schema
    this.store = new EntityStore(schema.classes.keys())
    this.logger = options.logger ?? new Logger()
  }

  /**
   * Build a model from already-parsed schema documents.
   */
  static fromDocuments(documents: readonly unknown[], options: ModelOptions = {}): DomainModel {
    const logger = options.logger ?? new Logger()
    return new DomainModel(resolveSchema(loadSchemaDocuments(documents, logger), logger), { logger })
  }

  /**
   * Build a model from a schema file or directory.
   */
  static fromPath(path: string, options: ModelOptions = {}): DomainModel {
    const logger = options.logger ?? new Logger()
    return new DomainModel(resolveSchema(loadSchemaPath(path, logger), logger), { logger })
  }

  // ===========================================================================
  // CLASSES
  // ===========================================================================

  /**
   * Canonical name of a class given by the caller.
   * @throws UnknownClassError
   */
  resolveClassName(name: string): string {
    const canonical = this.schema.canonicalClassName(name)
    if (canonical === undefined) {
      throw new UnknownClassError(name, [...this.schema.classes.keys()])
    }
    return canonical
  }

  private classOfEntity(entity: Entity): EntityClass {
    const cls = this.schema.getClass(entity.className)
    if (!cls) throw new UnknownClassError(entity.className, [...this.schema.classes.keys()])
    return cls
  }

  private requireEntity(id: string): Entity {
    const entity = this.store.get(id)
    if (!entity) throw new EntityNotFoundError(id)
    return entity
  }

  // ===========================================================================
  // WRITES
  // ===========================================================================

  /**
   * Create an entity and apply the attribute defaults of its class.
   * Defaults are resolved before the entity is stored, so a default that
   * fails its own checks leaves the store unchanged.
   *
   * @throws UnknownClassError if the class is unknown
   * @throws DuplicateIdError if the id is used by any class
   * @throws ValueError if a default cannot be written
   */
  addEntity(className: string, id: string, options: AddEntityOptions = {}): Entity {
    const canonical = this.resolveClassName(className)
    const cls = this.schema.getClass(canonical)
    if (!cls) throw new UnknownClassError(className, [...this.schema.classes.keys()])

    const existing = this.store.classOf(id)
    if (existing !== undefined) throw new DuplicateIdError(id, existing)

    if (cls.abstract) {
      this.logger.debug("Instantiating abstract class", { className: canonical, id })
    }

    const defaults: Array<[string, AttributeValue]> = []
    if (options.applyDefaults ?? true) {
      for (const def of cls.attributes.values()) {
        if (def.default === undefined) continue
        const value = resolveAttributeWrite({ cls, entityId: id, name: def.name, raw: def.default }, this.logger)
        if (value !== undefined) defaults.push([def.name, value])
      }
    }

    const entity = this.store.insert(canonical, id)
    for (const [name, value] of defaults) {
      this.store.setField(id, name, value)
    }
    return entity
  }

  /**
   * Set (or clear, for empty input) an attribute value.
   *
   * `value` may be a scalar or `{value, unit?, provenance_ref?}`;
   * explicit `unit`/`provenanceRef` arguments win over embedded ones.
   *
   * @throws EntityNotFoundError | UnknownFieldError | ValueError
   */
  addAttribute(id: string, name: string, value: unknown, unit?: string, provenanceRef?: string): void {
    const entity = this.requireEntity(id)
    const next = resolveAttributeWrite(
      { cls: this.classOfEntity(entity), entityId: id, name, raw: value, unit, provenanceRef },
      this.logger,
    )
    if (next === undefined) {
      this.store.deleteField(id, name)
    } else {
      this.store.setField(id, name, next)
    }
  }

  /**
   * Add targets to a relation: replaces a single-valued relation,
   * appends to a multi-valued one.
   *
   * @throws EntityNotFoundError | UnknownFieldError
   */
  addRelation(id: string, name: string, target: string | readonly string[]): void {
    const entity = this.requireEntity(id)
    const current = entity.data.get(name)
    const next = resolveRelationAdd(
      this.classOfEntity(entity),
      id,
      name,
      current !== undefined && isRelationValue(current) ? current : undefined,
      target,
    )
    this.writeRelation(id, name, next)
  }

  /**
   * Replace all targets of a relation. An empty list clears it.
   *
   * @throws EntityNotFoundError | UnknownFieldError
   */
  setRelation(id: string, name: string, targets: string | readonly string[]): void {
    const entity = this.requireEntity(id)
    this.writeRelation(id, name, resolveRelationSet(this.classOfEntity(entity), id, name, targets))
  }

  private writeRelation(id: string, name: string, value: string | readonly string[] | undefined): void {
    if (value === undefined) {
      this.store.deleteField(id, name)
    } else {
      this.store.setField(id, name, value)
    }
  }

  /**
   * Create an entity and write its fields in one call.
   * Each field is routed to an attribute or a relation by the schema.
   *
   * @throws UnknownFieldError for a field the class does not declare
   */
  create(className: string, id: string, fields: Record<string, unknown> = {}): Entity {
    const entity = this.addEntity(className, id)
    const cls = this.classOfEntity(entity)

    for (const [name, value] of Object.entries(fields)) {
      if (cls.attributes.has(name)) {
        this.addAttribute(id, name, value)
      } else if (cls.relations.has(name)) {
        if (!isTargetList(value)) {
          throw new ValueError(
            `[${cls.name}:${id}] Relation '${name}' expects an id or a list of ids`,
            "COERCION",
            cls.name,
            id,
            name,
            value,
            "string | string[]",
          )
        }
        this.setRelation(id, name, value)
      } else {
        throw new UnknownFieldError(cls.name, id, name, "attribute", [
          ...cls.attributes.keys(),
          ...cls.relations.keys(),
        ])
      }
    }
    return entity
  }

  // ===========================================================================
  // READS
  // ===========================================================================

  getEntity(id: string): Entity | undefined {
    return this.store.get(id)
  }

  /**
   * Entities of a class, optionally including entities of its subclasses.
   */
  entitiesOf(className: string, options: { includeSubclasses?: boolean } = {}): Entity[] {
    const canonical = this.resolveClassName(className)
    const classes = options.includeSubclasses
      ? [canonical, ...this.schema.descendants(canonical)]
      : [canonical]
    return classes.flatMap((name) => this.store.entitiesOf(name))
  }

  getAttribute(id: string, name: string): AttributeValue | undefined {
    const value = this.store.get(id)?.data.get(name)
    return value !== undefined && isAttributeValue(value) ? value : undefined
  }

  getRelationTargets(id: string, name: string): string[] {
    const value = this.store.get(id)?.data.get(name)
    return value !== undefined && isRelationValue(value) ? relationTargets(value) : []
  }

  /**
   * Plain `{attribute: value}` map of an entity.
   * Pairs with the record schemas from `buildRecordSchemas`.
   */
  toRecord(id: string): Record<string, AttributeScalar> {
    const entity = this.requireEntity(id)
    const record: Record<string, AttributeScalar> = {}
    for (const [name, value] of entity.data) {
      if (isAttributeValue(value)) record[name] = value.value
    }
    return record
  }

  validate(): Diagnostic[] {
    return validateModel(this.schema, this.store)
  }
}
