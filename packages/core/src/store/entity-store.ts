/**
 * Entity Store
 *
 * Holds entities bucketed by class plus a global id index.
 * Entity ids are unique across all classes.
 */

import { DuplicateIdError, EntityNotFoundError } from "../errors"
import type { Entity, FieldValue, StoreStats } from "./types"

interface StoredEntity {
  readonly className: string
  readonly id: string
  readonly data: Map<string, FieldValue>
}

export class EntityStore {
  /** All entities by id */
  private entities = new Map<string, StoredEntity>()

  /** Entity ids by class, in insertion order: className -> Set<id> */
  private byClass = new Map<string, Set<string>>()

  /**
   * @param classNames every known class, in schema order; buckets are created up front
   */
  constructor(classNames: Iterable<string> = []) {
    for (const name of classNames) {
      this.byClass.set(name, new Set())
    }
  }

  // ===========================================================================
  // WRITE OPERATIONS
  // ===========================================================================

  /**
   * Insert a new, empty entity.
   * @throws DuplicateIdError if the id exists in any class
   */
  insert(className: string, id: string): Entity {
    const existing = this.entities.get(id)
    if (existing) {
      throw new DuplicateIdError(id, existing.className)
    }

    const entity: StoredEntity = { className, id, data: new Map() }
    this.entities.set(id, entity)

    let bucket = this.byClass.get(className)
    if (!bucket) {
      bucket = new Set()
      this.byClass.set(className, bucket)
    }
    bucket.add(id)
    return entity
  }

  /**
   * @throws EntityNotFoundError
   */
  setField(id: string, name: string, value: FieldValue): void {
    this.mustGet(id).data.set(name, value)
  }

  deleteField(id: string, name: string): void {
    this.mustGet(id).data.delete(name)
  }

  private mustGet(id: string): StoredEntity {
    const entity = this.entities.get(id)
    if (!entity) throw new EntityNotFoundError(id)
    return entity
  }

  // ===========================================================================
  // READ OPERATIONS
  // ===========================================================================

  get(id: string): Entity | undefined {
    return this.entities.get(id)
  }

  has(id: string): boolean {
    return this.entities.has(id)
  }

  classOf(id: string): string | undefined {
    return this.entities.get(id)?.className
  }

  /**
   * Entities of exactly this class (not its subclasses), in insertion order.
   */
  entitiesOf(className: string): Entity[] {
    const ids = this.byClass.get(className) ?? new Set<string>()
    const result: Entity[] = []
    for (const id of ids) {
      const entity = this.entities.get(id)
      if (entity) result.push(entity)
    }
    return result
  }

  /**
   * Class names with a bucket, in schema order then first-insert order.
   */
  classNames(): string[] {
    return [...this.byClass.keys()]
  }

  /**
   * All entities, grouped by class in bucket order.
   */
  all(): Entity[] {
    return this.classNames().flatMap((name) => this.entitiesOf(name))
  }

  get size(): number {
    return this.entities.size
  }

  stats(): StoreStats {
    const perClass: Record<string, number> = {}
    for (const [name, ids] of this.byClass) {
      perClass[name] = ids.size
    }
    return {
      entities: this.entities.size,
      classes: this.byClass.size,
      perClass,
    }
  }
}
