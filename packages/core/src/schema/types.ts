/**
 * Core Schema Type Definitions
 *
 * These types define the structure of a domain schema: classes with
 * attributes and relations, arranged in a multiple-inheritance hierarchy.
 *
 * All records here are immutable once built by the loader or resolver.
 * IMPORTANT: every entity implicitly has an `id: string` that is unique
 * across all classes. It is never declared as an attribute.
 */

// =============================================================================
// ATTRIBUTE TYPES
// =============================================================================

/**
 * Primitive attribute types.
 * Aliases found in schema documents are normalized by the loader.
 */
export type AttributeType = "string" | "float" | "integer" | "boolean"

export type AttributeScalar = string | number | boolean

/**
 * Value constraints on a single attribute.
 *
 * `enum`, `minimum` and `maximum` are advisory when a value is written and
 * enforced by the validator. `pattern` is always enforced.
 */
export interface Constraint {
  readonly enum?: readonly AttributeScalar[]
  readonly minimum?: number
  readonly maximum?: number
  /** Regular expression the whole value must match */
  readonly pattern?: string
  /** Name of a class the value refers to (informational) */
  readonly ref?: string
  readonly minLength?: number
  readonly maxLength?: number
}

/**
 * Unit metadata for an attribute.
 *
 * - `default`: unit applied when a value is written without one
 * - `allowed`: closed list of permitted units (first entry is the default)
 */
export interface UnitSpec {
  readonly default?: string
  readonly allowed?: readonly string[]
  readonly description?: string
}

// =============================================================================
// ATTRIBUTE DEFINITION
// =============================================================================

export interface AttributeDef {
  readonly name: string
  readonly type: AttributeType
  readonly required: boolean
  readonly description: string
  readonly default?: AttributeScalar
  readonly constraints: Constraint
  readonly unit?: UnitSpec
  /** Display group, e.g. "master_data" or "cost" */
  readonly group?: string
  /** Position within the group */
  readonly order?: number
}

// =============================================================================
// RELATION DEFINITION
// =============================================================================

/**
 * Parsed relation cardinality.
 * `max` is `Infinity` for unbounded relations.
 */
export interface Cardinality {
  readonly min: number
  readonly max: number
}

export interface RelationConstraint {
  readonly minItems?: number
  readonly maxItems?: number
  /** Reject duplicate target ids */
  readonly unique?: boolean
}

/**
 * Definition of a relation from one entity to others.
 *
 * Supports polymorphic targets: an entity is an acceptable target if its
 * class equals or inherits from ANY of the listed classes. An empty list
 * accepts any class.
 */
export interface RelationDef {
  readonly name: string
  readonly targets: readonly string[]
  /** Cardinality as written in the schema, e.g. "1", "0..1", "1..*" */
  readonly cardinality: string
  /** Explicit required flag. When absent, derived from the cardinality lower bound. */
  readonly required?: boolean
  readonly description: string
  readonly constraints: RelationConstraint
}

// =============================================================================
// CLASS DEFINITION
// =============================================================================

/**
 * Schema-level description of a class.
 *
 * Before resolution `attributes`/`relations` hold only local definitions.
 * After resolution they hold the full inherited set, in inherited order.
 */
export interface EntityClass {
  readonly name: string
  readonly description: string
  readonly parents: readonly string[]
  readonly abstract: boolean
  readonly attributes: ReadonlyMap<string, AttributeDef>
  readonly relations: ReadonlyMap<string, RelationDef>
}

// =============================================================================
// RESOLVED SCHEMA
// =============================================================================

/**
 * Result of inheritance resolution. Read-only and safe to share.
 */
export interface ResolvedSchema {
  /** All classes in declaration order, fully merged */
  readonly classes: ReadonlyMap<string, EntityClass>
  /** child -> direct parents */
  readonly parents: ReadonlyMap<string, readonly string[]>
  /** parent -> direct children, sorted */
  readonly children: ReadonlyMap<string, readonly string[]>
  /** class -> itself and all transitive ancestors */
  readonly ancestors: ReadonlyMap<string, ReadonlySet<string>>
  /** Topological order (parents before children) */
  readonly order: readonly string[]

  getClass(name: string): EntityClass | undefined
  /** Map a user-supplied name onto an existing class name, or undefined */
  canonicalClassName(name: string): string | undefined
  /** Reflexive, transitive subtype test */
  isSubclassOf(className: string, ancestor: string): boolean
  /** All (transitive) subclasses of a class, excluding the class itself */
  descendants(className: string): ReadonlySet<string>
}
