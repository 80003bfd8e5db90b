/**
 * Entity Store Types
 */

import type { AttributeScalar } from "../schema"

/**
 * Stored attribute value with its optional unit and provenance reference.
 */
export interface AttributeValue {
  readonly value: AttributeScalar
  readonly unit?: string
  /** Opaque reference to where the value came from (a source file, a time series, ...) */
  readonly provenanceRef?: string
}

/**
 * Stored relation value: one target id for single-valued relations,
 * a list for multi-valued ones.
 */
export type RelationValue = string | readonly string[]

export type FieldValue = AttributeValue | RelationValue

/**
 * An instance of a class.
 */
export interface Entity {
  readonly className: string
  readonly id: string
  /** Field name -> value, in write order */
  readonly data: ReadonlyMap<string, FieldValue>
}

export interface StoreStats {
  entities: number
  classes: number
  /** Entity count per class, classes in schema order */
  perClass: Record<string, number>
}

export function isAttributeValue(value: FieldValue): value is AttributeValue {
  return typeof value === "object" && !Array.isArray(value)
}

export function isRelationValue(value: FieldValue): value is RelationValue {
  return typeof value === "string" || Array.isArray(value)
}
