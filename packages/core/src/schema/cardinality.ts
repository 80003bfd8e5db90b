/**
 * Relation cardinality parsing.
 *
 * Accepted forms: "n", "a..b", "a..*", "a..n", "*", "n".
 * A bare "0" reads as "0..1". Anything unparseable falls back to "0..*".
 */

import type { Cardinality, RelationDef } from "./types"

const UNBOUNDED = new Set(["*", "n"])

export function parseCardinality(raw: string): Cardinality {
  const card = raw.trim()

  if (UNBOUNDED.has(card)) return { min: 0, max: Infinity }

  const range = card.split("..")
  if (range.length === 2) {
    const [lo = "", hi = ""] = range
    const min = /^\d+$/.test(lo) ? Number(lo) : 0
    if (UNBOUNDED.has(hi)) return { min, max: Infinity }
    const max = /^\d+$/.test(hi) ? Number(hi) : Infinity
    return { min, max: Math.max(min, max) }
  }

  if (/^\d+$/.test(card)) {
    const n = Number(card)
    return n === 0 ? { min: 0, max: 1 } : { min: n, max: n }
  }

  return { min: 0, max: Infinity }
}

/**
 * True when the relation can hold more than one target.
 */
export function isMultiValued(def: RelationDef): boolean {
  return parseCardinality(def.cardinality).max > 1
}

/**
 * Explicit `required` wins; otherwise a positive lower bound makes the relation required.
 */
export function isRelationRequired(def: RelationDef): boolean {
  return def.required ?? parseCardinality(def.cardinality).min > 0
}

/**
 * Effective item bounds: relation constraints override the cardinality.
 */
export function relationItemBounds(def: RelationDef): Cardinality {
  const card = parseCardinality(def.cardinality)
  return {
    min: def.constraints.minItems ?? card.min,
    max: def.constraints.maxItems ?? card.max,
  }
}
