/**
 * Schema Introspection
 *
 * Human-readable views of a resolved schema.
 */

import { UnknownClassError } from "../errors"
import { parseCardinality } from "./cardinality"
import type { AttributeDef, ResolvedSchema } from "./types"

export const DEFAULT_ATTRIBUTE_GROUP = "master_data"

// =============================================================================
// CLASS TREE
// =============================================================================

/**
 * Render the inheritance hierarchy as a box-drawing tree.
 *
 * Roots and children are sorted by name. A class with several parents
 * appears under each of them.
 *
 * ```
 * Asset
 * ├── Generator
 * │   └── GasGenerator
 * └── Load
 * ```
 */
export function formatClassTree(schema: ResolvedSchema): string {
  const roots = [...schema.classes.keys()].filter((name) => (schema.parents.get(name) ?? []).length === 0).sort()
  const lines: string[] = []

  const walk = (name: string, prefix: string): void => {
    const kids = schema.children.get(name) ?? []
    kids.forEach((child, i) => {
      const last = i === kids.length - 1
      lines.push(`${prefix}${last ? "└── " : "├── "}${child}`)
      walk(child, prefix + (last ? "    " : "│   "))
    })
  }

  for (const root of roots) {
    lines.push(root)
    walk(root, "")
  }
  return lines.join("\n")
}

// =============================================================================
// ATTRIBUTE GROUPS
// =============================================================================

export type AttributeGroups = ReadonlyMap<string, readonly AttributeDef[]>

/**
 * Inherited attributes of a class, grouped by `group` and sorted by
 * `order` (missing counts as 0) then name. Groups appear in first-seen order.
 */
export function getAttributesGrouped(schema: ResolvedSchema, className: string): AttributeGroups {
  const cls = schema.getClass(className)
  if (!cls) throw new UnknownClassError(className, [...schema.classes.keys()])

  const groups = new Map<string, AttributeDef[]>()
  for (const def of cls.attributes.values()) {
    const group = def.group ?? DEFAULT_ATTRIBUTE_GROUP
    const list = groups.get(group) ?? []
    list.push(def)
    groups.set(group, list)
  }

  for (const list of groups.values()) {
    list.sort((a, b) => (a.order ?? 0) - (b.order ?? 0) || a.name.localeCompare(b.name))
  }
  return groups
}

/**
 * Render grouped attributes as a tree. Required attributes are marked `*`.
 */
export function formatAttributeTree(groups: AttributeGroups): string {
  const lines: string[] = []
  const entries = [...groups.entries()]

  entries.forEach(([group, defs], gi) => {
    const lastGroup = gi === entries.length - 1
    lines.push(`${lastGroup ? "└── " : "├── "}${group}`)
    const prefix = lastGroup ? "    " : "│   "
    defs.forEach((def, i) => {
      const last = i === defs.length - 1
      lines.push(`${prefix}${last ? "└── " : "├── "}${def.name}${def.required ? " *" : ""} (${def.type})`)
    })
  })
  return lines.join("\n")
}

// =============================================================================
// SUMMARY
// =============================================================================

export interface ClassSummary {
  parents: string[]
  abstract: boolean
  attributes: Record<string, { type: string; required: boolean; unit?: string }>
  relations: Record<string, { targets: string[]; cardinality: string; min: number; max: number | null }>
}

/**
 * Plain-object summary of every class, suitable for JSON output.
 * Unbounded relation maxima are written as `null`.
 */
export function describeSchema(schema: ResolvedSchema): Record<string, ClassSummary> {
  const out: Record<string, ClassSummary> = {}

  for (const cls of schema.classes.values()) {
    const attributes: ClassSummary["attributes"] = {}
    for (const def of cls.attributes.values()) {
      attributes[def.name] = {
        type: def.type,
        required: def.required,
        ...(def.unit?.default !== undefined ? { unit: def.unit.default } : {}),
      }
    }

    const relations: ClassSummary["relations"] = {}
    for (const def of cls.relations.values()) {
      const card = parseCardinality(def.cardinality)
      relations[def.name] = {
        targets: [...def.targets],
        cardinality: def.cardinality,
        min: card.min,
        max: Number.isFinite(card.max) ? card.max : null,
      }
    }

    out[cls.name] = { parents: [...cls.parents], abstract: cls.abstract, attributes, relations }
  }
  return out
}
