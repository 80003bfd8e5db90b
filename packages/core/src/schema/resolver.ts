/**
 * Inheritance Resolver
 *
 * Turns raw classes into a ResolvedSchema:
 * 1. canonicalize parent names
 * 2. order classes topologically (parents first), rejecting cycles
 * 3. merge inherited attributes and relations
 * 4. precompute ancestor and child maps
 *
 * Nothing is returned if any step fails.
 */

import { SchemaError } from "../errors"
import { createSilentLogger, type Logger } from "../logging"
import { isNumericType } from "./definitions"
import type { AttributeDef, EntityClass, RelationDef, ResolvedSchema } from "./types"

// =============================================================================
// NAME CANONICALIZATION
// =============================================================================

function normalizeClassName(name: string): string {
  const replaced = name.trim().replace(/[-\s]+/g, "_")
  return replaced.charAt(0).toUpperCase() + replaced.slice(1)
}

/**
 * Map a free-form class name onto a known one.
 * Tries an exact match, then a case-insensitive one, then a normalized form
 * (`-` and spaces become `_`, first letter upper-cased).
 */
export function canonicalizeClassName(name: string, known: Iterable<string>): string | undefined {
  const names = [...known]
  if (names.includes(name)) return name

  const lower = name.toLowerCase()
  const caseInsensitive = names.find((n) => n.toLowerCase() === lower)
  if (caseInsensitive !== undefined) return caseInsensitive

  const normalized = normalizeClassName(name)
  return names.find((n) => n === normalized)
}

// =============================================================================
// TOPOLOGICAL ORDER
// =============================================================================

function topologicalOrder(parents: ReadonlyMap<string, readonly string[]>): string[] {
  const order: string[] = []
  const permanent = new Set<string>()
  const temporary = new Set<string>()
  const path: string[] = []

  const visit = (name: string): void => {
    if (permanent.has(name)) return
    if (temporary.has(name)) {
      const cycle = [...path.slice(path.indexOf(name)), name]
      throw new SchemaError(
        `Inheritance cycle detected: ${cycle.join(" -> ")}`,
        "INHERITANCE_CYCLE",
        name,
        { cycle },
      )
    }

    temporary.add(name)
    path.push(name)
    for (const parent of parents.get(name) ?? []) {
      visit(parent)
    }
    path.pop()
    temporary.delete(name)
    permanent.add(name)
    order.push(name)
  }

  for (const name of parents.keys()) {
    visit(name)
  }
  return order
}

// =============================================================================
// MERGING
// =============================================================================

/**
 * Parents left to right (first definer wins), then the child's own fields.
 * A child override replaces the value but keeps the inherited position.
 */
function mergeFields<T>(
  inherited: ReadonlyArray<ReadonlyMap<string, T>>,
  own: ReadonlyMap<string, T>,
): Map<string, T> {
  const merged = new Map<string, T>()
  for (const fields of inherited) {
    for (const [name, def] of fields) {
      if (!merged.has(name)) merged.set(name, def)
    }
  }
  for (const [name, def] of own) {
    merged.set(name, def)
  }
  return merged
}

function warnNonNumericBounds(cls: EntityClass, logger: Logger): void {
  for (const def of cls.attributes.values()) {
    if (isNumericType(def.type)) continue
    if (def.constraints.minimum !== undefined || def.constraints.maximum !== undefined) {
      logger.warn("Numeric bounds on a non-numeric attribute are ignored", {
        className: cls.name,
        attribute: def.name,
        type: def.type,
      })
    }
  }
}

// =============================================================================
// RESOLVED SCHEMA
// =============================================================================

class Schema implements ResolvedSchema {
  private readonly descendantCache = new Map<string, ReadonlySet<string>>()

  constructor(
    readonly classes: ReadonlyMap<string, EntityClass>,
    readonly parents: ReadonlyMap<string, readonly string[]>,
    readonly children: ReadonlyMap<string, readonly string[]>,
    readonly ancestors: ReadonlyMap<string, ReadonlySet<string>>,
    readonly order: readonly string[],
  ) {}

  getClass(name: string): EntityClass | undefined {
    return this.classes.get(name)
  }

  canonicalClassName(name: string): string | undefined {
    return canonicalizeClassName(name, this.classes.keys())
  }

  isSubclassOf(className: string, ancestor: string): boolean {
    return this.ancestors.get(className)?.has(ancestor) ?? false
  }

  descendants(className: string): ReadonlySet<string> {
    const cached = this.descendantCache.get(className)
    if (cached) return cached

    const found = new Set<string>()
    const stack = [...(this.children.get(className) ?? [])]
    while (stack.length > 0) {
      const next = stack.pop()
      if (next === undefined || found.has(next)) continue
      found.add(next)
      stack.push(...(this.children.get(next) ?? []))
    }
    this.descendantCache.set(className, found)
    return found
  }
}

/**
 * Resolve multiple inheritance over raw classes.
 *
 * @throws SchemaError `UNKNOWN_PARENT` or `INHERITANCE_CYCLE`
 */
export function resolveSchema(
  rawClasses: ReadonlyMap<string, EntityClass>,
  logger: Logger = createSilentLogger(),
): ResolvedSchema {
  const names = [...rawClasses.keys()]

  // 1. Canonical parents
  const parents = new Map<string, readonly string[]>()
  for (const [name, cls] of rawClasses) {
    const canonical: string[] = []
    for (const parent of cls.parents) {
      const resolved = canonicalizeClassName(parent, names)
      if (resolved === undefined) {
        throw new SchemaError(
          `Class '${name}' has unknown parent '${parent}'`,
          "UNKNOWN_PARENT",
          name,
          { parent },
        )
      }
      if (!canonical.includes(resolved)) canonical.push(resolved)
    }
    parents.set(name, Object.freeze(canonical))
  }

  // 2. Order
  const order = topologicalOrder(parents)

  // 3. Merge, parents first
  const resolved = new Map<string, EntityClass>()
  const ancestors = new Map<string, ReadonlySet<string>>()
  for (const name of order) {
    const raw = rawClasses.get(name)
    if (!raw) continue
    const direct = parents.get(name) ?? []
    const parentClasses = direct.flatMap((p) => {
      const cls = resolved.get(p)
      return cls ? [cls] : []
    })

    const attributes = mergeFields<AttributeDef>(
      parentClasses.map((p) => p.attributes),
      raw.attributes,
    )
    const relations = mergeFields<RelationDef>(
      parentClasses.map((p) => p.relations),
      raw.relations,
    )

    const cls: EntityClass = Object.freeze({
      name,
      description: raw.description,
      parents: direct,
      abstract: raw.abstract || parentClasses.some((p) => p.abstract),
      attributes,
      relations,
    })
    resolved.set(name, cls)

    const closure = new Set<string>([name])
    for (const parent of direct) {
      for (const ancestor of ancestors.get(parent) ?? []) closure.add(ancestor)
    }
    ancestors.set(name, closure)

    warnNonNumericBounds(raw, logger)
  }

  // 4. Declaration order for the public map, children sorted
  const classes = new Map<string, EntityClass>()
  const children = new Map<string, string[]>()
  for (const name of names) {
    const cls = resolved.get(name)
    if (cls) classes.set(name, cls)
    children.set(name, [])
  }
  for (const [child, direct] of parents) {
    for (const parent of direct) children.get(parent)?.push(child)
  }
  for (const list of children.values()) list.sort()

  logger.debug("Schema resolved", { classes: classes.size })
  return new Schema(classes, parents, children, ancestors, Object.freeze(order))
}
