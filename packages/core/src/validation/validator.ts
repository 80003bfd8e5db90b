/**
 * Model Validator
 *
 * Checks every stored entity against its resolved class and returns
 * diagnostics. Validation never throws and never mutates the store.
 */

import { coerceValue, formatList, fullMatch, inEnum, relationTargets } from "../engine"
import {
  isNumericType,
  isRelationRequired,
  relationItemBounds,
  type AttributeDef,
  type EntityClass,
  type RelationDef,
  type ResolvedSchema,
} from "../schema"
import { isAttributeValue, isRelationValue, type Entity, type EntityStore } from "../store"

// =============================================================================
// TYPES
// =============================================================================

export type DiagnosticCode =
  | "UNKNOWN_FIELD"
  | "MISSING_ATTRIBUTE"
  | "TYPE_ERROR"
  | "MINIMUM"
  | "MAXIMUM"
  | "ENUM"
  | "PATTERN"
  | "MIN_LENGTH"
  | "MAX_LENGTH"
  | "MISSING_RELATION"
  | "MIN_ITEMS"
  | "MAX_ITEMS"
  | "DUPLICATE_TARGETS"
  | "DANGLING_TARGET"
  | "INCOMPATIBLE_TARGET"

export interface Diagnostic {
  code: DiagnosticCode
  className: string
  entityId: string
  field?: string
  /** `[Class:id] ...` */
  message: string
}

type Report = (code: DiagnosticCode, field: string | undefined, text: string) => void

// =============================================================================
// ATTRIBUTES
// =============================================================================

function checkAttribute(def: AttributeDef, entity: Entity, report: Report): void {
  const name = def.name
  const stored = entity.data.get(name)
  if (stored === undefined || !isAttributeValue(stored)) {
    if (def.required) report("MISSING_ATTRIBUTE", name, `Missing required attribute '${name}'`)
    return
  }

  const coerced = coerceValue(def.type, stored.value)
  if (!coerced.ok) {
    report("TYPE_ERROR", name, `Attribute '${name}' type error: ${coerced.message}`)
    return
  }
  const value = coerced.value
  const c = def.constraints

  if (isNumericType(def.type) && typeof value === "number") {
    if (c.minimum !== undefined && value < c.minimum) {
      report("MINIMUM", name, `Attribute '${name}' violates minimum ${c.minimum}: ${value}`)
    }
    if (c.maximum !== undefined && value > c.maximum) {
      report("MAXIMUM", name, `Attribute '${name}' violates maximum ${c.maximum}: ${value}`)
    }
  }

  if (c.enum && c.enum.length > 0 && !inEnum(c.enum, value)) {
    report("ENUM", name, `Attribute '${name}' not in enum ${formatList(c.enum)}: ${String(value)}`)
  }

  if (c.pattern !== undefined && !fullMatch(c.pattern, String(value))) {
    report("PATTERN", name, `Attribute '${name}' does not match pattern '${c.pattern}': '${String(value)}'`)
  }

  if (typeof value === "string") {
    if (c.minLength !== undefined && value.length < c.minLength) {
      report("MIN_LENGTH", name, `Attribute '${name}' length<${c.minLength}`)
    }
    if (c.maxLength !== undefined && value.length > c.maxLength) {
      report("MAX_LENGTH", name, `Attribute '${name}' length>${c.maxLength}`)
    }
  }
}

// =============================================================================
// RELATIONS
// =============================================================================

function checkRelation(
  def: RelationDef,
  entity: Entity,
  schema: ResolvedSchema,
  store: EntityStore,
  report: Report,
): void {
  const name = def.name
  const stored = entity.data.get(name)
  const targets = stored !== undefined && isRelationValue(stored) ? relationTargets(stored) : []

  if (targets.length === 0) {
    if (isRelationRequired(def)) report("MISSING_RELATION", name, `Missing required relation '${name}'`)
    return
  }

  const bounds = relationItemBounds(def)
  if (targets.length < bounds.min) {
    report("MIN_ITEMS", name, `Relation '${name}' has <${bounds.min} targets`)
  }
  if (targets.length > bounds.max) {
    report("MAX_ITEMS", name, `Relation '${name}' has >${bounds.max} targets`)
  }

  if (def.constraints.unique && new Set(targets).size !== targets.length) {
    report("DUPLICATE_TARGETS", name, `Relation '${name}' contains duplicate target ids`)
  }

  const allowed = def.targets
  const allowedText = allowed.length > 0 ? allowed.join(", ") : "<any>"
  for (const target of targets) {
    const targetClass = store.classOf(target)
    if (targetClass === undefined) {
      report(
        "DANGLING_TARGET",
        name,
        `Relation '${name}' with '${target}' not among entities of allowed classes [${allowedText}]`,
      )
      continue
    }
    if (allowed.length > 0 && !allowed.some((a) => schema.isSubclassOf(targetClass, a))) {
      report(
        "INCOMPATIBLE_TARGET",
        name,
        `Relation '${name}' with '${target}' is of class '${targetClass}' not compatible with any of [${allowedText}]`,
      )
    }
  }
}

// =============================================================================
// ENTRY POINTS
// =============================================================================

function validateEntity(
  cls: EntityClass,
  entity: Entity,
  schema: ResolvedSchema,
  store: EntityStore,
  out: Diagnostic[],
): void {
  const report: Report = (code, field, text) => {
    out.push({
      code,
      className: cls.name,
      entityId: entity.id,
      ...(field !== undefined ? { field } : {}),
      message: `[${cls.name}:${entity.id}] ${text}`,
    })
  }

  for (const key of entity.data.keys()) {
    if (!cls.attributes.has(key) && !cls.relations.has(key)) {
      report("UNKNOWN_FIELD", key, `Unknown field '${key}'`)
    }
  }
  for (const def of cls.attributes.values()) {
    checkAttribute(def, entity, report)
  }
  for (const def of cls.relations.values()) {
    checkRelation(def, entity, schema, store, report)
  }
}

/**
 * Validate every entity. Classes are visited in schema order, entities in
 * insertion order, fields in resolved order.
 *
 * @returns diagnostics; empty when the model is valid
 */
export function validateModel(schema: ResolvedSchema, store: EntityStore): Diagnostic[] {
  const diagnostics: Diagnostic[] = []
  for (const cls of schema.classes.values()) {
    for (const entity of store.entitiesOf(cls.name)) {
      validateEntity(cls, entity, schema, store, diagnostics)
    }
  }
  return diagnostics
}

/**
 * One message per line.
 */
export function formatDiagnostics(diagnostics: readonly Diagnostic[]): string {
  return diagnostics.map((d) => d.message).join("\n")
}
