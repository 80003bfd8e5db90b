/**
 * Schema Definition Parsing
 *
 * Zod schemas for the attribute, relation, constraint and unit specs found
 * in schema documents, plus builders that turn a validated spec into the
 * immutable records of `./types`, and the inverse writers.
 *
 * Two attribute styles are accepted:
 *
 * ```yaml
 * # nested
 * capacity:
 *   description: Installed capacity.
 *   required: true
 *   value: { type: float, constraints: { minimum: 0 } }
 *   unit: { type: string, constraints: { enum: [MW, kW] } }
 *
 * # flat
 * capacity: { type: float, required: true, constraints: { minimum: 0 }, unit: MW }
 * ```
 */

import { z } from "zod"
import { SchemaError } from "../errors"
import type {
  AttributeDef,
  AttributeScalar,
  AttributeType,
  Constraint,
  RelationConstraint,
  RelationDef,
  UnitSpec,
} from "./types"

// =============================================================================
// ZOD SPECS
// =============================================================================

const scalarSchema = z.union([z.string(), z.number(), z.boolean()])
const countSchema = z.number().int().nonnegative()

export const constraintSpecSchema = z.object({
  enum: z.array(scalarSchema).nullish(),
  minimum: z.number().nullish(),
  maximum: z.number().nullish(),
  pattern: z.string().nullish(),
  regex: z.string().nullish(),
  ref: z.string().nullish(),
  min_length: countSchema.nullish(),
  minLength: countSchema.nullish(),
  max_length: countSchema.nullish(),
  maxLength: countSchema.nullish(),
  min_items: countSchema.nullish(),
  minItems: countSchema.nullish(),
  max_items: countSchema.nullish(),
  maxItems: countSchema.nullish(),
  unique: z.boolean().nullish(),
})

export const unitSpecSchema = z.union([
  z.string(),
  z.object({
    type: z.string().nullish(),
    default: z.string().nullish(),
    description: z.string().nullish(),
    constraints: z.object({ enum: z.array(z.string()).nullish() }).nullish(),
  }),
])

const valueSpecSchema = z.object({
  type: z.string().nullish(),
  default: scalarSchema.nullish(),
  required: z.boolean().nullish(),
  enum: z.array(scalarSchema).nullish(),
  constraints: constraintSpecSchema.nullish(),
})

export const attributeSpecSchema = valueSpecSchema.extend({
  description: z.string().nullish(),
  value: valueSpecSchema.nullish(),
  unit: unitSpecSchema.nullish(),
  group: z.string().nullish(),
  order: z.number().int().nullish(),
})

const targetListSchema = z.union([z.string(), z.array(z.string())])

export const relationSpecSchema = z.object({
  target: targetListSchema.nullish(),
  targets: targetListSchema.nullish(),
  ref: z.string().nullish(),
  cardinality: z.union([z.string(), z.number()]).nullish(),
  required: z.boolean().nullish(),
  description: z.string().nullish(),
  constraints: constraintSpecSchema.nullish(),
})

export type ConstraintSpec = z.infer<typeof constraintSpecSchema>
export type UnitSpecInput = z.infer<typeof unitSpecSchema>
export type AttributeSpec = z.infer<typeof attributeSpecSchema>
export type RelationSpec = z.infer<typeof relationSpecSchema>

// =============================================================================
// TYPE NAMES
// =============================================================================

const TYPE_ALIASES: Record<string, AttributeType> = {
  string: "string",
  str: "string",
  float: "float",
  number: "float",
  double: "float",
  decimal: "float",
  integer: "integer",
  int: "integer",
  long: "integer",
  boolean: "boolean",
  bool: "boolean",
}

/**
 * Normalize a type name from a schema document.
 * Unknown names (dates, timestamps, ...) are carried as strings.
 */
export function normalizeAttributeType(raw: string | null | undefined): AttributeType {
  if (!raw) return "string"
  return TYPE_ALIASES[raw.trim().toLowerCase()] ?? "string"
}

export function isNumericType(type: AttributeType): boolean {
  return type === "float" || type === "integer"
}

// =============================================================================
// BUILDERS
// =============================================================================

function parseSpec<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  className: string,
  field: string,
): z.infer<T> {
  const result = schema.safeParse(raw ?? {})
  if (!result.success) {
    const issue = result.error.errors[0]
    const where = issue && issue.path.length > 0 ? ` at '${issue.path.join(".")}'` : ""
    throw new SchemaError(
      `Invalid definition of '${field}' in class '${className}'${where}: ${issue?.message ?? "validation failed"}`,
      "INVALID_DEFINITION",
      className,
      { field, issues: result.error.errors },
    )
  }
  return result.data
}

/** Drop keys whose value is undefined, for written documents. */
function compact(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined))
}

function buildConstraint(spec: ConstraintSpec | null | undefined, enumOverride?: AttributeScalar[] | null): Constraint {
  const enumValues = spec?.enum ?? enumOverride ?? undefined
  return Object.freeze({
    enum: enumValues ? Object.freeze([...enumValues]) : undefined,
    minimum: spec?.minimum ?? undefined,
    maximum: spec?.maximum ?? undefined,
    pattern: spec?.pattern ?? spec?.regex ?? undefined,
    ref: spec?.ref ?? undefined,
    minLength: spec?.min_length ?? spec?.minLength ?? undefined,
    maxLength: spec?.max_length ?? spec?.maxLength ?? undefined,
  })
}

function buildRelationConstraint(spec: ConstraintSpec | null | undefined): RelationConstraint {
  return Object.freeze({
    minItems: spec?.min_items ?? spec?.minItems ?? undefined,
    maxItems: spec?.max_items ?? spec?.maxItems ?? undefined,
    unique: spec?.unique ?? undefined,
  })
}

export function buildUnitSpec(spec: UnitSpecInput | null | undefined): UnitSpec | undefined {
  if (spec === null || spec === undefined) return undefined
  if (typeof spec === "string") {
    return spec === "" ? undefined : Object.freeze({ default: spec })
  }

  const allowed = spec.constraints?.enum ?? []
  const unit: UnitSpec = {
    allowed: allowed.length > 0 ? Object.freeze([...allowed]) : undefined,
    default: spec.default ?? allowed[0],
    description: spec.description ?? undefined,
  }
  if (unit.allowed === undefined && unit.default === undefined && unit.description === undefined) {
    return undefined
  }
  return Object.freeze(unit)
}

/**
 * Build an attribute definition from a raw spec (either style).
 * @throws SchemaError on a malformed spec
 */
export function buildAttributeDef(name: string, raw: unknown, className: string): AttributeDef {
  const spec = parseSpec(attributeSpecSchema, raw, className, name)
  // Nested style keeps type/default/constraints under `value`
  const value = spec.value ?? spec

  return Object.freeze({
    name,
    type: normalizeAttributeType(value.type),
    required: Boolean(spec.required ?? value.required ?? false),
    description: spec.description ?? "",
    default: value.default ?? undefined,
    constraints: buildConstraint(value.constraints, value.enum),
    unit: buildUnitSpec(spec.unit),
    group: spec.group ?? undefined,
    order: spec.order ?? undefined,
  })
}

/**
 * Build a relation definition. `target` may be one class name or a list.
 * @throws SchemaError on a malformed spec
 */
export function buildRelationDef(name: string, raw: unknown, className: string): RelationDef {
  const spec = parseSpec(relationSpecSchema, raw, className, name)
  const rawTargets = spec.target ?? spec.targets ?? spec.ref ?? []
  const targets = (Array.isArray(rawTargets) ? rawTargets : [rawTargets])
    .map((t) => t.trim())
    .filter((t) => t.length > 0)

  return Object.freeze({
    name,
    targets: Object.freeze(targets),
    cardinality: spec.cardinality === null || spec.cardinality === undefined ? "1" : String(spec.cardinality),
    required: spec.required ?? undefined,
    description: spec.description ?? "",
    constraints: buildRelationConstraint(spec.constraints),
  })
}

// =============================================================================
// WRITERS
// =============================================================================

function writeConstraint(c: Constraint): Record<string, unknown> | undefined {
  const out = compact({
    enum: c.enum ? [...c.enum] : undefined,
    minimum: c.minimum,
    maximum: c.maximum,
    pattern: c.pattern,
    ref: c.ref,
    min_length: c.minLength,
    max_length: c.maxLength,
  })
  return Object.keys(out).length > 0 ? out : undefined
}

function writeUnit(unit: UnitSpec | undefined): unknown {
  if (!unit) return undefined
  if (!unit.allowed && !unit.description && unit.default !== undefined) return unit.default

  return compact({
    type: "string",
    default: unit.allowed && unit.default === unit.allowed[0] ? undefined : unit.default,
    description: unit.description,
    constraints: unit.allowed ? { enum: [...unit.allowed] } : undefined,
  })
}

/**
 * Write an attribute back in the nested document style.
 */
export function writeAttributeSpec(def: AttributeDef): Record<string, unknown> {
  return compact({
    description: def.description || undefined,
    required: def.required || undefined,
    value: compact({
      type: def.type,
      default: def.default,
      constraints: writeConstraint(def.constraints),
    }),
    unit: writeUnit(def.unit),
    group: def.group,
    order: def.order,
  })
}

export function writeRelationSpec(def: RelationDef): Record<string, unknown> {
  const constraints = compact({
    min_items: def.constraints.minItems,
    max_items: def.constraints.maxItems,
    unique: def.constraints.unique,
  })
  return compact({
    target: [...def.targets],
    cardinality: def.cardinality,
    required: def.required,
    description: def.description || undefined,
    constraints: Object.keys(constraints).length > 0 ? constraints : undefined,
  })
}
