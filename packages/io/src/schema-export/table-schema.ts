/**
 * Frictionless Table Schemas
 *
 * Table Schema descriptors for the three CSV layouts. The wide layout gets
 * typed, constrained columns; schema details with no Table Schema keyword
 * go into a `domodel` extension object on the field.
 */

import {
  isMultiValued,
  isRelationRequired,
  UnknownClassError,
  type AttributeDef,
  type RelationDef,
  type ResolvedSchema,
} from "@domodel/core"
import { LONG_COLUMNS } from "../csv/long"
import { NARROW_COLUMNS } from "../csv/narrow"
import { PROVENANCE_SUFFIX, UNIT_SUFFIX } from "../csv/wide"
import { jsonSchemaType, type JsonObject } from "./json-schema"

export const EXTENSION_KEY = "domodel"

export interface TableField {
  name: string
  type: "string" | "number" | "integer" | "boolean"
  description?: string
  constraints?: JsonObject
  default?: string | number | boolean
  [EXTENSION_KEY]?: JsonObject
}

export interface TableSchema {
  fields: TableField[]
  primaryKey?: string[]
  foreignKeys?: Array<{ fields: string[]; reference: { resource: string; fields: string[] } }>
  missingValues: string[]
}

/**
 * Lowercase, with runs of characters outside `[-a-z0-9._/]` replaced by `-`.
 */
export function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^-a-z0-9._/]+/g, "-")
    .replace(/^-+|-+$/g, "")
}

function stringField(name: string, required = false): TableField {
  return required ? { name, type: "string", constraints: { required: true } } : { name, type: "string" }
}

function attributeField(def: AttributeDef): TableField {
  const c = def.constraints
  const type = jsonSchemaType(def.type)
  const constraints: JsonObject = {}
  if (def.required) constraints.required = true
  if (c.enum && c.enum.length > 0) constraints.enum = [...c.enum]
  if (type === "number" || type === "integer") {
    if (c.minimum !== undefined) constraints.minimum = c.minimum
    if (c.maximum !== undefined) constraints.maximum = c.maximum
  }
  if (type === "string") {
    if (c.pattern !== undefined) constraints.pattern = c.pattern
    if (c.minLength !== undefined) constraints.minLength = c.minLength
    if (c.maxLength !== undefined) constraints.maxLength = c.maxLength
  }

  const extension: JsonObject = {}
  if (def.unit?.default !== undefined) extension.unit = def.unit.default
  if (def.unit?.allowed) extension.allowedUnits = [...def.unit.allowed]
  if (def.group !== undefined) extension.group = def.group
  if (def.order !== undefined) extension.order = def.order

  return {
    name: def.name,
    type,
    ...(def.description ? { description: def.description } : {}),
    ...(Object.keys(constraints).length > 0 ? { constraints } : {}),
    ...(def.default !== undefined ? { default: def.default } : {}),
    ...(Object.keys(extension).length > 0 ? { [EXTENSION_KEY]: extension } : {}),
  }
}

function relationField(def: RelationDef): TableField {
  return {
    name: def.name,
    type: "string",
    ...(def.description ? { description: def.description } : {}),
    ...(isRelationRequired(def) ? { constraints: { required: true } } : {}),
    [EXTENSION_KEY]: {
      relation: true,
      targets: [...def.targets],
      cardinality: def.cardinality,
      multiValued: isMultiValued(def),
    },
  }
}

/**
 * Table Schema of a class's wide CSV.
 *
 * Single-valued relations with exactly one target class become foreign
 * keys into that class's resource (resource names are slugified class names).
 *
 * @throws UnknownClassError
 */
export function buildWideTableSchema(schema: ResolvedSchema, className: string, meta = false): TableSchema {
  const cls = schema.getClass(className)
  if (!cls) throw new UnknownClassError(className, [...schema.classes.keys()])

  const fields: TableField[] = [
    { name: "entity_id", type: "string", constraints: { required: true, unique: true } },
  ]
  const foreignKeys: NonNullable<TableSchema["foreignKeys"]> = []

  for (const def of cls.relations.values()) {
    fields.push(relationField(def))
    const [target] = def.targets
    if (def.targets.length === 1 && target !== undefined && !isMultiValued(def)) {
      foreignKeys.push({
        fields: [def.name],
        reference: { resource: slugify(schema.canonicalClassName(target) ?? target), fields: ["entity_id"] },
      })
    }
  }

  for (const def of cls.attributes.values()) {
    fields.push(attributeField(def))
    if (meta) {
      fields.push(stringField(`${def.name}${UNIT_SUFFIX}`), stringField(`${def.name}${PROVENANCE_SUFFIX}`))
    }
  }

  return {
    fields,
    primaryKey: ["entity_id"],
    ...(foreignKeys.length > 0 ? { foreignKeys } : {}),
    missingValues: [""],
  }
}

export function buildNarrowTableSchema(): TableSchema {
  return {
    fields: NARROW_COLUMNS.map((name) => stringField(name, name === "entity_id" || name === "attribute")),
    missingValues: [""],
  }
}

export function buildLongTableSchema(): TableSchema {
  return {
    fields: LONG_COLUMNS.map((name) => stringField(name, name === "entity_class" || name === "entity_id")),
    missingValues: [""],
  }
}
