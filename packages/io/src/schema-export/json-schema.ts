/**
 * JSON Schema Generator
 *
 * Describes the nested export (`toNestedDocument`) as a draft 2020-12
 * JSON Schema: one `$defs` entry per class, entity sections keyed by id,
 * attribute and relation arrays whose items are `oneOf` the declared fields.
 */

import {
  isRelationRequired,
  relationItemBounds,
  type AttributeDef,
  type EntityClass,
  type RelationDef,
  type ResolvedSchema,
  type AttributeType,
} from "@domodel/core"
import { writeText } from "../fs"

export type JsonObject = Record<string, unknown>

export const JSON_SCHEMA_DIALECT = "https://json-schema.org/draft/2020-12/schema"

export function jsonSchemaType(type: AttributeType): "number" | "integer" | "boolean" | "string" {
  switch (type) {
    case "float":
      return "number"
    case "integer":
      return "integer"
    case "boolean":
      return "boolean"
    case "string":
      return "string"
  }
}

/**
 * Schema of a bare attribute value, with its value constraints.
 */
export function valueSchema(def: AttributeDef): JsonObject {
  const type = jsonSchemaType(def.type)
  const c = def.constraints
  const schema: JsonObject = { type }

  if (c.enum && c.enum.length > 0) schema.enum = [...c.enum]
  if (type === "number" || type === "integer") {
    if (c.minimum !== undefined) schema.minimum = c.minimum
    if (c.maximum !== undefined) schema.maximum = c.maximum
  }
  if (type === "string") {
    if (c.pattern !== undefined) schema.pattern = `^(?:${c.pattern})$`
    if (c.minLength !== undefined) schema.minLength = c.minLength
    if (c.maxLength !== undefined) schema.maxLength = c.maxLength
  }
  return schema
}

function attributeItem(def: AttributeDef): JsonObject {
  const unit: JsonObject = { type: "string" }
  if (def.unit?.allowed) unit.enum = [...def.unit.allowed]

  return {
    type: "object",
    ...(def.description ? { description: def.description } : {}),
    properties: {
      id: { const: def.name },
      value: valueSchema(def),
      unit,
      provenance_ref: { type: "string" },
    },
    required: ["id", "value"],
    additionalProperties: false,
  }
}

function relationItem(def: RelationDef): JsonObject {
  const bounds = relationItemBounds(def)
  const ids: JsonObject = { type: "array", items: { type: "string" } }
  if (bounds.min > 0) ids.minItems = bounds.min
  if (Number.isFinite(bounds.max)) ids.maxItems = bounds.max
  if (def.constraints.unique) ids.uniqueItems = true

  return {
    type: "object",
    ...(def.description ? { description: def.description } : {}),
    properties: {
      id: { const: def.name },
      target_entity_ids: ids,
    },
    required: ["id", "target_entity_ids"],
    additionalProperties: false,
  }
}

function containsField(name: string): JsonObject {
  return { contains: { type: "object", properties: { id: { const: name } }, required: ["id"] } }
}

function fieldArray(items: JsonObject[], requiredNames: string[]): JsonObject {
  const schema: JsonObject = { type: "array" }
  if (items.length === 0) {
    schema.maxItems = 0
  } else {
    schema.items = { oneOf: items }
  }
  if (requiredNames.length > 0) schema.allOf = requiredNames.map(containsField)
  return schema
}

export function entitySchema(cls: EntityClass): JsonObject {
  const attributes = [...cls.attributes.values()]
  const relations = [...cls.relations.values()]

  return {
    type: "object",
    ...(cls.description ? { description: cls.description } : {}),
    properties: {
      attributes: fieldArray(
        attributes.map(attributeItem),
        attributes.filter((a) => a.required).map((a) => a.name),
      ),
      relations: fieldArray(
        relations.map(relationItem),
        relations.filter(isRelationRequired).map((r) => r.name),
      ),
    },
    required: ["attributes", "relations"],
    additionalProperties: false,
  }
}

export function buildJsonSchema(schema: ResolvedSchema, title = "Domain model"): JsonObject {
  const properties: JsonObject = {}
  const defs: JsonObject = {}

  for (const cls of schema.classes.values()) {
    defs[cls.name] = entitySchema(cls)
    properties[cls.name] = {
      type: "object",
      additionalProperties: { $ref: `#/$defs/${cls.name}` },
    }
  }

  return {
    $schema: JSON_SCHEMA_DIALECT,
    title,
    type: "object",
    properties,
    additionalProperties: false,
    $defs: defs,
  }
}

export function exportJsonSchema(schema: ResolvedSchema, path: string): void {
  writeText(path, JSON.stringify(buildJsonSchema(schema), null, 2) + "\n")
}
