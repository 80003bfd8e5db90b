/**
 * Typed Record Schemas
 *
 * Derives a zod object schema per class describing its plain
 * `{attribute: value}` record, so callers can validate records
 * produced by `DomainModel.toRecord` or coming from elsewhere.
 */

import { z } from "zod"
import { fullMatch, inEnum } from "./matching"
import type { AttributeDef, AttributeScalar, EntityClass, ResolvedSchema } from "./types"

export type RecordSchema = z.ZodObject<z.ZodRawShape, "strict">

function scalarSchema(def: AttributeDef): z.ZodTypeAny {
  const c = def.constraints

  switch (def.type) {
    case "boolean":
      return z.boolean()
    case "integer":
    case "float": {
      let schema = def.type === "integer" ? z.number().int() : z.number()
      if (c.minimum !== undefined) schema = schema.gte(c.minimum)
      if (c.maximum !== undefined) schema = schema.lte(c.maximum)
      return schema
    }
    case "string": {
      let schema = z.string()
      if (c.minLength !== undefined) schema = schema.min(c.minLength)
      if (c.maxLength !== undefined) schema = schema.max(c.maxLength)
      const pattern = c.pattern
      if (pattern === undefined) return schema
      return schema.refine((value) => fullMatch(pattern, value), {
        message: `Does not match pattern '${pattern}'`,
      })
    }
  }
}

function attributeSchema(def: AttributeDef): z.ZodTypeAny {
  const base = scalarSchema(def)
  const allowed = def.constraints.enum
  if (!allowed || allowed.length === 0) return base
  return base.refine((value: AttributeScalar) => inEnum(allowed, value), {
    message: `Expected one of [${allowed.join(", ")}]`,
  })
}

/**
 * Build the strict record schema of one class.
 * Required attributes without a default are mandatory; the rest are optional.
 */
export function buildRecordSchema(cls: EntityClass): RecordSchema {
  const shape: z.ZodRawShape = {}
  for (const def of cls.attributes.values()) {
    const schema = attributeSchema(def)
    shape[def.name] = def.required && def.default === undefined ? schema : schema.optional()
  }
  return z.object(shape).strict()
}

/**
 * Record schemas for every instantiable (non-abstract) class.
 */
export function buildRecordSchemas(schema: ResolvedSchema): Map<string, RecordSchema> {
  const out = new Map<string, RecordSchema>()
  for (const cls of schema.classes.values()) {
    if (!cls.abstract) out.set(cls.name, buildRecordSchema(cls))
  }
  return out
}
