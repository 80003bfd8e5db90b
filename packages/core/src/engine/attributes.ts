/**
 * Attribute Engine
 *
 * Turns raw input into a stored AttributeValue for one attribute of one
 * entity: unwraps structured input, coerces to the declared type, checks
 * constraints and resolves the unit.
 *
 * Enum and bound violations are advisory here (logged, value kept) and
 * enforced later by the validator. Coercion, pattern and unit violations
 * are fatal.
 */

import { UnknownFieldError, ValueError } from "../errors"
import type { Logger } from "../logging"
import { isNumericType, type AttributeDef, type AttributeScalar, type EntityClass } from "../schema"
import type { AttributeValue } from "../store"
import { fullMatch, inEnum } from "../schema/matching"
import { coerceValue, isEmptyInput } from "./coerce"

export interface AttributeWrite {
  cls: EntityClass
  entityId: string
  name: string
  /** Scalar, or structured `{value, unit?, provenance_ref?}` */
  raw: unknown
  /** Overrides any unit embedded in `raw` */
  unit?: string
  /** Overrides any provenance embedded in `raw` */
  provenanceRef?: string
}

interface Unwrapped {
  value: unknown
  unit?: string
  provenanceRef?: string
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === "string") return value === "" ? undefined : value
  if (typeof value === "number") return String(value)
  return undefined
}

/**
 * Split structured input into its parts. Plain values pass through.
 */
export function unwrapAttributeInput(raw: unknown): Unwrapped {
  if (isRecord(raw) && "value" in raw) {
    return {
      value: raw.value,
      unit: optionalString(raw.unit),
      provenanceRef: optionalString(raw.provenance_ref ?? raw.provenanceRef),
    }
  }
  return { value: raw }
}

export function formatList(values: readonly unknown[]): string {
  return `[${values.map((v) => String(v)).join(", ")}]`
}

function lookup(cls: EntityClass, entityId: string, name: string): AttributeDef {
  const def = cls.attributes.get(name)
  if (!def) {
    throw new UnknownFieldError(cls.name, entityId, name, "attribute", [...cls.attributes.keys()])
  }
  return def
}

function checkAdvisory(def: AttributeDef, value: AttributeScalar, tag: string, logger: Logger): void {
  const c = def.constraints
  if (c.enum && c.enum.length > 0 && !inEnum(c.enum, value)) {
    logger.warn(`${tag} Value '${String(value)}' is not allowed for '${def.name}'. Allowed: ${formatList(c.enum)}`)
  }
  if (isNumericType(def.type) && typeof value === "number") {
    if (c.minimum !== undefined && value < c.minimum) {
      logger.warn(`${tag} Value ${value} for '${def.name}' is below minimum ${c.minimum}.`)
    }
    if (c.maximum !== undefined && value > c.maximum) {
      logger.warn(`${tag} Value ${value} for '${def.name}' is above maximum ${c.maximum}.`)
    }
  }
}

/**
 * Compute the value to store for an attribute write.
 *
 * @returns the new value, or `undefined` when the input clears the attribute
 * @throws UnknownFieldError if the class does not declare the attribute
 * @throws ValueError on coercion, pattern or unit violations
 */
export function resolveAttributeWrite(write: AttributeWrite, logger: Logger): AttributeValue | undefined {
  const { cls, entityId, name } = write
  const def = lookup(cls, entityId, name)
  const tag = `[${cls.name}:${entityId}]`

  const input = unwrapAttributeInput(write.raw)
  if (isEmptyInput(input.value)) return undefined

  const coerced = coerceValue(def.type, input.value)
  if (!coerced.ok) {
    throw new ValueError(
      `${tag} Attribute '${name}': ${coerced.message}`,
      "COERCION",
      cls.name,
      entityId,
      name,
      input.value,
      def.type,
    )
  }
  const value = coerced.value

  checkAdvisory(def, value, tag, logger)

  const pattern = def.constraints.pattern
  if (pattern !== undefined && !fullMatch(pattern, String(value))) {
    throw new ValueError(
      `${tag} Value '${String(value)}' for '${name}' does not match pattern '${pattern}'.`,
      "PATTERN",
      cls.name,
      entityId,
      name,
      value,
      pattern,
    )
  }

  const unit = write.unit ?? input.unit ?? def.unit?.default
  const allowed = def.unit?.allowed
  if (unit !== undefined && allowed && allowed.length > 0 && !allowed.includes(unit)) {
    throw new ValueError(
      `${tag} Unit '${unit}' is not allowed for '${name}'. Allowed: ${formatList(allowed)}`,
      "UNIT",
      cls.name,
      entityId,
      name,
      unit,
      allowed.join(", "),
    )
  }

  const provenanceRef = write.provenanceRef ?? input.provenanceRef
  return Object.freeze({
    value,
    ...(unit !== undefined ? { unit } : {}),
    ...(provenanceRef !== undefined ? { provenanceRef } : {}),
  })
}
