/**
 * Value Coercion
 *
 * Converts raw input (typically strings read from CSV or YAML) to the
 * declared attribute type. Never throws; callers decide whether a failed
 * coercion is fatal (writes) or a diagnostic (validation).
 */

import type { AttributeScalar, AttributeType } from "../schema"

export type CoercionResult = { ok: true; value: AttributeScalar } | { ok: false; message: string }

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/
const TRUE_WORDS = new Set(["true", "1", "yes"])
const FALSE_WORDS = new Set(["false", "0", "no"])

function describe(raw: unknown): string {
  if (typeof raw === "string") return raw
  if (typeof raw === "object" && raw !== null) return JSON.stringify(raw)
  return String(raw)
}

function fail(raw: unknown, type: string): CoercionResult {
  return { ok: false, message: `cannot parse '${describe(raw)}' as ${type}` }
}

/**
 * Parse a finite number, accepting a comma as decimal separator in strings.
 */
function toNumber(raw: unknown): number | undefined {
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : undefined
  if (typeof raw !== "string") return undefined
  const text = raw.trim().replace(",", ".")
  if (!NUMERIC.test(text)) return undefined
  const n = Number(text)
  return Number.isFinite(n) ? n : undefined
}

export function coerceValue(type: AttributeType, raw: unknown): CoercionResult {
  switch (type) {
    case "float": {
      const n = toNumber(raw)
      return n === undefined ? fail(raw, "float") : { ok: true, value: n }
    }

    case "integer": {
      const n = toNumber(raw)
      // Math.trunc(-0.5) is -0; normalize it
      return n === undefined ? fail(raw, "integer") : { ok: true, value: Math.trunc(n) || 0 }
    }

    case "boolean": {
      if (typeof raw === "boolean") return { ok: true, value: raw }
      if (typeof raw !== "string" && typeof raw !== "number") return fail(raw, "boolean")
      const word = String(raw).trim().toLowerCase()
      if (TRUE_WORDS.has(word)) return { ok: true, value: true }
      if (FALSE_WORDS.has(word)) return { ok: true, value: false }
      return fail(raw, "boolean")
    }

    case "string": {
      if (typeof raw === "string") return { ok: true, value: raw }
      if (typeof raw === "number" || typeof raw === "boolean" || typeof raw === "bigint") {
        return { ok: true, value: String(raw) }
      }
      if (typeof raw === "object" && raw !== null) return { ok: true, value: JSON.stringify(raw) }
      return fail(raw, "string")
    }
  }
}

/**
 * True for input that clears an attribute instead of setting it.
 */
export function isEmptyInput(raw: unknown): raw is null | undefined | "" {
  return raw === null || raw === undefined || raw === ""
}
