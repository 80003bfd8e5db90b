/**
 * Constraint Matching
 *
 * Pattern and enum checks shared by attribute writes, the validator and
 * record schemas.
 */

import type { AttributeScalar } from "./types"

const patternCache = new Map<string, RegExp | null>()

/**
 * Whole-string regular expression match. An uncompilable pattern matches nothing.
 */
export function fullMatch(pattern: string, text: string): boolean {
  let compiled = patternCache.get(pattern)
  if (compiled === undefined) {
    try {
      compiled = new RegExp(`^(?:${pattern})$`)
    } catch (err) {
      if (!(err instanceof SyntaxError)) throw err
      compiled = null
    }
    patternCache.set(pattern, compiled)
  }
  return compiled !== null && compiled.test(text)
}

/**
 * Enum membership; `5` and `"5"` count as the same member.
 */
export function inEnum(allowed: readonly AttributeScalar[], value: AttributeScalar): boolean {
  return allowed.some((a) => a === value || String(a) === String(value))
}
