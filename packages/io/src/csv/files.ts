/**
 * Directory-per-model CSV helpers: one file per class.
 */

import { readdirSync, statSync } from "node:fs"
import { basename, extname, join } from "node:path"
import { ImportError } from "../errors"

export function classFileName(className: string, suffix = ""): string {
  return `${className}${suffix}.csv`
}

/**
 * CSV files directly inside a directory, sorted by name.
 * @throws ImportError `MALFORMED` if the directory does not exist
 */
export function listCsvFiles(dir: string): string[] {
  let entries: string[]
  try {
    entries = readdirSync(dir)
  } catch (err) {
    throw new ImportError(
      `Cannot read CSV directory ${dir}`,
      "MALFORMED",
      [],
      dir,
      err instanceof Error ? err : undefined,
    )
  }
  return entries
    .filter((name) => extname(name).toLowerCase() === ".csv")
    .map((name) => join(dir, name))
    .filter((path) => statSync(path).isFile())
    .sort()
}

/**
 * Class name encoded in a file name, with an optional suffix stripped.
 */
export function classFromFile(path: string, suffix = ""): string {
  const stem = basename(path, extname(path))
  return suffix && stem.endsWith(suffix) ? stem.slice(0, -suffix.length) : stem
}

/**
 * @throws ImportError `MALFORMED` naming the missing columns
 */
export function requireColumns(header: readonly string[], required: readonly string[], source: string): void {
  const missing = required.filter((column) => !header.includes(column))
  if (missing.length > 0) {
    throw new ImportError(`${source}: missing column(s) ${missing.join(", ")}`, "MALFORMED", [], source)
  }
}

export function formatScalar(value: string | number | boolean): string {
  return typeof value === "string" ? value : String(value)
}
