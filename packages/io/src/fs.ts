/**
 * File helpers shared by the exporters and importers.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs"
import { dirname } from "node:path"
import { ImportError } from "./errors"

/**
 * Write a UTF-8 text file, creating parent directories on demand.
 */
export function writeText(path: string, text: string): void {
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, text, "utf-8")
}

export function ensureDir(path: string): void {
  mkdirSync(path, { recursive: true })
}

/**
 * @throws ImportError `MALFORMED` when the file does not exist
 */
export function readText(path: string): string {
  if (!existsSync(path)) {
    throw new ImportError(`File not found: ${path}`, "MALFORMED", [], path)
  }
  return readFileSync(path, "utf-8")
}
