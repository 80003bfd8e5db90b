/**
 * Nested JSON and YAML files.
 */

import YAML from "yaml"
import type { DomainModel } from "@domodel/core"
import { ImportError } from "../errors"
import { readText, writeText } from "../fs"
import { applyImport } from "../import/pipeline"
import type { ImportOptions, ImportSummary } from "../import/types"
import { readNestedDocument, toNestedDocument } from "./document"

const FLOW_SEQUENCES = new Set(["attributes", "relations"])

export function exportJson(model: DomainModel, path: string): void {
  writeText(path, JSON.stringify(toNestedDocument(model), null, 2) + "\n")
}

/**
 * Write the nested document as YAML. Attribute and relation records are
 * written in flow style, one per line.
 */
export function exportYaml(model: DomainModel, path: string): void {
  const doc = new YAML.Document(toNestedDocument(model))

  YAML.visit(doc, {
    Map(_key, map, path) {
      const seq = path[path.length - 1]
      const pair = path[path.length - 2]
      if (
        YAML.isSeq(seq) &&
        YAML.isPair(pair) &&
        YAML.isScalar(pair.key) &&
        typeof pair.key.value === "string" &&
        FLOW_SEQUENCES.has(pair.key.value)
      ) {
        map.flow = true
      }
    },
  })

  writeText(path, doc.toString())
}

/**
 * Apply an in-memory nested document.
 */
export function importNested(
  model: DomainModel,
  doc: unknown,
  options: ImportOptions = {},
  source?: string,
): ImportSummary {
  return applyImport(model, readNestedDocument(doc, source), options)
}

export function importJson(model: DomainModel, path: string, options: ImportOptions = {}): ImportSummary {
  let doc: unknown
  try {
    doc = JSON.parse(readText(path))
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new ImportError(`Invalid JSON in ${path}: ${err.message}`, "MALFORMED", [], path)
    }
    throw err
  }
  return importNested(model, doc, options, path)
}

export function importYaml(model: DomainModel, path: string, options: ImportOptions = {}): ImportSummary {
  const parsed = YAML.parseDocument(readText(path))
  const [firstError] = parsed.errors
  if (firstError) {
    throw new ImportError(`Invalid YAML in ${path}: ${firstError.message}`, "MALFORMED", [], path)
  }
  return importNested(model, parsed.toJS(), options, path)
}
