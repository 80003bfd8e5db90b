/**
 * Wide CSV
 *
 * One file per class, one row per entity, one column per field:
 *
 * ```csv
 * entity_id,connected_to,capacity,fuel
 * G1,N1,100,gas
 * ```
 *
 * Relations come first, then attributes, both in resolved order. A
 * multi-valued relation cell holds a JSON array of ids, as does a cell whose
 * id contains a separator. With `meta` every attribute column is followed by
 * `<name>__unit` and `<name>__prov`, and the file is named
 * `<Class>_wide_meta.csv`.
 */

import { join } from "node:path"
import {
  isAttributeValue,
  isMultiValued,
  isRelationValue,
  relationTargets,
  type DomainModel,
  type EntityClass,
  type Entity,
} from "@domodel/core"
import { ensureDir, readText, writeText } from "../fs"
import { applyImport } from "../import/pipeline"
import type { ImportOptions, ImportRecord, ImportSummary } from "../import/types"
import { formatCsv, parseCsvTable, type CsvRow } from "./codec"
import { classFileName, classFromFile, formatScalar, listCsvFiles, requireColumns } from "./files"

export const META_FILE_SUFFIX = "_wide_meta"
export const UNIT_SUFFIX = "__unit"
export const PROVENANCE_SUFFIX = "__prov"

export interface WideCsvOptions {
  /** Write rows for entities without fields (default: true) */
  includePlaceholders?: boolean
  /** Add unit and provenance columns (default: false) */
  meta?: boolean
}

export const defaultWideCsvOptions: Readonly<Required<WideCsvOptions>> = Object.freeze({
  includePlaceholders: true,
  meta: false,
})

// =============================================================================
// RELATION CELLS
// =============================================================================

/** Ids that `parseRelationCell` would split or strip when written bare */
function needsJsonCell(id: string): boolean {
  return /[;,]/.test(id) || /^\s*[["']/.test(id) || /["'\]]\s*$/.test(id)
}

/**
 * Write relation targets as one cell: a bare id, or a JSON array for lists
 * and for ids that would not survive `parseRelationCell` bare.
 */
export function formatRelationCell(targets: readonly string[], asList = false): string {
  const [first] = targets
  if (first === undefined) return ""
  if (!asList && targets.length === 1 && !needsJsonCell(first)) return first
  return JSON.stringify(targets)
}

// =============================================================================
// EXPORT
// =============================================================================

export function wideHeader(cls: EntityClass, meta: boolean): string[] {
  const header = ["entity_id", ...cls.relations.keys()]
  for (const name of cls.attributes.keys()) {
    header.push(name)
    if (meta) header.push(`${name}${UNIT_SUFFIX}`, `${name}${PROVENANCE_SUFFIX}`)
  }
  return header
}

function wideRow(cls: EntityClass, entity: Entity, meta: boolean): string[] {
  const row = [entity.id]

  for (const def of cls.relations.values()) {
    const value = entity.data.get(def.name)
    const targets = value !== undefined && isRelationValue(value) ? relationTargets(value) : []
    row.push(formatRelationCell(targets, isMultiValued(def)))
  }

  for (const name of cls.attributes.keys()) {
    const value = entity.data.get(name)
    const attribute = value !== undefined && isAttributeValue(value) ? value : undefined
    row.push(attribute ? formatScalar(attribute.value) : "")
    if (meta) row.push(attribute?.unit ?? "", attribute?.provenanceRef ?? "")
  }
  return row
}

/**
 * Write one wide CSV per class (classes without entities get a header-only file).
 */
export function exportWideCsv(model: DomainModel, dir: string, options: WideCsvOptions = {}): void {
  const opts = { ...defaultWideCsvOptions, ...options }
  ensureDir(dir)

  for (const cls of model.schema.classes.values()) {
    const rows: CsvRow[] = [wideHeader(cls, opts.meta)]
    for (const entity of model.store.entitiesOf(cls.name)) {
      if (entity.data.size === 0 && !opts.includePlaceholders) continue
      rows.push(wideRow(cls, entity, opts.meta))
    }
    const file = classFileName(cls.name, opts.meta ? META_FILE_SUFFIX : "")
    writeText(join(dir, file), formatCsv(rows))
  }
}

// =============================================================================
// IMPORT
// =============================================================================

/**
 * Split a relation cell: a JSON array, or ids separated by `;` or `,`.
 */
export function parseRelationCell(cell: string): string[] {
  const text = cell.trim()
  if (text === "") return []

  if (text.startsWith("[")) {
    try {
      const parsed: unknown = JSON.parse(text)
      if (Array.isArray(parsed)) {
        return parsed.map((id) => String(id).trim()).filter((id) => id !== "")
      }
    } catch (err) {
      if (!(err instanceof SyntaxError)) throw err
    }
  }

  return text
    .replace(/^\[|\]$/g, "")
    .split(/[;,]/)
    .map((id) => id.trim().replace(/^["']|["']$/g, ""))
    .filter((id) => id !== "")
}

/**
 * Read every `*.csv` in a directory as wide CSV (plain or meta).
 * Columns are routed by the class schema; undeclared columns are read as
 * attributes and reported by the import pipeline.
 */
export function readWideCsv(model: DomainModel, dir: string): ImportRecord[] {
  const records: ImportRecord[] = []

  for (const file of listCsvFiles(dir)) {
    const className = classFromFile(file, META_FILE_SUFFIX)
    const canonical = model.schema.canonicalClassName(className)
    const cls = canonical === undefined ? undefined : model.schema.getClass(canonical)

    const table = parseCsvTable(readText(file))
    requireColumns(table.header, ["entity_id"], file)

    const fieldColumns = table.header.filter(
      (column) => column !== "entity_id" && !column.endsWith(UNIT_SUFFIX) && !column.endsWith(PROVENANCE_SUFFIX),
    )

    for (const { line, values } of table.records) {
      const entityId = (values.entity_id ?? "").trim()
      if (entityId === "") continue

      const record: ImportRecord = { className, entityId, attributes: [], relations: [], line, source: file }
      for (const column of fieldColumns) {
        const cell = values[column] ?? ""
        if (cell.trim() === "") continue

        if (cls?.relations.has(column)) {
          record.relations.push({ name: column, targets: parseRelationCell(cell) })
          continue
        }

        const unit = (values[`${column}${UNIT_SUFFIX}`] ?? "").trim()
        const provenance = (values[`${column}${PROVENANCE_SUFFIX}`] ?? "").trim()
        record.attributes.push({
          name: column,
          value: cell,
          ...(unit !== "" ? { unit } : {}),
          ...(provenance !== "" ? { provenanceRef: provenance } : {}),
        })
      }
      records.push(record)
    }
  }
  return records
}

export function importWideCsv(model: DomainModel, dir: string, options: ImportOptions = {}): ImportSummary {
  return applyImport(model, readWideCsv(model, dir), options)
}
