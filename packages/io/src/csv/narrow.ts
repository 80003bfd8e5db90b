/**
 * Narrow CSV
 *
 * One file per class, `<Class>.csv`, one row per attribute value or
 * relation target:
 *
 * ```csv
 * entity_id,attribute,value,relation
 * G1,capacity,100,
 * G1,connected_to,,N1
 * R1,__exists__,,
 * ```
 *
 * Units and provenance are not carried by this layout.
 */

import { join } from "node:path"
import { isAttributeValue, relationTargets, type DomainModel } from "@domodel/core"
import { ensureDir, readText, writeText } from "../fs"
import { applyImport } from "../import/pipeline"
import type { ImportOptions, ImportRecord, ImportSummary } from "../import/types"
import { formatCsv, parseCsvTable, type CsvRow } from "./codec"
import { classFileName, classFromFile, formatScalar, listCsvFiles, requireColumns } from "./files"

export const NARROW_COLUMNS = ["entity_id", "attribute", "value", "relation"] as const

/** Attribute name of the row that marks an entity without fields */
export const EXISTS_MARKER = "__exists__"

export interface CsvExportOptions {
  /** Write an `__exists__` row for entities without fields (default: true) */
  includePlaceholders?: boolean
}

export const defaultCsvExportOptions: Readonly<Required<CsvExportOptions>> = Object.freeze({
  includePlaceholders: true,
})

/**
 * Write one narrow CSV per class (classes without entities get a header-only file).
 */
export function exportNarrowCsv(model: DomainModel, dir: string, options: CsvExportOptions = {}): void {
  const opts = { ...defaultCsvExportOptions, ...options }
  ensureDir(dir)

  for (const className of model.store.classNames()) {
    const rows: CsvRow[] = [NARROW_COLUMNS]

    for (const entity of model.store.entitiesOf(className)) {
      for (const [name, value] of entity.data) {
        if (isAttributeValue(value)) {
          rows.push([entity.id, name, formatScalar(value.value), ""])
        } else {
          for (const target of relationTargets(value)) {
            rows.push([entity.id, name, "", target])
          }
        }
      }
      if (entity.data.size === 0 && opts.includePlaceholders) {
        rows.push([entity.id, EXISTS_MARKER, "", ""])
      }
    }

    writeText(join(dir, classFileName(className)), formatCsv(rows))
  }
}

/**
 * Read every `*.csv` in a directory as narrow CSV; the file name is the class.
 */
export function readNarrowCsv(dir: string): ImportRecord[] {
  const records: ImportRecord[] = []

  for (const file of listCsvFiles(dir)) {
    const className = classFromFile(file)
    const table = parseCsvTable(readText(file))
    requireColumns(table.header, ["entity_id", "attribute"], file)

    for (const { line, values } of table.records) {
      const entityId = (values.entity_id ?? "").trim()
      if (entityId === "") continue
      const attribute = (values.attribute ?? "").trim()
      const relation = (values.relation ?? "").trim()

      const record: ImportRecord = { className, entityId, attributes: [], relations: [], line, source: file }
      if (attribute !== "" && attribute !== EXISTS_MARKER) {
        if (relation !== "") {
          record.relations.push({ name: attribute, targets: [relation] })
        } else {
          record.attributes.push({ name: attribute, value: values.value ?? "" })
        }
      }
      records.push(record)
    }
  }
  return records
}

export function importNarrowCsv(model: DomainModel, dir: string, options: ImportOptions = {}): ImportSummary {
  return applyImport(model, readNarrowCsv(dir), options)
}
