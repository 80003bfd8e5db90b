/**
 * Long CSV
 *
 * The whole model in one file, one row per attribute value or relation
 * target. Entities without fields get a row with only class and id.
 */

import {
  isAttributeValue,
  relationTargets,
  type DomainModel,
} from "@domodel/core"
import { readText, writeText } from "../fs"
import { applyImport } from "../import/pipeline"
import type { ImportOptions, ImportRecord, ImportSummary } from "../import/types"
import { formatCsv, parseCsvTable, type CsvRow } from "./codec"
import { formatScalar, requireColumns } from "./files"
import { formatRelationCell, parseRelationCell } from "./wide"

export const LONG_COLUMNS = [
  "entity_class",
  "entity_id",
  "attribute_id",
  "attribute_value",
  "attribute_unit",
  "attribute_provenance",
  "relation_type",
  "relation_id",
] as const

export function exportLongCsv(model: DomainModel, path: string): void {
  const rows: CsvRow[] = [LONG_COLUMNS]

  for (const entity of model.store.all()) {
    const { className, id } = entity
    for (const [name, value] of entity.data) {
      if (isAttributeValue(value)) {
        rows.push([
          className,
          id,
          name,
          formatScalar(value.value),
          value.unit ?? "",
          value.provenanceRef ?? "",
          "",
          "",
        ])
      } else {
        for (const target of relationTargets(value)) {
          rows.push([className, id, "", "", "", "", name, formatRelationCell([target])])
        }
      }
    }
    if (entity.data.size === 0) {
      rows.push([className, id, "", "", "", "", "", ""])
    }
  }

  writeText(path, formatCsv(rows))
}

/**
 * @throws ImportError `MALFORMED` when a column is missing
 */
export function readLongCsv(path: string): ImportRecord[] {
  const table = parseCsvTable(readText(path))
  requireColumns(table.header, LONG_COLUMNS, path)

  const records: ImportRecord[] = []
  for (const { line, values } of table.records) {
    const cell = (column: (typeof LONG_COLUMNS)[number]): string => (values[column] ?? "").trim()

    const className = cell("entity_class")
    const entityId = cell("entity_id")
    if (className === "" || entityId === "") continue

    const record: ImportRecord = { className, entityId, attributes: [], relations: [], line, source: path }

    const attribute = cell("attribute_id")
    if (attribute !== "") {
      const unit = cell("attribute_unit")
      const provenance = cell("attribute_provenance")
      record.attributes.push({
        name: attribute,
        value: values.attribute_value ?? "",
        ...(unit !== "" ? { unit } : {}),
        ...(provenance !== "" ? { provenanceRef: provenance } : {}),
      })
    }

    const relation = cell("relation_type")
    if (relation !== "") {
      record.relations.push({ name: relation, targets: parseRelationCell(cell("relation_id")) })
    }

    records.push(record)
  }
  return records
}

export function importLongCsv(model: DomainModel, path: string, options: ImportOptions = {}): ImportSummary {
  return applyImport(model, readLongCsv(path), options)
}
