/**
 * Frictionless Data Package
 *
 * Writes wide CSVs under `data/` plus a `datapackage.json` whose resources
 * embed their Table Schemas inline.
 */

import { basename, join, resolve } from "node:path"
import type { DomainModel } from "@domodel/core"
import { exportWideCsv } from "../csv/wide"
import { writeText } from "../fs"
import { buildWideTableSchema, slugify, type TableSchema } from "./table-schema"

export const DATA_DIR = "data"

export interface DataResource {
  name: string
  path: string
  profile: "tabular-data-resource"
  format: "csv"
  mediatype: "text/csv"
  encoding: "utf-8"
  title: string
  description: string
  schema: TableSchema
}

export interface DataPackage {
  profile: "data-package"
  name: string
  resources: DataResource[]
}

export function buildDatapackage(model: DomainModel, name: string): DataPackage {
  const resources = [...model.schema.classes.values()].map(
    (cls): DataResource => ({
      name: slugify(cls.name),
      path: `${DATA_DIR}/${cls.name}.csv`,
      profile: "tabular-data-resource",
      format: "csv",
      mediatype: "text/csv",
      encoding: "utf-8",
      title: cls.name,
      description: cls.description,
      schema: buildWideTableSchema(model.schema, cls.name),
    }),
  )
  return { profile: "data-package", name: slugify(name) || "domodel", resources }
}

/**
 * @returns path of the written `datapackage.json`
 */
export function exportDatapackage(model: DomainModel, dir: string): string {
  exportWideCsv(model, join(dir, DATA_DIR))
  const descriptor = buildDatapackage(model, basename(resolve(dir)))
  const path = join(dir, "datapackage.json")
  writeText(path, JSON.stringify(descriptor, null, 2) + "\n")
  return path
}
