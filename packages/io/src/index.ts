/**
 * @domodel/io
 *
 * Exporters and importers for domodel models: nested JSON and YAML,
 * narrow, wide and long CSV, JSON Schema and Frictionless descriptors.
 */

export { ImportError } from "./errors"
export type { ImportErrorCode } from "./errors"

export * from "./import"
export * from "./nested"
export * from "./csv"
export * from "./schema-export"
