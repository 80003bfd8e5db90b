export { parseCsv, parseCsvRows, parseCsvTable, formatCsv, escapeCsv } from "./codec"
export type { CsvRow, CsvRecord, CsvTable } from "./codec"
export {
  exportNarrowCsv,
  importNarrowCsv,
  readNarrowCsv,
  NARROW_COLUMNS,
  EXISTS_MARKER,
  defaultCsvExportOptions,
} from "./narrow"
export type { CsvExportOptions } from "./narrow"
export {
  exportWideCsv,
  importWideCsv,
  readWideCsv,
  parseRelationCell,
  formatRelationCell,
  wideHeader,
  defaultWideCsvOptions,
  META_FILE_SUFFIX,
  UNIT_SUFFIX,
  PROVENANCE_SUFFIX,
} from "./wide"
export type { WideCsvOptions } from "./wide"
export { exportLongCsv, importLongCsv, readLongCsv, LONG_COLUMNS } from "./long"
