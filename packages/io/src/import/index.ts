export { applyImport } from "./pipeline"
export { defaultImportOptions } from "./types"
export type {
  ImportAttribute,
  ImportRelation,
  ImportRecord,
  ImportUnknown,
  ImportOptions,
  ImportSummary,
} from "./types"
