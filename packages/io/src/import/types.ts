/**
 * Import Record Types
 *
 * Every reader turns its input into ImportRecords; the pipeline applies them.
 */

export interface ImportAttribute {
  name: string
  value: unknown
  unit?: string
  provenanceRef?: string
}

export interface ImportRelation {
  name: string
  targets: string[]
}

/**
 * Fields read for one entity. Several records may name the same entity;
 * their relation targets are combined.
 */
export interface ImportRecord {
  className: string
  entityId: string
  attributes: ImportAttribute[]
  relations: ImportRelation[]
  /** 1-based source line, for line-oriented formats */
  line?: number
  /** File the record was read from */
  source?: string
}

export interface ImportUnknown {
  className: string
  entityId: string
  field?: string
  /** e.g. "unknown class", "unknown attribute: foo" */
  reason: string
  line?: number
  source?: string
}

export interface ImportOptions {
  /** Reject the whole import when anything is unknown (default: false) */
  strictUnknown?: boolean
  /** Create missing relation targets in the relation's first target class (default: false) */
  createMissingRefs?: boolean
}

export const defaultImportOptions: Readonly<Required<ImportOptions>> = Object.freeze({
  strictUnknown: false,
  createMissingRefs: false,
})

export interface ImportSummary {
  createdEntities: number
  setAttributes: number
  setRelations: number
  unknowns: ImportUnknown[]
}
