/**
 * Schema Module
 *
 * Loading, inheritance resolution and introspection of class definitions.
 */

export type {
  AttributeType,
  AttributeScalar,
  Constraint,
  UnitSpec,
  AttributeDef,
  Cardinality,
  RelationConstraint,
  RelationDef,
  EntityClass,
  ResolvedSchema,
} from "./types"

export {
  attributeSpecSchema,
  relationSpecSchema,
  constraintSpecSchema,
  unitSpecSchema,
  normalizeAttributeType,
  isNumericType,
  buildAttributeDef,
  buildRelationDef,
  buildUnitSpec,
  writeAttributeSpec,
  writeRelationSpec,
} from "./definitions"
export type { AttributeSpec, RelationSpec, ConstraintSpec, UnitSpecInput } from "./definitions"

export { parseCardinality, isMultiValued, isRelationRequired, relationItemBounds } from "./cardinality"

export {
  loadSchemaDocuments,
  loadSchemaFile,
  loadSchemaPath,
  readSchemaFile,
  toSchemaDocument,
  fieldEntries,
  SCHEMA_FILE_EXTENSIONS,
} from "./loader"
export type { SchemaEncoding } from "./loader"

export { resolveSchema, canonicalizeClassName } from "./resolver"

export {
  formatClassTree,
  getAttributesGrouped,
  formatAttributeTree,
  describeSchema,
  DEFAULT_ATTRIBUTE_GROUP,
} from "./introspection"
export type { AttributeGroups, ClassSummary } from "./introspection"

export { buildRecordSchema, buildRecordSchemas } from "./records"
export type { RecordSchema } from "./records"
