export { buildJsonSchema, exportJsonSchema, entitySchema, valueSchema, jsonSchemaType, JSON_SCHEMA_DIALECT } from "./json-schema"
export type { JsonObject } from "./json-schema"
export {
  buildWideTableSchema,
  buildNarrowTableSchema,
  buildLongTableSchema,
  slugify,
  EXTENSION_KEY,
} from "./table-schema"
export type { TableSchema, TableField } from "./table-schema"
export { buildDatapackage, exportDatapackage, DATA_DIR } from "./datapackage"
export type { DataPackage, DataResource } from "./datapackage"
