export { toNestedDocument, readNestedDocument } from "./document"
export type { NestedDocument, NestedEntity } from "./document"
export { exportJson, exportYaml, importJson, importYaml, importNested } from "./nested"
