export { DomainModel } from "./model"
export type { AddEntityOptions, ModelOptions } from "./model"
export { toAttributeRecord, toRelationRecord, entityRecords } from "./values"
export type { AttributeRecord, RelationRecord } from "./values"
