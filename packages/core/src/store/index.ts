export { EntityStore } from "./entity-store"
export { isAttributeValue, isRelationValue } from "./types"
export type { Entity, AttributeValue, RelationValue, FieldValue, StoreStats } from "./types"
