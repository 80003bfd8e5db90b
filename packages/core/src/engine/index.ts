export { coerceValue, isEmptyInput } from "./coerce"
export type { CoercionResult } from "./coerce"
export { resolveAttributeWrite, unwrapAttributeInput, formatList } from "./attributes"
export { fullMatch, inEnum } from "../schema/matching"
export type { AttributeWrite } from "./attributes"
export { resolveRelationAdd, resolveRelationSet, relationTargets } from "./relations"
