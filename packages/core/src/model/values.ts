/**
 * Field Records
 *
 * Normalized, serializable views of stored field values. The validator and
 * every serializer read entity data through these helpers only.
 */

import type { AttributeScalar } from "../schema"
import { relationTargets } from "../engine"
import { isAttributeValue, type AttributeValue, type Entity, type RelationValue } from "../store"

export interface AttributeRecord {
  id: string
  value: AttributeScalar
  unit?: string
  provenance_ref?: string
}

export interface RelationRecord {
  id: string
  target_entity_ids: string[]
}

export function toAttributeRecord(name: string, value: AttributeValue): AttributeRecord {
  const record: AttributeRecord = { id: name, value: value.value }
  if (value.unit !== undefined) record.unit = value.unit
  if (value.provenanceRef !== undefined) record.provenance_ref = value.provenanceRef
  return record
}

export function toRelationRecord(name: string, value: RelationValue): RelationRecord {
  return { id: name, target_entity_ids: relationTargets(value) }
}

/**
 * Split an entity's data into attribute and relation records, in write order.
 */
export function entityRecords(entity: Entity): { attributes: AttributeRecord[]; relations: RelationRecord[] } {
  const attributes: AttributeRecord[] = []
  const relations: RelationRecord[] = []
  for (const [name, value] of entity.data) {
    if (isAttributeValue(value)) {
      attributes.push(toAttributeRecord(name, value))
    } else {
      relations.push(toRelationRecord(name, value))
    }
  }
  return { attributes, relations }
}
