/**
 * Nested Document Format
 *
 * ```json
 * {
 *   "Generator": {
 *     "G1": {
 *       "attributes": [{ "id": "capacity", "value": 100, "unit": "MW" }],
 *       "relations": [{ "id": "connected_to", "target_entity_ids": ["N1"] }]
 *     }
 *   }
 * }
 * ```
 *
 * The reader also accepts name-keyed attribute and relation maps and entity
 * sections written as lists of `{id, ...}` objects.
 */

import { z } from "zod"
import { entityRecords, type AttributeRecord, type DomainModel, type RelationRecord } from "@domodel/core"
import { ImportError } from "../errors"
import type { ImportAttribute, ImportRecord, ImportRelation } from "../import/types"

export interface NestedEntity {
  attributes: AttributeRecord[]
  relations: RelationRecord[]
}

/** Class -> entity id -> fields */
export type NestedDocument = Record<string, Record<string, NestedEntity>>

// =============================================================================
// WRITING
// =============================================================================

/**
 * Every entity, grouped by class in schema order. Classes without entities are omitted.
 */
export function toNestedDocument(model: DomainModel): NestedDocument {
  const doc: NestedDocument = {}
  for (const className of model.store.classNames()) {
    const entities = model.store.entitiesOf(className)
    if (entities.length === 0) continue

    const section: Record<string, NestedEntity> = {}
    for (const entity of entities) {
      section[entity.id] = entityRecords(entity)
    }
    doc[className] = section
  }
  return doc
}

// =============================================================================
// READING
// =============================================================================

const idListSchema = z.union([z.string(), z.number(), z.array(z.union([z.string(), z.number()]))])

const attributeItemSchema = z
  .object({
    id: z.string(),
    value: z.unknown(),
    unit: z.string().nullish(),
    provenance_ref: z.string().nullish(),
    provenanceRef: z.string().nullish(),
  })
  .passthrough()

const relationItemSchema = z.object({
  id: z.string(),
  target_entity_ids: idListSchema.nullish(),
  targets: idListSchema.nullish(),
  value: idListSchema.nullish(),
  target_entity_id: z.union([z.string(), z.number()]).nullish(),
})

const entityBodySchema = z.object({
  attributes: z.union([z.array(attributeItemSchema), z.record(z.unknown())]).nullish(),
  relations: z.union([z.array(relationItemSchema), z.record(idListSchema.nullable())]).nullish(),
})

const entitySectionSchema = z.union([
  z.record(entityBodySchema.nullable()),
  z.array(entityBodySchema.extend({ id: z.string() })),
])

const nestedDocumentSchema = z.record(entitySectionSchema.nullable())

type EntityBody = z.infer<typeof entityBodySchema>

function toIdList(raw: z.infer<typeof idListSchema> | null | undefined): string[] {
  if (raw === null || raw === undefined) return []
  if (typeof raw === "number") return [String(raw)]
  const list = typeof raw === "string" ? [raw] : raw.map(String)
  return list.map((id) => id.trim()).filter((id) => id !== "")
}

function readAttributes(raw: EntityBody["attributes"]): ImportAttribute[] {
  if (!raw) return []

  if (Array.isArray(raw)) {
    return raw.map((item) => ({
      name: item.id,
      value: item.value,
      unit: item.unit ?? undefined,
      provenanceRef: item.provenance_ref ?? item.provenanceRef ?? undefined,
    }))
  }

  // name -> scalar or structured value; the model unwraps structured input
  return Object.entries(raw).map(([name, value]) => ({ name, value }))
}

function readRelations(raw: EntityBody["relations"]): ImportRelation[] {
  if (!raw) return []

  if (Array.isArray(raw)) {
    return raw.map((item) => ({
      name: item.id,
      targets: toIdList(item.target_entity_ids ?? item.targets ?? item.value ?? item.target_entity_id),
    }))
  }
  return Object.entries(raw).map(([name, ids]) => ({ name, targets: toIdList(ids) }))
}

/**
 * Convert an in-memory nested document into import records.
 * @throws ImportError `MALFORMED` if the document does not have the nested shape
 */
export function readNestedDocument(doc: unknown, source?: string): ImportRecord[] {
  const result = nestedDocumentSchema.safeParse(doc ?? {})
  if (!result.success) {
    const issue = result.error.errors[0]
    throw new ImportError(
      `Malformed nested document at '${issue?.path.join(".") ?? ""}': ${issue?.message ?? "invalid"}`,
      "MALFORMED",
      [],
      source,
    )
  }

  const records: ImportRecord[] = []
  const push = (className: string, entityId: string, body: EntityBody | null): void => {
    records.push({
      className,
      entityId,
      attributes: readAttributes(body?.attributes),
      relations: readRelations(body?.relations),
      ...(source !== undefined ? { source } : {}),
    })
  }

  for (const [className, section] of Object.entries(result.data)) {
    if (!section) continue
    if (Array.isArray(section)) {
      for (const { id, ...body } of section) push(className, id, body)
    } else {
      for (const [id, body] of Object.entries(section)) push(className, id, body)
    }
  }
  return records
}
