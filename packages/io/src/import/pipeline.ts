/**
 * Import Pipeline
 *
 * Applies reader output to a model in two phases. The first phase checks
 * every record against the schema without touching the model; the second
 * creates entities, then writes attributes and relations.
 *
 * Relations are replaced rather than appended, so importing the same data
 * twice leaves the model unchanged.
 */

import type { DomainModel, EntityClass } from "@domodel/core"
import { ImportError } from "../errors"
import {
  defaultImportOptions,
  type ImportAttribute,
  type ImportOptions,
  type ImportRecord,
  type ImportSummary,
  type ImportUnknown,
} from "./types"

interface PlannedEntity {
  className: string
  cls: EntityClass
  attributes: ImportAttribute[]
  /** relation name -> combined targets */
  relations: Map<string, string[]>
}

function describeUnknown(u: ImportUnknown): string {
  const where = [u.source, u.line !== undefined ? `line ${u.line}` : undefined].filter(Boolean).join(":")
  const subject = `${u.className}:${u.entityId}`
  return `${where ? `${where} ` : ""}[${subject}] ${u.reason}`
}

/**
 * Check records against the schema and group them per entity.
 */
function plan(model: DomainModel, records: readonly ImportRecord[]): {
  entities: Map<string, PlannedEntity>
  unknowns: ImportUnknown[]
} {
  const entities = new Map<string, PlannedEntity>()
  const unknowns: ImportUnknown[] = []

  for (const record of records) {
    const at = {
      className: record.className,
      entityId: record.entityId,
      ...(record.line !== undefined ? { line: record.line } : {}),
      ...(record.source !== undefined ? { source: record.source } : {}),
    }

    const className = model.schema.canonicalClassName(record.className)
    const cls = className === undefined ? undefined : model.schema.getClass(className)
    if (className === undefined || !cls) {
      unknowns.push({ ...at, reason: "unknown class" })
      continue
    }

    const existingClass = entities.get(record.entityId)?.className ?? model.store.classOf(record.entityId)
    if (existingClass !== undefined && existingClass !== className) {
      unknowns.push({ ...at, reason: `id exists in class '${existingClass}'` })
      continue
    }

    let planned = entities.get(record.entityId)
    if (!planned) {
      planned = { className, cls, attributes: [], relations: new Map() }
      entities.set(record.entityId, planned)
    }

    for (const attribute of record.attributes) {
      if (cls.attributes.has(attribute.name)) {
        planned.attributes.push(attribute)
      } else {
        unknowns.push({ ...at, field: attribute.name, reason: `unknown attribute: ${attribute.name}` })
      }
    }

    for (const relation of record.relations) {
      if (cls.relations.has(relation.name)) {
        const targets = planned.relations.get(relation.name) ?? []
        targets.push(...relation.targets)
        planned.relations.set(relation.name, targets)
      } else {
        unknowns.push({ ...at, field: relation.name, reason: `unknown relation: ${relation.name}` })
      }
    }
  }

  return { entities, unknowns }
}

/**
 * Apply import records to a model.
 *
 * @throws ImportError `UNKNOWN_FIELDS` in strict mode, before any change
 * @throws ValueError when a value cannot be written (coercion, pattern, unit)
 */
export function applyImport(
  model: DomainModel,
  records: readonly ImportRecord[],
  options: ImportOptions = {},
): ImportSummary {
  const opts = { ...defaultImportOptions, ...options }
  const logger = model.logger.child({ component: "import" })
  const { entities, unknowns } = plan(model, records)

  if (opts.strictUnknown && unknowns.length > 0) {
    throw new ImportError(
      `Import rejected: ${unknowns.length} unknown item(s)\n${unknowns.map(describeUnknown).join("\n")}`,
      "UNKNOWN_FIELDS",
      unknowns,
      unknowns[0]?.source,
    )
  }
  for (const unknown of unknowns) {
    logger.warn(`Skipping ${describeUnknown(unknown)}`)
  }

  const summary: ImportSummary = { createdEntities: 0, setAttributes: 0, setRelations: 0, unknowns }

  // Records carry the complete data, so schema defaults are not re-applied
  for (const [id, planned] of entities) {
    if (!model.store.has(id)) {
      model.addEntity(planned.className, id, { applyDefaults: false })
      summary.createdEntities++
    }
  }

  if (opts.createMissingRefs) {
    for (const planned of entities.values()) {
      for (const [name, targets] of planned.relations) {
        const targetClass = planned.cls.relations.get(name)?.targets[0]
        if (targetClass === undefined) continue
        for (const target of targets) {
          if (model.store.has(target)) continue
          model.addEntity(targetClass, target)
          summary.createdEntities++
          logger.debug("Created missing relation target", { id: target, className: targetClass })
        }
      }
    }
  }

  for (const [id, planned] of entities) {
    for (const attribute of planned.attributes) {
      model.addAttribute(id, attribute.name, attribute.value, attribute.unit, attribute.provenanceRef)
      summary.setAttributes++
    }
    for (const [name, targets] of planned.relations) {
      model.setRelation(id, name, targets)
      summary.setRelations++
    }
  }

  logger.info("Import applied", {
    created: summary.createdEntities,
    attributes: summary.setAttributes,
    relations: summary.setRelations,
    unknowns: unknowns.length,
  })
  return summary
}
