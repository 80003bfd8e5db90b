/**
 * Schema Loader
 *
 * Reads schema documents and builds one raw (unresolved) EntityClass per
 * class name. Fragments of the same class spread over several documents or
 * files are merged in the order they are read.
 *
 * Recognized document shapes:
 *
 * ```yaml
 * # collection
 * entity_classes:
 *   Generator: { parents: [Asset], attributes: { ... } }
 *
 * # single class
 * name: Generator
 * parents: [Asset]
 * attributes:
 *   - id: capacity
 *     value: { type: float }
 * ```
 *
 * Other shapes are skipped.
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs"
import { extname, join } from "node:path"
import YAML from "yaml"
import { z } from "zod"
import { SchemaError } from "../errors"
import { createSilentLogger, type Logger } from "../logging"
import {
  buildAttributeDef,
  buildRelationDef,
  writeAttributeSpec,
  writeRelationSpec,
} from "./definitions"
import type { AttributeDef, EntityClass, RelationDef } from "./types"

// =============================================================================
// DOCUMENT SHAPES
// =============================================================================

const parentListSchema = z.union([z.string(), z.array(z.string())])
const fieldCollectionSchema = z.union([z.record(z.unknown()), z.array(z.unknown())])

const classFragmentSchema = z.object({
  name: z.string().nullish(),
  description: z.string().nullish(),
  parents: parentListSchema.nullish(),
  parent: parentListSchema.nullish(),
  inherits_from: parentListSchema.nullish(),
  abstract: z.boolean().nullish(),
  attributes: fieldCollectionSchema.nullish(),
  relations: fieldCollectionSchema.nullish(),
})

type ClassFragment = z.infer<typeof classFragmentSchema>

/**
 * Accumulated, still-raw state of one class across fragments.
 */
interface ClassDraft {
  description?: string
  parents?: string[]
  abstract?: boolean
  attributes: Map<string, unknown>
  relations: Map<string, unknown>
}

export const SCHEMA_FILE_EXTENSIONS = [".yaml", ".yml", ".json"] as const
const schemaExtensions: ReadonlySet<string> = new Set(SCHEMA_FILE_EXTENSIONS)

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

// =============================================================================
// FRAGMENT MERGING
// =============================================================================

/**
 * Normalize a name-keyed map or a list of `{id, ...}` objects into
 * `[name, spec]` pairs. List items without an id are ignored.
 */
export function fieldEntries(collection: unknown): Array<[string, unknown]> {
  if (Array.isArray(collection)) {
    const entries: Array<[string, unknown]> = []
    for (const item of collection) {
      if (!isRecord(item)) continue
      const id = item.id
      if (typeof id !== "string" || id === "") continue
      const { id: _id, ...spec } = item
      entries.push([id, spec])
    }
    return entries
  }
  if (isRecord(collection)) {
    return Object.entries(collection)
  }
  return []
}

function toParentList(raw: string | string[]): string[] {
  return (Array.isArray(raw) ? raw : [raw]).filter((p) => p !== "")
}

function parseFragment(raw: unknown, className: string): ClassFragment {
  const result = classFragmentSchema.safeParse(raw ?? {})
  if (!result.success) {
    const issue = result.error.errors[0]
    throw new SchemaError(
      `Invalid class definition '${className}' at '${issue?.path.join(".") ?? ""}': ${issue?.message ?? "validation failed"}`,
      "INVALID_DEFINITION",
      className,
      { issues: result.error.errors },
    )
  }
  return result.data
}

function mergeFragment(draft: ClassDraft, fragment: ClassFragment): void {
  if (fragment.description !== undefined && fragment.description !== null) {
    draft.description = fragment.description
  }
  const parents = fragment.parents ?? fragment.parent ?? fragment.inherits_from
  if (parents !== undefined && parents !== null) {
    draft.parents = toParentList(parents)
  }
  if (fragment.abstract !== undefined && fragment.abstract !== null) {
    draft.abstract = fragment.abstract
  }
  for (const [name, spec] of fieldEntries(fragment.attributes)) {
    draft.attributes.set(name, spec)
  }
  for (const [name, spec] of fieldEntries(fragment.relations)) {
    draft.relations.set(name, spec)
  }
}

function buildClass(name: string, draft: ClassDraft): EntityClass {
  const attributes = new Map<string, AttributeDef>()
  for (const [attrName, spec] of draft.attributes) {
    attributes.set(attrName, buildAttributeDef(attrName, spec, name))
  }
  const relations = new Map<string, RelationDef>()
  for (const [relName, spec] of draft.relations) {
    relations.set(relName, buildRelationDef(relName, spec, name))
  }

  return Object.freeze({
    name,
    description: draft.description ?? "",
    parents: Object.freeze([...(draft.parents ?? [])]),
    abstract: draft.abstract ?? false,
    attributes,
    relations,
  })
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Build raw classes from already-parsed documents.
 * The result is ordered by first appearance and NOT yet inheritance-resolved.
 */
export function loadSchemaDocuments(
  documents: readonly unknown[],
  logger: Logger = createSilentLogger(),
): Map<string, EntityClass> {
  const drafts = new Map<string, ClassDraft>()

  const draftFor = (name: string): ClassDraft => {
    let draft = drafts.get(name)
    if (!draft) {
      draft = { attributes: new Map(), relations: new Map() }
      drafts.set(name, draft)
    }
    return draft
  }

  documents.forEach((doc, index) => {
    if (!isRecord(doc)) {
      if (doc !== null && doc !== undefined) {
        logger.debug("Skipping schema document that is not a mapping", { index })
      }
      return
    }

    const collection = doc.entity_classes
    if (isRecord(collection)) {
      for (const [name, raw] of Object.entries(collection)) {
        mergeFragment(draftFor(name), parseFragment(raw, name))
      }
      return
    }

    if (typeof doc.name === "string" && doc.name !== "") {
      mergeFragment(draftFor(doc.name), parseFragment(doc, doc.name))
      return
    }

    logger.debug("Skipping unrecognized schema document", { index, keys: Object.keys(doc) })
  })

  const classes = new Map<string, EntityClass>()
  for (const [name, draft] of drafts) {
    classes.set(name, buildClass(name, draft))
  }
  return classes
}

/**
 * Parse one schema file. YAML files may hold several `---` separated documents.
 */
export function readSchemaFile(path: string): unknown[] {
  const text = readFileSync(path, "utf-8")
  const documents = YAML.parseAllDocuments(text)
  const parsed: unknown[] = []

  for (const doc of documents) {
    const [firstError] = doc.errors
    if (firstError) {
      throw new SchemaError(
        `Cannot parse schema file ${path}: ${firstError.message}`,
        "INVALID_DEFINITION",
        undefined,
        { path },
      )
    }
    parsed.push(doc.toJS())
  }
  return parsed
}

/**
 * Load raw classes from a single schema file.
 */
export function loadSchemaFile(path: string, logger: Logger = createSilentLogger()): Map<string, EntityClass> {
  if (!existsSync(path)) {
    throw new SchemaError(`Schema path not found: ${path}`, "SCHEMA_NOT_FOUND", undefined, { path })
  }
  return loadSchemaDocuments(readSchemaFile(path), logger)
}

function collectSchemaFiles(dir: string): string[] {
  const files: string[] = []
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const full = join(dir, entry.name)
    if (entry.isDirectory()) {
      files.push(...collectSchemaFiles(full))
    } else if (schemaExtensions.has(extname(entry.name).toLowerCase())) {
      files.push(full)
    }
  }
  return files
}

/**
 * Load raw classes from a schema file or a directory of schema files.
 * Directories are searched recursively; files are read in sorted path order.
 */
export function loadSchemaPath(path: string, logger: Logger = createSilentLogger()): Map<string, EntityClass> {
  if (!existsSync(path)) {
    throw new SchemaError(`Schema path not found: ${path}`, "SCHEMA_NOT_FOUND", undefined, { path })
  }

  const files = statSync(path).isDirectory() ? collectSchemaFiles(path).sort() : [path]
  logger.debug("Loading schema files", { path, files: files.length })

  const documents: unknown[] = []
  for (const file of files) {
    documents.push(...readSchemaFile(file))
  }
  return loadSchemaDocuments(documents, logger)
}

export type SchemaEncoding = "map" | "list"

/**
 * Write a class as a single-class schema document.
 *
 * `map` keys attributes and relations by name; `list` writes them as
 * `{id, ...}` objects. Loading either form yields an equal class.
 */
export function toSchemaDocument(cls: EntityClass, encoding: SchemaEncoding = "map"): Record<string, unknown> {
  const attributes = [...cls.attributes.values()].map((def): [string, Record<string, unknown>] => [
    def.name,
    writeAttributeSpec(def),
  ])
  const relations = [...cls.relations.values()].map((def): [string, Record<string, unknown>] => [
    def.name,
    writeRelationSpec(def),
  ])

  const encode = (entries: Array<[string, Record<string, unknown>]>): unknown =>
    encoding === "map"
      ? Object.fromEntries(entries)
      : entries.map(([id, spec]) => ({ id, ...spec }))

  const doc: Record<string, unknown> = { name: cls.name }
  if (cls.description) doc.description = cls.description
  if (cls.parents.length > 0) doc.parents = [...cls.parents]
  if (cls.abstract) doc.abstract = true
  doc.attributes = encode(attributes)
  doc.relations = encode(relations)
  return doc
}
