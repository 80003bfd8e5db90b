/**
 * Relation Engine
 *
 * Computes stored relation values. Targets are not checked for existence
 * here, so entities may be written in any order; the validator resolves them.
 */

import { UnknownFieldError } from "../errors"
import { isMultiValued, type EntityClass, type RelationDef } from "../schema"
import type { RelationValue } from "../store"

function lookup(cls: EntityClass, entityId: string, name: string): RelationDef {
  const def = cls.relations.get(name)
  if (!def) {
    throw new UnknownFieldError(cls.name, entityId, name, "relation", [...cls.relations.keys()])
  }
  return def
}

/**
 * Normalize a stored relation value to a list of target ids.
 */
export function relationTargets(value: RelationValue | undefined): string[] {
  if (value === undefined) return []
  return typeof value === "string" ? [value] : [...value]
}

function cleanTargets(targets: Iterable<string>): string[] {
  return [...targets].map((t) => t.trim()).filter((t) => t !== "")
}

function shape(def: RelationDef, targets: string[]): RelationValue | undefined {
  if (targets.length === 0) return undefined
  if (isMultiValued(def)) return Object.freeze(targets)
  // A single-valued relation given several ids keeps them all so the validator can report it
  return targets.length === 1 ? targets[0] : Object.freeze(targets)
}

/**
 * Value after adding one or more targets.
 * Single-valued relations are replaced; multi-valued relations are appended to.
 *
 * @returns the new value, or `undefined` when nothing remains
 * @throws UnknownFieldError if the class does not declare the relation
 */
export function resolveRelationAdd(
  cls: EntityClass,
  entityId: string,
  name: string,
  current: RelationValue | undefined,
  target: string | readonly string[],
): RelationValue | undefined {
  const def = lookup(cls, entityId, name)
  const added = cleanTargets(typeof target === "string" ? [target] : target)
  if (!isMultiValued(def)) return shape(def, added.length > 0 ? added : relationTargets(current))
  return shape(def, [...relationTargets(current), ...added])
}

/**
 * Value after replacing all targets.
 *
 * @returns the new value, or `undefined` when the list is empty
 * @throws UnknownFieldError if the class does not declare the relation
 */
export function resolveRelationSet(
  cls: EntityClass,
  entityId: string,
  name: string,
  targets: string | readonly string[],
): RelationValue | undefined {
  const def = lookup(cls, entityId, name)
  return shape(def, cleanTargets(typeof targets === "string" ? [targets] : targets))
}
