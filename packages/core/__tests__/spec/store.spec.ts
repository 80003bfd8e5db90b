/**
 * Entity Store Specification Tests
 */

import { describe, it, expect, beforeEach } from "vitest"
import { DuplicateIdError, EntityNotFoundError, EntityStore } from "../../src"
import { thrown } from "./fixtures/grid"

describe("EntityStore", () => {
  let store: EntityStore

  beforeEach(() => {
    store = new EntityStore(["Node", "Line"])
  })

  it("creates buckets for every known class", () => {
    expect(store.classNames()).toEqual(["Node", "Line"])
    expect(store.stats()).toEqual({ entities: 0, classes: 2, perClass: { Node: 0, Line: 0 } })
  })

  it("keeps ids unique across classes", () => {
    store.insert("Node", "E1")
    const err = thrown(() => store.insert("Line", "E1"))

    expect(err).toBeInstanceOf(DuplicateIdError)
    expect(err).toMatchObject({
      message: "Duplicate id 'E1' already exists in class 'Node'. Entity IDs must be globally unique.",
    })
    expect(store.size).toBe(1)
  })

  it("returns entities per class in insertion order", () => {
    store.insert("Line", "L2")
    store.insert("Node", "N1")
    store.insert("Line", "L1")

    expect(store.entitiesOf("Line").map((e) => e.id)).toEqual(["L2", "L1"])
    expect(store.all().map((e) => e.id)).toEqual(["N1", "L2", "L1"])
    expect(store.classOf("L1")).toBe("Line")
    expect(store.entitiesOf("Region")).toEqual([])
  })

  it("appends buckets for classes it did not know", () => {
    store.insert("Region", "R1")
    expect(store.classNames()).toEqual(["Node", "Line", "Region"])
  })

  it("sets and deletes fields", () => {
    store.insert("Node", "N1")
    store.setField("N1", "voltage", { value: 110, unit: "kV" })
    store.setField("N1", "code", { value: "N-1" })
    store.deleteField("N1", "code")

    expect([...(store.get("N1")?.data.entries() ?? [])]).toEqual([["voltage", { value: 110, unit: "kV" }]])
  })

  it("rejects writes to missing entities", () => {
    expect(thrown(() => store.setField("N9", "voltage", { value: 1 }))).toBeInstanceOf(EntityNotFoundError)
    expect(store.has("N9")).toBe(false)
  })
})
