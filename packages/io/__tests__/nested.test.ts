/**
 * Tests for the nested JSON and YAML formats
 */

import { readFileSync, writeFileSync } from "node:fs"
import { join } from "node:path"
import { describe, it, expect, beforeEach, afterEach } from "vitest"
import {
  ImportError,
  exportJson,
  exportYaml,
  importJson,
  importNested,
  importYaml,
  readNestedDocument,
  toNestedDocument,
} from "../src"
import { PLANT_NAME, createFleet, createFleetModel, tempDir, thrown } from "./fixtures/fleet"

describe("Nested formats", () => {
  let dir: string
  let cleanup: () => void

  beforeEach(() => {
    ;({ dir, cleanup } = tempDir())
  })

  afterEach(() => {
    cleanup()
  })

  describe("toNestedDocument", () => {
    it("should list entities per class with attribute and relation records", () => {
      const doc = toNestedDocument(createFleet())

      expect(Object.keys(doc)).toEqual(["Site", "Plant", "Bus", "Grid"])
      expect(doc.Plant?.P1).toEqual({
        attributes: [
          { id: "online", value: true },
          { id: "name", value: PLANT_NAME },
          { id: "capacity", value: 5, unit: "kW", provenance_ref: "survey.xlsx" },
          { id: "commissioned", value: 1998 },
        ],
        relations: [{ id: "feeds", target_entity_ids: ["B1"] }],
      })
      expect(doc.Bus?.B2).toEqual({ attributes: [], relations: [] })
    })

    it("should omit classes without entities", () => {
      const model = createFleetModel()
      model.create("Bus", "B1", { voltage: 20 })

      expect(Object.keys(toNestedDocument(model))).toEqual(["Bus"])
    })
  })

  describe("readNestedDocument", () => {
    it("should accept name-keyed maps and entity lists", () => {
      const records = readNestedDocument({
        Plant: [{ id: "P1", attributes: { capacity: { value: 3, unit: "kW" } }, relations: { feeds: "B1" } }],
        Grid: { GR1: { relations: [{ id: "buses", target_entity_ids: ["B1", " ", "B2"] }] } },
        Bus: { B9: null },
      })

      expect(records).toEqual([
        {
          className: "Plant",
          entityId: "P1",
          attributes: [{ name: "capacity", value: { value: 3, unit: "kW" } }],
          relations: [{ name: "feeds", targets: ["B1"] }],
        },
        {
          className: "Grid",
          entityId: "GR1",
          attributes: [],
          relations: [{ name: "buses", targets: ["B1", "B2"] }],
        },
        { className: "Bus", entityId: "B9", attributes: [], relations: [] },
      ])
    })

    it("should reject documents of the wrong shape", () => {
      const err = thrown(() => readNestedDocument({ Plant: "P1" }, "bad.json"))

      expect(err).toBeInstanceOf(ImportError)
      expect(err).toMatchObject({ code: "MALFORMED", source: "bad.json" })
    })
  })

  describe("JSON", () => {
    it("should round-trip the model", () => {
      const original = createFleet()
      const path = join(dir, "model.json")
      exportJson(original, path)

      const copy = createFleetModel()
      importJson(copy, path)

      expect(toNestedDocument(copy)).toEqual(toNestedDocument(original))
      expect(copy.validate()).toEqual([])
    })

    it("should leave the model unchanged when imported twice", () => {
      const path = join(dir, "model.json")
      exportJson(createFleet(), path)

      const copy = createFleetModel()
      importJson(copy, path)
      const first = toNestedDocument(copy)
      const summary = importJson(copy, path)

      expect(summary.createdEntities).toBe(0)
      expect(toNestedDocument(copy)).toEqual(first)
    })

    it("should write in nested subdirectories", () => {
      const path = join(dir, "out", "deep", "model.json")
      exportJson(createFleet(), path)

      expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual(toNestedDocument(createFleet()))
    })

    it("should reject invalid JSON", () => {
      const path = join(dir, "broken.json")
      writeFileSync(path, "{ not json")

      expect(thrown(() => importJson(createFleetModel(), path))).toMatchObject({ code: "MALFORMED", source: path })
    })
  })

  describe("YAML", () => {
    it("should write attribute and relation records in flow style", () => {
      const path = join(dir, "model.yaml")
      exportYaml(createFleet(), path)
      const text = readFileSync(path, "utf-8")

      expect(text).toContain("- { id: voltage, value: 110, unit: kV }")
      expect(text).toContain("- { id: feeds, target_entity_ids: [ B1 ] }")
    })

    it("should round-trip the model", () => {
      const original = createFleet()
      const path = join(dir, "model.yaml")
      exportYaml(original, path)

      const copy = createFleetModel()
      importYaml(copy, path)

      expect(toNestedDocument(copy)).toEqual(toNestedDocument(original))
    })

    it("should reject invalid YAML", () => {
      const path = join(dir, "broken.yaml")
      writeFileSync(path, "Bus: [B1, B2\n")

      expect(thrown(() => importYaml(createFleetModel(), path))).toMatchObject({ code: "MALFORMED" })
    })
  })

  it("should import in-memory documents", () => {
    const model = createFleetModel()
    importNested(model, { Bus: { B1: { attributes: [{ id: "voltage", value: "0,4", unit: "kV" }] } } })

    expect(model.getAttribute("B1", "voltage")).toEqual({ value: 0.4, unit: "kV" })
  })
})
