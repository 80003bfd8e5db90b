/**
 * Introspection Specification Tests
 *
 * - formatClassTree(), getAttributesGrouped(), formatAttributeTree()
 * - describeSchema()
 * - typed record schemas
 */

import { describe, it, expect } from "vitest"
import {
  UnknownClassError,
  buildRecordSchema,
  buildRecordSchemas,
  describeSchema,
  formatAttributeTree,
  formatClassTree,
  getAttributesGrouped,
  loadSchemaDocuments,
  resolveSchema,
} from "../../src"
import { createGridModel, createValidGrid, thrown } from "./fixtures/grid"

describe("Introspection Specification", () => {
  const model = createGridModel()
  const schema = model.schema

  describe("formatClassTree()", () => {
    it("renders roots and children alphabetically", () => {
      expect(formatClassTree(schema)).toBe(
        [
          "Asset",
          "├── Generator",
          "│   └── GasGenerator",
          "├── Line",
          "└── Load",
          "Node",
          "Region",
        ].join("\n"),
      )
    })

    it("lists a class with two parents under both", () => {
      const diamond = resolveSchema(
        loadSchemaDocuments([
          {
            entity_classes: {
              A: {},
              B: { parents: ["A"] },
              C: { parents: ["A"] },
              D: { parents: ["B", "C"] },
            },
          },
        ]),
      )

      expect(formatClassTree(diamond)).toBe(["A", "├── B", "│   └── D", "└── C", "    └── D"].join("\n"))
    })
  })

  describe("getAttributesGrouped()", () => {
    it("groups by group name and sorts by order then name", () => {
      const groups = getAttributesGrouped(schema, "GasGenerator")

      expect([...groups.keys()]).toEqual(["master_data", "technical"])
      expect(groups.get("master_data")?.map((a) => a.name)).toEqual([
        "commissioning_year",
        "efficiency",
        "is_active",
        "name",
      ])
      expect(groups.get("technical")?.map((a) => a.name)).toEqual(["capacity", "fuel"])
    })

    it("rejects an unknown class", () => {
      expect(thrown(() => getAttributesGrouped(schema, "Turbine"))).toBeInstanceOf(UnknownClassError)
    })
  })

  describe("formatAttributeTree()", () => {
    it("marks required attributes with *", () => {
      expect(formatAttributeTree(getAttributesGrouped(schema, "GasGenerator"))).toBe(
        [
          "├── master_data",
          "│   ├── commissioning_year (integer)",
          "│   ├── efficiency (float)",
          "│   ├── is_active (boolean)",
          "│   └── name * (string)",
          "└── technical",
          "    ├── capacity * (float)",
          "    └── fuel (string)",
        ].join("\n"),
      )
    })
  })

  describe("describeSchema()", () => {
    it("summarizes fields, units and relation bounds", () => {
      const summary = describeSchema(schema)

      expect(summary.Line).toEqual({
        parents: ["Asset"],
        abstract: false,
        attributes: {
          name: { type: "string", required: true },
          commissioning_year: { type: "integer", required: false },
          length: { type: "float", required: false, unit: "km" },
        },
        relations: {
          from_node: { targets: ["Node"], cardinality: "1", min: 1, max: 1 },
          to_node: { targets: ["Node"], cardinality: "1", min: 1, max: 1 },
        },
      })
      expect(summary.Region?.relations.nodes).toEqual({
        targets: ["Node"],
        cardinality: "1..*",
        min: 1,
        max: null,
      })
    })
  })

  describe("record schemas", () => {
    const gas = schema.getClass("GasGenerator")
    if (!gas) throw new Error("fixture missing GasGenerator")
    const record = buildRecordSchema(gas)

    it("requires required attributes without a default", () => {
      expect(record.safeParse({ name: "G", capacity: 5 }).success).toBe(true)
      expect(record.safeParse({ name: "G" }).success).toBe(false)
    })

    it("enforces types, bounds and enums", () => {
      expect(record.safeParse({ name: "G", capacity: 5, efficiency: 2 }).success).toBe(false)
      expect(record.safeParse({ name: "G", capacity: 5, fuel: "oil" }).success).toBe(false)
      expect(record.safeParse({ name: "G", capacity: "5" }).success).toBe(false)
      expect(record.safeParse({ name: "G", capacity: 5, fuel: "wind", is_active: false }).success).toBe(true)
    })

    it("rejects unknown keys", () => {
      expect(record.safeParse({ name: "G", capacity: 5, colour: "red" }).success).toBe(false)
    })

    it("enforces whole-string patterns", () => {
      const node = schema.getClass("Node")
      if (!node) throw new Error("fixture missing Node")
      const nodeRecord = buildRecordSchema(node)

      expect(nodeRecord.safeParse({ voltage: 110, code: "N-12" }).success).toBe(true)
      expect(nodeRecord.safeParse({ voltage: 110, code: "xN-12" }).success).toBe(false)
    })

    it("checks patterns and enums the way the validator does", () => {
      const tagged = resolveSchema(
        loadSchemaDocuments([
          {
            name: "Tag",
            attributes: {
              level: { value: { type: "string", enum: [1, 2] } },
              code: { value: { type: "string", constraints: { pattern: "[" } } },
            },
          },
        ]),
      ).getClass("Tag")
      if (!tagged) throw new Error("fixture missing Tag")

      const tagRecord = buildRecordSchema(tagged)

      expect(tagRecord.safeParse({ level: "1" }).success).toBe(true)
      expect(tagRecord.safeParse({ level: "3" }).success).toBe(false)
      expect(tagRecord.safeParse({ code: "[" }).success).toBe(false)
    })

    it("accepts the records produced by the model", () => {
      const valid = createValidGrid()
      const schemas = buildRecordSchemas(valid.schema)

      expect([...schemas.keys()]).toHaveLength(7)
      expect(valid.toRecord("G1")).toEqual({ name: "Gas 1", capacity: 250, fuel: "gas", is_active: true })
      expect(schemas.get("GasGenerator")?.safeParse(valid.toRecord("G1")).success).toBe(true)
    })
  })
})
