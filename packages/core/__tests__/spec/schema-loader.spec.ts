/**
 * Schema Loader Specification Tests
 *
 * - document shapes (collection, single class, skipped)
 * - attribute styles (nested, flat) and field encodings (map, list)
 * - fragment merging across documents and files
 * - symmetric write-back via toSchemaDocument()
 */

import { describe, it, expect } from "vitest"
import { fileURLToPath } from "node:url"
import {
  SchemaError,
  loadSchemaDocuments,
  loadSchemaFile,
  loadSchemaPath,
  toSchemaDocument,
  buildAttributeDef,
  buildRelationDef,
  normalizeAttributeType,
} from "../../src"
import { captureLogger, gridDocuments, thrown } from "./fixtures/grid"

const fixtureDir = fileURLToPath(new URL("./fixtures/schema", import.meta.url))

describe("Schema Loader Specification", () => {
  // ===========================================================================
  // DOCUMENT SHAPES
  // ===========================================================================

  describe("loadSchemaDocuments()", () => {
    it("reads collections and single-class documents in order of appearance", () => {
      const classes = loadSchemaDocuments(gridDocuments)

      expect([...classes.keys()]).toEqual(["Asset", "Node", "Line", "Generator", "GasGenerator", "Load", "Region"])
    })

    it("keeps only local fields before resolution", () => {
      const classes = loadSchemaDocuments(gridDocuments)
      const generator = classes.get("Generator")

      expect([...(generator?.attributes.keys() ?? [])]).toEqual(["capacity", "fuel", "is_active"])
      expect(generator?.parents).toEqual(["asset"])
    })

    it("skips documents that are not class definitions", () => {
      const { logger, entries } = captureLogger()
      const classes = loadSchemaDocuments([null, "text", { title: "x" }, { name: "Only" }], logger)

      expect([...classes.keys()]).toEqual(["Only"])
      expect(entries.map((e) => e.message)).toEqual([
        "Skipping schema document that is not a mapping",
        "Skipping unrecognized schema document",
      ])
    })

    it("accepts parent and inherits_from as aliases of parents", () => {
      const classes = loadSchemaDocuments([
        { name: "A" },
        { name: "B", parent: "A" },
        { name: "C", inherits_from: ["A", "B"] },
      ])

      expect(classes.get("B")?.parents).toEqual(["A"])
      expect(classes.get("C")?.parents).toEqual(["A", "B"])
    })

    it("merges fragments of the same class key by key", () => {
      const classes = loadSchemaDocuments([
        { name: "Node", description: "first", attributes: { a: { type: "string" } } },
        { entity_classes: { Node: { description: "second", attributes: { b: { type: "int" } } } } },
        { name: "Node", attributes: { a: { type: "float" } } },
      ])
      const node = classes.get("Node")

      expect(node?.description).toBe("second")
      expect([...(node?.attributes.keys() ?? [])]).toEqual(["a", "b"])
      expect(node?.attributes.get("a")?.type).toBe("float")
      expect(node?.attributes.get("b")?.type).toBe("integer")
    })

    it("rejects malformed field specs with INVALID_DEFINITION", () => {
      const load = () =>
        loadSchemaDocuments([{ name: "Node", attributes: { voltage: { required: "yes" } } }])

      const err = thrown(load)
      expect(err).toBeInstanceOf(SchemaError)
      expect(err).toMatchObject({
        code: "INVALID_DEFINITION",
        className: "Node",
        message: "Invalid definition of 'voltage' in class 'Node' at 'required': Expected boolean, received string",
      })
    })
  })

  // ===========================================================================
  // ATTRIBUTE AND RELATION SPECS
  // ===========================================================================

  describe("attribute specs", () => {
    it("reads the nested style", () => {
      const def = buildAttributeDef(
        "capacity",
        {
          description: "Installed capacity",
          required: true,
          value: { type: "number", default: 10, constraints: { minimum: 0, maximum: 500 } },
          unit: { type: "string", constraints: { enum: ["MW", "kW"] } },
          group: "technical",
          order: 3,
        },
        "Generator",
      )

      expect(def).toEqual({
        name: "capacity",
        type: "float",
        required: true,
        description: "Installed capacity",
        default: 10,
        constraints: { minimum: 0, maximum: 500 },
        unit: { allowed: ["MW", "kW"], default: "MW" },
        group: "technical",
        order: 3,
      })
    })

    it("reads the flat style with a top-level enum and a bare unit", () => {
      const def = buildAttributeDef(
        "fuel",
        { type: "str", enum: ["gas", "coal"], required: false, unit: "-" },
        "Generator",
      )

      expect(def.type).toBe("string")
      expect(def.required).toBe(false)
      expect(def.constraints.enum).toEqual(["gas", "coal"])
      expect(def.unit).toEqual({ default: "-" })
    })

    it("reads constraint key aliases", () => {
      const def = buildAttributeDef(
        "code",
        { type: "string", constraints: { regex: "[A-Z]+", min_length: 2, maxLength: 5 } },
        "Node",
      )

      expect(def.constraints.pattern).toBe("[A-Z]+")
      expect(def.constraints.minLength).toBe(2)
      expect(def.constraints.maxLength).toBe(5)
    })

    it("normalizes type aliases and treats unknown types as strings", () => {
      expect(normalizeAttributeType("double")).toBe("float")
      expect(normalizeAttributeType("long")).toBe("integer")
      expect(normalizeAttributeType("Bool")).toBe("boolean")
      expect(normalizeAttributeType("date")).toBe("string")
      expect(normalizeAttributeType(undefined)).toBe("string")
    })

    it("reads relation targets from target, targets or ref", () => {
      expect(buildRelationDef("a", { target: "Node" }, "X").targets).toEqual(["Node"])
      expect(buildRelationDef("b", { targets: ["Node", "Bus"] }, "X").targets).toEqual(["Node", "Bus"])
      expect(buildRelationDef("c", { ref: "Node" }, "X").targets).toEqual(["Node"])
      expect(buildRelationDef("d", {}, "X").targets).toEqual([])
    })

    it("defaults relation cardinality to 1 and stringifies numbers", () => {
      expect(buildRelationDef("a", { target: "Node" }, "X").cardinality).toBe("1")
      expect(buildRelationDef("b", { target: "Node", cardinality: 2 }, "X").cardinality).toBe("2")
    })

    it("reads relation constraints", () => {
      const def = buildRelationDef(
        "nodes",
        { target: "Node", cardinality: "1..*", constraints: { min_items: 2, max_items: 4, unique: true } },
        "Region",
      )

      expect(def.constraints).toEqual({ minItems: 2, maxItems: 4, unique: true })
    })
  })

  // ===========================================================================
  // FILES
  // ===========================================================================

  describe("loadSchemaPath()", () => {
    it("walks a directory recursively in sorted path order and merges fragments", () => {
      const classes = loadSchemaPath(fixtureDir)

      expect([...classes.keys()]).toEqual(["Asset", "Generator", "Node"])
      expect([...(classes.get("Generator")?.attributes.keys() ?? [])]).toEqual(["capacity", "fuel"])
      expect(classes.get("Generator")?.attributes.get("capacity")?.unit).toEqual({ default: "MW" })
      expect(classes.get("Node")?.attributes.get("voltage")?.unit).toEqual({ default: "kV" })
    })

    it("loads a single multi-document file", () => {
      const classes = loadSchemaFile(`${fixtureDir}/assets.yaml`)

      expect([...classes.keys()]).toEqual(["Asset", "Generator"])
      expect(classes.get("Generator")?.relations.get("connected_to")?.targets).toEqual(["Node"])
    })

    it("fails with SCHEMA_NOT_FOUND for a missing path", () => {
      const err = thrown(() => loadSchemaPath(`${fixtureDir}/missing`))
      expect(err).toBeInstanceOf(SchemaError)
      expect(err).toMatchObject({ code: "SCHEMA_NOT_FOUND" })
    })
  })

  // ===========================================================================
  // WRITE-BACK
  // ===========================================================================

  describe("toSchemaDocument()", () => {
    it.each(["map", "list"] as const)("round-trips every fixture class through the %s encoding", (encoding) => {
      const classes = loadSchemaDocuments(gridDocuments)

      for (const cls of classes.values()) {
        const reloaded = loadSchemaDocuments([toSchemaDocument(cls, encoding)]).get(cls.name)
        expect(reloaded).toEqual(cls)
      }
    })

    it("writes list encoding as id-tagged objects", () => {
      const classes = loadSchemaDocuments(gridDocuments)
      const line = classes.get("Line")
      if (!line) throw new Error("fixture missing Line")

      expect(toSchemaDocument(line, "list")).toEqual({
        name: "Line",
        parents: ["Asset"],
        attributes: [{ id: "length", value: { type: "float" }, unit: "km" }],
        relations: [
          { id: "from_node", target: ["Node"], cardinality: "1" },
          { id: "to_node", target: ["Node"], cardinality: "1" },
        ],
      })
    })
  })
})
