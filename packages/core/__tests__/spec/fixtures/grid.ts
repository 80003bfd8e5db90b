/**
 * Grid Schema Fixture
 *
 * A small power-grid schema shared by the core tests.
 * Covers multiple encodings, canonicalized parent names, units,
 * polymorphic relations and relation constraints.
 *
 * Hierarchy:
 * ```
 * Asset
 * ├── Generator
 * │   └── GasGenerator
 * ├── Line
 * └── Load
 * Node
 * Region
 * ```
 */

import { DomainModel, Logger, createSilentLogger, type LogEntry } from "../../../src"

export const gridDocuments: unknown[] = [
  {
    entity_classes: {
      Asset: {
        description: "Anything installed in the grid",
        attributes: {
          name: { required: true, value: { type: "string" } },
          commissioning_year: {
            value: { type: "integer", constraints: { minimum: 1900, maximum: 2100 } },
          },
        },
      },
      Node: {
        attributes: {
          voltage: {
            required: true,
            value: { type: "float", constraints: { minimum: 0 } },
            unit: { type: "string", constraints: { enum: ["kV", "V"] } },
          },
          code: { value: { type: "string", constraints: { pattern: "N-[0-9]+" } } },
        },
      },
    },
  },
  {
    name: "Line",
    parents: ["Asset"],
    attributes: [{ id: "length", value: { type: "float" }, unit: "km" }],
    relations: [
      { id: "from_node", target: "Node", cardinality: "1" },
      { id: "to_node", target: "Node", cardinality: "1" },
    ],
  },
  {
    name: "Generator",
    parents: "asset",
    attributes: {
      capacity: {
        required: true,
        value: { type: "float", constraints: { minimum: 0 } },
        unit: { type: "string", constraints: { enum: ["MW", "kW"] } },
        group: "technical",
        order: 1,
      },
      fuel: {
        value: { type: "string", constraints: { enum: ["gas", "coal", "wind"] } },
        group: "technical",
        order: 2,
      },
      is_active: { value: { type: "bool", default: true } },
    },
    relations: { connected_to: { target: "Node", cardinality: "1" } },
  },
  {
    name: "GasGenerator",
    parents: ["Generator"],
    attributes: {
      efficiency: { value: { type: "float", constraints: { minimum: 0, maximum: 1 } } },
    },
  },
  {
    name: "Load",
    parents: ["Asset"],
    relations: { supplied_by: { target: ["Generator"], cardinality: "0..*" } },
  },
  {
    name: "Region",
    relations: {
      nodes: { target: "Node", cardinality: "1..*", constraints: { min_items: 2, unique: true } },
    },
  },
]

export function createGridModel(logger: Logger = createSilentLogger()): DomainModel {
  return DomainModel.fromDocuments(gridDocuments, { logger })
}

/**
 * Logger at debug level that records entries instead of printing them.
 */
export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const logger = new Logger({ level: "debug", output: (entry) => entries.push(entry) })
  return { logger, entries }
}

/**
 * A model that validates cleanly: two nodes, a line between them,
 * a gas generator at N1, a load supplied by it and a region.
 */
export function createValidGrid(logger?: Logger): DomainModel {
  const model = createGridModel(logger)
  model.create("Node", "N1", { voltage: 110 })
  model.create("Node", "N2", { voltage: 110 })
  model.create("Line", "L1", { name: "Line 1", length: 12.5, from_node: "N1", to_node: "N2" })
  model.create("GasGenerator", "G1", { name: "Gas 1", capacity: 250, fuel: "gas", connected_to: "N1" })
  model.create("Load", "D1", { name: "Town", supplied_by: ["G1"] })
  model.create("Region", "R1", { nodes: ["N1", "N2"] })
  return model
}

/**
 * Run a function that is expected to throw and return what it threw.
 */
export function thrown(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error("Expected function to throw")
}
