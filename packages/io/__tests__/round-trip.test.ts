/**
 * Round trips through every import format
 *
 * Export a model with diagnostics, import it into a fresh model and compare.
 */

import { join } from "node:path"
import { describe, it, expect, beforeEach, afterEach } from "vitest"
import type { DomainModel } from "@domodel/core"
import {
  exportJson,
  exportLongCsv,
  exportNarrowCsv,
  exportWideCsv,
  exportYaml,
  importJson,
  importLongCsv,
  importNarrowCsv,
  importWideCsv,
  importYaml,
} from "../src"
import { createFlawedFleet, createFleetModel, tempDir } from "./fixtures/fleet"

type RoundTrip = (model: DomainModel, copy: DomainModel, dir: string) => void

const formats: Array<[string, RoundTrip]> = [
  [
    "json",
    (model, copy, dir) => {
      exportJson(model, join(dir, "model.json"))
      importJson(copy, join(dir, "model.json"))
    },
  ],
  [
    "yaml",
    (model, copy, dir) => {
      exportYaml(model, join(dir, "model.yaml"))
      importYaml(copy, join(dir, "model.yaml"))
    },
  ],
  [
    "narrow csv",
    (model, copy, dir) => {
      exportNarrowCsv(model, dir)
      importNarrowCsv(copy, dir)
    },
  ],
  [
    "wide csv",
    (model, copy, dir) => {
      exportWideCsv(model, dir)
      importWideCsv(copy, dir)
    },
  ],
  [
    "wide csv with meta columns",
    (model, copy, dir) => {
      exportWideCsv(model, dir, { meta: true })
      importWideCsv(copy, dir)
    },
  ],
  [
    "long csv",
    (model, copy, dir) => {
      exportLongCsv(model, join(dir, "model.csv"))
      importLongCsv(copy, join(dir, "model.csv"))
    },
  ],
]

describe("Round trips", () => {
  let dir: string
  let cleanup: () => void

  beforeEach(() => {
    ;({ dir, cleanup } = tempDir())
  })

  afterEach(() => {
    cleanup()
  })

  it("should start from a model with diagnostics", () => {
    expect(createFlawedFleet().validate().map((d) => d.message)).toEqual([
      "[Plant:P1] Missing required attribute 'name'",
      "[Plant:P1] Attribute 'capacity' violates minimum 0: -3",
      "[Plant:P1] Relation 'feeds' with 'B9' not among entities of allowed classes [Bus]",
      "[Grid:GR1] Relation 'buses' with 'B9' not among entities of allowed classes [Bus]",
    ])
  })

  it.each(formats)("should keep the diagnostics through %s", (_name, roundTrip) => {
    const original = createFlawedFleet()
    const copy = createFleetModel()

    roundTrip(original, copy, dir)

    expect(copy.validate()).toEqual(original.validate())
  })

  it.each(formats)("should not bring back a cleared default through %s", (_name, roundTrip) => {
    const copy = createFleetModel()

    roundTrip(createFlawedFleet(), copy, dir)

    expect(copy.toRecord("P1")).toEqual({ capacity: -3 })
    expect(copy.toRecord("P2")).toEqual({ name: "South", capacity: 1, online: true })
  })

  it.each(formats)("should keep ids containing separators through %s", (_name, roundTrip) => {
    const copy = createFleetModel()

    roundTrip(createFlawedFleet(), copy, dir)

    expect(copy.getRelationTargets("P2", "feeds")).toEqual(["n,1"])
    expect(copy.getRelationTargets("GR1", "buses")).toEqual(["n,1", "B9"])
    expect(copy.getEntity("n,1")?.className).toBe("Bus")
  })
})
