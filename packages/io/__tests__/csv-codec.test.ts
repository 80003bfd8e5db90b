/**
 * Tests for the CSV codec and relation cell parsing
 */

import { describe, it, expect } from "vitest"
import { escapeCsv, formatCsv, parseCsv, parseCsvRows, parseCsvTable, parseRelationCell } from "../src"

describe("CSV codec", () => {
  describe("escapeCsv", () => {
    it("should leave plain fields alone", () => {
      expect(escapeCsv("plain text")).toBe("plain text")
    })

    it("should quote fields with commas, quotes or line breaks", () => {
      expect(escapeCsv("a,b")).toBe('"a,b"')
      expect(escapeCsv('say "hi"')).toBe('"say ""hi"""')
      expect(escapeCsv("two\nlines")).toBe('"two\nlines"')
    })
  })

  describe("formatCsv", () => {
    it("should join rows with LF and end with a newline", () => {
      expect(formatCsv([["a", "b,c"], ['q"', ""]])).toBe('a,"b,c"\n"q""",\n')
    })
  })

  describe("parseCsv", () => {
    it("should read quoted fields, CRLF and blank lines", () => {
      const text = 'a,b\r\n"x, y","He said ""hi"""\n\n"multi\nline",z\n'

      expect(parseCsv(text)).toEqual([
        ["a", "b"],
        ["x, y", 'He said "hi"'],
        ["multi\nline", "z"],
      ])
    })

    it("should report the line each row starts on", () => {
      const text = 'a,b\r\n"x, y","He said ""hi"""\n\n"multi\nline",z\n'

      expect(parseCsvRows(text).map((row) => row.line)).toEqual([1, 2, 4])
    })

    it("should strip a byte order mark and accept a missing final newline", () => {
      expect(parseCsv("\uFEFFid\n1")).toEqual([["id"], ["1"]])
    })

    it("should read back what formatCsv writes", () => {
      const rows = [["id", "note"], ["1", 'a "quoted", multi\nline note'], ["2", ""]]
      expect(parseCsv(formatCsv(rows))).toEqual(rows)
    })
  })

  describe("parseCsvTable", () => {
    it("should key cells by header and pad short rows", () => {
      expect(parseCsvTable(" id ,name\n1\n")).toEqual({
        header: ["id", "name"],
        records: [{ line: 2, values: { id: "1", name: "" } }],
      })
    })

    it("should return an empty table for empty input", () => {
      expect(parseCsvTable("")).toEqual({ header: [], records: [] })
    })
  })

  describe("parseRelationCell", () => {
    it.each([
      ['["B1", "B2"]', ["B1", "B2"]],
      ["B1; B2", ["B1", "B2"]],
      ["B1,B2", ["B1", "B2"]],
      ["[B1, B2]", ["B1", "B2"]],
      ["['B1']", ["B1"]],
      ["B1", ["B1"]],
      ["  ", []],
    ])("should split %j", (cell, expected) => {
      expect(parseRelationCell(cell)).toEqual(expected)
    })
  })
})
