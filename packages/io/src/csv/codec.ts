/**
 * CSV Codec
 *
 * Minimal RFC 4180 reader and writer: comma separated, fields quoted when
 * they contain a comma, quote or line break, quotes doubled inside quoted
 * fields. Accepts LF and CRLF line ends and a leading byte order mark.
 */

export type CsvRow = readonly string[]

/**
 * Header-keyed row with its 1-based line number in the source.
 */
export interface CsvRecord {
  line: number
  values: Record<string, string>
}

export interface CsvTable {
  header: string[]
  records: CsvRecord[]
}

/**
 * Escape one field.
 */
export function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

export function formatCsv(rows: readonly CsvRow[]): string {
  return rows.map((row) => row.map(escapeCsv).join(",")).join("\n") + "\n"
}

/**
 * Parse CSV text into rows of raw fields, each tagged with the line it starts on.
 * Blank lines are skipped.
 */
export function parseCsvRows(text: string): Array<{ line: number; fields: string[] }> {
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text
  const rows: Array<{ line: number; fields: string[] }> = []

  let fields: string[] = []
  let field = ""
  let quoted = false
  let line = 1
  let rowLine = 1
  let i = 0

  const endRow = (): void => {
    fields.push(field)
    if (!(fields.length === 1 && fields[0] === "")) {
      rows.push({ line: rowLine, fields })
    }
    fields = []
    field = ""
  }

  while (i < input.length) {
    const ch = input.charAt(i)

    if (quoted) {
      if (ch === '"') {
        if (input.charAt(i + 1) === '"') {
          field += '"'
          i += 2
          continue
        }
        quoted = false
      } else {
        if (ch === "\n") line++
        field += ch
      }
      i++
      continue
    }

    if (ch === '"') {
      quoted = true
    } else if (ch === ",") {
      fields.push(field)
      field = ""
    } else if (ch === "\r" || ch === "\n") {
      if (ch === "\r" && input.charAt(i + 1) === "\n") i++
      endRow()
      line++
      rowLine = line
    } else {
      field += ch
    }
    i++
  }

  if (field !== "" || fields.length > 0) endRow()
  return rows
}

export function parseCsv(text: string): string[][] {
  return parseCsvRows(text).map((row) => row.fields)
}

/**
 * Parse CSV text with a header row into header-keyed records.
 * Missing trailing cells read as empty strings.
 */
export function parseCsvTable(text: string): CsvTable {
  const [head, ...body] = parseCsvRows(text)
  if (!head) return { header: [], records: [] }

  const header = head.fields.map((h) => h.trim())
  const records = body.map((row) => {
    const values: Record<string, string> = {}
    header.forEach((name, index) => {
      values[name] = row.fields[index] ?? ""
    })
    return { line: row.line, values }
  })
  return { header, records }
}
