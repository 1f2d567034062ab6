import { readFileSync } from 'fs'
import { basename } from 'path'
import { MissingColumnError } from './errors.ts'

export type Row = Record<string, string>

export interface Table {
  source: string
  columns: string[]
  rows: Row[]
}

// .tsv and .txt are tab separated, anything else is treated as CSV
export function delimiterFor(path: string) {
  const lower = path.toLowerCase()
  return lower.endsWith('.tsv') || lower.endsWith('.txt') ? '\t' : ','
}

// Pick whichever delimiter the header line actually uses
export function sniffDelimiter(headerLine: string) {
  return headerLine.includes('\t') ? '\t' : ','
}

// Split one line, honouring double-quoted fields ("a,b" and "" escapes)
export function splitLine(line: string, delimiter: string) {
  const fields: string[] = []
  let current = ''
  let quoted = false

  for (let i = 0; i < line.length; i++) {
    const ch = line[i]!
    if (quoted) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"'
          i++
        } else {
          quoted = false
        }
      } else {
        current += ch
      }
    } else if (ch === '"' && current === '') {
      quoted = true
    } else if (ch === delimiter) {
      fields.push(current)
      current = ''
    } else {
      current += ch
    }
  }
  fields.push(current)
  return fields
}

export function parseTable(
  text: string,
  delimiter: string,
  source = 'table',
): Table {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/)
  const header = lines.shift()
  if (header === undefined || header.trim() === '') {
    return { source, columns: [], rows: [] }
  }
  const columns = splitLine(header, delimiter).map(c => c.trim())
  const rows: Row[] = []

  for (const line of lines) {
    if (line.trim() === '') {
      continue
    }
    const fields = splitLine(line, delimiter)
    const row: Row = {}
    columns.forEach((column, i) => {
      row[column] = fields[i] ?? ''
    })
    rows.push(row)
  }

  return { source, columns, rows }
}

export function requireColumns(table: Table, required: readonly string[]) {
  for (const column of required) {
    if (!table.columns.includes(column)) {
      throw new MissingColumnError(column, table.source, table.columns)
    }
  }
}

export function hasColumn(table: Table, column: string) {
  return table.columns.includes(column)
}

export function readTableFile(
  path: string,
  delimiter: string | 'sniff' = delimiterFor(path),
) {
  const text = readFileSync(path, 'utf-8')
  const sep =
    delimiter === 'sniff' ? sniffDelimiter(text.split('\n', 1)[0] ?? '') : delimiter
  return parseTable(text, sep, basename(path))
}
