// src/services/records.ts
// Typed records and the tab-separated parser that produces them.

import { tsvParseRows } from 'd3-dsv'
import { CountTypeError, MalformedRowError, SchemaError } from './errors'

export type InstitutionRecord = { name: string; count: number; country: string }
export type TopicRecord = { name: string; count: number }
export type TypeRecord = { name: string; count: number }

export type ColumnType = 'text' | 'count'
export type Column = { name: string; type: ColumnType }

/** Typed access to one validated row, by column name. */
export type RowReader = {
  text(column: string): string
  count(column: string): number
}

export type RecordSchema<T> = {
  file: string
  columns: readonly Column[]
  build: (row: RowReader) => T
}

export const institutionSchema: RecordSchema<InstitutionRecord> = {
  file: 'institution.txt',
  columns: [
    { name: 'name', type: 'text' },
    { name: 'count', type: 'count' },
    { name: 'country', type: 'text' },
  ],
  build: row => ({ name: row.text('name'), count: row.count('count'), country: row.text('country') }),
}

export const topicSchema: RecordSchema<TopicRecord> = {
  file: 'topic.txt',
  columns: [
    { name: 'name', type: 'text' },
    { name: 'count', type: 'count' },
  ],
  build: row => ({ name: row.text('name'), count: row.count('count') }),
}

export const typeSchema: RecordSchema<TypeRecord> = {
  file: 'type.txt',
  columns: [
    { name: 'name', type: 'text' },
    { name: 'count', type: 'count' },
  ],
  build: row => ({ name: row.text('name'), count: row.count('count') }),
}

const COUNT_RX = /^\d+$/

function parseCount(raw: string, file: string, line: number, column: string): number {
  const trimmed = raw.trim()
  if (!COUNT_RX.test(trimmed)) throw new CountTypeError(file, line, column, raw)
  const value = Number(trimmed)
  if (!Number.isSafeInteger(value)) throw new CountTypeError(file, line, column, raw)
  return value
}

function reader(values: Map<string, string | number>): RowReader {
  return {
    text(column) {
      const v = values.get(column)
      if (typeof v !== 'string') throw new Error(`column "${column}" is not a text column`)
      return v
    },
    count(column) {
      const v = values.get(column)
      if (typeof v !== 'number') throw new Error(`column "${column}" is not a count column`)
      return v
    },
  }
}

// Line breaks inside a quoted field, so errors can name physical lines
const BREAK_RX = /\r\n|\r|\n/g

function breaksIn(fields: readonly string[]): number {
  return fields.reduce((n, f) => n + (f.match(BREAK_RX)?.length ?? 0), 0)
}

/**
 * Parse a tab-separated document into records.
 *
 * The first row must hold exactly the schema's column names, in order.
 * Blank lines are skipped but still counted, so line numbers in errors
 * match the file. Parsing stops at the first bad row.
 */
export function parseRecords<T>(text: string, schema: RecordSchema<T>): T[] {
  const { file, columns } = schema
  const [first = [''], ...rows] = tsvParseRows(text.replace(/^\uFEFF/, ''))

  const header = first.map(h => h.trim())
  const expected = columns.map(c => c.name)
  if (header.length !== expected.length || header.some((h, i) => h !== expected[i])) {
    throw new SchemaError(file, expected, header)
  }

  const out: T[] = []
  let lineNo = 1 + breaksIn(first)
  for (const fields of rows) {
    lineNo += 1
    const startLine = lineNo
    lineNo += breaksIn(fields)
    if (fields.every(f => f.trim() === '')) continue

    if (fields.length !== columns.length) {
      throw new MalformedRowError(file, startLine, `expected ${columns.length} fields, found ${fields.length}`)
    }

    const values = new Map<string, string | number>()
    columns.forEach((col, j) => {
      const field = fields[j]
      if (col.type === 'count') {
        values.set(col.name, parseCount(field, file, startLine, col.name))
      } else {
        if (field.trim() === '') throw new MalformedRowError(file, startLine, `empty "${col.name}"`)
        values.set(col.name, field)
      }
    })
    out.push(schema.build(reader(values)))
  }
  return out
}
