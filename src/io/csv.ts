/**
 * Delimited text loading and writing.
 * Supports quoted fields with doubled-quote escapes.
 * @module io/csv
 */

import { readFileSync, writeFileSync } from 'fs'
import type { Row } from '../types/row.js'
import type { CollectionOptions } from '../types/config.js'
import { Collection } from '../collection/collection.js'
import { InvalidArgumentError, requireRows } from '../utils/errors.js'
import { setKey } from '../utils/row.js'

export interface CsvParseOptions {
  /** Field delimiter (default: ',') */
  delimiter?: string
  /** Whether the first line holds the column names (default: true) */
  hasHeader?: boolean
  /** Column names to use instead of a header line */
  headerRow?: string[]
  /** Lines to skip before the header or data (default: 0) */
  skipRows?: number
  /** Convert numeric-looking cells to numbers (default: false) */
  parseNumbers?: boolean
  /** File encoding used by readCsv (default: 'utf-8') */
  encoding?: BufferEncoding
}

export interface CsvWriteOptions {
  /** Field delimiter (default: ',') */
  delimiter?: string
}

const NUMERIC_CELL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/**
 * Splits delimited text into records of cells. Quote state carries across
 * line breaks, so a quoted cell may hold newlines. Blank lines outside
 * quotes produce no record.
 */
function parseRecords(content: string, delimiter: string): string[][] {
  const records: string[][] = []
  let cells: string[] = []
  let current = ''
  let inQuotes = false
  let quoted = false

  const endRecord = () => {
    cells.push(current)
    const blank = !quoted && cells.length === 1 && current.trim().length === 0
    if (!blank) {
      records.push(cells)
    }
    cells = []
    current = ''
    quoted = false
  }

  for (let i = 0; i < content.length; i++) {
    const char = content[i]

    if (char === '"') {
      if (inQuotes && content[i + 1] === '"') {
        current += '"'
        i++
      } else {
        inQuotes = !inQuotes
        quoted = true
      }
    } else if (inQuotes) {
      current += char
    } else if (content.startsWith(delimiter, i)) {
      cells.push(current)
      current = ''
      i += delimiter.length - 1
    } else if (char === '\n') {
      endRecord()
    } else if (char === '\r' && content[i + 1] === '\n') {
      endRecord()
      i++
    } else {
      current += char
    }
  }

  if (current.length > 0 || cells.length > 0 || quoted) {
    endRecord()
  }
  return records
}

function parseCell(cell: string, parseNumbers: boolean): unknown {
  if (parseNumbers && NUMERIC_CELL.test(cell.trim())) {
    return Number(cell)
  }
  return cell
}

/**
 * Parses delimited text into rows.
 *
 * Cells missing at the end of a short record leave the key absent, so
 * reducers skip them. Blank lines are ignored, and quoted cells may span
 * lines.
 *
 * @example
 * ```typescript
 * parseCsv('a,b\n1,2\n3', { parseNumbers: true })
 * // [{ a: 1, b: 2 }, { a: 3 }]
 * ```
 */
export function parseCsv(content: string, options: CsvParseOptions = {}): Row[] {
  const {
    delimiter = ',',
    hasHeader = true,
    headerRow,
    skipRows = 0,
    parseNumbers = false,
  } = options

  if (delimiter.length === 0 || /["\r\n]/.test(delimiter)) {
    throw new InvalidArgumentError(
      'delimiter',
      delimiter,
      'must be non-empty and must not contain quotes or line breaks'
    )
  }

  const records = parseRecords(content, delimiter).slice(skipRows)

  if (records.length === 0) {
    return []
  }

  let headers: string[]
  let dataRecords: string[][]

  if (headerRow) {
    headers = headerRow
    dataRecords = records
  } else if (hasHeader) {
    headers = records[0].map((header) => header.trim())
    dataRecords = records.slice(1)
  } else {
    headers = records[0].map((_, i) => `field_${i}`)
    dataRecords = records
  }

  return dataRecords.map((cells, recordIndex) => {
    if (cells.length > headers.length) {
      throw new InvalidArgumentError(
        'content',
        cells,
        `record ${recordIndex + 1} has ${cells.length} cells but there are ${headers.length} columns`
      )
    }
    const row: Row = {}
    cells.forEach((cell, i) => {
      setKey(row, headers[i], parseCell(cell, parseNumbers))
    })
    return row
  })
}

/**
 * Reads a delimited file into a collection
 */
export function readCsv(
  path: string,
  options: CsvParseOptions = {},
  collectionOptions?: CollectionOptions
): Collection<Row> {
  const content = readFileSync(path, options.encoding ?? 'utf-8')
  return new Collection(parseCsv(content, options), collectionOptions)
}

function formatCell(value: unknown, delimiter: string): string {
  if (value === undefined || value === null) return ''
  const text =
    typeof value === 'object' && !(value instanceof Date)
      ? JSON.stringify(value)
      : value instanceof Date
        ? value.toISOString()
        : String(value)
  if (text.includes(delimiter) || text.includes('"') || /[\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`
  }
  return text
}

/**
 * Formats rows as delimited text. Columns are the union of all keys in
 * first-occurrence order; absent values become empty cells. Arrays and
 * objects are written as JSON.
 *
 * @example
 * ```typescript
 * toCsv([{ a: 1, b: 'x,y' }, { a: 2 }]) // 'a,b\n1,"x,y"\n2,\n'
 * ```
 */
export function toCsv(rows: Iterable<unknown>, options: CsvWriteOptions = {}): string {
  const { delimiter = ',' } = options
  const checked = requireRows(Array.from(rows), 'toCsv')
  const columns = [...new Set(checked.flatMap((row) => Object.keys(row)))]
  if (columns.length === 0) {
    return ''
  }
  const lines = [columns.map((column) => formatCell(column, delimiter)).join(delimiter)]
  for (const row of checked) {
    lines.push(columns.map((column) => formatCell(row[column], delimiter)).join(delimiter))
  }
  return `${lines.join('\n')}\n`
}

/**
 * Writes rows to a delimited file
 */
export function writeCsv(
  path: string,
  rows: Iterable<unknown>,
  options: CsvWriteOptions = {}
): void {
  writeFileSync(path, toCsv(rows, options), 'utf-8')
}
