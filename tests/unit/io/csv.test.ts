import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { parseCsv, readCsv, toCsv, writeCsv } from '../../../src/io/index.js'
import { InvalidArgumentError, TypeMismatchError } from '../../../src/utils/errors.js'

describe('parseCsv', () => {
  it('uses the first line as the header', () => {
    expect(parseCsv('name,city\nAda,London\nGrace,New York')).toEqual([
      { name: 'Ada', city: 'London' },
      { name: 'Grace', city: 'New York' },
    ])
  })

  it('keeps cells as strings unless asked to parse numbers', () => {
    expect(parseCsv('a,b\n1,x')).toEqual([{ a: '1', b: 'x' }])
    expect(parseCsv('a,b,c\n1,-2.5,1e3', { parseNumbers: true })).toEqual([
      { a: 1, b: -2.5, c: 1000 },
    ])
  })

  it('leaves keys absent on short lines', () => {
    expect(parseCsv('a,b\n1,2\n3', { parseNumbers: true })).toEqual([{ a: 1, b: 2 }, { a: 3 }])
  })

  it('handles quoted fields with delimiters and escaped quotes', () => {
    expect(parseCsv('a,b\n"x,y","say ""hi"""')).toEqual([{ a: 'x,y', b: 'say "hi"' }])
  })

  it('supports other delimiters', () => {
    expect(parseCsv('a;b\n1;2', { delimiter: ';' })).toEqual([{ a: '1', b: '2' }])
    expect(parseCsv('a||b\n1||2', { delimiter: '||' })).toEqual([{ a: '1', b: '2' }])
  })

  it('names columns when there is no header', () => {
    expect(parseCsv('1,2\n3,4', { hasHeader: false })).toEqual([
      { field_0: '1', field_1: '2' },
      { field_0: '3', field_1: '4' },
    ])
  })

  it('accepts explicit column names', () => {
    expect(parseCsv('1,2', { headerRow: ['x', 'y'] })).toEqual([{ x: '1', y: '2' }])
  })

  it('skips leading lines and blank lines', () => {
    expect(parseCsv('# export\na,b\n\n1,2\r\n', { skipRows: 1 })).toEqual([{ a: '1', b: '2' }])
  })

  it('returns no rows for empty content', () => {
    expect(parseCsv('')).toEqual([])
    expect(parseCsv('a,b')).toEqual([])
  })

  it('rejects lines with more cells than columns', () => {
    expect(() => parseCsv('a\n1,2')).toThrow(
      "Invalid argument 'content': record 1 has 2 cells but there are 1 columns"
    )
  })

  it('keeps line breaks inside quoted cells', () => {
    expect(parseCsv('id,note\n1,"line1\nline2"\n2,x')).toEqual([
      { id: '1', note: 'line1\nline2' },
      { id: '2', note: 'x' },
    ])
    expect(parseCsv('a\r\n"x\r\ny"\r\n')).toEqual([{ a: 'x\r\ny' }])
  })

  it('keeps a quoted empty cell on its own line', () => {
    expect(parseCsv('a\n""\n')).toEqual([{ a: '' }])
  })

  it('keeps a __proto__ column as data', () => {
    const [row] = parseCsv('__proto__,a\n1,2')
    expect(Object.entries(row)).toEqual([
      ['__proto__', '1'],
      ['a', '2'],
    ])
  })

  it('rejects unusable delimiters', () => {
    expect(() => parseCsv('a', { delimiter: '' })).toThrow(InvalidArgumentError)
    expect(() => parseCsv('a', { delimiter: '"' })).toThrow(InvalidArgumentError)
    expect(() => parseCsv('a', { delimiter: '\n' })).toThrow(
      "Invalid argument 'delimiter': must be non-empty and must not contain quotes or line breaks"
    )
  })
})

describe('toCsv', () => {
  it('writes the union of keys as columns', () => {
    expect(toCsv([{ a: 1, b: 'x,y' }, { a: 2 }])).toBe('a,b\n1,"x,y"\n2,\n')
  })

  it('writes arrays and objects as JSON and escapes quotes', () => {
    expect(toCsv([{ tags: [1, 2], note: 'say "hi"' }])).toBe(
      'tags,note\n"[1,2]","say ""hi"""\n'
    )
  })

  it('writes null and undefined as empty cells', () => {
    expect(toCsv([{ a: null, b: undefined, c: 0 }])).toBe('a,b,c\n,,0\n')
  })

  it('uses the given delimiter', () => {
    expect(toCsv([{ a: 1, b: 2 }], { delimiter: '\t' })).toBe('a\tb\n1\t2\n')
  })

  it('returns an empty string when there are no columns', () => {
    expect(toCsv([])).toBe('')
    expect(toCsv([{}])).toBe('')
  })

  it('rejects non-row items', () => {
    expect(() => toCsv([1])).toThrow(TypeMismatchError)
  })
})

describe('readCsv / writeCsv', () => {
  let directory: string

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'rowset-csv-'))
  })

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true })
  })

  it('reads a file into a collection', () => {
    const path = join(directory, 'scores.csv')
    writeFileSync(path, 'team,score\nred,3\nblue,5\n', 'utf-8')

    const collection = readCsv(path, { parseNumbers: true })

    expect(collection.collect()).toEqual([
      { team: 'red', score: 3 },
      { team: 'blue', score: 5 },
    ])
    expect(collection.sum('score')).toBe(8)
  })

  it('passes collection options through', () => {
    const path = join(directory, 'scores.csv')
    writeFileSync(path, 'team,score\nred,3\n', 'utf-8')

    expect(readCsv(path, {}, { groups: ['team'] }).groups).toEqual(['team'])
  })

  it('reads back values holding line breaks and delimiters', () => {
    const path = join(directory, 'notes.csv')
    const rows = [
      { id: '1', note: 'line1\nline2' },
      { id: '2', note: 'a, "b"' },
    ]
    writeCsv(path, rows)

    expect(readCsv(path).collect()).toEqual(rows)
  })

  it('writes rows that read back the same', () => {
    const path = join(directory, 'out.csv')
    writeCsv(path, [{ a: 1, b: 'x' }, { a: 2, b: 'y' }])

    expect(readFileSync(path, 'utf-8')).toBe('a,b\n1,x\n2,y\n')
    expect(readCsv(path, { parseNumbers: true }).collect()).toEqual([
      { a: 1, b: 'x' },
      { a: 2, b: 'y' },
    ])
  })
})
