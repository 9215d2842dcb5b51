import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  parseJsonRows,
  parseJsonlRows,
  readJson,
  readJsonl,
  writeJson,
  writeJsonl,
} from '../../../src/io/index.js'
import { InvalidArgumentError, TypeMismatchError } from '../../../src/utils/errors.js'

describe('parseJsonRows', () => {
  it('parses an array of objects', () => {
    expect(parseJsonRows('[{"a":1},{"a":2,"b":[1,2]}]')).toEqual([{ a: 1 }, { a: 2, b: [1, 2] }])
  })

  it('rejects invalid JSON', () => {
    expect(() => parseJsonRows('[{"a":')).toThrow("Invalid argument 'content': is not valid JSON")
  })

  it('rejects a document that is not an array', () => {
    expect(() => parseJsonRows('{"a":1}')).toThrow(
      "Invalid argument 'content': must hold a top-level array"
    )
  })

  it('rejects elements that are not objects', () => {
    expect(() => parseJsonRows('[{"a":1},2]')).toThrow(TypeMismatchError)
    expect(() => parseJsonRows('[{"a":1},2]')).toThrow(
      "'readJson' expects a collection of rows, got number"
    )
  })
})

describe('parseJsonlRows', () => {
  it('parses one object per line and skips blank lines', () => {
    expect(parseJsonlRows('{"a":1}\n\n{"a":2}\r\n')).toEqual([{ a: 1 }, { a: 2 }])
  })

  it('names the line that failed to parse', () => {
    try {
      parseJsonlRows('{"a":1}\n{oops}')
      expect.unreachable('expected an InvalidArgumentError')
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidArgumentError)
      if (error instanceof InvalidArgumentError) {
        expect(error.value).toBe('line 2')
      }
    }
  })

  it('rejects lines that are not objects', () => {
    expect(() => parseJsonlRows('[1]')).toThrow("'readJsonl' expects a collection of rows, got array")
  })
})

describe('JSON files', () => {
  let directory: string

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'rowset-json-'))
  })

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true })
  })

  it('reads a JSON array into a collection', () => {
    const path = join(directory, 'rows.json')
    writeFileSync(path, '[{"a":1},{"a":3}]', 'utf-8')

    expect(readJson(path).mean('a')).toBe(2)
  })

  it('reads JSON Lines into a grouped collection', () => {
    const path = join(directory, 'rows.jsonl')
    writeFileSync(path, '{"g":"x","v":1}\n{"g":"x","v":2}\n', 'utf-8')

    const collection = readJsonl(path, { groups: ['g'] })

    expect(collection.agg({ total: ['v', 'sum'] }).collect()).toEqual([{ g: 'x', total: 3 }])
  })

  it('writes an indented JSON array', () => {
    const path = join(directory, 'out.json')
    writeJson(path, [{ a: 1 }])

    expect(readFileSync(path, 'utf-8')).toBe('[\n  {\n    "a": 1\n  }\n]\n')
  })

  it('writes JSON Lines', () => {
    const path = join(directory, 'out.jsonl')
    writeJsonl(path, [{ a: 1 }, { b: [2] }])

    expect(readFileSync(path, 'utf-8')).toBe('{"a":1}\n{"b":[2]}\n')
    expect(readJsonl(path).collect()).toEqual([{ a: 1 }, { b: [2] }])
  })

  it('writes an empty file for no items', () => {
    const path = join(directory, 'empty.jsonl')
    writeJsonl(path, [])

    expect(readFileSync(path, 'utf-8')).toBe('')
    expect(readJsonl(path).length).toBe(0)
  })
})
