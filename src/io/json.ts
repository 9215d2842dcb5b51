/**
 * JSON and JSON Lines loading and writing
 * @module io/json
 */

import { readFileSync, writeFileSync } from 'fs'
import type { Row } from '../types/row.js'
import type { CollectionOptions } from '../types/config.js'
import { Collection } from '../collection/collection.js'
import { InvalidArgumentError, requireRows } from '../utils/errors.js'

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text)
  } catch (error) {
    throw new InvalidArgumentError('content', source, 'is not valid JSON', {
      cause: error instanceof Error ? error.message : String(error),
    })
  }
}

/**
 * Parses a JSON document holding an array of objects
 *
 * @throws {InvalidArgumentError} If the content is not JSON or not an array
 * @throws {TypeMismatchError} If an element is not an object
 */
export function parseJsonRows(content: string): Row[] {
  const parsed = parseJson(content, 'document')
  if (!Array.isArray(parsed)) {
    throw new InvalidArgumentError('content', 'document', 'must hold a top-level array')
  }
  return [...requireRows(parsed, 'readJson')]
}

/**
 * Parses JSON Lines: one object per non-blank line
 */
export function parseJsonlRows(content: string): Row[] {
  const values = content
    .split(/\r?\n/)
    .map((line, i) => ({ line, number: i + 1 }))
    .filter(({ line }) => line.trim().length > 0)
    .map(({ line, number }) => parseJson(line, `line ${number}`))
  return [...requireRows(values, 'readJsonl')]
}

/**
 * Reads a JSON array of objects into a collection
 */
export function readJson(path: string, options?: CollectionOptions): Collection<Row> {
  return new Collection(parseJsonRows(readFileSync(path, 'utf-8')), options)
}

/**
 * Reads a JSON Lines file into a collection
 */
export function readJsonl(path: string, options?: CollectionOptions): Collection<Row> {
  return new Collection(parseJsonlRows(readFileSync(path, 'utf-8')), options)
}

/**
 * Writes items as a JSON array
 */
export function writeJson(path: string, items: Iterable<unknown>, indent = 2): void {
  writeFileSync(path, `${JSON.stringify(Array.from(items), null, indent)}\n`, 'utf-8')
}

/**
 * Writes items as JSON Lines
 */
export function writeJsonl(path: string, items: Iterable<unknown>): void {
  const lines = Array.from(items, (item) => JSON.stringify(item))
  writeFileSync(path, lines.length > 0 ? `${lines.join('\n')}\n` : '', 'utf-8')
}
