/**
 * Row helpers shared by the engines
 * @module utils/row
 */

import type { Row } from '../types/row.js'
import { isPlainObject } from './equality.js'

/**
 * True for plain objects usable as rows. Maps, sets, dates and class
 * instances are not rows.
 */
export function isRow(value: unknown): value is Row {
  return isPlainObject(value)
}

/**
 * True when the row carries `key` as an own property, whatever its value
 */
export function hasKey(row: Row, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(row, key)
}

/**
 * Sets `key` as an own enumerable property. Plain assignment would treat
 * `__proto__` as the prototype setter.
 */
export function setKey(row: Row, key: string, value: unknown): void {
  Object.defineProperty(row, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  })
}

/**
 * Values stored under `column`, skipping rows where the column is absent
 */
export function columnValues(rows: Iterable<Row>, column: string): unknown[] {
  const values: unknown[] = []
  for (const row of rows) {
    if (hasKey(row, column)) {
      values.push(row[column])
    }
  }
  return values
}
