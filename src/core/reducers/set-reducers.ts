/**
 * Counting reducers: count, unique, n_unique
 * @module core/reducers/set-reducers
 */

import { distinctValues } from '../../utils/equality.js'

/**
 * Number of present values, duplicates included
 */
export function count(values: unknown[]): number {
  return values.length
}

/**
 * Distinct values in first-occurrence order. Values compare structurally,
 * so `[1, 2]` and `[1, 2]` collapse into one entry.
 *
 * @example
 * ```typescript
 * unique([7, 2, 3, 2]) // [7, 2, 3]
 * ```
 */
export function unique(values: unknown[]): unknown[] {
  return distinctValues(values)
}

/**
 * Number of distinct values
 */
export function nUnique(values: unknown[]): number {
  return distinctValues(values).length
}
