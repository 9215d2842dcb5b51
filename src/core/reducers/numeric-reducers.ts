/**
 * Numeric reducers: sum, mean, median, var, std, min, max
 * @module core/reducers/numeric-reducers
 */

import { TypeMismatchError } from '../../utils/errors.js'

function isNumber(value: unknown): value is number {
  return typeof value === 'number'
}

function isString(value: unknown): value is string {
  return typeof value === 'string'
}

/**
 * Narrows the values to numbers or throws for the first non-number
 */
function requireNumbers(values: unknown[], reducer: string): number[] {
  if (values.every(isNumber)) {
    return values
  }
  const offender = values.find((value) => !isNumber(value))
  throw new TypeMismatchError(reducer, 'numeric values', offender)
}

function extreme<T extends number | string>(
  values: T[],
  replaces: (candidate: T, current: T) => boolean
): T {
  let result = values[0]
  for (let i = 1; i < values.length; i++) {
    if (replaces(values[i], result)) {
      result = values[i]
    }
  }
  return result
}

/**
 * Sum of numeric values. Returns 0 for no values.
 *
 * @example
 * ```typescript
 * sum([7, 6, 7]) // 20
 * sum([]) // 0
 * ```
 */
export function sum(values: unknown[]): number {
  let total = 0
  for (const value of requireNumbers(values, 'sum')) {
    total += value
  }
  return total
}

/**
 * Arithmetic mean. Expects at least one value.
 */
export function mean(values: unknown[]): number {
  const numbers = requireNumbers(values, 'mean')
  return sum(numbers) / numbers.length
}

/**
 * Median of numeric values; the mean of the two middle values when the
 * count is even. Expects at least one value.
 *
 * @example
 * ```typescript
 * median([3, 1, 2]) // 2
 * median([4, 1, 3, 2]) // 2.5
 * ```
 */
export function median(values: unknown[]): number {
  const sorted = [...requireNumbers(values, 'median')].sort((a, b) => a - b)
  const middle = Math.floor(sorted.length / 2)
  if (sorted.length % 2 === 1) {
    return sorted[middle]
  }
  return (sorted[middle - 1] + sorted[middle]) / 2
}

/**
 * Sample variance with an n - 1 denominator. Expects at least two values.
 */
export function variance(values: unknown[]): number {
  const numbers = requireNumbers(values, 'var')
  const avg = mean(numbers)
  let squares = 0
  for (const value of numbers) {
    squares += (value - avg) ** 2
  }
  return squares / (numbers.length - 1)
}

/**
 * Sample standard deviation. Expects at least two values.
 */
export function stdev(values: unknown[]): number {
  return Math.sqrt(variance(values))
}

/**
 * Smallest value. Works on all-number or all-string input; ties keep the
 * first occurrence. Expects at least one value.
 */
export function min(values: unknown[]): number | string {
  if (values.every(isNumber)) return extreme(values, (a, b) => a < b)
  if (values.every(isString)) return extreme(values, (a, b) => a < b)
  throw new TypeMismatchError('min', 'all-numeric or all-string values', values.find((v) => !isNumber(v)))
}

/**
 * Largest value. Works on all-number or all-string input; ties keep the
 * first occurrence. Expects at least one value.
 */
export function max(values: unknown[]): number | string {
  if (values.every(isNumber)) return extreme(values, (a, b) => a > b)
  if (values.every(isString)) return extreme(values, (a, b) => a > b)
  throw new TypeMismatchError('max', 'all-numeric or all-string values', values.find((v) => !isNumber(v)))
}
