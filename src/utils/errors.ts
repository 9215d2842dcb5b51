/**
 * Central error classes and validation utilities for rowset
 * @module utils/errors
 */

import type { Row } from '../types/row.js'
import { isPlainObject } from './equality.js'
import { isRow } from './row.js'

/**
 * Base error class for all rowset errors
 */
export class RowsetError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'RowsetError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a value does not have the shape a verb or reducer needs
 */
export class TypeMismatchError extends RowsetError {
  public readonly operation: string
  public readonly expected: string

  constructor(
    operation: string,
    expected: string,
    received: unknown,
    context?: Record<string, unknown>
  ) {
    super(
      `'${operation}' expects ${expected}, got ${describeValue(received)}`,
      'TYPE_MISMATCH',
      { operation, expected, received: describeValue(received), ...context }
    )
    this.name = 'TypeMismatchError'
    this.operation = operation
    this.expected = expected
  }
}

/**
 * Error thrown when a reducer name is not in the reducer table
 */
export class UnknownReducerError extends RowsetError {
  public readonly reducer: string

  constructor(reducer: string, available: readonly string[]) {
    super(
      `Unknown reducer '${reducer}'. Available reducers: ${available.join(', ')}`,
      'UNKNOWN_REDUCER',
      { reducer, available }
    )
    this.name = 'UnknownReducerError'
    this.reducer = reducer
  }
}

/**
 * Error thrown when an operation receives fewer values than it needs
 */
export class EmptyInputError extends RowsetError {
  public readonly operation: string
  public readonly required: number
  public readonly received: number

  constructor(
    operation: string,
    required: number,
    received: number,
    context?: Record<string, unknown>
  ) {
    super(
      `'${operation}' requires at least ${required} value${required === 1 ? '' : 's'}, got ${received}`,
      'EMPTY_INPUT',
      { operation, required, received, ...context }
    )
    this.name = 'EmptyInputError'
    this.operation = operation
    this.required = required
    this.received = received
  }
}

/**
 * Error thrown when an argument value is invalid
 */
export class InvalidArgumentError extends RowsetError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid argument '${parameterName}': ${reason}`,
      'INVALID_ARGUMENT',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidArgumentError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when a verb needs an active group spec
 */
export class NotGroupedError extends RowsetError {
  public readonly operation: string

  constructor(operation: string) {
    super(
      `'${operation}' requires a grouped collection. Call groupBy() first.`,
      'NOT_GROUPED',
      { operation }
    )
    this.name = 'NotGroupedError'
    this.operation = operation
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Short, human-readable description of a value for error messages
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (typeof value === 'object' && !isPlainObject(value)) {
    return value.constructor?.name || 'object'
  }
  return typeof value
}

/**
 * Validates that a number is a non-negative integer
 */
export function requireNonNegativeInteger(
  value: unknown,
  parameterName: string
): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidArgumentError(
      parameterName,
      value,
      'must be an integer'
    )
  }
  if (value < 0) {
    throw new InvalidArgumentError(
      parameterName,
      value,
      'must be non-negative (>= 0)'
    )
  }
  return value
}

/**
 * Validates that a value is a string (empty strings are allowed)
 */
export function requireString(value: unknown, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidArgumentError(
      parameterName,
      value,
      'must be a string'
    )
  }
  return value
}

function isRowItem<T>(item: T): item is T & Row {
  return isRow(item)
}

/**
 * Validates that every item of a sequence is a row
 */
export function requireRows<T>(
  items: readonly T[],
  operation: string
): readonly (T & Row)[] {
  if (items.every(isRowItem)) {
    return items
  }
  const index = items.findIndex((item) => !isRow(item))
  throw new TypeMismatchError(operation, 'a collection of rows', items[index], {
    index,
  })
}

/**
 * Check if an error is a rowset error
 */
export function isRowsetError(error: unknown): error is RowsetError {
  return error instanceof RowsetError
}
