/**
 * Static reducer table and the aggregation dispatcher
 * @module core/reducers/reducer-table
 */

import type { Row } from '../../types/row.js'
import type {
  ReducerName,
  ReducerDefinition,
  ReducerSpec,
  ResolvedReducer,
} from './types.js'
import { REDUCER_NAMES } from './types.js'
import { sum, mean, median, variance, stdev, min, max } from './numeric-reducers.js'
import { count, unique, nUnique } from './set-reducers.js'
import {
  EmptyInputError,
  InvalidArgumentError,
  UnknownReducerError,
} from '../../utils/errors.js'
import { columnValues } from '../../utils/row.js'

const REDUCERS: { readonly [N in ReducerName]: ReducerDefinition } = {
  mean: { name: 'mean', minValues: 1, reduce: mean },
  count: { name: 'count', minValues: 0, reduce: count },
  unique: { name: 'unique', minValues: 0, reduce: unique },
  n_unique: { name: 'n_unique', minValues: 0, reduce: nUnique },
  sum: { name: 'sum', minValues: 0, reduce: sum },
  min: { name: 'min', minValues: 1, reduce: min },
  max: { name: 'max', minValues: 1, reduce: max },
  median: { name: 'median', minValues: 1, reduce: median },
  var: { name: 'var', minValues: 2, reduce: variance },
  std: { name: 'std', minValues: 2, reduce: stdev },
}

/**
 * Check if a string names a built-in reducer
 */
export function isReducerName(name: string): name is ReducerName {
  return Object.prototype.hasOwnProperty.call(REDUCERS, name)
}

/**
 * Look up a built-in reducer by name
 *
 * @throws {UnknownReducerError} If the name is not in the table
 *
 * @example
 * ```typescript
 * getReducer('median').reduce([4, 1, 3]) // 3
 * ```
 */
export function getReducer(name: string): ReducerDefinition {
  if (!isReducerName(name)) {
    throw new UnknownReducerError(name, REDUCER_NAMES)
  }
  return REDUCERS[name]
}

/**
 * Resolves a reducer name or custom function.
 * Untyped callers may pass anything, so non-string, non-function specs are
 * rejected here.
 */
export function resolveReducer(spec: ReducerSpec | string): ResolvedReducer {
  if (typeof spec === 'function') {
    return { kind: 'custom', reduce: spec }
  }
  if (typeof spec === 'string') {
    return { kind: 'builtin', definition: getReducer(spec) }
  }
  throw new InvalidArgumentError(
    'reducer',
    spec,
    `must be a function or one of: ${REDUCER_NAMES.join(', ')}`
  )
}

/**
 * Applies a reducer to an already extracted list of values
 *
 * @throws {EmptyInputError} If a built-in reducer gets fewer values than it needs
 */
export function summariseValues(
  values: unknown[],
  spec: ReducerSpec | string,
  context?: Record<string, unknown>
): unknown {
  const resolved = resolveReducer(spec)
  if (resolved.kind === 'custom') {
    return resolved.reduce(values)
  }
  const { definition } = resolved
  if (values.length < definition.minValues) {
    throw new EmptyInputError(
      definition.name,
      definition.minValues,
      values.length,
      context
    )
  }
  return definition.reduce(values)
}

/**
 * Applies a reducer to the values found under `column`, skipping rows where
 * the column is absent.
 *
 * @example
 * ```typescript
 * summarise([{ a: 7 }, { a: 2, b: 7 }, { a: 3, b: 6 }], 'sum', 'b') // 13
 * summarise(rows, (values) => values.length * 2, 'b')
 * ```
 */
export function summarise(
  rows: Iterable<Row>,
  spec: ReducerSpec | string,
  column: string
): unknown {
  return summariseValues(columnValues(rows, column), spec, { column })
}

/**
 * Fewest values the reducer is defined for; custom reducers accept any input
 */
export function minimumValues(spec: ReducerSpec | string): number {
  const resolved = resolveReducer(spec)
  return resolved.kind === 'builtin' ? resolved.definition.minValues : 0
}
