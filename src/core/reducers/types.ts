/**
 * Reducer type definitions for the aggregation dispatcher
 * @module core/reducers/types
 */

/**
 * Built-in reducers, resolved through a static lookup table.
 *
 * - `mean` - Arithmetic mean
 * - `count` - Number of present values (not distinct)
 * - `unique` - Distinct values, first-occurrence order
 * - `n_unique` - Number of distinct values
 * - `sum` - Sum of numeric values (0 for no values)
 * - `min` - Smallest number or string
 * - `max` - Largest number or string
 * - `median` - Middle value, mean of the two middle values for even counts
 * - `var` - Sample variance (n - 1 denominator)
 * - `std` - Sample standard deviation
 */
export type ReducerName =
  | 'mean'
  | 'count'
  | 'unique'
  | 'n_unique'
  | 'sum'
  | 'min'
  | 'max'
  | 'median'
  | 'var'
  | 'std'

/**
 * Array of all built-in reducer names
 */
export const REDUCER_NAMES: readonly ReducerName[] = [
  'mean',
  'count',
  'unique',
  'n_unique',
  'sum',
  'min',
  'max',
  'median',
  'var',
  'std',
]

/**
 * A caller-supplied reducer. Receives the present values of a column.
 */
export type CustomReducer<R = unknown> = (values: unknown[]) => R

/**
 * Either a built-in reducer name or a custom reducer function
 */
export type ReducerSpec = ReducerName | CustomReducer

/**
 * Entry of the built-in reducer table
 */
export interface ReducerDefinition<R = unknown> {
  /** Reducer name */
  readonly name: ReducerName
  /** Fewest values the reducer is defined for */
  readonly minValues: number
  /** Computes the summary. Callers guarantee `values.length >= minValues`. */
  readonly reduce: (values: unknown[]) => R
}

/**
 * Outcome of resolving a {@link ReducerSpec}
 */
export type ResolvedReducer =
  | { kind: 'builtin'; definition: ReducerDefinition }
  | { kind: 'custom'; reduce: CustomReducer }

/**
 * One aggregation: the column to summarise and the reducer to apply
 *
 * @example
 * ```typescript
 * const spec: AggregationSpec = ['price', 'mean']
 * ```
 */
export type AggregationSpec = readonly [column: string, reducer: ReducerSpec]

/**
 * Named aggregations; each name becomes a key of the summary row
 */
export type AggregationSpecs = Readonly<Record<string, AggregationSpec>>
