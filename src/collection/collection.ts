/**
 * Chainable verbs over an ordered sequence of rows
 * @module collection/collection
 */

import { v4 as uuidv4 } from 'uuid'
import type { GroupSpec, JoinMapping, Row } from '../types/row.js'
import type { CollectionOptions } from '../types/config.js'
import { DEFAULT_HEAD_SIZE, DEFAULT_JOIN_OPTIONS } from '../types/config.js'
import type {
  AggregationSpecs,
  CustomReducer,
  ReducerName,
  ReducerSpec,
} from '../core/reducers/types.js'
import { getReducer, summarise } from '../core/reducers/reducer-table.js'
import { sum, mean, median, variance, stdev, min, max } from '../core/reducers/numeric-reducers.js'
import { unique, nUnique } from '../core/reducers/set-reducers.js'
import { GroupPartitioner, cartesianProduct } from '../core/grouping/group-partitioner.js'
import { aggregateRows } from '../core/aggregate/aggregate-engine.js'
import { transformRows } from '../core/aggregate/transform-engine.js'
import { joinRows } from '../core/join/join-engine.js'
import type { JoinKind } from '../core/join/join-engine.js'
import type { Logger } from '../utils/logger.js'
import { createSilentLogger, createVerbLogger } from '../utils/logger.js'
import {
  EmptyInputError,
  NotGroupedError,
  TypeMismatchError,
  requireNonNegativeInteger,
  requireRows,
  requireString,
} from '../utils/errors.js'
import { columnValues, hasKey, isRow, setKey } from '../utils/row.js'

/**
 * Value returned by a sort key function
 */
export type SortKey = number | string

/**
 * Explode argument: a column name, or an object of new name to source column
 */
export type ExplodeSpec = string | Readonly<Record<string, string>>

function compareSortKeys(a: SortKey, b: SortKey): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a < b ? -1 : a > b ? 1 : 0
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0
  }
  throw new TypeMismatchError('sort', 'keys of one type (all numbers or all strings)', b)
}

/**
 * An ordered, immutable sequence of items with an optional group spec.
 *
 * Every verb returns a new collection; neither the collection nor its rows
 * are modified. The group spec set by {@link Collection.groupBy} changes how
 * group-aware verbs (`agg`, `transform`, `mutate`, `sort`) behave and is
 * inherited by derived collections until {@link Collection.ungroup}.
 *
 * @typeParam T - Item type; most verbs need rows (plain objects)
 *
 * @example
 * ```typescript
 * const summary = new Collection([
 *   { team: 'red', score: 3 },
 *   { team: 'blue', score: 5 },
 *   { team: 'red', score: 4 },
 * ])
 *   .groupBy('team')
 *   .agg({ total: ['score', 'sum'], games: ['score', 'count'] })
 *   .collect()
 * // [{ team: 'red', total: 7, games: 2 }, { team: 'blue', total: 5, games: 1 }]
 * ```
 */
export class Collection<T = Row> implements Iterable<T> {
  /** Random identifier shown by toString() */
  readonly id: string

  /** Active group keys; empty when ungrouped */
  readonly groups: GroupSpec

  private readonly items: readonly T[]
  private readonly logger: Logger

  constructor(items: Iterable<T> = [], options: CollectionOptions = {}) {
    this.items = Array.from(items)
    this.groups = Object.freeze([...(options.groups ?? [])])
    this.logger = options.logger ?? createSilentLogger()
    this.id = uuidv4()
  }

  /**
   * Creates a collection from any iterable
   */
  static from<T>(items: Iterable<T>, options?: CollectionOptions): Collection<T> {
    return new Collection(items, options)
  }

  get length(): number {
    return this.items.length
  }

  get isGrouped(): boolean {
    return this.groups.length > 0
  }

  /**
   * True when every item is a row
   */
  get onlyHasRows(): boolean {
    return this.items.every((item) => isRow(item))
  }

  /**
   * Options that derived collections inherit
   */
  get options(): CollectionOptions {
    return { groups: this.groups, logger: this.logger }
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]()
  }

  toString(): string {
    return `<Collection groups=[${this.groups.join(', ')}] len=${this.length} @${this.id}>`
  }

  private createNew<U>(items: Iterable<U>, groups: GroupSpec = this.groups): Collection<U> {
    return new Collection(items, { groups, logger: this.logger })
  }

  private rows(operation: string): readonly (T & Row)[] {
    return requireRows(this.items, operation)
  }

  private scoped(operation: string): Logger {
    return createVerbLogger(operation, this.logger, {
      groups: [...this.groups],
      items: this.items.length,
    })
  }

  /**
   * Applies `apply` to each group and concatenates the results in group
   * order. Rows missing a group key are processed last as one partition.
   */
  private perGroup<U>(operation: string, apply: (items: (T & Row)[]) => U[]): Collection<U> {
    const partitioner = new GroupPartitioner(this.scoped(operation))
    const { groups, unassigned } = partitioner.partition(this.rows(operation), this.groups)
    const result = groups.flatMap((group) => apply([...group.rows]))
    if (unassigned.length > 0) {
      result.push(...apply(unassigned))
    }
    return this.createNew(result)
  }

  // ==================== GROUPING ====================

  /**
   * Sets the group keys, replacing any previous grouping.
   *
   * @example
   * ```typescript
   * collection.groupBy('country', 'year').agg({ n: ['id', 'count'] })
   * ```
   */
  groupBy(...keys: string[]): Collection<T> {
    keys.forEach((key, i) => requireString(key, `keys[${i}]`))
    return this.createNew(this.items, keys)
  }

  /**
   * Removes all grouping
   */
  ungroup(): Collection<T> {
    return this.createNew(this.items, [])
  }

  /**
   * Summarises the collection: one row overall, or one row per group when
   * grouped. Each spec name becomes a key holding `reducer(values of column)`.
   *
   * Groups come from the Cartesian product of each key's distinct values,
   * so unobserved combinations produce summaries over no rows. Reducers that
   * need values (mean, min, max, median, var, std) throw for those.
   *
   * @throws {TypeMismatchError} If the collection holds non-row items
   * @throws {UnknownReducerError} If a reducer name is not in the table
   * @throws {EmptyInputError} If a reducer gets fewer values than it needs
   *
   * @example
   * ```typescript
   * new Collection([{ a: 1, b: 2 }, { a: 2, b: 3 }, { a: 3 }])
   *   .agg({ mean_a: ['a', 'mean'], max_b: ['b', 'max'] })
   *   .collect()
   * // [{ mean_a: 2, max_b: 3 }]
   * ```
   */
  agg(specs: AggregationSpecs): Collection<Row> {
    const rows = this.rows('agg')
    return this.createNew(aggregateRows(rows, this.groups, specs, this.scoped('agg')))
  }

  /**
   * Like {@link Collection.agg}, but keeps every row and adds the group's
   * summaries to it instead of reducing.
   *
   * @throws {NotGroupedError} If the collection is not grouped
   * @throws {TypeMismatchError} If the collection holds non-row items
   *
   * @example
   * ```typescript
   * new Collection([{ a: 1, b: 1 }, { a: 1, b: 2 }, { a: 2, b: 5 }])
   *   .groupBy('a')
   *   .transform({ b_sum: ['b', 'sum'] })
   *   .collect()
   * // [{ a: 1, b: 1, b_sum: 3 }, { a: 1, b: 2, b_sum: 3 }, { a: 2, b: 5, b_sum: 5 }]
   * ```
   */
  transform(specs: AggregationSpecs): Collection<Row> {
    if (!this.isGrouped) {
      throw new NotGroupedError('transform')
    }
    const rows = this.rows('transform')
    return this.createNew(transformRows(rows, this.groups, specs, this.scoped('transform')))
  }

  // ==================== JOINS ====================

  private join(
    kind: JoinKind,
    other: Iterable<unknown>,
    mapping: JoinMapping,
    lsuffix: string,
    rsuffix: string
  ): Collection<Row> {
    const operation = kind === 'left' ? 'leftJoin' : 'innerJoin'
    const left = this.rows(operation)
    const right = requireRows(Array.from(other), operation)
    return this.createNew(
      joinRows(left, right, mapping, kind, { lsuffix, rsuffix }, this.scoped(operation))
    )
  }

  /**
   * Left join: every row of this collection appears once per matching row of
   * `other`, or once unmerged when nothing matches.
   *
   * Keys present on both sides that are not in `mapping` are suffixed with
   * `lsuffix` and `rsuffix`. Mapped keys are never suffixed.
   *
   * @example
   * ```typescript
   * orders.leftJoin(customers, { customerId: 'id' })
   * ```
   */
  leftJoin(
    other: Iterable<unknown>,
    mapping: JoinMapping,
    lsuffix: string = DEFAULT_JOIN_OPTIONS.lsuffix,
    rsuffix: string = DEFAULT_JOIN_OPTIONS.rsuffix
  ): Collection<Row> {
    return this.join('left', other, mapping, lsuffix, rsuffix)
  }

  /**
   * Inner join: one merged row per matching pair; unmatched rows are dropped.
   */
  innerJoin(
    other: Iterable<unknown>,
    mapping: JoinMapping,
    lsuffix: string = DEFAULT_JOIN_OPTIONS.lsuffix,
    rsuffix: string = DEFAULT_JOIN_OPTIONS.rsuffix
  ): Collection<Row> {
    return this.join('inner', other, mapping, lsuffix, rsuffix)
  }

  // ==================== COLUMN SUMMARIES ====================

  /**
   * Applies a reducer to the values under `column`, skipping rows without it.
   * Ignores groups and returns the raw result rather than a collection.
   *
   * @throws {UnknownReducerError} If a reducer name is not in the table
   * @throws {EmptyInputError} If a built-in reducer gets fewer values than it needs
   */
  summariseCol<R>(reducer: CustomReducer<R>, column: string): R
  summariseCol(reducer: ReducerName | string, column: string): unknown
  summariseCol(reducer: ReducerSpec | string, column: string): unknown {
    return summarise(this.rows('summariseCol'), reducer, column)
  }

  /**
   * Present values of `column`, or undefined when there are fewer than the
   * reducer needs
   */
  private sufficientValues(reducer: ReducerName, column: string): unknown[] | undefined {
    const values = columnValues(this.rows(reducer), column)
    return values.length >= getReducer(reducer).minValues ? values : undefined
  }

  /** Sum of `column`; 0 when no row has it */
  sum(column: string): number {
    return sum(columnValues(this.rows('sum'), column))
  }

  /** Mean of `column`; undefined when no row has it */
  mean(column: string): number | undefined {
    const values = this.sufficientValues('mean', column)
    return values === undefined ? undefined : mean(values)
  }

  /** Number of rows that have `column` */
  count(column: string): number {
    return columnValues(this.rows('count'), column).length
  }

  /** Number of distinct values of `column` */
  nUnique(column: string): number {
    return nUnique(columnValues(this.rows('n_unique'), column))
  }

  /** Distinct values of `column` in first-occurrence order */
  unique(column: string): unknown[] {
    return unique(columnValues(this.rows('unique'), column))
  }

  /** Smallest value of `column`; undefined when no row has it */
  min(column: string): number | string | undefined {
    const values = this.sufficientValues('min', column)
    return values === undefined ? undefined : min(values)
  }

  /** Largest value of `column`; undefined when no row has it */
  max(column: string): number | string | undefined {
    const values = this.sufficientValues('max', column)
    return values === undefined ? undefined : max(values)
  }

  /** Median of `column`; undefined when no row has it */
  median(column: string): number | undefined {
    const values = this.sufficientValues('median', column)
    return values === undefined ? undefined : median(values)
  }

  /** Sample variance of `column`; undefined for fewer than two values */
  var(column: string): number | undefined {
    const values = this.sufficientValues('var', column)
    return values === undefined ? undefined : variance(values)
  }

  /** Sample standard deviation of `column`; undefined for fewer than two values */
  std(column: string): number | undefined {
    const values = this.sufficientValues('std', column)
    return values === undefined ? undefined : stdev(values)
  }

  // ==================== SEQUENCE VERBS ====================

  /**
   * Keeps the items for which every predicate returns true
   *
   * @example
   * ```typescript
   * collection.keep((d) => d.a >= 3, (d) => d.b !== undefined)
   * ```
   */
  keep(...predicates: Array<(item: T) => boolean>): Collection<T> {
    return this.createNew(
      this.items.filter((item) => predicates.every((predicate) => predicate(item)))
    )
  }

  /**
   * First `n` items
   *
   * @throws {InvalidArgumentError} If n is not a non-negative integer
   */
  head(n: number = DEFAULT_HEAD_SIZE): Collection<T> {
    const size = requireNonNegativeInteger(n, 'n')
    return this.createNew(this.items.slice(0, size))
  }

  /**
   * Last `n` items
   *
   * @throws {InvalidArgumentError} If n is not a non-negative integer
   */
  tail(n: number = DEFAULT_HEAD_SIZE): Collection<T> {
    const size = requireNonNegativeInteger(n, 'n')
    return this.createNew(this.items.slice(Math.max(this.items.length - size, 0)))
  }

  /**
   * Keeps only the given keys of every row. Keys a row lacks are skipped.
   */
  select(...keys: string[]): Collection<Row> {
    return this.createNew(
      this.rows('select').map((row) => {
        const selected: Row = {}
        for (const key of keys) {
          if (hasKey(row, key)) {
            setKey(selected, key, row[key])
          }
        }
        return selected
      })
    )
  }

  /**
   * Removes the given keys from every row
   */
  drop(...keys: string[]): Collection<Row> {
    const dropped = new Set(keys)
    return this.createNew(
      this.rows('drop').map((row) =>
        Object.fromEntries(Object.entries(row).filter(([key]) => !dropped.has(key)))
      )
    )
  }

  /**
   * Adds or overrides keys. Functions run in order and each one sees the
   * keys set by the previous ones. Group-aware: when grouped, rows come out
   * ordered by group.
   *
   * @example
   * ```typescript
   * collection.mutate({
   *   c: (d) => Number(d.a) + Number(d.b),
   *   double_c: (d) => Number(d.c) * 2,
   * })
   * ```
   */
  mutate(fns: Readonly<Record<string, (row: Row) => unknown>>): Collection<Row> {
    const apply = (rows: readonly Row[]): Row[] =>
      rows.map((row) => {
        const next: Row = { ...row }
        for (const [key, fn] of Object.entries(fns)) {
          setKey(next, key, fn(next))
        }
        return next
      })

    if (this.isGrouped) {
      return this.perGroup<Row>('mutate', apply)
    }
    return this.createNew(apply(this.rows('mutate')))
  }

  /**
   * Stable sort by a key function. Group-aware: when grouped, each group is
   * sorted separately and groups keep their enumeration order.
   *
   * @throws {TypeMismatchError} If keys mix numbers and strings
   */
  sort(key: (item: T) => SortKey, reverse = false): Collection<T> {
    const sortItems = <U extends T>(items: readonly U[]): U[] =>
      items
        .map((item) => ({ item, sortKey: key(item) }))
        .sort((a, b) => {
          const order = compareSortKeys(a.sortKey, b.sortKey)
          return reverse ? -order : order
        })
        .map(({ item }) => item)

    if (this.isGrouped) {
      return this.perGroup<T>('sort', (items) => sortItems(items))
    }
    return this.createNew(sortItems(this.items))
  }

  /**
   * Maps every item through `fn`. For rows, {@link Collection.mutate} is
   * usually the better fit.
   */
  map<U>(fn: (item: T) => U): Collection<U> {
    return this.createNew(this.items.map((item) => fn(item)))
  }

  /**
   * All keys across rows in first-occurrence order, or only the keys every
   * row has when `overlap` is true.
   *
   * @example
   * ```typescript
   * new Collection([{ a: 1, b: 2 }, { a: 2, c: 3 }]).keys() // ['a', 'b', 'c']
   * new Collection([{ a: 1, b: 2 }, { a: 2, c: 3 }]).keys(true) // ['a']
   * ```
   */
  keys(overlap = false): string[] {
    const rows = this.rows('keys')
    if (overlap) {
      if (rows.length === 0) return []
      return Object.keys(rows[0]).filter((key) => rows.every((row) => hasKey(row, key)))
    }
    const seen = new Set<string>()
    for (const row of rows) {
      for (const key of Object.keys(row)) {
        seen.add(key)
      }
    }
    return [...seen]
  }

  /**
   * Turns array values into one row per element. With several columns,
   * every combination of their elements is produced. A plain column name
   * keeps its name; `{ newName: column }` renames and drops the source.
   *
   * @throws {TypeMismatchError} If a row lacks an array under an exploded column
   *
   * @example
   * ```typescript
   * new Collection([{ a: 1, items: [1, 2] }]).explode('items').collect()
   * // [{ a: 1, items: 1 }, { a: 1, items: 2 }]
   * new Collection([{ a: 1, items: [1, 2] }]).explode({ item: 'items' }).collect()
   * // [{ a: 1, item: 1 }, { a: 1, item: 2 }]
   * ```
   */
  explode(...specs: ExplodeSpec[]): Collection<Row> {
    const renames: Record<string, string> = {}
    for (const spec of specs) {
      if (typeof spec === 'string') {
        setKey(renames, spec, spec)
      } else {
        for (const [target, source] of Object.entries(spec)) {
          setKey(renames, target, source)
        }
      }
    }
    const targets = Object.keys(renames)
    const sources = Object.values(renames)
    const targetSet = new Set(targets)
    const removed = sources.filter((source) => !targetSet.has(source))

    const result: Row[] = []
    for (const row of this.rows('explode')) {
      const lists = sources.map((source) => {
        const value = row[source]
        if (!hasKey(row, source) || !Array.isArray(value)) {
          throw new TypeMismatchError('explode', `an array under '${source}'`, value)
        }
        return value
      })
      for (const combination of cartesianProduct(lists)) {
        const next: Row = { ...row }
        targets.forEach((target, i) => {
          setKey(next, target, combination[i])
        })
        for (const source of removed) {
          delete next[source]
        }
        result.push(next)
      }
    }
    return this.createNew(result)
  }

  /**
   * Folds the collection with each function, producing a single row whose
   * keys are the function names. Folds start from the first item.
   *
   * @throws {EmptyInputError} If the collection is empty
   *
   * @example
   * ```typescript
   * new Collection([1, 2, 3, 4, 5])
   *   .reduce({ sum: (x, y) => x + y, max: (x, y) => Math.max(x, y) })
   *   .collect()
   * // [{ sum: 15, max: 5 }]
   * ```
   */
  reduce(fns: Readonly<Record<string, (accumulator: T, item: T) => T>>): Collection<Row> {
    if (this.items.length === 0) {
      throw new EmptyInputError('reduce', 1, 0)
    }
    const [first, ...rest] = this.items
    const reduced: Row = {}
    for (const [name, fn] of Object.entries(fns)) {
      setKey(
        reduced,
        name,
        rest.reduce((accumulator, item) => fn(accumulator, item), first)
      )
    }
    return this.createNew([reduced])
  }

  /**
   * Passes this collection to `fn` so custom steps can sit in a chain
   *
   * @example
   * ```typescript
   * const removeOutliers = (c: Collection, low: number, high: number) =>
   *   c.keep((d) => Number(d.a) >= low && Number(d.a) <= high)
   * collection.pipe(removeOutliers, 10, 90)
   * ```
   */
  pipe<R, A extends unknown[]>(fn: (collection: Collection<T>, ...args: A) => R, ...args: A): R {
    return fn(this, ...args)
  }

  /**
   * Concatenates this collection with others. The result is ungrouped.
   */
  concat(...others: Iterable<T>[]): Collection<T> {
    const items = [...this.items]
    for (const other of others) {
      items.push(...other)
    }
    return this.createNew(items, [])
  }

  /**
   * The items as a new array
   */
  collect(): T[] {
    return [...this.items]
  }

  /**
   * A new collection over the same items and options
   */
  copy(): Collection<T> {
    return this.createNew(this.items)
  }
}
