import type { Group, GroupKey, GroupSpec, Row } from '../../types/row.js'
import type { GroupingStats, PartitionResult } from './types.js'
import type { Logger } from '../../utils/logger.js'
import { createSilentLogger } from '../../utils/logger.js'
import { distinctValues, tupleKey } from '../../utils/equality.js'
import { columnValues, hasKey, setKey } from '../../utils/row.js'

/**
 * Cartesian product of value lists; the first list varies slowest.
 * An empty list of lists yields a single empty tuple.
 */
export function cartesianProduct(lists: readonly (readonly unknown[])[]): unknown[][] {
  let product: unknown[][] = [[]]
  for (const list of lists) {
    const next: unknown[][] = []
    for (const prefix of product) {
      for (const value of list) {
        next.push([...prefix, value])
      }
    }
    product = next
  }
  return product
}

/**
 * Splits rows into groups by the active group keys.
 *
 * Groups are enumerated from the Cartesian product of each key's distinct
 * values, not from the combinations actually observed. A combination that
 * no row carries therefore yields an empty group, and aggregating it runs
 * reducers over empty input. This is intentional and reported through the
 * logger.
 *
 * Rows are indexed in a single pass by their tuple of key values, so the
 * cost is O(rows × keys + combinations).
 *
 * @example
 * ```typescript
 * const partitioner = new GroupPartitioner()
 * const { groups } = partitioner.partition(
 *   [{ a: 1, b: 'x' }, { a: 2, b: 'y' }],
 *   ['a', 'b']
 * )
 * // four groups: (1,x) (1,y) (2,x) (2,y); two of them empty
 * ```
 */
export class GroupPartitioner {
  private readonly logger: Logger

  constructor(logger: Logger = createSilentLogger()) {
    this.logger = logger
  }

  /**
   * Distinct values observed under `key`, first-occurrence order.
   * Rows without the key are skipped.
   */
  distinctValues(rows: readonly Row[], key: string): unknown[] {
    return distinctValues(columnValues(rows, key))
  }

  /**
   * Every combination of distinct group key values.
   */
  combinations(rows: readonly Row[], keys: GroupSpec): GroupKey[] {
    const valueSets = keys.map((key) => this.distinctValues(rows, key))
    return cartesianProduct(valueSets).map((values) => toGroupKey(keys, values))
  }

  /**
   * Partitions rows into one group per combination of group key values.
   */
  partition<R extends Row>(rows: readonly R[], keys: GroupSpec): PartitionResult<R> {
    const index = new Map<string, R[]>()
    const unassigned: R[] = []

    for (const row of rows) {
      if (!keys.every((key) => hasKey(row, key))) {
        unassigned.push(row)
        continue
      }
      const rowKey = tupleKey(keys.map((key) => row[key]))
      const bucket = index.get(rowKey)
      if (bucket) {
        bucket.push(row)
      } else {
        index.set(rowKey, [row])
      }
    }

    const groups: Group<R>[] = this.combinations(rows, keys).map((key) => ({
      key,
      rows: index.get(tupleKey(keys.map((k) => key[k]))) ?? [],
    }))

    const stats = this.calculateStats(groups, rows.length, unassigned.length)
    this.logger.debug('Partitioned rows', { keys: [...keys], ...stats })
    if (stats.emptyGroups > 0) {
      this.logger.warn(
        `${stats.emptyGroups} of ${stats.totalGroups} groups have no rows; reducers will run on empty input`,
        { keys: [...keys] }
      )
    }

    return { groups, unassigned, stats }
  }

  /**
   * Calculates statistics for a set of groups.
   */
  calculateStats(
    groups: readonly Group<Row>[],
    totalRows: number,
    unassignedRows = 0
  ): GroupingStats {
    const sizes = groups.map((group) => group.rows.length)
    const observedGroups = sizes.filter((size) => size > 0).length
    return {
      totalRows,
      totalGroups: groups.length,
      observedGroups,
      emptyGroups: groups.length - observedGroups,
      unassignedRows,
      maxGroupSize: sizes.reduce((largest, size) => Math.max(largest, size), 0),
    }
  }
}

function toGroupKey(keys: GroupSpec, values: readonly unknown[]): GroupKey {
  const key: Row = {}
  keys.forEach((name, i) => {
    setKey(key, name, values[i])
  })
  return key
}
