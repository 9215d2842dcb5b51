/**
 * Split-apply-combine aggregation
 * @module core/aggregate/aggregate-engine
 */

import type { GroupSpec, Row } from '../../types/row.js'
import type { AggregationSpecs } from '../reducers/types.js'
import { resolveReducer, summariseValues } from '../reducers/reducer-table.js'
import { GroupPartitioner } from '../grouping/group-partitioner.js'
import type { Logger } from '../../utils/logger.js'
import { createSilentLogger } from '../../utils/logger.js'
import { InvalidArgumentError } from '../../utils/errors.js'
import { isPlainObject } from '../../utils/equality.js'
import { columnValues, setKey } from '../../utils/row.js'

/**
 * Validates named aggregation specs before any work is done
 *
 * @throws {InvalidArgumentError} If a spec is not a `[column, reducer]` pair
 * @throws {UnknownReducerError} If a reducer name is not in the table
 */
export function validateAggregationSpecs(specs: AggregationSpecs): void {
  if (!isPlainObject(specs)) {
    throw new InvalidArgumentError('specs', specs, 'must be an object of name to [column, reducer]')
  }
  for (const [name, spec] of Object.entries(specs)) {
    if (!Array.isArray(spec) || spec.length !== 2) {
      throw new InvalidArgumentError(name, spec, 'must be a [column, reducer] pair')
    }
    const [column, reducer] = spec
    if (typeof column !== 'string') {
      throw new InvalidArgumentError(name, spec, 'column must be a string')
    }
    resolveReducer(reducer)
  }
}

/**
 * One summary row: each spec name mapped to its reducer's result over `rows`
 */
export function summaryRow(rows: readonly Row[], specs: AggregationSpecs): Row {
  const summary: Row = {}
  for (const [name, [column, reducer]] of Object.entries(specs)) {
    setKey(
      summary,
      name,
      summariseValues(columnValues(rows, column), reducer, {
        column,
        aggregation: name,
      })
    )
  }
  return summary
}

/**
 * Aggregates rows, once overall or once per group.
 *
 * Ungrouped, the result is a single summary row. Grouped, there is one row
 * per group in Cartesian enumeration order holding the group key values
 * followed by the summaries. Empty groups are summarised over empty input,
 * so reducers that need values throw {@link EmptyInputError} for them.
 *
 * @example
 * ```typescript
 * aggregateRows(
 *   [{ c: 'a', v: 1 }, { c: 'b', v: 2 }, { c: 'a', v: 3 }],
 *   ['c'],
 *   { total: ['v', 'sum'] }
 * )
 * // [{ c: 'a', total: 4 }, { c: 'b', total: 2 }]
 * ```
 */
export function aggregateRows(
  rows: readonly Row[],
  groups: GroupSpec,
  specs: AggregationSpecs,
  logger: Logger = createSilentLogger()
): Row[] {
  validateAggregationSpecs(specs)

  if (groups.length === 0) {
    return [summaryRow(rows, specs)]
  }

  const partitioner = new GroupPartitioner(logger)
  const { groups: partitions } = partitioner.partition(rows, groups)
  return partitions.map((group) => ({
    ...group.key,
    ...summaryRow(group.rows, specs),
  }))
}
