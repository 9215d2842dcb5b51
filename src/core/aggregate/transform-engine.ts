import type { GroupSpec, JoinMapping, Row } from '../../types/row.js'
import type { AggregationSpecs } from '../reducers/types.js'
import { DEFAULT_JOIN_OPTIONS } from '../../types/config.js'
import { aggregateRows } from './aggregate-engine.js'
import { leftJoin } from '../join/join-engine.js'
import type { Logger } from '../../utils/logger.js'
import { createSilentLogger } from '../../utils/logger.js'
import { NotGroupedError } from '../../utils/errors.js'

/**
 * Maps every group key to itself
 */
export function groupJoinMapping(groups: GroupSpec): JoinMapping {
  return Object.fromEntries(groups.map((key) => [key, key]))
}

/**
 * Annotates every row with the aggregates of its group.
 *
 * Runs the grouped aggregation, then left-joins the summaries back onto the
 * original rows on the group keys. Output order and length match the input;
 * a row lacking a group key matches no summary and passes through unchanged.
 *
 * @throws {NotGroupedError} If no group keys are given
 */
export function transformRows(
  rows: readonly Row[],
  groups: GroupSpec,
  specs: AggregationSpecs,
  logger: Logger = createSilentLogger()
): Row[] {
  if (groups.length === 0) {
    throw new NotGroupedError('transform')
  }
  const summaries = aggregateRows(rows, groups, specs, logger)
  return leftJoin(rows, summaries, groupJoinMapping(groups), DEFAULT_JOIN_OPTIONS, logger)
}
