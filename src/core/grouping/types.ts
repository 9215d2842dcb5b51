import type { Group, Row } from '../../types/row.js'

/**
 * Statistics about a partitioning pass.
 */
export interface GroupingStats {
  /** Total number of rows processed */
  totalRows: number
  /** Number of groups produced (size of the Cartesian product) */
  totalGroups: number
  /** Groups holding at least one row */
  observedGroups: number
  /** Groups synthesized from unobserved combinations */
  emptyGroups: number
  /** Rows missing at least one group key */
  unassignedRows: number
  /** Largest group size */
  maxGroupSize: number
}

/**
 * Output of {@link GroupPartitioner.partition}.
 */
export interface PartitionResult<R extends Row = Row> {
  /** One group per combination, in Cartesian enumeration order */
  groups: Group<R>[]
  /** Rows that lack one of the group keys, in input order */
  unassigned: R[]
  /** Summary of the pass */
  stats: GroupingStats
}
