/**
 * A single record: a mapping from field name to value.
 * Rows are treated as immutable; verbs always build new rows.
 */
export type Row = Record<string, unknown>

/**
 * The tuple of field names a collection is currently grouped by.
 * An empty tuple means the collection is ungrouped.
 */
export type GroupSpec = readonly string[]

/**
 * Left-field to right-field equality correspondence used to match rows
 * across two collections.
 */
export type JoinMapping = Readonly<Record<string, string>>

/**
 * One combination of group key values, keyed by group field name.
 */
export type GroupKey = Readonly<Row>

/**
 * A transient partition of rows sharing one combination of group key values.
 * May be empty when the combination was never observed.
 */
export interface Group<R extends Row = Row> {
  /** The group key values for this partition */
  key: GroupKey
  /** Rows whose values under every group key equal `key` */
  rows: readonly R[]
}
