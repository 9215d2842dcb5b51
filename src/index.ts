// Main entry point
export { Collection } from './collection/index.js'
export type { SortKey, ExplodeSpec } from './collection/index.js'

// Types - Rows
export type {
  Row,
  GroupSpec,
  GroupKey,
  Group,
  JoinMapping,
} from './types/row.js'

// Types - Configuration
export type { CollectionOptions, JoinOptions } from './types/config.js'
export { DEFAULT_JOIN_OPTIONS, DEFAULT_HEAD_SIZE } from './types/config.js'

// Reducers
export {
  REDUCER_NAMES,
  isReducerName,
  getReducer,
  resolveReducer,
  summarise,
  summariseValues,
  minimumValues,
} from './core/reducers/index.js'
export type {
  ReducerName,
  CustomReducer,
  ReducerSpec,
  ReducerDefinition,
  ResolvedReducer,
  AggregationSpec,
  AggregationSpecs,
} from './core/reducers/index.js'

// Grouping
export { GroupPartitioner, cartesianProduct } from './core/grouping/index.js'
export type { GroupingStats, PartitionResult } from './core/grouping/index.js'

// Aggregation and transform
export {
  aggregateRows,
  summaryRow,
  validateAggregationSpecs,
  transformRows,
  groupJoinMapping,
} from './core/aggregate/index.js'

// Joins
export {
  joinRows,
  leftJoin,
  innerJoin,
  mergeRows,
  validateJoinArguments,
} from './core/join/index.js'
export type { JoinKind } from './core/join/index.js'

// IO adapters
export {
  parseCsv,
  readCsv,
  toCsv,
  writeCsv,
  parseJsonRows,
  parseJsonlRows,
  readJson,
  readJsonl,
  writeJson,
  writeJsonl,
} from './io/index.js'
export type { CsvParseOptions, CsvWriteOptions } from './io/index.js'

// Logging
export type { Logger, LogLevel, ConsoleLoggerOptions } from './utils/logger.js'
export {
  defaultLogger,
  createConsoleLogger,
  createSilentLogger,
  createVerbLogger,
} from './utils/logger.js'

// Equality
export {
  canonicalKey,
  valuesEqual,
  distinctValues,
  isPlainObject,
} from './utils/equality.js'

// Errors
export {
  RowsetError,
  TypeMismatchError,
  UnknownReducerError,
  EmptyInputError,
  InvalidArgumentError,
  NotGroupedError,
  isRowsetError,
} from './utils/errors.js'
