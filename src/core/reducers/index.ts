/**
 * Aggregation dispatcher - reducer table and resolution
 * @module core/reducers
 */

export type {
  ReducerName,
  CustomReducer,
  ReducerSpec,
  ReducerDefinition,
  ResolvedReducer,
  AggregationSpec,
  AggregationSpecs,
} from './types.js'
export { REDUCER_NAMES } from './types.js'

export {
  isReducerName,
  getReducer,
  resolveReducer,
  summarise,
  summariseValues,
  minimumValues,
} from './reducer-table.js'
