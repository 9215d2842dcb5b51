export {
  aggregateRows,
  summaryRow,
  validateAggregationSpecs,
} from './aggregate-engine.js'
export { transformRows, groupJoinMapping } from './transform-engine.js'
