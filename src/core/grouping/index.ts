export { GroupPartitioner, cartesianProduct } from './group-partitioner.js'
export type { GroupingStats, PartitionResult } from './types.js'
