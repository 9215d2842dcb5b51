import { bench, describe } from 'vitest'
import { Collection } from '../src/collection/index.js'
import { GroupPartitioner } from '../src/core/grouping/index.js'
import { generateSalesDataset } from './bench-helpers.js'

/**
 * Grouping and aggregation throughput.
 *
 * Partitioning is a single indexing pass, so time should grow linearly with
 * row count and with the number of Cartesian combinations.
 */

const datasets = {
  small: generateSalesDataset({ size: 1000 }),
  medium: generateSalesDataset({ size: 10000 }),
  large: generateSalesDataset({ size: 100000 }),
}

const partitioner = new GroupPartitioner()

describe('Partitioning', () => {
  for (const [name, rows] of Object.entries(datasets)) {
    describe(`${name} (${rows.length} rows)`, () => {
      bench('one key', () => {
        partitioner.partition(rows, ['region'])
      })

      bench('three keys', () => {
        partitioner.partition(rows, ['region', 'product', 'channel'])
      })
    })
  }
})

describe('Aggregation', () => {
  const collection = new Collection(datasets.medium)

  bench('ungrouped summary', () => {
    collection.agg({ total: ['units', 'sum'], avg: ['units', 'mean'] })
  })

  bench('grouped summary', () => {
    collection
      .groupBy('region', 'channel')
      .agg({ total: ['units', 'sum'], avg: ['units', 'mean'], products: ['product', 'n_unique'] })
  })

  bench('grouped transform', () => {
    collection.groupBy('region').transform({ regionUnits: ['units', 'sum'] })
  })
})
