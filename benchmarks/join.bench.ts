import { bench, describe } from 'vitest'
import { innerJoin, leftJoin } from '../src/core/join/index.js'
import { generateProductCatalog, generateSalesDataset } from './bench-helpers.js'

/**
 * Join throughput. The right side is indexed once, so cost follows
 * left + right + matches rather than left × right.
 */

const catalog = generateProductCatalog(50)
const sales = {
  small: generateSalesDataset({ size: 1000 }),
  medium: generateSalesDataset({ size: 10000 }),
  large: generateSalesDataset({ size: 100000 }),
}

describe('Joins against a product catalog', () => {
  for (const [name, rows] of Object.entries(sales)) {
    describe(`${name} (${rows.length} rows)`, () => {
      bench('left join', () => {
        leftJoin(rows, catalog, { product: 'product' })
      })

      bench('inner join', () => {
        innerJoin(rows, catalog, { product: 'product' })
      })
    })
  }
})

describe('Self join with suffixes', () => {
  const rows = sales.small

  bench('inner join on region', () => {
    innerJoin(rows.slice(0, 200), rows.slice(0, 200), { region: 'region' }, { lsuffix: '_a', rsuffix: '_b' })
  })
})
