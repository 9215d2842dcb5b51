/**
 * Join and Transform Example
 *
 * Demonstrates:
 * - Left and inner joins with suffixes for colliding columns
 * - Annotating rows with group aggregates via transform
 * - Reading and writing CSV and JSON Lines files
 * - Surfacing engine diagnostics through a logger
 */

import { mkdtempSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  Collection,
  createConsoleLogger,
  readCsv,
  readJsonl,
  writeCsv,
  writeJsonl,
  isRowsetError,
} from '../src/index.js'

const orders = [
  { orderId: 1, customerId: 10, amount: 40, note: 'gift' },
  { orderId: 2, customerId: 11, amount: 15, note: 'rush' },
  { orderId: 3, customerId: 10, amount: 25, note: 'none' },
  { orderId: 4, customerId: 99, amount: 5, note: 'none' },
]

const customers = [
  { id: 10, name: 'Ada', note: 'vip' },
  { id: 11, name: 'Grace', note: 'new' },
]

const directory = mkdtempSync(join(tmpdir(), 'rowset-example-'))

try {
  console.log('=== Joins ===')
  const orderCollection = new Collection(orders, { logger: createConsoleLogger({ level: 'debug' }) })

  const everyOrder = orderCollection.leftJoin(customers, { customerId: 'id' })
  console.log('Left join keeps order 4 without a customer:')
  console.log(everyOrder.collect())

  const knownCustomers = orderCollection.innerJoin(customers, { customerId: 'id' }, '_order', '_customer')
  console.log('Inner join with custom suffixes:')
  console.log(knownCustomers.select('orderId', 'name', 'note_order', 'note_customer').collect())

  console.log('\n=== Transform ===')
  const shares = orderCollection
    .groupBy('customerId')
    .transform({ customerTotal: ['amount', 'sum'] })
    .mutate({ share: (d) => Number(d.amount) / Number(d.customerTotal) })
    .ungroup()
  console.log(shares.select('orderId', 'customerId', 'share').collect())

  console.log('\n=== Files ===')
  const csvPath = join(directory, 'orders.csv')
  writeCsv(csvPath, shares)
  const reloaded = readCsv(csvPath, { parseNumbers: true })
  console.log(`Reloaded ${reloaded.length} rows with columns: ${reloaded.keys().join(', ')}`)

  const jsonlPath = join(directory, 'customers.jsonl')
  writeJsonl(jsonlPath, customers)
  console.log(readJsonl(jsonlPath).unique('name'))

  console.log('\n=== Errors ===')
  try {
    orderCollection.transform({ total: ['amount', 'sum'] })
  } catch (error) {
    if (isRowsetError(error)) {
      console.log(`${error.code}: ${error.message}`)
    } else {
      throw error
    }
  }
} finally {
  rmSync(directory, { recursive: true, force: true })
}
