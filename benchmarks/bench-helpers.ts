/**
 * Synthetic datasets for the grouping and join benchmarks
 */

export interface SaleRow {
  [key: string]: unknown
  orderId: number
  region: string
  product: string
  channel: string
  units: number
}

export interface ProductRow {
  [key: string]: unknown
  product: string
  price: number
  category: string
}

export interface SalesDatasetOptions {
  size: number
  regions?: number
  products?: number
  seed?: number
}

const CHANNELS = ['web', 'store', 'phone']

/**
 * Deterministic pseudo-random generator so runs are comparable
 */
function createRandom(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0
    return state / 2 ** 32
  }
}

export function generateSalesDataset(options: SalesDatasetOptions): SaleRow[] {
  const { size, regions = 8, products = 50, seed = 42 } = options
  const random = createRandom(seed)
  const rows: SaleRow[] = []
  for (let i = 0; i < size; i++) {
    rows.push({
      orderId: i,
      region: `region-${Math.floor(random() * regions)}`,
      product: `product-${Math.floor(random() * products)}`,
      channel: CHANNELS[Math.floor(random() * CHANNELS.length)],
      units: 1 + Math.floor(random() * 10),
    })
  }
  return rows
}

export function generateProductCatalog(products = 50): ProductRow[] {
  return Array.from({ length: products }, (_, i) => ({
    product: `product-${i}`,
    price: 5 + (i % 20) * 2.5,
    category: `category-${i % 5}`,
  }))
}
