export { Collection } from './collection.js'
export type { SortKey, ExplodeSpec } from './collection.js'
