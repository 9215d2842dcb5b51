import type { Logger } from '../utils/logger.js'
import type { GroupSpec } from './row.js'

/**
 * Options carried by a collection and inherited by every collection
 * derived from it.
 */
export interface CollectionOptions {
  /** Active group keys (default: ungrouped) */
  groups?: GroupSpec
  /** Logger handed to the engines (default: silent) */
  logger?: Logger
}

/**
 * Suffixes applied to colliding, non-mapped keys during a join merge.
 */
export interface JoinOptions {
  /** Appended to the left row's colliding keys */
  lsuffix: string
  /** Appended to the right row's colliding keys */
  rsuffix: string
}

/**
 * Default join suffixes: left keys keep their name, right keys get `_joined`.
 */
export const DEFAULT_JOIN_OPTIONS: Readonly<JoinOptions> = {
  lsuffix: '',
  rsuffix: '_joined',
}

/**
 * Number of items returned by head() and tail() when no count is given.
 */
export const DEFAULT_HEAD_SIZE = 5
