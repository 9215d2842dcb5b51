/**
 * Left and inner joins over row sequences
 * @module core/join/join-engine
 */

import type { JoinMapping, Row } from '../../types/row.js'
import type { JoinOptions } from '../../types/config.js'
import { DEFAULT_JOIN_OPTIONS } from '../../types/config.js'
import type { Logger } from '../../utils/logger.js'
import { createSilentLogger } from '../../utils/logger.js'
import { tupleKey } from '../../utils/equality.js'
import { hasKey, setKey } from '../../utils/row.js'
import { InvalidArgumentError, requireString } from '../../utils/errors.js'

/**
 * Join semantics: `left` keeps unmatched left rows, `inner` drops them
 */
export type JoinKind = 'left' | 'inner'

/**
 * Validates a join mapping and resolved suffixes
 *
 * @throws {InvalidArgumentError} If the mapping is not an object of strings or a suffix is not a string
 */
export function validateJoinArguments(
  mapping: JoinMapping,
  options: JoinOptions
): void {
  if (typeof mapping !== 'object' || mapping === null || Array.isArray(mapping)) {
    throw new InvalidArgumentError('mapping', mapping, 'must be an object of left key to right key')
  }
  for (const [leftKey, rightKey] of Object.entries(mapping)) {
    if (typeof rightKey !== 'string') {
      throw new InvalidArgumentError(
        'mapping',
        mapping,
        `right key for '${leftKey}' must be a string`
      )
    }
  }
  requireString(options.lsuffix, 'lsuffix')
  requireString(options.rsuffix, 'rsuffix')
}

/**
 * Merges two matched rows.
 *
 * Keys present in both rows that are not part of the mapping (as a left or
 * a right key) are renamed with `lsuffix` on the left copy and `rsuffix` on
 * the right copy. Mapped keys are never suffixed and keep the left row's
 * value.
 *
 * @example
 * ```typescript
 * mergeRows({ id: 1, x: 'a' }, { id: 1, x: 'b' }, { id: 'id' }, '', '_joined')
 * // { id: 1, x: 'a', x_joined: 'b' }
 * ```
 */
export function mergeRows(
  left: Row,
  right: Row,
  mapping: JoinMapping,
  lsuffix: string,
  rsuffix: string
): Row {
  const mappedKeys = new Set<string>([
    ...Object.keys(mapping),
    ...Object.values(mapping),
  ])
  const collides = (key: string) =>
    !mappedKeys.has(key) && hasKey(left, key) && hasKey(right, key)

  const merged: Row = {}
  for (const [key, value] of Object.entries(left)) {
    setKey(merged, collides(key) ? key + lsuffix : key, value)
  }
  for (const [key, value] of Object.entries(right)) {
    setKey(merged, collides(key) ? key + rsuffix : key, value)
  }
  for (const key of Object.keys(mapping)) {
    if (hasKey(left, key)) {
      setKey(merged, key, left[key])
    }
  }
  return merged
}

/**
 * Canonical key of a row's mapped values, or null when any mapped key is absent
 */
function matchKey(row: Row, keys: readonly string[]): string | null {
  if (!keys.every((key) => hasKey(row, key))) {
    return null
  }
  return tupleKey(keys.map((key) => row[key]))
}

/**
 * Joins two row sequences on a key mapping.
 *
 * A left row matches a right row when every mapped pair is present on both
 * sides and structurally equal; partial key presence never matches. Every
 * match is emitted, left order first and right order second. An empty
 * mapping matches every pair.
 *
 * The right side is indexed once by its mapped values, so the cost is
 * O(left + right + matches) instead of the O(left × right) scan.
 */
export function joinRows(
  left: readonly Row[],
  right: readonly Row[],
  mapping: JoinMapping,
  kind: JoinKind,
  options: Partial<JoinOptions> = {},
  logger: Logger = createSilentLogger()
): Row[] {
  const resolved: JoinOptions = { ...DEFAULT_JOIN_OPTIONS, ...options }
  validateJoinArguments(mapping, resolved)

  const leftKeys = Object.keys(mapping)
  const rightKeys = leftKeys.map((key) => mapping[key])

  const index = new Map<string, Row[]>()
  for (const row of right) {
    const key = matchKey(row, rightKeys)
    if (key === null) continue
    const bucket = index.get(key)
    if (bucket) {
      bucket.push(row)
    } else {
      index.set(key, [row])
    }
  }

  const result: Row[] = []
  let matchedLeftRows = 0
  for (const row of left) {
    const key = matchKey(row, leftKeys)
    const matches = key === null ? undefined : index.get(key)
    if (matches) {
      matchedLeftRows++
      for (const match of matches) {
        result.push(mergeRows(row, match, mapping, resolved.lsuffix, resolved.rsuffix))
      }
    } else if (kind === 'left') {
      result.push(row)
    }
  }

  logger.debug(`${kind} join matched ${matchedLeftRows} of ${left.length} left rows`, {
    mapping: { ...mapping },
    rightRows: right.length,
    outputRows: result.length,
  })
  return result
}

/**
 * Left join: every left row appears at least once; unmatched rows are kept as-is
 */
export function leftJoin(
  left: readonly Row[],
  right: readonly Row[],
  mapping: JoinMapping,
  options?: Partial<JoinOptions>,
  logger?: Logger
): Row[] {
  return joinRows(left, right, mapping, 'left', options, logger)
}

/**
 * Inner join: one merged row per matching left/right pair
 */
export function innerJoin(
  left: readonly Row[],
  right: readonly Row[],
  mapping: JoinMapping,
  options?: Partial<JoinOptions>,
  logger?: Logger
): Row[] {
  return joinRows(left, right, mapping, 'inner', options, logger)
}
