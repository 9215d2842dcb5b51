/**
 * Structural value equality and canonical keys for grouping and joining
 * @module utils/equality
 */

const identityIds = new WeakMap<object, number>()
// Unregistered symbols stay referenced here for the life of the process;
// registered ones (Symbol.for) are keyed by their registry name instead.
const symbolIds = new Map<symbol, number>()
let nextIdentityId = 1

function identityKey(value: object): string {
  let id = identityIds.get(value)
  if (id === undefined) {
    id = nextIdentityId++
    identityIds.set(value, id)
  }
  return `r:${id}`
}

function symbolKey(value: symbol): string {
  const registered = Symbol.keyFor(value)
  if (registered !== undefined) {
    return `y:g:${JSON.stringify(registered)}`
  }
  let id = symbolIds.get(value)
  if (id === undefined) {
    id = nextIdentityId++
    symbolIds.set(value, id)
  }
  return `y:${id}`
}

/**
 * True for objects created by literals, `Object.create(null)` or JSON parsing
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Builds a string that is identical for two values exactly when they are
 * structurally equal.
 *
 * Arrays compare element-wise, plain objects by key set regardless of key
 * order, dates by timestamp. `NaN` equals itself and `-0` equals `0`.
 * Functions, symbols and class instances compare by identity.
 *
 * @example
 * ```typescript
 * canonicalKey({ a: 1, b: [2] }) === canonicalKey({ b: [2], a: 1 }) // true
 * canonicalKey(1) === canonicalKey('1') // false
 * ```
 */
export function canonicalKey(value: unknown): string {
  switch (typeof value) {
    case 'undefined':
      return 'u'
    case 'boolean':
      return value ? 'b:1' : 'b:0'
    case 'number':
      // String(-0) is '0' and String(NaN) is 'NaN'
      return `d:${String(value)}`
    case 'bigint':
      return `i:${value.toString()}`
    case 'string':
      return `s:${JSON.stringify(value)}`
    case 'symbol':
      return symbolKey(value)
    case 'function':
      return identityKey(value)
    default:
      break
  }

  if (typeof value !== 'object' || value === null) return 'n'
  if (value instanceof Date) return `t:${value.getTime()}`
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => canonicalKey(item)).join(',')}]`
  }
  if (isPlainObject(value)) {
    const parts = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalKey(value[key])}`)
    return `{${parts.join(',')}}`
  }
  return identityKey(value)
}

/**
 * Structural equality, consistent with {@link canonicalKey}
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true
  return canonicalKey(a) === canonicalKey(b)
}

/**
 * Canonical key of an ordered tuple of values
 */
export function tupleKey(values: readonly unknown[]): string {
  return canonicalKey(values)
}

/**
 * Distinct values in first-occurrence order, compared structurally
 */
export function distinctValues(values: Iterable<unknown>): unknown[] {
  const seen = new Set<string>()
  const result: unknown[] = []
  for (const value of values) {
    const key = canonicalKey(value)
    if (!seen.has(key)) {
      seen.add(key)
      result.push(value)
    }
  }
  return result
}
