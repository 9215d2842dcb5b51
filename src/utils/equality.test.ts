import { describe, it, expect } from 'vitest'
import {
  canonicalKey,
  distinctValues,
  isPlainObject,
  tupleKey,
  valuesEqual,
} from './equality.js'

describe('canonicalKey', () => {
  it('distinguishes values of different types', () => {
    const keys = [1, '1', true, null, undefined, 1n].map(canonicalKey)
    expect(new Set(keys).size).toBe(6)
  })

  it('ignores object key order', () => {
    expect(canonicalKey({ a: 1, b: [2] })).toBe(canonicalKey({ b: [2], a: 1 }))
  })

  it('respects array order', () => {
    expect(canonicalKey([1, 2])).not.toBe(canonicalKey([2, 1]))
  })

  it('treats NaN as itself and -0 as 0', () => {
    expect(canonicalKey(NaN)).toBe(canonicalKey(Number.NaN))
    expect(canonicalKey(-0)).toBe(canonicalKey(0))
  })

  it('compares dates by timestamp', () => {
    expect(canonicalKey(new Date(5))).toBe(canonicalKey(new Date(5)))
    expect(canonicalKey(new Date(5))).not.toBe(canonicalKey(5))
  })

  it('compares functions and class instances by identity', () => {
    class Point {
      constructor(readonly x: number) {}
    }
    const p = new Point(1)
    const fn = () => 1

    expect(canonicalKey(p)).toBe(canonicalKey(p))
    expect(canonicalKey(p)).not.toBe(canonicalKey(new Point(1)))
    expect(canonicalKey(fn)).toBe(canonicalKey(fn))
    expect(canonicalKey(fn)).not.toBe(canonicalKey(() => 1))
  })

  it('keys registered symbols by name and others by identity', () => {
    const local = Symbol('k')

    expect(canonicalKey(Symbol.for('k'))).toBe(canonicalKey(Symbol.for('k')))
    expect(canonicalKey(local)).toBe(canonicalKey(local))
    expect(canonicalKey(local)).not.toBe(canonicalKey(Symbol('k')))
    expect(canonicalKey(local)).not.toBe(canonicalKey(Symbol.for('k')))
  })

  it('keys maps and sets by identity', () => {
    const map = new Map([['a', 1]])

    expect(canonicalKey(map)).toBe(canonicalKey(map))
    expect(canonicalKey(map)).not.toBe(canonicalKey(new Map([['a', 1]])))
    expect(canonicalKey(new Set())).toMatch(/^r:\d+$/)
  })

  it('does not confuse strings containing separators', () => {
    expect(canonicalKey(['a,b'])).not.toBe(canonicalKey(['a', 'b']))
  })
})

describe('valuesEqual', () => {
  it('compares structurally', () => {
    expect(valuesEqual({ x: [1, { y: 2 }] }, { x: [1, { y: 2 }] })).toBe(true)
    expect(valuesEqual({ x: 1 }, { x: 1, y: undefined })).toBe(false)
    expect(valuesEqual(1, '1')).toBe(false)
  })
})

describe('tupleKey', () => {
  it('keys ordered tuples', () => {
    expect(tupleKey([1, 'x'])).toBe(tupleKey([1, 'x']))
    expect(tupleKey([1, 'x'])).not.toBe(tupleKey(['x', 1]))
  })
})

describe('distinctValues', () => {
  it('keeps first occurrences in order', () => {
    expect(distinctValues([3, 1, 3, [1], [1], 2])).toEqual([3, 1, [1], 2])
  })
})

describe('isPlainObject', () => {
  it('accepts literals and null-prototype objects only', () => {
    expect(isPlainObject({})).toBe(true)
    expect(isPlainObject(Object.create(null))).toBe(true)
    expect(isPlainObject([])).toBe(false)
    expect(isPlainObject(new Date())).toBe(false)
    expect(isPlainObject(null)).toBe(false)
  })
})
