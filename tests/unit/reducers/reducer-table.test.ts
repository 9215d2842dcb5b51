import { describe, it, expect } from 'vitest'
import {
  REDUCER_NAMES,
  isReducerName,
  getReducer,
  resolveReducer,
  summarise,
  summariseValues,
  minimumValues,
} from '../../../src/core/reducers/index.js'
import { EmptyInputError, UnknownReducerError } from '../../../src/utils/errors.js'
import { scoreRows } from '../../fixtures/rows.js'

describe('Reducer table', () => {
  it('lists every built-in reducer', () => {
    expect(REDUCER_NAMES).toEqual([
      'mean',
      'count',
      'unique',
      'n_unique',
      'sum',
      'min',
      'max',
      'median',
      'var',
      'std',
    ])
  })

  it('recognises reducer names', () => {
    expect(isReducerName('n_unique')).toBe(true)
    expect(isReducerName('mode')).toBe(false)
    expect(isReducerName('toString')).toBe(false)
  })

  it('looks up reducers by name', () => {
    const reducer = getReducer('median')
    expect(reducer.name).toBe('median')
    expect(reducer.reduce([4, 1, 3])).toBe(3)
  })

  it('throws for unknown names and lists the valid ones', () => {
    expect(() => getReducer('mode')).toThrow(UnknownReducerError)
    expect(() => getReducer('mode')).toThrow(
      "Unknown reducer 'mode'. Available reducers: mean, count, unique, n_unique, sum, min, max, median, var, std"
    )
  })

  it('resolves names and custom functions to tagged variants', () => {
    const custom = (values: unknown[]) => values.length
    expect(resolveReducer('sum')).toEqual({ kind: 'builtin', definition: getReducer('sum') })
    expect(resolveReducer(custom)).toEqual({ kind: 'custom', reduce: custom })
  })

  it('reports the minimum number of values per reducer', () => {
    expect(minimumValues('count')).toBe(0)
    expect(minimumValues('mean')).toBe(1)
    expect(minimumValues('var')).toBe(2)
    expect(minimumValues(() => 0)).toBe(0)
  })
})

describe('summariseValues', () => {
  it('defines count, unique, n_unique and sum for empty input', () => {
    expect(summariseValues([], 'count')).toBe(0)
    expect(summariseValues([], 'unique')).toEqual([])
    expect(summariseValues([], 'n_unique')).toBe(0)
    expect(summariseValues([], 'sum')).toBe(0)
  })

  it.each(['mean', 'min', 'max', 'median'] as const)(
    'throws EmptyInputError for %s on empty input',
    (name) => {
      expect(() => summariseValues([], name)).toThrow(EmptyInputError)
    }
  )

  it('requires two values for var and std', () => {
    expect(() => summariseValues([1], 'var')).toThrow(
      "'var' requires at least 2 values, got 1"
    )
    expect(() => summariseValues([1], 'std')).toThrow(EmptyInputError)
    expect(summariseValues([1, 3], 'var')).toBe(2)
  })

  it('includes the context in the error', () => {
    try {
      summariseValues([], 'mean', { column: 'price' })
      expect.unreachable('expected an EmptyInputError')
    } catch (error) {
      expect(error).toBeInstanceOf(EmptyInputError)
      if (error instanceof EmptyInputError) {
        expect(error.required).toBe(1)
        expect(error.received).toBe(0)
        expect(error.context?.column).toBe('price')
      }
    }
  })

  it('passes every value to custom reducers, even none', () => {
    expect(summariseValues([], (values) => values.length)).toBe(0)
    expect(summariseValues(['a', 'b'], (values) => values.join('-'))).toBe('a-b')
  })
})

describe('summarise', () => {
  it('skips rows where the column is absent', () => {
    expect(summarise(scoreRows, 'sum', 'b')).toBe(20)
    expect(summarise(scoreRows, 'count', 'b')).toBe(3)
    expect(summarise(scoreRows, 'n_unique', 'b')).toBe(2)
  })

  it('treats a column present with an undefined value as present', () => {
    expect(summarise([{ b: undefined }, {}], 'count', 'b')).toBe(1)
  })

  it('applies custom reducers to the present values', () => {
    expect(summarise(scoreRows, (values) => values.length * 2, 'b')).toBe(6)
  })
})
