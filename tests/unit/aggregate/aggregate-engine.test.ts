import { describe, it, expect } from 'vitest'
import {
  aggregateRows,
  summaryRow,
  validateAggregationSpecs,
} from '../../../src/core/aggregate/index.js'
import {
  EmptyInputError,
  InvalidArgumentError,
  UnknownReducerError,
} from '../../../src/utils/errors.js'
import { createSpyLogger, scoreRows, sparseRows } from '../../fixtures/rows.js'

describe('validateAggregationSpecs', () => {
  it('accepts names and custom functions', () => {
    expect(() =>
      validateAggregationSpecs({
        total: ['v', 'sum'],
        spread: ['v', (values) => values.length],
      })
    ).not.toThrow()
  })

  it('rejects non-object specs', () => {
    expect(() => validateAggregationSpecs(JSON.parse('[]'))).toThrow(
      "Invalid argument 'specs': must be an object of name to [column, reducer]"
    )
  })

  it('rejects entries that are not pairs', () => {
    expect(() => validateAggregationSpecs(JSON.parse('{"x": ["v"]}'))).toThrow(
      "Invalid argument 'x': must be a [column, reducer] pair"
    )
  })

  it('rejects non-string columns', () => {
    expect(() => validateAggregationSpecs(JSON.parse('{"x": [1, "sum"]}'))).toThrow(
      "Invalid argument 'x': column must be a string"
    )
  })

  it('rejects unknown reducer names', () => {
    expect(() => validateAggregationSpecs(JSON.parse('{"x": ["v", "mode"]}'))).toThrow(
      UnknownReducerError
    )
  })

  it('rejects reducers that are neither names nor functions', () => {
    expect(() => validateAggregationSpecs(JSON.parse('{"x": ["v", 3]}'))).toThrow(
      InvalidArgumentError
    )
  })
})

describe('summaryRow', () => {
  it('maps each name to its reducer result', () => {
    expect(
      summaryRow(scoreRows, {
        total: ['b', 'sum'],
        rows: ['a', 'count'],
        distinct: ['a', 'unique'],
      })
    ).toEqual({ total: 20, rows: 4, distinct: [7, 2, 3] })
  })

  it('reports the aggregation that failed', () => {
    try {
      summaryRow([], { avg: ['v', 'mean'] })
      expect.unreachable('expected an EmptyInputError')
    } catch (error) {
      expect(error).toBeInstanceOf(EmptyInputError)
      if (error instanceof EmptyInputError) {
        expect(error.context).toEqual({
          operation: 'mean',
          required: 1,
          received: 0,
          column: 'v',
          aggregation: 'avg',
        })
      }
    }
  })
})

describe('aggregateRows', () => {
  it('returns a single summary row when ungrouped', () => {
    expect(
      aggregateRows(scoreRows, [], { total: ['b', 'sum'], n: ['a', 'n_unique'] })
    ).toEqual([{ total: 20, n: 3 }])
  })

  it('summarises empty input when ungrouped', () => {
    expect(aggregateRows([], [], { n: ['v', 'count'] })).toEqual([{ n: 0 }])
  })

  it('returns one row per group with key values first', () => {
    const result = aggregateRows(
      [
        { c: 'a', v: 1 },
        { c: 'b', v: 2 },
        { c: 'a', v: 3 },
      ],
      ['c'],
      { total: ['v', 'sum'] }
    )

    expect(result).toEqual([
      { c: 'a', total: 4 },
      { c: 'b', total: 2 },
    ])
    expect(Object.keys(result[0])).toEqual(['c', 'total'])
  })

  it('emits rows for unobserved combinations', () => {
    expect(aggregateRows(sparseRows, ['a', 'b'], { n: ['v', 'count'] })).toEqual([
      { a: 1, b: 'x', n: 1 },
      { a: 1, b: 'y', n: 0 },
      { a: 2, b: 'x', n: 0 },
      { a: 2, b: 'y', n: 1 },
    ])
  })

  it('throws when a reducer needs values and a group is empty', () => {
    expect(() => aggregateRows(sparseRows, ['a', 'b'], { avg: ['v', 'mean'] })).toThrow(
      EmptyInputError
    )
  })

  it('excludes rows missing a group key', () => {
    expect(aggregateRows(scoreRows, ['b'], { n: ['a', 'count'] })).toEqual([
      { b: 7, n: 2 },
      { b: 6, n: 1 },
    ])
  })

  it('returns no rows when grouping empty input', () => {
    expect(aggregateRows([], ['a'], { n: ['v', 'count'] })).toEqual([])
  })

  it('validates specs before touching the rows', () => {
    expect(() => aggregateRows([], ['a'], JSON.parse('{"x": ["v", "mode"]}'))).toThrow(
      UnknownReducerError
    )
  })

  it('passes the logger to the partitioner', () => {
    const logger = createSpyLogger()
    aggregateRows(sparseRows, ['a', 'b'], { n: ['v', 'count'] }, logger)

    expect(logger.warn).toHaveBeenCalledTimes(1)
  })
})
