import { describe, expect, it } from 'vitest'
import { InsufficientDataError } from '../errors'
import { baselineRate, isSignificant, testRate } from '../significance'

describe('testRate', () => {
  it('reports p = 1 for zero-variance samples at the baseline', () => {
    const result = testRate([0.2, 0.2, 0.2], baselineRate({ items: ['a', 'b', 'c', 'd', 'e'] }))
    expect(result.tStatistic).toBe(0)
    expect(result.pValue).toBe(1)
    expect(result.observedMean).toBeCloseTo(0.2, 12)
    expect(result.degreesOfFreedom).toBe(2)
    expect(isSignificant(result)).toBe(false)
  })

  it('reports an infinite t for zero-variance samples away from the baseline', () => {
    expect(testRate([0.3, 0.3, 0.3], 0.2)).toMatchObject({ tStatistic: Infinity, pValue: 0 })
    expect(testRate([0.1, 0.1], 0.2)).toMatchObject({ tStatistic: -Infinity, pValue: 0 })
  })

  it('computes t and a two-sided p-value', () => {
    const result = testRate([1, 2, 3], 0)
    const t = 2 * Math.sqrt(3)
    expect(result.tStatistic).toBeCloseTo(t, 12)
    expect(result.pValue).toBeCloseTo(1 - t / Math.sqrt(2 + t * t), 10)
    expect(result.observedMean).toBe(2)
    expect(result.sampleSize).toBe(3)
    expect(isSignificant(result)).toBe(false)
    expect(isSignificant(result, 0.1)).toBe(true)
  })

  it('is symmetric in the direction of the deviation', () => {
    const above = testRate([0, 2], 0)
    const below = testRate([0, 2], 2)
    expect(above.tStatistic).toBeCloseTo(1, 12)
    expect(below.tStatistic).toBeCloseTo(-1, 12)
    expect(above.pValue).toBeCloseTo(0.5, 10)
    expect(below.pValue).toBeCloseTo(0.5, 10)
  })

  it('gives p = 1 when the mean sits on the baseline', () => {
    expect(testRate([1, 2, 3, 4, 5], 3)).toEqual({
      tStatistic: 0,
      pValue: 1,
      observedMean: 3,
      degreesOfFreedom: 4,
      sampleSize: 5
    })
  })

  it('needs at least two samples', () => {
    expect(() => testRate([], 0.2)).toThrow(InsufficientDataError)
    expect(() => testRate([0.4], 0.2)).toThrow('A t-test needs at least 2 rate samples, got 1')
  })
})
