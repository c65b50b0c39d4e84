import { InsufficientDataError } from './errors'
import { average, sampleVariance, studentTTwoSidedP } from './sampling'
import type { RateTestResult, SimulationSpec } from './types'

export const DEFAULT_ALPHA = 0.05

const ZERO_TOLERANCE = 1e-12

export function baselineRate(spec: Pick<SimulationSpec, 'items'>) {
  return 1 / spec.items.length
}

// With zero variance the samples either sit on the baseline (t = 0, p = 1) or
// away from it (t = ±Infinity, p = 0).
export function testRate(samples: readonly number[], baseline: number): RateTestResult {
  const sampleSize = samples.length
  if (sampleSize < 2) {
    throw new InsufficientDataError(`A t-test needs at least 2 rate samples, got ${sampleSize}`)
  }
  const degreesOfFreedom = sampleSize - 1
  const observedMean = average(samples)
  const sd = Math.sqrt(sampleVariance(samples))
  const tolerance = ZERO_TOLERANCE * Math.max(1, Math.abs(observedMean), Math.abs(baseline))

  if (sd <= tolerance) {
    const diff = observedMean - baseline
    if (Math.abs(diff) <= tolerance) {
      return { tStatistic: 0, pValue: 1, observedMean, degreesOfFreedom, sampleSize }
    }
    return {
      tStatistic: diff > 0 ? Infinity : -Infinity,
      pValue: 0,
      observedMean,
      degreesOfFreedom,
      sampleSize
    }
  }

  const tStatistic = (observedMean - baseline) / (sd / Math.sqrt(sampleSize))
  return {
    tStatistic,
    pValue: studentTTwoSidedP(tStatistic, degreesOfFreedom),
    observedMean,
    degreesOfFreedom,
    sampleSize
  }
}

export function isSignificant(result: RateTestResult, alpha = DEFAULT_ALPHA) {
  return result.pValue < alpha
}
