import type { SimulationResults } from '../sim/types'

export function makeResults(overrides: Partial<SimulationResults> = {}): SimulationResults {
  return {
    summary: {
      runs: 10,
      snapshots: {
        '100%': { A: 10, B: 10 },
        '25%': { A: 3, B: 2 }
      },
      snapshotTotals: { '100%': 20, '25%': 5 },
      successRate: { A: 0.5, B: 0 },
      sessions: { A: 8, B: 0 },
      meanPullsToDepletion: { A: 12.4, B: Infinity },
      meanSuccessfulPulls: { A: 2, B: 0 },
      meanFailedPulls: { A: 3.5, B: 0 },
      successesByPull: [0.2, 0.2],
      rateSamples: {
        '100%': { A: [0.5, 0.5], B: [0.5, 0.5] },
        '25%': { A: [0.6, 0.6], B: [0.4, 0.4] }
      }
    },
    analysis: { threshold: 0.25, item: 'B', alpha: 0.05, label: '25%' },
    baselineRate: 0.5,
    significance: {
      tStatistic: -2.5,
      pValue: 0.0312345,
      observedMean: 0.4,
      degreesOfFreedom: 9,
      sampleSize: 10
    },
    insufficientData: null,
    scenarioSummary: 'Items: 2 x 10 capsules (20 total)',
    seed: 'test-seed',
    ...overrides
  }
}
