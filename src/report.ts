import { formatCount, formatPercent, formatPValue, formatPull } from './format'
import { isSignificant } from './sim/significance'
import type { SimulationResults } from './sim/types'

const RULE = '='.repeat(70)

function snapshotSection(results: SimulationResults) {
  const { summary } = results
  const lines = ['--- Part 1: Machine state at depletion snapshots ---']
  for (const [label, averages] of Object.entries(summary.snapshots)) {
    const total = summary.snapshotTotals[label]
    lines.push('', `  When machine is ~${label} full (avg. ${formatCount(total)} capsules):`)
    if (total === 0) {
      lines.push('    (empty)')
      continue
    }
    const sorted = Object.entries(averages).sort((a, b) => b[1] - a[1])
    for (const [item, avg] of sorted) {
      lines.push(`    - ${item.padEnd(18)}: ${formatCount(avg).padStart(6)} avg. units | Rate: ${formatPercent(avg / total, 2)}`)
    }
  }
  return lines
}

function outcomeSection(results: SimulationResults) {
  const { summary } = results
  const lines = ['--- Part 2: Customer sessions and depletion ---', '']
  for (const item of Object.keys(summary.successRate)) {
    const sessions = summary.sessions[item]
    const depletes = `depletes at pull ${formatPull(summary.meanPullsToDepletion[item])}`
    if (sessions === 0) {
      lines.push(`    - ${item.padEnd(18)}: no sessions | ${depletes}`)
      continue
    }
    lines.push(
      `    - ${item.padEnd(18)}: ${formatPercent(summary.successRate[item], 2)} success over ${sessions} sessions` +
        ` | pulls on hit ${summary.meanSuccessfulPulls[item].toFixed(2)}` +
        ` | pulls on miss ${summary.meanFailedPulls[item].toFixed(2)} | ${depletes}`
    )
  }
  return lines
}

function significanceSection(results: SimulationResults) {
  const { analysis, baselineRate, significance } = results
  const lines = [
    '--- Part 3: Statistical significance ---',
    '',
    `  Hypothesis test for '${analysis.item}' at '${analysis.label}' fullness:`
  ]
  if (!significance) {
    lines.push('    Not enough data to perform significance test.')
    return lines
  }
  lines.push(
    `    - Null hypothesis: the true average rate equals the baseline of ${formatPercent(baselineRate, 2)}.`,
    `    - Observed mean rate: ${formatPercent(significance.observedMean, 4)}`,
    `    - t statistic: ${significance.tStatistic.toFixed(4)} (df = ${significance.degreesOfFreedom})`,
    `    - p-value: ${formatPValue(significance.pValue)}`
  )
  if (isSignificant(significance, analysis.alpha)) {
    lines.push(`    - Conclusion: since p < ${analysis.alpha}, we reject the null hypothesis.`)
  } else {
    lines.push(
      `    - Conclusion: since p >= ${analysis.alpha}, we fail to reject the null hypothesis.`,
      '      The difference from the baseline is NOT statistically significant.'
    )
  }
  return lines
}

export function renderTextReport(results: SimulationResults) {
  return [
    RULE,
    `    GACHAPON DEPLETION ANALYSIS (${results.summary.runs} SIMULATIONS)`,
    RULE,
    results.scenarioSummary,
    '',
    ...snapshotSection(results),
    '',
    ...outcomeSection(results),
    '',
    ...significanceSection(results),
    '',
    RULE
  ].join('\n')
}
