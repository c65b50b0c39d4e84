import React from 'react'
import { Bar, BarChart, CartesianGrid, Legend, Tooltip, XAxis, YAxis } from 'recharts'
import { formatCount, formatPercent, formatPValue, formatPull } from '../format'
import { isSignificant } from '../sim/significance'
import type { SimulationResults } from '../sim/types'

interface Props {
  results: SimulationResults | null
}

const PALETTE = ['#f97316', '#10b981', '#ef4444', '#a855f7', '#38bdf8', '#facc15', '#fb7185', '#34d399']

function shareByThreshold(results: SimulationResults) {
  const { snapshots, snapshotTotals } = results.summary
  return Object.entries(snapshots).map(([label, averages]) => {
    const total = snapshotTotals[label]
    const row: Record<string, string | number> = { label }
    for (const [item, avg] of Object.entries(averages)) {
      row[item] = total > 0 ? avg / total : 0
    }
    return row
  })
}

function SignificanceCard({ results }: { results: SimulationResults }) {
  const { analysis, baselineRate, significance } = results
  return (
    <div className="kpi-card">
      <h3>Significance</h3>
      <p className="section-note">
        {analysis.item} at {analysis.label} fullness vs. baseline {formatPercent(baselineRate)}
      </p>
      {significance ? (
        <dl>
          <dt>Observed mean rate</dt>
          <dd className="observed-mean">{formatPercent(significance.observedMean, 2)}</dd>
          <dt>t statistic</dt>
          <dd className="t-statistic">{significance.tStatistic.toFixed(3)}</dd>
          <dt>p-value</dt>
          <dd className="p-value">{formatPValue(significance.pValue)}</dd>
          <dt>Verdict</dt>
          <dd className="verdict">
            {isSignificant(significance, analysis.alpha) ? 'Reject null hypothesis' : 'Fail to reject null hypothesis'}
          </dd>
        </dl>
      ) : (
        <p className="insufficient">Not enough data to perform significance test.</p>
      )}
    </div>
  )
}

export function ResultsPanel({ results }: Props) {
  if (!results) {
    return (
      <div className="results-empty">
        <h2>No results yet</h2>
        <p>Run the simulation to see snapshot composition and significance.</p>
      </div>
    )
  }

  const { summary } = results
  const items = Object.keys(summary.successRate)
  const shares = shareByThreshold(results)

  return (
    <div className="results">
      <section className="kpi-grid">
        <div className="kpi-card">
          <h3>Sessions</h3>
          <p className="section-note">Per desired item, averaged over {summary.runs} lifetimes.</p>
          <table>
            <thead>
              <tr>
                <th>Item</th>
                <th>Sessions</th>
                <th>Success rate</th>
                <th>Pulls on hit</th>
                <th>Pulls on miss</th>
                <th>Depletes at pull</th>
              </tr>
            </thead>
            <tbody>
              {items.map((item) => (
                <tr key={item}>
                  <td>{item}</td>
                  <td>{summary.sessions[item]}</td>
                  <td>{formatPercent(summary.successRate[item])}</td>
                  <td>{summary.meanSuccessfulPulls[item].toFixed(2)}</td>
                  <td>{summary.meanFailedPulls[item].toFixed(2)}</td>
                  <td>{formatPull(summary.meanPullsToDepletion[item])}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>
        <SignificanceCard results={results} />
      </section>

      <section className="chart-grid">
        <div className="chart-card">
          <h3>Mean Item Count per Snapshot</h3>
          <table>
            <thead>
              <tr>
                <th>Threshold</th>
                <th>Total</th>
                {items.map((item) => (
                  <th key={item}>{item}</th>
                ))}
              </tr>
            </thead>
            <tbody>
              {Object.entries(summary.snapshots).map(([label, averages]) => (
                <tr key={label}>
                  <td>{label}</td>
                  <td>{formatCount(summary.snapshotTotals[label])}</td>
                  {items.map((item) => (
                    <td key={item}>{formatCount(averages[item])}</td>
                  ))}
                </tr>
              ))}
            </tbody>
          </table>
        </div>
        <div className="chart-card">
          <h3>Item Share by Fullness</h3>
          <BarChart width={640} height={260} data={shares}>
            <CartesianGrid strokeDasharray="3 3" />
            <XAxis dataKey="label" />
            <YAxis tickFormatter={(v: number) => formatPercent(v, 0)} />
            <Tooltip formatter={(value) => formatPercent(Number(value), 2)} />
            <Legend />
            {items.map((item, i) => (
              <Bar key={item} dataKey={item} fill={PALETTE[i % PALETTE.length]} isAnimationActive={false} />
            ))}
          </BarChart>
        </div>
      </section>

      <section className="scenario">
        <h3>Scenario Summary</h3>
        <p>{results.scenarioSummary}</p>
      </section>
    </div>
  )
}
