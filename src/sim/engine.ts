import { Aggregator } from './aggregator'
import { CustomerBehaviorModel } from './customer'
import { InsufficientDataError } from './errors'
import { Inventory } from './inventory'
import { createRunRng, type RNG } from './rng'
import { runSession } from './session'
import { baselineRate, testRate } from './significance'
import { buildThresholds, initialTotal, thresholdLabel } from './thresholds'
import type {
  ItemId,
  LifetimeResult,
  RateTestResult,
  SessionOutcome,
  SimulationResults,
  SimulationSpec,
  Snapshot,
  Threshold
} from './types'

const CHUNK_SIZE = 250

function buildScenarioSummary(spec: SimulationSpec) {
  const lines = [
    `Items: ${spec.items.length} x ${spec.capsulesPerItem} capsules (${initialTotal(spec)} total)`,
    `Lifetimes: ${spec.lifetimes}`,
    `Thresholds: ${buildThresholds(spec)
      .map((t) => t.label)
      .join(', ')}`,
    `Tested: ${spec.analysis.item} at ${thresholdLabel(spec.analysis.threshold)}`
  ]
  return lines.join(' | ')
}

/**
 * Runs one machine from full to empty.
 *
 * Depletion and snapshot bookkeeping happen after every draw, not at session
 * boundaries: a threshold is captured at the exact draw that first brings the
 * total to or below its capacity.
 */
export function simulateLifetime(
  spec: SimulationSpec,
  rng: RNG,
  model = new CustomerBehaviorModel(spec),
  thresholds: readonly Threshold[] = buildThresholds(spec)
): LifetimeResult {
  const inventory = new Inventory(spec.items, spec.capsulesPerItem)
  const snapshots: Record<string, Snapshot> = {}
  const outcomes: SessionOutcome[] = []
  const depletion: Record<ItemId, number> = {}
  let pulls = 0
  let nextThreshold = 0

  const captureCrossed = () => {
    const total = inventory.totalRemaining()
    while (nextThreshold < thresholds.length && total <= thresholds[nextThreshold].capacity) {
      const { label, fraction, capacity } = thresholds[nextThreshold]
      snapshots[label] = { label, fraction, capacity, pull: pulls, total, counts: inventory.snapshot() }
      nextThreshold += 1
    }
  }

  const onDraw = (item: ItemId) => {
    pulls += 1
    if (inventory.count(item) === 0 && !(item in depletion)) {
      depletion[item] = pulls
    }
    captureCrossed()
  }

  captureCrossed()
  while (inventory.totalRemaining() > 0) {
    const desiredItem = model.chooseDesiredItem(rng)
    const maxPulls = model.choosePatience(desiredItem, rng)
    outcomes.push(runSession(inventory, desiredItem, maxPulls, rng, onDraw))
  }

  return {
    snapshots: Object.freeze(snapshots),
    outcomes: Object.freeze(outcomes),
    depletion: Object.freeze(depletion),
    pulls
  }
}

export function simulateOnce(spec: SimulationSpec, runIndex: number): LifetimeResult {
  return simulateLifetime(spec, createRunRng(spec.seed, runIndex))
}

export function simulateChunk(
  spec: SimulationSpec,
  startIndex: number,
  count: number,
  onProgress?: (completed: number) => void
): Aggregator {
  const aggregator = new Aggregator(spec)
  const model = new CustomerBehaviorModel(spec)
  const thresholds = buildThresholds(spec)
  for (let i = 0; i < count; i += 1) {
    const rng = createRunRng(spec.seed, startIndex + i)
    aggregator.addResult(simulateLifetime(spec, rng, model, thresholds))
    if (onProgress) onProgress(i + 1)
  }
  return aggregator
}

export function runSimulation(spec: SimulationSpec, onProgress?: (value: number) => void): SimulationResults {
  const runs = spec.lifetimes
  const aggregator = new Aggregator(spec)
  for (let start = 0; start < runs; start += CHUNK_SIZE) {
    const count = Math.min(CHUNK_SIZE, runs - start)
    const chunk = simulateChunk(spec, start, count, (completed) => {
      if (onProgress) onProgress((start + completed) / runs)
    })
    aggregator.merge(chunk)
  }

  const summary = aggregator.finalize()
  const label = thresholdLabel(spec.analysis.threshold)
  const baseline = baselineRate(spec)
  const samples = summary.rateSamples[label]?.[spec.analysis.item] ?? []

  let significance: RateTestResult | null = null
  let insufficientData: string | null = null
  try {
    significance = testRate(samples, baseline)
  } catch (err) {
    if (!(err instanceof InsufficientDataError)) throw err
    insufficientData = err.message
  }

  return {
    summary,
    analysis: { ...spec.analysis, label },
    baselineRate: baseline,
    significance,
    insufficientData,
    scenarioSummary: buildScenarioSummary(spec),
    seed: spec.seed
  }
}
