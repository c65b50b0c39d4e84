import { InsufficientDataError } from './errors'
import { buildThresholds } from './thresholds'
import type { AggregateSummary, ItemId, LifetimeResult, SimulationSpec, Threshold } from './types'

interface ItemTally {
  successes: number
  failures: number
  successPulls: number
  failurePulls: number
  depletionPullSum: number
  depletions: number
}

function emptyTally(): ItemTally {
  return {
    successes: 0,
    failures: 0,
    successPulls: 0,
    failurePulls: 0,
    depletionPullSum: 0,
    depletions: 0
  }
}

function perItem<T>(items: readonly ItemId[], make: (item: ItemId) => T): Record<ItemId, T> {
  const out: Record<ItemId, T> = {}
  for (const item of items) out[item] = make(item)
  return out
}

export class Aggregator {
  private readonly items: readonly ItemId[]
  private readonly thresholds: readonly Threshold[]
  private runs = 0
  private readonly snapshotSums: Record<string, Record<ItemId, number>>
  private readonly snapshotTotalSums: Record<string, number>
  private readonly rateSamples: Record<string, Record<ItemId, number[]>>
  private readonly tallies: Record<ItemId, ItemTally>
  private readonly successesByPull: number[] = []

  constructor(spec: Pick<SimulationSpec, 'items' | 'capsulesPerItem' | 'thresholds'>) {
    this.items = [...spec.items]
    this.thresholds = buildThresholds(spec)
    this.snapshotSums = {}
    this.snapshotTotalSums = {}
    this.rateSamples = {}
    for (const { label } of this.thresholds) {
      this.snapshotSums[label] = perItem(this.items, () => 0)
      this.snapshotTotalSums[label] = 0
      this.rateSamples[label] = perItem(this.items, () => [])
    }
    this.tallies = perItem(this.items, emptyTally)
  }

  get runCount() {
    return this.runs
  }

  addResult(result: LifetimeResult) {
    this.runs += 1

    for (const [label, snapshot] of Object.entries(result.snapshots)) {
      const sums = this.snapshotRow(label)
      const samples = this.rateSamples[label]
      this.snapshotTotalSums[label] += snapshot.total
      for (const item of this.items) {
        const count = snapshot.counts[item] ?? 0
        sums[item] += count
        samples[item].push(snapshot.total > 0 ? count / snapshot.total : 0)
      }
    }

    for (const outcome of result.outcomes) {
      const tally = this.tally(outcome.desiredItem)
      if (outcome.succeeded) {
        tally.successes += 1
        tally.successPulls += outcome.pullsTaken
        this.addSuccessAt(outcome.pullsTaken, 1)
      } else {
        tally.failures += 1
        tally.failurePulls += outcome.pullsTaken
      }
    }

    for (const [item, pull] of Object.entries(result.depletion)) {
      const tally = this.tally(item)
      tally.depletionPullSum += pull
      tally.depletions += 1
    }
  }

  merge(other: Aggregator) {
    const sameItems = other.items.length === this.items.length && other.items.every((item, i) => item === this.items[i])
    const sameThresholds =
      other.thresholds.length === this.thresholds.length &&
      other.thresholds.every((t, i) => t.label === this.thresholds[i].label)
    if (!sameItems || !sameThresholds) {
      throw new RangeError('Cannot merge aggregators built from different configurations')
    }

    this.runs += other.runs
    for (const { label } of this.thresholds) {
      this.snapshotTotalSums[label] += other.snapshotTotalSums[label]
      for (const item of this.items) {
        this.snapshotSums[label][item] += other.snapshotSums[label][item]
        this.rateSamples[label][item].push(...other.rateSamples[label][item])
      }
    }
    for (const item of this.items) {
      const mine = this.tallies[item]
      const theirs = other.tallies[item]
      mine.successes += theirs.successes
      mine.failures += theirs.failures
      mine.successPulls += theirs.successPulls
      mine.failurePulls += theirs.failurePulls
      mine.depletionPullSum += theirs.depletionPullSum
      mine.depletions += theirs.depletions
    }
    other.successesByPull.forEach((count, i) => this.addSuccessAt(i + 1, count))
  }

  finalize(runCount = this.runs): AggregateSummary {
    if (runCount <= 0) {
      throw new InsufficientDataError('Cannot finalize statistics from zero runs')
    }

    const snapshots: AggregateSummary['snapshots'] = {}
    const snapshotTotals: AggregateSummary['snapshotTotals'] = {}
    const rateSamples: AggregateSummary['rateSamples'] = {}
    for (const { label } of this.thresholds) {
      snapshots[label] = perItem(this.items, (item) => this.snapshotSums[label][item] / runCount)
      snapshotTotals[label] = this.snapshotTotalSums[label] / runCount
      rateSamples[label] = perItem(this.items, (item) => [...this.rateSamples[label][item]])
    }

    const sessionsFor = (item: ItemId) => this.tallies[item].successes + this.tallies[item].failures

    return {
      runs: runCount,
      snapshots,
      snapshotTotals,
      successRate: perItem(this.items, (item) => {
        const sessions = sessionsFor(item)
        return sessions ? this.tallies[item].successes / sessions : 0
      }),
      sessions: perItem(this.items, sessionsFor),
      meanPullsToDepletion: perItem(this.items, (item) => {
        const { depletionPullSum, depletions } = this.tallies[item]
        return depletions ? depletionPullSum / depletions : Infinity
      }),
      meanSuccessfulPulls: perItem(this.items, (item) => {
        const { successPulls, successes } = this.tallies[item]
        return successes ? successPulls / successes : 0
      }),
      meanFailedPulls: perItem(this.items, (item) => {
        const { failurePulls, failures } = this.tallies[item]
        return failures ? failurePulls / failures : 0
      }),
      successesByPull: this.successesByPull.map((count) => count / runCount),
      rateSamples
    }
  }

  private addSuccessAt(pull: number, count: number) {
    while (this.successesByPull.length < pull) this.successesByPull.push(0)
    this.successesByPull[pull - 1] += count
  }

  private tally(item: ItemId) {
    const tally = this.tallies[item]
    if (!tally) throw new RangeError(`Unknown item "${item}"`)
    return tally
  }

  private snapshotRow(label: string) {
    const row = this.snapshotSums[label]
    if (!row) throw new RangeError(`Unknown snapshot threshold "${label}"`)
    return row
  }
}
