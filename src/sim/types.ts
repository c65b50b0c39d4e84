export type ItemId = string

export type WeightMap = Record<string, number>

/** Max pulls per session → probability weight. Keys are positive integers. */
export type PatienceDistribution = Record<number, number>

export const DEFAULT_PATIENCE_KEY = 'Default'

export interface AnalysisSpec {
  threshold: number
  item: ItemId
  alpha: number
}

export interface SimulationSpec {
  items: ItemId[]
  capsulesPerItem: number
  desire: WeightMap
  patience: Record<string, PatienceDistribution>
  lifetimes: number
  thresholds: number[]
  seed: string
  analysis: AnalysisSpec
}

export interface Threshold {
  label: string
  fraction: number
  capacity: number
}

export type InventoryCounts = Readonly<Record<ItemId, number>>

export interface Snapshot {
  label: string
  fraction: number
  capacity: number
  pull: number
  total: number
  counts: InventoryCounts
}

export interface SessionOutcome {
  readonly desiredItem: ItemId
  readonly succeeded: boolean
  readonly pullsTaken: number
}

export type DepletionRecord = Readonly<Record<ItemId, number>>

export interface LifetimeResult {
  readonly snapshots: Readonly<Record<string, Snapshot>>
  readonly outcomes: readonly SessionOutcome[]
  readonly depletion: DepletionRecord
  readonly pulls: number
}

export interface AggregateSummary {
  runs: number
  snapshots: Record<string, Record<ItemId, number>>
  snapshotTotals: Record<string, number>
  successRate: Record<ItemId, number>
  sessions: Record<ItemId, number>
  meanPullsToDepletion: Record<ItemId, number>
  meanSuccessfulPulls: Record<ItemId, number>
  meanFailedPulls: Record<ItemId, number>
  successesByPull: number[]
  rateSamples: Record<string, Record<ItemId, number[]>>
}

export interface RateTestResult {
  tStatistic: number
  pValue: number
  observedMean: number
  degreesOfFreedom: number
  sampleSize: number
}

export interface SimulationResults {
  summary: AggregateSummary
  analysis: AnalysisSpec & { label: string }
  baselineRate: number
  significance: RateTestResult | null
  insufficientData: string | null
  scenarioSummary: string
  seed: string
}
