import type { RNG } from './rng'
import { sampleCategorical, type WeightedEntry } from './sampling'
import {
  DEFAULT_PATIENCE_KEY,
  type ItemId,
  type PatienceDistribution,
  type SimulationSpec,
  type WeightMap
} from './types'

function desireEntries(desire: WeightMap): WeightedEntry<ItemId>[] {
  return Object.entries(desire)
}

function patienceEntries(distribution: PatienceDistribution): WeightedEntry<number>[] {
  return Object.entries(distribution).map(([pulls, weight]) => [Number(pulls), weight] as const)
}

export class CustomerBehaviorModel {
  private readonly desire: WeightedEntry<ItemId>[]
  private readonly patience: Map<string, WeightedEntry<number>[]>

  constructor(spec: Pick<SimulationSpec, 'desire' | 'patience'>) {
    this.desire = desireEntries(spec.desire)
    this.patience = new Map(
      Object.entries(spec.patience).map(([key, distribution]) => [key, patienceEntries(distribution)])
    )
  }

  chooseDesiredItem(rng: RNG): ItemId {
    return sampleCategorical(rng, this.desire)
  }

  choosePatience(desiredItem: ItemId, rng: RNG): number {
    const entries = this.patience.get(desiredItem) ?? this.patience.get(DEFAULT_PATIENCE_KEY)
    if (!entries) {
      throw new RangeError(`No patience distribution for "${desiredItem}" and no ${DEFAULT_PATIENCE_KEY}`)
    }
    return sampleCategorical(rng, entries)
  }
}
