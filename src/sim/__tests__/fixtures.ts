import type { RNG } from '../rng'
import type { SimulationSpec } from '../types'

export const FIVE_ITEMS = ['Cat Keychain', 'Dog Keychain', 'Rabbit Figurine', 'Hamster Sticker', 'Rare Gold Cat']

export function makeSpec(overrides: Partial<SimulationSpec> = {}): SimulationSpec {
  return {
    items: FIVE_ITEMS,
    capsulesPerItem: 10,
    desire: {
      'Cat Keychain': 0.2,
      'Dog Keychain': 0.2,
      'Rabbit Figurine': 0.2,
      'Hamster Sticker': 0.2,
      'Rare Gold Cat': 0.2
    },
    patience: {
      'Rare Gold Cat': { 5: 0.5, 20: 0.5 },
      Default: { 1: 0.5, 3: 0.5 }
    },
    lifetimes: 20,
    thresholds: [1, 0.75, 0.5, 0.25, 0],
    seed: 'test-seed',
    analysis: { threshold: 0.25, item: 'Rare Gold Cat', alpha: 0.05 },
    ...overrides
  }
}

// Replays `values` in order, cycling when exhausted.
export function scriptedRng(values: readonly number[]): RNG {
  if (values.length === 0) throw new RangeError('scriptedRng needs at least one value')
  let i = 0
  return () => {
    const value = values[i % values.length]
    i += 1
    return value
  }
}
