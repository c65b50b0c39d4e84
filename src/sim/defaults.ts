import type { SimulationSpec } from './types'

export const RARE_ITEM = 'Rare Gold Cat'

export const defaultSpec: SimulationSpec = {
  items: ['Cat Keychain', 'Dog Keychain', 'Rabbit Figurine', 'Hamster Sticker', RARE_ITEM],
  capsulesPerItem: 50,
  desire: {
    'Cat Keychain': 0,
    'Dog Keychain': 0,
    'Rabbit Figurine': 0,
    'Hamster Sticker': 0,
    [RARE_ITEM]: 1
  },
  patience: {
    [RARE_ITEM]: { 10000000: 1 },
    Default: { 10000000: 1 }
  },
  lifetimes: 10000,
  thresholds: [1, 0.75, 0.5, 0.25, 0],
  seed: 'gachapon-001',
  analysis: {
    threshold: 0.25,
    item: RARE_ITEM,
    alpha: 0.05
  }
}
