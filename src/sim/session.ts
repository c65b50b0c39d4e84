import type { Inventory } from './inventory'
import type { RNG } from './rng'
import type { ItemId, SessionOutcome } from './types'

export type DrawListener = (item: ItemId) => void

export function runSession(
  inventory: Inventory,
  desiredItem: ItemId,
  maxPulls: number,
  rng: RNG,
  onDraw?: DrawListener
): SessionOutcome {
  let pullsTaken = 0
  let succeeded = false
  while (pullsTaken < maxPulls && inventory.totalRemaining() > 0) {
    const item = inventory.draw(rng)
    pullsTaken += 1
    if (onDraw) onDraw(item)
    if (item === desiredItem) {
      succeeded = true
      break
    }
  }
  return { desiredItem, succeeded, pullsTaken }
}
