import { EmptyInventoryError } from './errors'
import { randomIndex, type RNG } from './rng'
import type { InventoryCounts, ItemId } from './types'

export class Inventory {
  private readonly items: readonly ItemId[]
  private readonly counts: Map<ItemId, number>
  private remaining: number

  constructor(items: readonly ItemId[], capsulesPerItem: number) {
    this.items = items
    this.counts = new Map(items.map((item) => [item, capsulesPerItem]))
    this.remaining = items.length * capsulesPerItem
  }

  draw(rng: RNG): ItemId {
    if (this.remaining === 0) throw new EmptyInventoryError()
    let target = randomIndex(rng, this.remaining)
    for (const item of this.items) {
      const count = this.counts.get(item) ?? 0
      if (target < count) {
        this.counts.set(item, count - 1)
        this.remaining -= 1
        return item
      }
      target -= count
    }
    throw new EmptyInventoryError()
  }

  totalRemaining() {
    return this.remaining
  }

  count(item: ItemId) {
    return this.counts.get(item) ?? 0
  }

  snapshot(): InventoryCounts {
    const copy: Record<ItemId, number> = {}
    for (const item of this.items) {
      copy[item] = this.counts.get(item) ?? 0
    }
    return Object.freeze(copy)
  }
}
