import { describe, expect, it } from 'vitest'
import { EmptyInventoryError } from '../errors'
import { Inventory } from '../inventory'
import { createRng } from '../rng'
import { scriptedRng } from './fixtures'

describe('Inventory', () => {
  it('starts with capsulesPerItem of every item', () => {
    const inventory = new Inventory(['a', 'b', 'c'], 4)
    expect(inventory.totalRemaining()).toBe(12)
    expect(inventory.snapshot()).toEqual({ a: 4, b: 4, c: 4 })
  })

  it('maps the draw onto remaining physical units', () => {
    const inventory = new Inventory(['a', 'b'], 2)
    // units laid out as [a, a, b, b]; 0.5 * 4 = 2 lands on the first b
    expect(inventory.draw(scriptedRng([0.5]))).toBe('b')
    expect(inventory.snapshot()).toEqual({ a: 2, b: 1 })
    // [a, a, b]; 0.99 * 3 -> index 2
    expect(inventory.draw(scriptedRng([0.99]))).toBe('b')
    expect(inventory.count('b')).toBe(0)
    // only a left: every draw value lands on a
    expect(inventory.draw(scriptedRng([0.99]))).toBe('a')
    expect(inventory.totalRemaining()).toBe(1)
  })

  it('gives exhausted items zero weight', () => {
    const inventory = new Inventory(['a', 'b', 'c'], 1)
    expect(inventory.draw(scriptedRng([0]))).toBe('a')
    expect(inventory.draw(scriptedRng([0]))).toBe('b')
    expect(inventory.draw(scriptedRng([0]))).toBe('c')
  })

  it('throws EmptyInventoryError once empty', () => {
    const inventory = new Inventory(['a'], 1)
    inventory.draw(scriptedRng([0.3]))
    expect(() => inventory.draw(scriptedRng([0.3]))).toThrow(EmptyInventoryError)
  })

  it('decreases the total by exactly one per draw until empty', () => {
    const inventory = new Inventory(['a', 'b', 'c', 'd'], 25)
    const rng = createRng('inventory-drain')
    let previous = inventory.totalRemaining()
    while (inventory.totalRemaining() > 0) {
      inventory.draw(rng)
      const current = inventory.totalRemaining()
      expect(current).toBe(previous - 1)
      previous = current
    }
    expect(inventory.snapshot()).toEqual({ a: 0, b: 0, c: 0, d: 0 })
  })

  it('returns frozen snapshots detached from later draws', () => {
    const inventory = new Inventory(['a', 'b'], 3)
    const before = inventory.snapshot()
    inventory.draw(scriptedRng([0]))
    expect(before).toEqual({ a: 3, b: 3 })
    expect(Object.isFrozen(before)).toBe(true)
    expect(inventory.count('unknown')).toBe(0)
  })
})
