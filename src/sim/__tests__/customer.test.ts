import { describe, expect, it } from 'vitest'
import { CustomerBehaviorModel } from '../customer'
import { createRng } from '../rng'
import { scriptedRng } from './fixtures'

const model = new CustomerBehaviorModel({
  desire: { a: 0, b: 0.25, c: 0.75 },
  patience: {
    c: { 10: 1 },
    Default: { 1: 0.5, 4: 0.5 }
  }
})

describe('CustomerBehaviorModel', () => {
  it('samples the desired item from the desire weights', () => {
    expect(model.chooseDesiredItem(scriptedRng([0]))).toBe('b')
    expect(model.chooseDesiredItem(scriptedRng([0.2]))).toBe('b')
    expect(model.chooseDesiredItem(scriptedRng([0.25]))).toBe('c')
  })

  it('never picks a zero-weight item', () => {
    const rng = createRng('desire')
    for (let i = 0; i < 500; i += 1) {
      expect(model.chooseDesiredItem(rng)).not.toBe('a')
    }
  })

  it('uses the item-specific patience distribution when registered', () => {
    expect(model.choosePatience('c', scriptedRng([0.99]))).toBe(10)
  })

  it('falls back to the Default patience distribution', () => {
    expect(model.choosePatience('b', scriptedRng([0.1]))).toBe(1)
    expect(model.choosePatience('b', scriptedRng([0.6]))).toBe(4)
    expect(model.choosePatience('a', scriptedRng([0.6]))).toBe(4)
  })

  it('throws when neither the item nor Default has a distribution', () => {
    const bare = new CustomerBehaviorModel({ desire: { a: 1 }, patience: {} })
    expect(() => bare.choosePatience('a', scriptedRng([0]))).toThrow(RangeError)
  })
})
