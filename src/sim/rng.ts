export type RNG = () => number

function xmur3(str: string) {
  let h = 1779033703 ^ str.length
  for (let i = 0; i < str.length; i += 1) {
    h = Math.imul(h ^ str.charCodeAt(i), 3432918353)
    h = (h << 13) | (h >>> 19)
  }
  return () => {
    h = Math.imul(h ^ (h >>> 16), 2246822507)
    h = Math.imul(h ^ (h >>> 13), 3266489909)
    h ^= h >>> 16
    return h >>> 0
  }
}

export function mulberry32(seed: number): RNG {
  let t = seed >>> 0
  return () => {
    t += 0x6d2b79f5
    let r = Math.imul(t ^ (t >>> 15), t | 1)
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61)
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296
  }
}

export function createRng(seed: string): RNG {
  const seedFn = xmur3(seed)
  return mulberry32(seedFn())
}

export function createRunRng(seed: string, runIndex: number): RNG {
  return createRng(`${seed}-${runIndex}`)
}

export function randomIndex(rng: RNG, n: number) {
  return Math.min(n - 1, Math.floor(rng() * n))
}
