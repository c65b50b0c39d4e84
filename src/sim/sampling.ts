import type { RNG } from './rng'

export type WeightedEntry<T> = readonly [value: T, weight: number]

export function sampleCategorical<T>(rng: RNG, entries: readonly WeightedEntry<T>[]): T {
  const u = rng()
  let acc = 0
  let lastPositive = -1
  for (let i = 0; i < entries.length; i += 1) {
    const [value, weight] = entries[i]
    if (weight <= 0) continue
    acc += weight
    lastPositive = i
    if (u < acc) return value
  }
  if (lastPositive < 0) {
    throw new RangeError('Categorical distribution has no positive weight')
  }
  return entries[lastPositive][0]
}

export function average(values: readonly number[]) {
  if (values.length === 0) return 0
  return values.reduce((a, b) => a + b, 0) / values.length
}

export function sampleVariance(values: readonly number[]) {
  if (values.length < 2) return 0
  const mean = average(values)
  let sum = 0
  for (const v of values) {
    const d = v - mean
    sum += d * d
  }
  return sum / (values.length - 1)
}

export function gammaLn(z: number): number {
  const p = [
    676.5203681218851,
    -1259.1392167224028,
    771.3234287776531,
    -176.6150291621406,
    12.507343278686905,
    -0.13857109526572012,
    9.984369578019571e-6,
    1.5056327351493116e-7
  ]
  if (z < 0.5) {
    return Math.log(Math.PI) - Math.log(Math.sin(Math.PI * z)) - gammaLn(1 - z)
  }
  z -= 1
  let x = 0.99999999999980993
  for (let i = 0; i < p.length; i += 1) {
    x += p[i] / (z + i + 1)
  }
  const t = z + p.length - 0.5
  return 0.5 * Math.log(2 * Math.PI) + (z + 0.5) * Math.log(t) - t + Math.log(x)
}

function betaContinuedFraction(a: number, b: number, x: number) {
  const MAX = 300
  const EPS = 1e-15
  const FPMIN = 1e-300
  const qab = a + b
  const qap = a + 1
  const qam = a - 1
  let c = 1
  let d = 1 - (qab * x) / qap
  if (Math.abs(d) < FPMIN) d = FPMIN
  d = 1 / d
  let h = d
  for (let m = 1; m <= MAX; m += 1) {
    const m2 = 2 * m
    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2))
    d = 1 + aa * d
    if (Math.abs(d) < FPMIN) d = FPMIN
    c = 1 + aa / c
    if (Math.abs(c) < FPMIN) c = FPMIN
    d = 1 / d
    h *= d * c
    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2))
    d = 1 + aa * d
    if (Math.abs(d) < FPMIN) d = FPMIN
    c = 1 + aa / c
    if (Math.abs(c) < FPMIN) c = FPMIN
    d = 1 / d
    const del = d * c
    h *= del
    if (Math.abs(del - 1) < EPS) break
  }
  return h
}

export function regularizedIncompleteBeta(a: number, b: number, x: number): number {
  if (x <= 0) return 0
  if (x >= 1) return 1
  const lnFront = gammaLn(a + b) - gammaLn(a) - gammaLn(b) + a * Math.log(x) + b * Math.log(1 - x)
  const front = Math.exp(lnFront)
  if (x < (a + 1) / (a + b + 2)) {
    return (front * betaContinuedFraction(a, b, x)) / a
  }
  return 1 - (front * betaContinuedFraction(b, a, 1 - x)) / b
}

export function studentTTwoSidedP(t: number, df: number) {
  if (Number.isNaN(t)) return Number.NaN
  if (!Number.isFinite(t)) return 0
  return regularizedIncompleteBeta(df / 2, 0.5, df / (df + t * t))
}
