import type { SimulationSpec, Threshold } from './types'

export function thresholdLabel(fraction: number) {
  return `${Number((fraction * 100).toFixed(2))}%`
}

export function initialTotal(spec: Pick<SimulationSpec, 'items' | 'capsulesPerItem'>) {
  return spec.items.length * spec.capsulesPerItem
}

// Snapshots and aggregate tables are keyed by label, so two fractions that
// round to the same label would share one slot.
export function findLabelCollisions(fractions: readonly number[]) {
  const seen = new Map<string, number>()
  const collisions: string[] = []
  for (const fraction of new Set(fractions)) {
    const label = thresholdLabel(fraction)
    const first = seen.get(label)
    if (first === undefined) seen.set(label, fraction)
    else collisions.push(`${first} and ${fraction} both round to ${label}`)
  }
  return collisions
}

// Highest first. The epsilon keeps values such as 0.29 * 100 from flooring to 28.
export function buildThresholds(spec: Pick<SimulationSpec, 'items' | 'capsulesPerItem' | 'thresholds'>): Threshold[] {
  const collisions = findLabelCollisions(spec.thresholds)
  if (collisions.length > 0) throw new RangeError(`Threshold labels collide: ${collisions.join('; ')}`)
  const total = initialTotal(spec)
  return [...spec.thresholds]
    .sort((a, b) => b - a)
    .map((fraction) => ({
      label: thresholdLabel(fraction),
      fraction,
      capacity: Math.min(total, Math.floor(total * fraction + 1e-9))
    }))
}
