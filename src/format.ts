export function formatPercent(value: number, digits = 1) {
  return `${(value * 100).toFixed(digits)}%`
}

export function formatCount(value: number) {
  return value.toFixed(2)
}

/** Roughly printf's `%.4g`: four significant digits, no trailing zeros. */
export function formatPValue(value: number) {
  return String(Number(value.toPrecision(4)))
}

export function formatPull(value: number) {
  return Number.isFinite(value) ? value.toFixed(1) : 'never'
}
