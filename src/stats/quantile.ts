/**
 * Empirical quantile of an ascending-sorted sample, interpolating linearly
 * between the two order statistics around rank `p * (n - 1)`.
 *
 * `p = 0` is the first value and `p = 1` the last. An empty sample has no
 * quantiles and yields NaN.
 */
export function quantile(p: number, sorted: readonly number[]): number {
  if (!(p >= 0 && p <= 1)) {
    throw new RangeError(`quantile p must be within [0, 1], got ${p}`)
  }
  const n = sorted.length
  if (n === 0) {
    return NaN
  }

  const rank = p * (n - 1)
  const lower = Math.floor(rank)
  const upper = Math.ceil(rank)
  const fraction = rank - lower
  if (fraction === 0 || lower === upper) {
    return sorted[lower]
  }
  return sorted[lower] + (sorted[upper] - sorted[lower]) * fraction
}

/**
 * Copy of the values sorted ascending by numeric value
 */
export function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b)
}
