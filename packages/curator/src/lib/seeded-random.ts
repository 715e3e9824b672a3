/**
 * Deterministic PRNG for clustering
 * Same seed, same corpus, same assignments
 */

export type RandomSource = () => number

/**
 * mulberry32: 32-bit state, uniform floats in [0, 1)
 */
export function mulberry32(seed: number): RandomSource {
  let t = seed >>> 0
  return () => {
    t += 0x6d2b79f5
    let r = Math.imul(t ^ (t >>> 15), 1 | t)
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r)
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Pick an index with probability proportional to its weight.
 * Falls back to a uniform pick when every weight is zero.
 */
export function weightedIndex(weights: number[], random: RandomSource): number {
  const total = weights.reduce((sum, w) => sum + w, 0)
  if (total <= 0) {
    return Math.min(weights.length - 1, Math.floor(random() * weights.length))
  }

  let target = random() * total
  for (let i = 0; i < weights.length; i++) {
    target -= weights[i]
    if (target < 0) return i
  }
  // Float drift: land on the last positive weight
  for (let i = weights.length - 1; i >= 0; i--) {
    if (weights[i] > 0) return i
  }
  return weights.length - 1
}
