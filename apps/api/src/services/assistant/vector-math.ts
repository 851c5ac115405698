export function magnitude(vector: readonly number[]): number {
  let sum = 0
  for (const value of vector) sum += value * value
  return Math.sqrt(sum)
}

/**
 * Scale to unit length. A zero-magnitude vector is returned unchanged.
 */
export function l2Normalize(vector: number[]): number[] {
  const norm = magnitude(vector)
  if (norm === 0) return vector
  return vector.map(value => value / norm)
}

/**
 * dot(a, b) / (|a| |b|); 0 when either vector has zero norm or the lengths
 * differ.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0

  let dot = 0
  let magA = 0
  let magB = 0
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0
    const y = b[i] ?? 0
    dot += x * y
    magA += x * x
    magB += y * y
  }

  const denom = Math.sqrt(magA) * Math.sqrt(magB)
  return denom === 0 ? 0 : dot / denom
}
