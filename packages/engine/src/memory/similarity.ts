// ──────────────────────────────────────────────────
// Vector math
// ──────────────────────────────────────────────────

export function vectorNorm(v: readonly number[]): number {
  let sum = 0
  for (const x of v) sum += x * x
  return Math.sqrt(sum)
}

/**
 * Cosine similarity with precomputed norms. Zero vectors and mismatched
 * dimensions score 0.
 */
export function cosineWithNorms(
  a: readonly number[],
  normA: number,
  b: readonly number[],
  normB: number,
): number {
  if (a.length !== b.length || a.length === 0) return 0

  const denom = normA * normB
  if (denom === 0) return 0

  let dot = 0
  for (let i = 0; i < a.length; i++) {
    dot += (a[i] ?? 0) * (b[i] ?? 0)
  }

  // Clamp rounding drift so rescaling stays inside [0, 1]
  return Math.max(-1, Math.min(1, dot / denom))
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  return cosineWithNorms(a, vectorNorm(a), b, vectorNorm(b))
}
