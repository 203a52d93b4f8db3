function maxAbs(v: readonly number[]): number {
  let max = 0;
  for (const x of v) max = Math.max(max, Math.abs(x));
  return max;
}

/**
 * Cosine similarity in [-1, 1]. Zero when either vector has zero magnitude,
 * the lengths differ or a component is not finite. Each vector is scaled by its
 * largest component first so the sums cannot overflow.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) return 0;
  const scaleA = maxAbs(a);
  const scaleB = maxAbs(b);
  if (scaleA === 0 || scaleB === 0 || !Number.isFinite(scaleA) || !Number.isFinite(scaleB)) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = (a[i] ?? 0) / scaleA;
    const y = (b[i] ?? 0) / scaleB;
    dotProduct += x * y;
    normA += x * x;
    normB += y * y;
  }
  const score = dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
  return Number.isFinite(score) ? score : 0;
}

export interface Ranked<T> {
  item: T;
  score: number;
}

/**
 * Score every candidate against the query, sort by descending similarity and
 * keep the first `limit`. The sort is stable, so ties keep scan order.
 */
export function rankBySimilarity<T extends { vector: readonly number[] }>(
  query: readonly number[],
  candidates: readonly T[],
  limit: number,
): Ranked<T>[] {
  if (limit <= 0) return [];
  return candidates
    .map(item => ({ item, score: cosineSimilarity(query, item.vector) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, limit);
}
