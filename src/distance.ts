import type { DistanceMetric, EmbeddingVector } from "./types";

/** L2 distance. Callers guarantee equal lengths. */
export function euclidean(a: EmbeddingVector, b: EmbeddingVector): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}

/**
 * Cosine similarity in [-1, 1]. A zero vector has no direction, so its
 * similarity to anything is 0.
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  let dot = 0,
    na = 0,
    nb = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

/** Cosine distance `1 - similarity`, in [0, 2]. */
export function cosineDistance(a: EmbeddingVector, b: EmbeddingVector): number {
  return 1 - cosineSimilarity(a, b);
}

export function distanceFunction(
  metric: DistanceMetric,
): (a: EmbeddingVector, b: EmbeddingVector) => number {
  return metric === "cosine" ? cosineDistance : euclidean;
}
