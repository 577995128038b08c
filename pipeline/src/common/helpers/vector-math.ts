export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function norm(vector: readonly number[]): number {
  return Math.sqrt(dot(vector, vector));
}

/** Scales to unit length; a zero vector is returned unchanged. */
export function l2Normalize(vector: readonly number[]): number[] {
  const length = norm(vector);
  if (length === 0) {
    return [...vector];
  }
  return vector.map((value) => value / length);
}

/** Cosine similarity in [-1, 1]; 0 when either side is a zero vector. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const denominator = norm(a) * norm(b);
  if (denominator === 0) {
    return 0;
  }
  return Math.max(-1, Math.min(1, dot(a, b) / denominator));
}
