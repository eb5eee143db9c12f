export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  const score = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  // float error can push identical vectors just past 1
  return Math.max(-1, Math.min(1, score));
}

export function meanVector(vectors: number[][]): number[] {
  if (vectors.length === 0) {
    return [];
  }
  const size = vectors[0].length;
  const out = new Array<number>(size).fill(0);
  for (const vector of vectors) {
    if (vector.length !== size) {
      throw new RangeError(
        `cannot average vectors of different sizes (${size} vs ${vector.length})`,
      );
    }
    for (let i = 0; i < size; i += 1) {
      out[i] += vector[i];
    }
  }
  return out.map((value) => value / vectors.length);
}

export function isUsableVector(value: number[]): boolean {
  return value.length > 0 && value.every((v) => Number.isFinite(v));
}
