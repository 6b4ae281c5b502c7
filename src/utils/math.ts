/**
 * Vector math helpers.
 *
 * Iterative on purpose: Math.max(...arr) and friends spread every element
 * as an argument and overflow the stack on large arrays.
 */

export type NumericVector = ArrayLike<number>;

export function dot(a: NumericVector, b: NumericVector): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function l2Norm(v: NumericVector): number {
  let sum = 0;
  for (let i = 0; i < v.length; i++) {
    sum += v[i] * v[i];
  }
  return Math.sqrt(sum);
}

/**
 * Cosine similarity in [-1, 1]. Zero vectors have no direction: 0.
 */
export function cosineSimilarity(a: NumericVector, b: NumericVector): number {
  const denom = l2Norm(a) * l2Norm(b);
  if (denom === 0) return 0;
  const sim = dot(a, b) / denom;
  return Math.max(-1, Math.min(1, sim));
}

/**
 * Unit-length copy. A zero vector is returned unchanged.
 */
export function normalize(v: NumericVector): Float32Array {
  const out = Float32Array.from(v);
  const norm = l2Norm(out);
  if (norm === 0) return out;
  for (let i = 0; i < out.length; i++) {
    out[i] /= norm;
  }
  return out;
}

/**
 * Element-wise mean of equally sized vectors.
 */
export function meanVector(vectors: NumericVector[]): Float32Array {
  if (vectors.length === 0) {
    throw new RangeError('meanVector requires at least one vector');
  }
  const dim = vectors[0].length;
  const out = new Float32Array(dim);
  for (const v of vectors) {
    if (v.length !== dim) {
      throw new RangeError(`Vector length mismatch: ${v.length} vs ${dim}`);
    }
    for (let i = 0; i < dim; i++) {
      out[i] += v[i];
    }
  }
  for (let i = 0; i < dim; i++) {
    out[i] /= vectors.length;
  }
  return out;
}

export function isFiniteVector(v: NumericVector): boolean {
  for (let i = 0; i < v.length; i++) {
    if (!Number.isFinite(v[i])) return false;
  }
  return true;
}
