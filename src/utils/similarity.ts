/**
 * Vector similarity helpers
 *
 * Embeddings run to thousands of components, so dot products and norms are
 * accumulated with Neumaier compensated summation.
 */

const NEAR_ZERO_NORM = 1e-10;

/**
 * Compensated (Neumaier) sum of f(i) for i in [0, length)
 */
function compensatedSum(length: number, term: (i: number) => number): number {
  let sum = 0;
  let compensation = 0;

  for (let i = 0; i < length; i += 1) {
    const value = term(i);
    const next = sum + value;
    if (Math.abs(sum) >= Math.abs(value)) {
      compensation += sum - next + value;
    } else {
      compensation += value - next + sum;
    }
    sum = next;
  }

  return sum + compensation;
}

/**
 * Cosine similarity clamped to [-1, 1]
 *
 * Returns 0 when either norm is near zero or the vectors are empty.
 * Vectors of different length are compared over the shared prefix.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  if (length === 0) return 0;

  const dot = compensatedSum(length, (i) => a[i] * b[i]);
  const normA = Math.sqrt(compensatedSum(length, (i) => a[i] * a[i]));
  const normB = Math.sqrt(compensatedSum(length, (i) => b[i] * b[i]));

  if (normA < NEAR_ZERO_NORM || normB < NEAR_ZERO_NORM) {
    return 0;
  }

  return Math.max(-1, Math.min(1, dot / (normA * normB)));
}

/**
 * Mean cosine similarity of `embedding` against every member; 0 for no members
 */
export function averageSimilarity(embedding: readonly number[], members: readonly (readonly number[])[]): number {
  if (members.length === 0) return 0;
  let total = 0;
  for (const member of members) {
    total += cosineSimilarity(embedding, member);
  }
  return total / members.length;
}
