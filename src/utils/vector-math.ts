/**
 * Vector helpers for embedding comparison and SQLite BLOB storage.
 */

/** Magnitude below which an embedding is treated as a failed/mock vector. */
export const DEGENERATE_NORM_THRESHOLD = 1e-8;

export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let sum = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function norm(a: ArrayLike<number>): number {
  return Math.sqrt(dot(a, a));
}

/**
 * True when the vector is empty, contains a non-finite component, or has
 * near-zero magnitude. Such vectors never take part in similarity ranking.
 */
export function isDegenerate(
  a: ArrayLike<number>,
  threshold: number = DEGENERATE_NORM_THRESHOLD,
): boolean {
  if (a.length === 0) return true;
  for (let i = 0; i < a.length; i++) {
    if (!Number.isFinite(a[i])) return true;
  }
  return norm(a) < threshold;
}

/**
 * Cosine similarity in [-1, 1]. Returns 0 when either side is degenerate or
 * the dimensions differ.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) return 0;
  const na = norm(a);
  const nb = norm(b);
  if (na < DEGENERATE_NORM_THRESHOLD || nb < DEGENERATE_NORM_THRESHOLD) return 0;
  // Clamp for floating point drift
  return Math.max(-1, Math.min(1, dot(a, b) / (na * nb)));
}

/**
 * Serialize an embedding as little-endian Float32 for a BLOB column.
 * A 1024-dimension vector takes 4KB.
 */
export function serializeEmbedding(embedding: ArrayLike<number>): Buffer {
  return Buffer.from(new Float32Array(Array.from(embedding)).buffer);
}

/**
 * Inverse of serializeEmbedding. Copies the bytes first so an unaligned
 * byteOffset from the SQLite driver cannot break the Float32Array view.
 */
export function deserializeEmbedding(buffer: Buffer): number[] {
  const copy = new Uint8Array(buffer.length);
  copy.set(buffer);
  const float32 = new Float32Array(copy.buffer, 0, Math.floor(copy.length / Float32Array.BYTES_PER_ELEMENT));
  return Array.from(float32);
}
