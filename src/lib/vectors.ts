/**
 * Vector math and serialization shared by both storage backends.
 *
 * Ranking convention everywhere: ascending Euclidean (L2) distance,
 * ties broken by ascending insertion sequence.
 */

import { DimensionMismatchError, ValidationError } from './errors.js';

export function l2Distance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}

/**
 * Scale a vector to unit length. Never applied implicitly: embedders that
 * want normalized output call it themselves. Zero vectors are returned as-is.
 */
export function normalizeVector(vector: ArrayLike<number>): number[] {
  let norm = 0;
  for (let i = 0; i < vector.length; i++) norm += vector[i] * vector[i];
  norm = Math.sqrt(norm);
  const out = Array.from(vector);
  if (norm === 0) return out;
  return out.map((v) => v / norm);
}

/**
 * Same vector once both sides are rounded to float32, the precision the
 * stores keep.
 */
export function sameStoredVector(a: ArrayLike<number>, b: ArrayLike<number>): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (Math.fround(a[i]) !== Math.fround(b[i])) return false;
  }
  return true;
}

/**
 * Reject vectors of the wrong size or with non-finite components.
 * Never pads or truncates.
 */
export function assertDimensions(vector: ArrayLike<number>, expected: number): void {
  if (vector.length !== expected) {
    throw new DimensionMismatchError(expected, vector.length);
  }
  for (let i = 0; i < vector.length; i++) {
    if (!Number.isFinite(vector[i])) {
      throw new ValidationError('Embedding contains NaN or Infinity values', { index: i });
    }
  }
}

// ---------- Serialization ----------

/**
 * number[] -> little-endian Float32 bytes (BLOB / BYTEA column)
 */
export function encodeVector(vector: ArrayLike<number>): Buffer {
  const float32 = Float32Array.from(vector);
  return Buffer.from(float32.buffer, float32.byteOffset, float32.byteLength);
}

/**
 * Float32 bytes -> number[]. Copies first: Float32Array needs 4-byte alignment.
 */
export function decodeVector(bytes: Uint8Array): number[] {
  if (bytes.byteLength % Float32Array.BYTES_PER_ELEMENT !== 0) {
    throw new ValidationError(`Vector blob length ${bytes.byteLength} is not a multiple of 4`);
  }
  const aligned = new Uint8Array(bytes.byteLength);
  aligned.set(bytes);
  return Array.from(new Float32Array(aligned.buffer));
}

export function vectorToBase64(vector: ArrayLike<number>): string {
  return encodeVector(vector).toString('base64');
}

export function vectorFromBase64(encoded: string): number[] {
  return decodeVector(Buffer.from(encoded, 'base64'));
}
