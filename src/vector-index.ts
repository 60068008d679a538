import { DimensionMismatchError } from "./errors";
import type { SearchHit } from "./types";

/**
 * Vector engine contract: stores fixed-dimension vectors by ordinal and
 * answers top-k inner-product queries. Callers normalize vectors first, so
 * scores are cosine similarities.
 */
export interface VectorIndex {
  readonly dimension: number;
  size(): number;
  /** Append a vector at ordinal `size()`. */
  add(vector: Float32Array): void;
  /**
   * Top-`k` entries by inner product, highest first. Engines may pad the
   * result with `index < 0` placeholders when fewer than `k` entries exist.
   */
  search(query: Float32Array, k: number): SearchHit[];
  /** Row-major copy of the stored vectors (`size() * dimension` floats). */
  vectors(): Float32Array;
}

/** Factory used by the index store to create a fresh engine per build. */
export type VectorIndexFactory = (dimension: number, vectors?: Float32Array) => VectorIndex;

/**
 * Return a unit-length copy of `v`. A zero vector is returned unchanged
 * (as a copy), since it has no direction to preserve.
 */
export function l2Normalize(v: Float32Array): Float32Array {
  let sum = 0;
  for (let i = 0; i < v.length; i++) sum += v[i] * v[i];
  const out = new Float32Array(v);
  if (sum === 0) return out;
  const inv = 1 / Math.sqrt(sum);
  for (let i = 0; i < out.length; i++) out[i] *= inv;
  return out;
}

export function l2Norm(v: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < v.length; i++) sum += v[i] * v[i];
  return Math.sqrt(sum);
}

/**
 * Exact (brute-force) inner-product index over a contiguous Float32 matrix.
 * Every query scans all rows; fine for corpora of tens of thousands of chunks.
 */
export class FlatInnerProductIndex implements VectorIndex {
  public readonly dimension: number;
  private data: Float32Array;
  private count: number;

  /**
   * @param dimension Vector length shared by every entry.
   * @param vectors Optional row-major matrix to start from (length must be a
   *                multiple of `dimension`).
   */
  public constructor(dimension: number, vectors?: Float32Array) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new RangeError(`Vector dimension must be a positive integer (got ${dimension})`);
    }
    this.dimension = dimension;
    if (vectors) {
      if (vectors.length % dimension !== 0) {
        throw new DimensionMismatchError(dimension, vectors.length % dimension);
      }
      this.data = new Float32Array(vectors);
      this.count = vectors.length / dimension;
    } else {
      this.data = new Float32Array(dimension * 16);
      this.count = 0;
    }
  }

  public size(): number {
    return this.count;
  }

  public add(vector: Float32Array): void {
    if (vector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, vector.length);
    }
    const needed = (this.count + 1) * this.dimension;
    if (needed > this.data.length) {
      const grown = new Float32Array(Math.max(needed, this.data.length * 2));
      grown.set(this.data.subarray(0, this.count * this.dimension));
      this.data = grown;
    }
    this.data.set(vector, this.count * this.dimension);
    this.count++;
  }

  public search(query: Float32Array, k: number): SearchHit[] {
    if (query.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, query.length);
    }
    const scored: SearchHit[] = [];
    for (let row = 0; row < this.count; row++) {
      const base = row * this.dimension;
      let dot = 0;
      for (let j = 0; j < this.dimension; j++) dot += this.data[base + j] * query[j];
      scored.push({ score: dot, index: row });
    }
    // descending score; equal scores keep insertion order
    scored.sort((a, b) => b.score - a.score || a.index - b.index);
    return scored.slice(0, Math.max(0, k));
  }

  public vectors(): Float32Array {
    return this.data.slice(0, this.count * this.dimension);
  }
}

export const flatIndexFactory: VectorIndexFactory = (dimension, vectors) =>
  new FlatInnerProductIndex(dimension, vectors);
