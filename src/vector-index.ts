import { ConfigurationError, DimensionMismatchError } from "./errors";
import { indexLogger as log } from "./logger";
import { IndexStore } from "./persistence";
import type { Chunk, IndexEntry, SearchHit, Vector } from "./types";

/** Squared Euclidean distance; both vectors must share a width. */
export function squaredL2(a: Vector, b: Vector): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return sum;
}

/** Map a distance onto (0, 1], higher is better; 0 distance scores 1. */
export function distanceToScore(distance: number): number {
  return 1 / (1 + distance);
}

/**
 * Exact nearest-neighbor index over (vector, chunk) entries.
 *
 * Entries are stored as one append-only sequence of pairs, so a vector can
 * never exist without its chunk. The dimension is fixed by the constructor or
 * by the first vector ever stored; every later vector must match it.
 */
export class VectorIndex {
  private entriesList: IndexEntry[] = [];
  private dim: number | null;

  public constructor(dimension?: number) {
    if (dimension !== undefined && (!Number.isInteger(dimension) || dimension <= 0)) {
      throw new ConfigurationError(`Invalid index dimension: ${dimension}`);
    }
    this.dim = dimension ?? null;
  }

  /** Established vector width, or null before anything was added. */
  public get dimension(): number | null {
    return this.dim;
  }

  public get size(): number {
    return this.entriesList.length;
  }

  public entries(): readonly IndexEntry[] {
    return this.entriesList;
  }

  public chunks(): Chunk[] {
    return this.entriesList.map((e) => e.chunk);
  }

  public get(position: number): IndexEntry | undefined {
    return this.entriesList[position];
  }

  /**
   * One-shot initialization: replaces any existing entries. The dimension
   * comes from the vectors (or the constructor when `vectors` is empty).
   */
  public create(vectors: readonly Vector[], chunks: readonly Chunk[]): void {
    VectorIndex.assertPaired(vectors, chunks);
    const dimension = vectors.length > 0 ? vectors[0].length : this.dim;
    if (dimension === null || dimension <= 0) {
      throw new ConfigurationError("Cannot create an index without vectors or an explicit dimension");
    }
    VectorIndex.assertWidth(vectors, dimension);
    this.dim = dimension;
    this.entriesList = vectors.map((vector, i) => ({ vector, chunk: chunks[i] }));
    log.info({ vectors: this.size, dimension }, "Created index");
  }

  /**
   * Append vectors with their chunks. Every width is checked before anything
   * is stored, so a failed call leaves the index untouched.
   *
   * @returns Positions assigned to the new entries, usable with {@link get}.
   */
  public add(vectors: readonly Vector[], chunks: readonly Chunk[]): number[] {
    VectorIndex.assertPaired(vectors, chunks);
    if (vectors.length === 0) return [];
    const dimension = this.dim ?? vectors[0].length;
    if (dimension <= 0) throw new ConfigurationError("Cannot add zero-width vectors");
    VectorIndex.assertWidth(vectors, dimension);

    if (this.dim === null) {
      this.dim = dimension;
      log.info({ dimension }, "Index dimension established");
    }
    const first = this.entriesList.length;
    for (let i = 0; i < vectors.length; i++) {
      this.entriesList.push({ vector: vectors[i], chunk: chunks[i] });
    }
    log.debug({ added: vectors.length, total: this.size }, "Added vectors");
    return vectors.map((_, i) => first + i);
  }

  /**
   * Return up to `k` hits ranked best-first by squared Euclidean distance.
   * Ties keep insertion order. An empty index yields `[]`.
   */
  public search(query: Vector, k: number): SearchHit[] {
    const limit = Math.floor(k);
    if (this.entriesList.length === 0 || !(limit > 0)) return [];
    if (this.dim !== null && query.length !== this.dim) {
      throw new DimensionMismatchError(this.dim, query.length, "query");
    }
    const scored = this.entriesList.map((entry, i) => ({ i, d: squaredL2(query, entry.vector) }));
    scored.sort((a, b) => a.d - b.d);
    return scored.slice(0, limit).map(({ i, d }) => ({
      chunk: this.entriesList[i].chunk,
      score: distanceToScore(d),
    }));
  }

  /** Drop every entry and forget the dimension unless one was fixed at construction. */
  public clear(dimension?: number): void {
    this.entriesList = [];
    this.dim = dimension ?? null;
  }

  /** Persist both artifacts (vectors + chunk metadata) into `dir`. */
  public async save(dir: string): Promise<void> {
    await new IndexStore(dir).save(this.dim, this.entriesList);
  }

  /**
   * Restore a previously saved index from `dir`, replacing current entries.
   * Returns false (and leaves the index untouched) when nothing usable is there.
   */
  public async load(dir: string): Promise<boolean> {
    const loaded = await new IndexStore(dir).load();
    if (!loaded) return false;
    this.dim = loaded.dimension;
    this.entriesList = loaded.entries;
    return true;
  }

  private static assertPaired(vectors: readonly Vector[], chunks: readonly Chunk[]): void {
    if (vectors.length !== chunks.length) {
      throw new ConfigurationError(
        `Vector/chunk count mismatch: ${vectors.length} vectors, ${chunks.length} chunks`,
      );
    }
  }

  private static assertWidth(vectors: readonly Vector[], dimension: number): void {
    for (const v of vectors) {
      if (v.length !== dimension) throw new DimensionMismatchError(dimension, v.length);
    }
  }
}
