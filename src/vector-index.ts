import { distanceFunction } from "./distance";
import { DimensionMismatchError, InvalidConfigurationError } from "./errors";
import type {
  Chunk,
  DistanceMetric,
  EmbeddingVector,
  IndexEntry,
  ScoredChunk,
} from "./types";

/**
 * Nearest-neighbour store over (chunk, vector) pairs. Entries are write-once;
 * the only way to drop them is to build a new index.
 */
export interface VectorIndex {
  /** Fixed for the lifetime of the index. */
  readonly metric: DistanceMetric;
  /** Length shared by every stored vector; undefined while empty. */
  readonly dimension: number | undefined;
  readonly size: number;
  /**
   * Insert a batch. Either the whole batch becomes visible to queries or,
   * on error, none of it does.
   *
   * @throws {DimensionMismatchError} if any vector's length disagrees with the
   *   stored vectors or with the rest of the batch.
   */
  add(entries: readonly IndexEntry[]): void;
  /**
   * The `min(k, size)` entries closest to `vector`, by increasing distance;
   * ties go to the lower `sequenceIndex`, then to the earlier insertion.
   *
   * @throws {InvalidConfigurationError} if `k` is not a positive integer.
   * @throws {DimensionMismatchError} if `vector` has the wrong length.
   */
  query(vector: EmbeddingVector, k: number): ScoredChunk[];
  /** Stored entries in insertion order, with vectors copied out. */
  entries(): readonly IndexEntry[];
}

/** Reject `k` values a query cannot honour. */
export function validateTopK(k: number): void {
  if (!Number.isInteger(k) || k <= 0) {
    throw new InvalidConfigurationError(`k must be a positive integer (got ${k})`);
  }
}

/**
 * Exact in-process index: every query scans all entries. Adequate for one
 * document's worth of chunks.
 *
 * Published state is an immutable snapshot swapped in one assignment, so a
 * query running alongside an `add` sees either all or none of that batch.
 */
export class InMemoryVectorIndex implements VectorIndex {
  public readonly metric: DistanceMetric;
  private readonly distance: (a: EmbeddingVector, b: EmbeddingVector) => number;
  private snapshot: readonly IndexEntry[] = [];
  private dim: number | undefined;

  public constructor(metric: DistanceMetric = "euclidean") {
    this.metric = metric;
    this.distance = distanceFunction(metric);
  }

  public get dimension(): number | undefined {
    return this.dim;
  }

  public get size(): number {
    return this.snapshot.length;
  }

  public entries(): readonly IndexEntry[] {
    return this.snapshot.map((e) => ({ chunk: e.chunk, vector: Float32Array.from(e.vector) }));
  }

  public add(entries: readonly IndexEntry[]): void {
    if (entries.length === 0) return;
    const expected = this.dim ?? entries[0].vector.length;
    if (expected === 0) {
      throw new DimensionMismatchError(1, 0, "Cannot index zero-length vectors");
    }
    for (const e of entries) {
      if (e.vector.length !== expected) {
        throw new DimensionMismatchError(expected, e.vector.length, "Vector index dimension mismatch");
      }
    }
    // Copy vectors so later writes by the caller cannot reach stored entries.
    const added = entries.map((e) =>
      Object.freeze({ chunk: Object.freeze({ ...e.chunk }), vector: Float32Array.from(e.vector) }),
    );
    this.snapshot = Object.freeze([...this.snapshot, ...added]);
    this.dim = expected;
  }

  public query(vector: EmbeddingVector, k: number): ScoredChunk[] {
    validateTopK(k);
    const entries = this.snapshot;
    if (entries.length === 0) return [];
    if (vector.length !== this.dim) {
      throw new DimensionMismatchError(this.dim ?? 0, vector.length, "Query vector dimension mismatch");
    }
    const scored = entries.map((e, insertion) => ({
      chunk: e.chunk,
      distance: this.distance(vector, e.vector),
      insertion,
    }));
    scored.sort(
      (a, b) =>
        a.distance - b.distance ||
        a.chunk.sequenceIndex - b.chunk.sequenceIndex ||
        a.insertion - b.insertion,
    );
    return scored.slice(0, k).map(({ chunk, distance }) => ({ chunk, distance }));
  }
}

/** Chunks of a query result, dropping scores. */
export function chunksOf(results: readonly ScoredChunk[]): Chunk[] {
  return results.map((r) => r.chunk);
}
