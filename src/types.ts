/**
 * Shared data model for the indexing + retrieval layers.
 */

/** A loaded document: page texts in the order the loader produced them. */
export interface Document {
  /** Where the document came from (file path or caller-supplied label). */
  readonly source: string;
  /** Raw page texts, one entry per page. */
  readonly pages: readonly string[];
}

/**
 * A contiguous slice of one page's normalized text. `text` always equals
 * `normalizedPage.slice(startOffset, endOffset)`.
 */
export interface Chunk {
  readonly text: string;
  /** 0-based index of the page the chunk was cut from. */
  readonly sourcePageIndex: number;
  /** Inclusive start offset within the normalized page text. */
  readonly startOffset: number;
  /** Exclusive end offset within the normalized page text. */
  readonly endOffset: number;
  /** Position among all chunks of the document (page order first). */
  readonly sequenceIndex: number;
}

/** Fixed-length embedding. Length is fixed per embedder instance. */
export type EmbeddingVector = Float32Array;

/** One stored (chunk, vector) pair. */
export interface IndexEntry {
  readonly chunk: Chunk;
  readonly vector: EmbeddingVector;
}

/** Query hit. Smaller distance means closer, whatever the metric. */
export interface ScoredChunk {
  readonly chunk: Chunk;
  readonly distance: number;
}

export type DistanceMetric = "euclidean" | "cosine";

export const DISTANCE_METRICS: readonly DistanceMetric[] = ["euclidean", "cosine"];

/** Pure text transform applied to every page before chunking. */
export type TextNormalizer = (text: string) => string;

/** Cooperative cancellation hook accepted by long-running operations. */
export interface CancelOptions {
  signal?: AbortSignal;
}

/**
 * Build a {@link Document} from raw text. Form-feed characters (`\f`), which
 * text extractors emit between pages, delimit the pages.
 */
export function documentFromText(text: string, source: string): Document {
  const pages = text.length === 0 ? [] : text.split("\f");
  return Object.freeze({ source, pages: Object.freeze(pages) });
}
