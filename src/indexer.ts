import { throwIfAborted } from "./async";
import { Chunker, validateChunkParams } from "./chunker";
import type { Embedder } from "./embeddings";
import { normalize } from "./normalizer";
import type { StatusManager } from "./status";
import type {
  CancelOptions,
  Chunk,
  DistanceMetric,
  Document,
  IndexEntry,
  TextNormalizer,
} from "./types";
import { InMemoryVectorIndex, type VectorIndex } from "./vector-index";

/**
 * Collaborators for an {@link IndexBuilder}. Only `embedder` is required.
 */
export interface IndexBuilderOptions {
  embedder: Embedder;
  /** Metric of the indexes this builder creates (default euclidean). */
  metric?: DistanceMetric;
  normalize?: TextNormalizer;
  chunker?: Chunker;
  /** Factory for the target index; swap in an adapter for another backend. */
  createIndex?: (metric: DistanceMetric) => VectorIndex;
  /** Receives page / chunk totals and embedding progress. */
  status?: StatusManager;
  verbose?: boolean;
}

/**
 * Offline phase: turns a whole document into a populated {@link VectorIndex}.
 *
 * Pages are normalized and chunked in order with a document-wide
 * `sequenceIndex`, all chunk texts are embedded (batched and concurrent inside
 * the embedder), and the pairs go into a fresh index as one batch. Nothing is
 * returned unless every chunk was embedded and inserted.
 */
export class IndexBuilder {
  private readonly embedder: Embedder;
  private readonly metric: DistanceMetric;
  private readonly normalize: TextNormalizer;
  private readonly chunker: Chunker;
  private readonly createIndex: (metric: DistanceMetric) => VectorIndex;
  private readonly status?: StatusManager;
  private readonly verbose: boolean;

  public constructor(opts: IndexBuilderOptions) {
    this.embedder = opts.embedder;
    this.metric = opts.metric ?? "euclidean";
    this.normalize = opts.normalize ?? normalize;
    this.chunker = opts.chunker ?? new Chunker();
    this.createIndex = opts.createIndex ?? ((metric) => new InMemoryVectorIndex(metric));
    this.status = opts.status;
    this.verbose = !!opts.verbose;
  }

  /** Normalize and split every page; sequence indices run across pages. */
  public chunkDocument(document: Document, chunkSize: number, chunkOverlap: number): Chunk[] {
    validateChunkParams(chunkSize, chunkOverlap);
    const chunks: Chunk[] = [];
    document.pages.forEach((page, pageIndex) => {
      const pageChunks = this.chunker.split(this.normalize(page), chunkSize, chunkOverlap, {
        pageIndex,
        sequenceStart: chunks.length,
      });
      chunks.push(...pageChunks);
      if (this.verbose) {
        console.error(`[RAG][verbose] Page ${pageIndex}: ${pageChunks.length} chunks`);
      }
    });
    return chunks;
  }

  /**
   * Build a fresh index for `document`.
   *
   * @throws {InvalidConfigurationError} before any work if the chunk
   *   parameters are invalid.
   * @throws whatever the embedder or the index raises; no index is produced.
   */
  public async build(
    document: Document,
    chunkSize: number,
    chunkOverlap: number,
    opts: CancelOptions = {},
  ): Promise<VectorIndex> {
    validateChunkParams(chunkSize, chunkOverlap);
    throwIfAborted(opts.signal);
    try {
      const chunks = this.chunkDocument(document, chunkSize, chunkOverlap);
      console.error(
        `[RAG] Created ${chunks.length} chunks from ${document.pages.length} pages. Generating embeddings...`,
      );
      this.status?.setIndexTotals(document.pages.length, chunks.length);

      const vectors = await this.embedder.embedMany(
        chunks.map((c) => c.text),
        {
          signal: opts.signal,
          onProgress: (done) => {
            this.status?.setEmbedded(done);
            if (this.verbose) {
              const pct = ((done / Math.max(1, chunks.length)) * 100).toFixed(1);
              console.error(`[RAG][verbose] Embedding progress: ${done}/${chunks.length} (${pct}%)`);
            }
          },
        },
      );
      throwIfAborted(opts.signal);

      const entries: IndexEntry[] = chunks.map((chunk, i) => ({ chunk, vector: vectors[i] }));
      const index = this.createIndex(this.metric);
      index.add(entries);
      console.error(`[RAG] Embeddings ready. Indexed ${index.size} chunks.`);
      this.status?.markReady();
      return index;
    } catch (e) {
      this.status?.markFailed(e);
      throw e;
    }
  }
}
