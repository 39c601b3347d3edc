import { APP_VERSION } from "./config";

/**
 * Aggregated counters for the indexing / embedding pipeline.
 * All values are non-negative integers updated in place.
 */
export interface IndexingStatus {
  /** Pages in the loaded document. */
  pagesLoaded: number;
  /** Chunks produced after splitting every page. */
  chunksTotal: number;
  /** Chunks whose embeddings have been generated (or restored from the store). */
  chunksEmbedded: number;
}

/**
 * In-memory snapshot of server lifecycle + indexing progress, served by the
 * HTTP transport's /health endpoint.
 *
 * ready = true only once the index is fully built (or restored) and queryable.
 */
export interface ServerStatus {
  /** Package version (kept in sync with package.json). */
  version: string;
  /** Path of the document being indexed. */
  documentPath: string;
  /** Embedding model identifier (empty before the embedder is created). */
  modelName: string;
  /** 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  /** ISO timestamp when the StatusManager was created. */
  startedAt: string;
  /** Last indexing failure, if any. */
  lastError?: string;
  indexing: IndexingStatus;
}

/**
 * Class wrapper around mutable server status state. One instance is created at
 * startup and handed to the builder and the transports.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      documentPath: initial?.documentPath ?? "",
      modelName: initial?.modelName ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      indexing: initial?.indexing ?? {
        pagesLoaded: 0,
        chunksTotal: 0,
        chunksEmbedded: 0,
      },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setDocumentPath(p: string) {
    this.data.documentPath = p;
  }

  public setModelName(name: string) {
    this.data.modelName = name;
  }

  /** Record page + chunk totals; resets the embedded counter for a fresh build. */
  public setIndexTotals(pages: number, chunks: number) {
    this.data.indexing.pagesLoaded = pages;
    this.data.indexing.chunksTotal = chunks;
    this.data.indexing.chunksEmbedded = 0;
    this.data.ready = false;
    delete this.data.lastError;
  }

  /** Set the number of chunks with embeddings (monotonic within a build). */
  public setEmbedded(count: number) {
    this.data.indexing.chunksEmbedded = Math.max(this.data.indexing.chunksEmbedded, count);
  }

  public markReady() {
    this.data.ready = true;
  }

  public markFailed(error: unknown) {
    this.data.ready = false;
    this.data.lastError = error instanceof Error ? error.message : String(error);
  }

  /** Live reference to current status (treat as read-only). */
  public getStatus(): Readonly<ServerStatus> {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}
