import OpenAI from "openai";
import { mapWithConcurrency, retry, throwIfAborted, withTimeout } from "./async";
import {
  DimensionMismatchError,
  EmbeddingUnavailableError,
  InvalidConfigurationError,
  RagError,
  TimeoutError,
} from "./errors";
import type { CancelOptions, EmbeddingVector } from "./types";

/** Options accepted by {@link Embedder.embedMany}. */
export interface EmbedManyOptions extends CancelOptions {
  /** Called with the number of texts completed after each request returns. */
  onProgress?: (completed: number) => void;
}

/**
 * Uniform embedding capability. All vectors produced by one instance share the
 * same length for the instance's whole lifetime.
 */
export interface Embedder {
  /** Identifier of the underlying model (used for store compatibility checks). */
  readonly modelName: string;
  /** Locked dimensionality, or undefined before the first successful call. */
  readonly dimension: number | undefined;
  embed(text: string, opts?: CancelOptions): Promise<EmbeddingVector>;
  /** Batch form of {@link embed}; results are aligned with `texts`. */
  embedMany(texts: readonly string[], opts?: EmbedManyOptions): Promise<EmbeddingVector[]>;
}

export interface EmbedderOptions {
  modelName: string;
  /** Lock the dimensionality up front instead of on the first response. */
  expectedDimension?: number;
  /** Texts per provider request (default 64). */
  batchSize?: number;
  /** Provider requests in flight at once (default 4). */
  concurrency?: number;
  /** Deadline per provider request (default 30000). */
  timeoutMs?: number;
  /** Retries for transient failures (default 3). */
  maxRetries?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  verbose?: boolean;
}

/**
 * Shared request plumbing for embedding backends: batching, bounded
 * concurrency, per-request deadlines, transient retries with capped
 * exponential backoff, and validation of whatever the provider returns.
 * Subclasses only implement {@link requestEmbeddings}.
 */
export abstract class BaseEmbedder implements Embedder {
  public readonly modelName: string;
  private lockedDimension: number | undefined;
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryMaxDelayMs: number;
  protected readonly verbose: boolean;

  protected constructor(opts: EmbedderOptions) {
    this.modelName = opts.modelName;
    this.lockedDimension = opts.expectedDimension;
    this.batchSize = opts.batchSize ?? 64;
    this.concurrency = opts.concurrency ?? 4;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.maxRetries = opts.maxRetries ?? 3;
    this.retryBaseDelayMs = opts.retryBaseDelayMs ?? 500;
    this.retryMaxDelayMs = opts.retryMaxDelayMs ?? 8_000;
    this.verbose = !!opts.verbose;
    for (const [name, value] of [
      ["batchSize", this.batchSize],
      ["concurrency", this.concurrency],
      ["timeoutMs", this.timeoutMs],
    ] as const) {
      if (!Number.isInteger(value) || value <= 0) {
        throw new InvalidConfigurationError(`${name} must be a positive integer (got ${value})`);
      }
    }
    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 0) {
      throw new InvalidConfigurationError(
        `maxRetries must be a non-negative integer (got ${this.maxRetries})`,
      );
    }
    if (
      this.lockedDimension !== undefined &&
      (!Number.isInteger(this.lockedDimension) || this.lockedDimension <= 0)
    ) {
      throw new InvalidConfigurationError(
        `expectedDimension must be a positive integer (got ${this.lockedDimension})`,
      );
    }
  }

  public get dimension(): number | undefined {
    return this.lockedDimension;
  }

  /**
   * Fetch raw vectors for one batch. Must return exactly one vector per input,
   * in input order. The signal aborts on timeout or cancellation.
   */
  protected abstract requestEmbeddings(
    texts: readonly string[],
    signal: AbortSignal,
  ): Promise<ArrayLike<number>[]>;

  /** Whether a provider error is worth retrying. Timeouts always are. */
  protected isTransient(error: unknown): boolean {
    return error instanceof TimeoutError;
  }

  public async embed(text: string, opts: CancelOptions = {}): Promise<EmbeddingVector> {
    const [vector] = await this.embedBatch([text], opts.signal);
    return vector;
  }

  public async embedMany(
    texts: readonly string[],
    opts: EmbedManyOptions = {},
  ): Promise<EmbeddingVector[]> {
    throwIfAborted(opts.signal);
    if (texts.length === 0) return [];
    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      batches.push(texts.slice(i, i + this.batchSize));
    }
    let completed = 0;
    const results = await mapWithConcurrency(
      batches,
      this.concurrency,
      async (batch, _index, signal) => {
        const vectors = await this.embedBatch(batch, signal);
        completed += batch.length;
        opts.onProgress?.(completed);
        return vectors;
      },
      opts.signal,
    );
    return results.flat();
  }

  private async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<EmbeddingVector[]> {
    let raw: ArrayLike<number>[];
    try {
      raw = await retry(
        () =>
          withTimeout(
            this.timeoutMs,
            `Embedding request (${texts.length} texts, model ${this.modelName})`,
            (s) => this.requestEmbeddings(texts, s),
            signal,
          ),
        {
          retries: this.maxRetries,
          baseDelayMs: this.retryBaseDelayMs,
          maxDelayMs: this.retryMaxDelayMs,
          isTransient: (e) => this.isTransient(e),
          signal,
          onRetry: (e, attempt, delay) => {
            if (this.verbose) {
              console.error(
                `[RAG][verbose] Embedding retry ${attempt}/${this.maxRetries} in ${delay}ms:`,
                e instanceof Error ? e.message : e,
              );
            }
          },
        },
      );
    } catch (e) {
      if (e instanceof RagError) throw e;
      throw new EmbeddingUnavailableError(`Embedding model ${this.modelName} unavailable`, e);
    }
    if (!Array.isArray(raw) || raw.length !== texts.length) {
      throw new EmbeddingUnavailableError(
        `Embedding model ${this.modelName} returned ${Array.isArray(raw) ? raw.length : "no"} vectors for ${texts.length} inputs`,
      );
    }
    return raw.map((values) => this.validate(values));
  }

  private validate(values: ArrayLike<number> | undefined): EmbeddingVector {
    if (!values || values.length === 0) {
      throw new EmbeddingUnavailableError(`Embedding model ${this.modelName} returned an empty vector`);
    }
    const vector = Float32Array.from(values);
    for (let i = 0; i < vector.length; i++) {
      if (!Number.isFinite(vector[i])) {
        throw new EmbeddingUnavailableError(
          `Embedding model ${this.modelName} returned a non-finite value at position ${i}`,
        );
      }
    }
    if (this.lockedDimension === undefined) {
      this.lockedDimension = vector.length;
    } else if (vector.length !== this.lockedDimension) {
      throw new DimensionMismatchError(
        this.lockedDimension,
        vector.length,
        `Embedding model ${this.modelName} changed dimensionality`,
      );
    }
    return vector;
  }
}

/**
 * The slice of the OpenAI client used for embeddings. The real `OpenAI`
 * instance satisfies it; tests pass a stand-in.
 */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: { model: string; input: string[]; dimensions?: number },
      options?: { signal?: AbortSignal },
    ): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

export interface OpenAIEmbedderOptions extends EmbedderOptions {
  apiKey?: string;
  /** Any OpenAI-compatible endpoint (e.g. a local inference server). */
  baseURL?: string;
  /** Ask the model for shortened vectors (text-embedding-3 models only). */
  dimensions?: number;
  client?: EmbeddingsClient;
}

/** {@link Embedder} backed by the OpenAI embeddings endpoint. */
export class OpenAIEmbedder extends BaseEmbedder {
  private readonly client: EmbeddingsClient;
  private readonly dimensions?: number;

  public constructor(opts: OpenAIEmbedderOptions) {
    super({ ...opts, expectedDimension: opts.expectedDimension ?? opts.dimensions });
    this.dimensions = opts.dimensions;
    // Retries are owned by BaseEmbedder; the SDK's own would multiply them.
    this.client =
      opts.client ?? new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL, maxRetries: 0 });
  }

  protected async requestEmbeddings(
    texts: readonly string[],
    signal: AbortSignal,
  ): Promise<number[][]> {
    const res = await this.client.embeddings.create(
      {
        model: this.modelName,
        input: [...texts],
        ...(this.dimensions !== undefined ? { dimensions: this.dimensions } : {}),
      },
      { signal },
    );
    // The endpoint tags each vector with its input position.
    const slots: Array<number[] | undefined> = texts.map(() => undefined);
    for (const item of res.data) {
      if (item.index >= 0 && item.index < slots.length) slots[item.index] = item.embedding;
    }
    const vectors = slots.filter((v): v is number[] => v !== undefined);
    if (vectors.length !== texts.length) {
      throw new EmbeddingUnavailableError(
        `Embedding response for ${texts.length} inputs is missing entries (got ${res.data.length})`,
      );
    }
    return vectors;
  }

  /** Connection failures and HTTP 408/409/429/5xx, mirroring the SDK's own policy. */
  protected isTransient(error: unknown): boolean {
    if (super.isTransient(error)) return true;
    if (error instanceof OpenAI.APIUserAbortError) return false;
    if (error instanceof OpenAI.APIConnectionError) return true;
    if (error instanceof OpenAI.APIError) {
      const status = error.status;
      return status === 408 || status === 409 || status === 429 || (status !== undefined && status >= 500);
    }
    return false;
  }
}
