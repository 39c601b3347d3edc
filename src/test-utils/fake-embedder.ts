import { BaseEmbedder, type EmbedderOptions } from "../embeddings";

/** Deterministic pseudo-embedding: one FNV-1a hash per component, in [-1, 1). */
export function hashVector(text: string, dimension: number): number[] {
  const out: number[] = [];
  for (let d = 0; d < dimension; d++) {
    let h = 0x811c9dc5 ^ d;
    for (let i = 0; i < text.length; i++) {
      h ^= text.charCodeAt(i);
      h = Math.imul(h, 0x01000193);
    }
    out.push(((h >>> 0) / 2 ** 32) * 2 - 1);
  }
  return out;
}

export interface FakeEmbedderOptions extends Partial<EmbedderOptions> {
  /** Length of the hash vectors (default 8). */
  vectorLength?: number;
  /** Replace the hash vectors for a request; `call` counts from 0. */
  respond?: (
    texts: readonly string[],
    call: number,
    signal: AbortSignal,
  ) => Promise<ArrayLike<number>[]>;
  /** Override the transient-error classification. */
  transient?: (error: unknown) => boolean;
}

/** In-process embedder for tests; records every provider request. */
export class FakeEmbedder extends BaseEmbedder {
  public readonly requests: string[][] = [];
  private readonly vectorLength: number;
  private readonly respond?: FakeEmbedderOptions["respond"];
  private readonly transient?: FakeEmbedderOptions["transient"];

  public constructor(opts: FakeEmbedderOptions = {}) {
    const { vectorLength, respond, transient, ...rest } = opts;
    super({ retryBaseDelayMs: 0, retryMaxDelayMs: 0, ...rest, modelName: rest.modelName ?? "fake-embedder" });
    this.vectorLength = vectorLength ?? 8;
    this.respond = respond;
    this.transient = transient;
  }

  protected async requestEmbeddings(
    texts: readonly string[],
    signal: AbortSignal,
  ): Promise<ArrayLike<number>[]> {
    const call = this.requests.length;
    this.requests.push([...texts]);
    if (this.respond) return this.respond(texts, call, signal);
    return texts.map((t) => hashVector(t, this.vectorLength));
  }

  protected isTransient(error: unknown): boolean {
    return this.transient ? this.transient(error) : super.isTransient(error);
  }
}
