import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import type { Chunk, Document, DistanceMetric, IndexEntry } from "./types";
import { InMemoryVectorIndex, type VectorIndex } from "./vector-index";

export const STORE_VERSION = 2;

/**
 * Everything a stored index must agree with before it can stand in for a
 * fresh build. Any difference means the store is stale.
 */
export interface StoreMeta {
  chunkSize: number;
  chunkOverlap: number;
  modelName: string;
  metric: DistanceMetric;
  /** {@link hashDocument} of the source document. */
  documentHash: string;
  /** Vector length the embedder is locked to, when known before embedding. */
  dimension?: number;
}

export interface LoadParams extends StoreMeta {
  storePath?: string;
  verbose?: boolean;
}

export interface SaveParams extends StoreMeta {
  storePath?: string;
  index: VectorIndex;
  verbose?: boolean;
}

/** One record per chunk; `emb` is base64 little-endian float32. */
interface StoredRecord {
  sequenceIndex: number;
  sourcePageIndex: number;
  startOffset: number;
  endOffset: number;
  text: string;
  emb: string;
}

/** SHA-256 over the page texts, page boundaries included. */
export function hashDocument(document: Document): string {
  const h = createHash("sha256");
  h.update(String(document.pages.length));
  for (const page of document.pages) {
    h.update("\u0000");
    h.update(String(page.length));
    h.update("\u0000");
    h.update(page);
  }
  return h.digest("hex");
}

function encodeVector(v: Float32Array): string {
  return Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64");
}

function decodeVector(s: string): Float32Array | null {
  const buf = Buffer.from(s, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  // Copy out of the (possibly shared, unaligned) Buffer pool.
  const bytes = new Uint8Array(buf);
  return new Float32Array(bytes.buffer, bytes.byteOffset, bytes.byteLength / 4);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function parseRecord(value: unknown): IndexEntry | null {
  if (!isRecord(value)) return null;
  const { sequenceIndex, sourcePageIndex, startOffset, endOffset, text, emb } = value;
  if (
    typeof sequenceIndex !== "number" ||
    typeof sourcePageIndex !== "number" ||
    typeof startOffset !== "number" ||
    typeof endOffset !== "number" ||
    typeof text !== "string" ||
    typeof emb !== "string"
  )
    return null;
  const vector = decodeVector(emb);
  if (!vector) return null;
  const chunk: Chunk = { text, sourcePageIndex, startOffset, endOffset, sequenceIndex };
  return { chunk, vector };
}

/**
 * Load / save of a built index as a single JSON file. An instance can be
 * configured with a default store path + verbosity; each call may override.
 */
export class Persistence {
  private storePath?: string;
  private verbose: boolean;

  public constructor(storePath?: string, verbose = false) {
    this.storePath = storePath;
    this.verbose = verbose;
  }

  public getStorePath(): string | undefined {
    return this.storePath;
  }

  /**
   * Restore a previously saved index. Returns null when no store exists, when
   * its metadata disagrees with `params` (triggering a cold rebuild), or when
   * the file is unreadable / corrupt.
   */
  public async load(params: LoadParams): Promise<InMemoryVectorIndex | null> {
    const storePath = params.storePath ?? this.storePath;
    const verbose = params.verbose ?? this.verbose;
    if (!storePath) return null;
    if (!fsSync.existsSync(storePath)) return null;
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(storePath, "utf8"));
      if (!isRecord(parsed) || !Array.isArray(parsed.entries) || !isRecord(parsed.meta)) {
        console.error(`[RAG] Stored index at ${storePath} is malformed. Performing cold rebuild.`);
        return null;
      }
      const meta = parsed.meta;
      const mismatched: string[] = (
        ["chunkSize", "chunkOverlap", "modelName", "metric", "documentHash"] as const
      ).filter((key) => meta[key] !== params[key]);
      if (params.dimension !== undefined && meta.dimension !== params.dimension) {
        mismatched.push("dimension");
      }
      if (parsed.version !== STORE_VERSION || mismatched.length > 0) {
        console.error(
          `[RAG] Stored index incompatible (${mismatched.join(", ") || "version"} differ). Performing cold rebuild.`,
        );
        return null;
      }
      const entries: IndexEntry[] = [];
      for (const raw of parsed.entries) {
        const entry = parseRecord(raw);
        if (!entry) {
          console.error(`[RAG] Stored index at ${storePath} has a corrupt record. Performing cold rebuild.`);
          return null;
        }
        entries.push(entry);
      }
      entries.sort((a, b) => a.chunk.sequenceIndex - b.chunk.sequenceIndex);
      const index = new InMemoryVectorIndex(params.metric);
      index.add(entries);
      console.error(`[RAG] Loaded persisted index: ${index.size} chunks.`);
      if (verbose) console.error(`[RAG][verbose] Loaded from ${storePath}`);
      return index;
    } catch (e) {
      console.error(`[RAG] Failed to load store at ${storePath}:`, e);
      return null;
    }
  }

  /** Persist `index` to disk (no-op without a store path). Write errors propagate. */
  public async save(params: SaveParams): Promise<void> {
    const storePath = params.storePath ?? this.storePath;
    const verbose = params.verbose ?? this.verbose;
    if (!storePath) return;
    const { index, chunkSize, chunkOverlap, modelName, metric, documentHash } = params;
    const entries: StoredRecord[] = index.entries().map(({ chunk, vector }) => ({
      sequenceIndex: chunk.sequenceIndex,
      sourcePageIndex: chunk.sourcePageIndex,
      startOffset: chunk.startOffset,
      endOffset: chunk.endOffset,
      text: chunk.text,
      emb: encodeVector(vector),
    }));
    const out = {
      version: STORE_VERSION,
      meta: {
        chunkSize,
        chunkOverlap,
        modelName,
        metric,
        documentHash,
        dimension: index.dimension ?? 0,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      },
      entries,
    };
    await fs.mkdir(path.dirname(storePath), { recursive: true });
    // Atomic replace via rename.
    const tmp = `${storePath}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(out));
    await fs.rename(tmp, storePath);
    if (verbose) console.error(`[RAG][verbose] Persisted index to ${storePath}`);
  }
}
