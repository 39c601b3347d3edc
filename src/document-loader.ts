/**
 * Document loading: PDF page extraction (cached) and plain-text files.
 *
 * Cache structure:
 *   Extracted PDF pages are stored in a single pdf-text-cache.json file located
 *   in the same directory as INDEX_STORE_PATH (or next to the document if not
 *   specified):
 *   {
 *     "version": 2,
 *     "entries": {
 *       "/absolute/path/to/file.pdf": {
 *         "pdfSize": 12345,                    // file size in bytes
 *         "extractedAt": "2024-01-01T00:00:00Z",
 *         "pages": ["page 1 text", "page 2 text"]
 *       }
 *     }
 *   }
 *
 * Cache invalidation:
 *   An entry is stale when the PDF's size changed; a missing or unparseable
 *   cache file is treated as empty.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { PDFParse } from "pdf-parse";
import { withTimeout } from "./async";
import { DocumentLoadFailureError, RagError } from "./errors";
import { documentFromText, type CancelOptions, type Document } from "./types";

export interface PdfCacheEntry {
  pdfSize: number;
  extractedAt: string;
  pages: string[];
}

interface PdfCacheStore {
  version: number;
  entries: Record<string, PdfCacheEntry>;
}

const CACHE_VERSION = 2;

function isCacheEntry(value: unknown): value is PdfCacheEntry {
  if (typeof value !== "object" || value === null) return false;
  if (!("pdfSize" in value) || !("extractedAt" in value) || !("pages" in value)) return false;
  return (
    typeof value.pdfSize === "number" &&
    typeof value.extractedAt === "string" &&
    Array.isArray(value.pages) &&
    value.pages.every((p: unknown) => typeof p === "string")
  );
}

/**
 * PDF page extraction with a JSON cache keyed by absolute path.
 */
export class PdfExtractor {
  private readonly cacheFilePath: string;
  private readonly verbose: boolean;
  private cacheStore: PdfCacheStore | null = null;

  /**
   * @param cacheDir Directory holding pdf-text-cache.json
   * @param verbose Enable additional logging
   */
  public constructor(cacheDir: string, verbose = false) {
    this.cacheFilePath = path.join(cacheDir, "pdf-text-cache.json");
    this.verbose = verbose;
  }

  private async loadCacheStore(): Promise<PdfCacheStore> {
    if (this.cacheStore) return this.cacheStore;
    const store: PdfCacheStore = { version: CACHE_VERSION, entries: {} };
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(this.cacheFilePath, "utf8"));
      if (typeof parsed === "object" && parsed !== null && "entries" in parsed) {
        const entries: unknown = parsed.entries;
        if (typeof entries === "object" && entries !== null) {
          for (const [key, entry] of Object.entries(entries)) {
            if (isCacheEntry(entry)) store.entries[key] = entry;
          }
        }
      }
    } catch (e) {
      // Missing or corrupt cache file: start fresh.
      if (this.verbose) console.error(`[PDF] No usable cache at ${this.cacheFilePath}:`, e);
    }
    this.cacheStore = store;
    return store;
  }

  private async saveCacheStore(store: PdfCacheStore): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.cacheFilePath), { recursive: true });
      await fs.writeFile(this.cacheFilePath, JSON.stringify(store, null, 2), "utf8");
    } catch (e) {
      console.error(`[PDF] Failed to save cache store:`, e);
    }
  }

  /**
   * Extract page texts from a PDF, using the cache when the file size matches.
   *
   * @param pdfAbsPath Absolute path to the PDF file
   * @param pdfSize File size in bytes (cache validity check)
   */
  public async extractPages(pdfAbsPath: string, pdfSize: number): Promise<string[]> {
    const store = await this.loadCacheStore();
    const cached = store.entries[pdfAbsPath];
    if (cached && cached.pdfSize === pdfSize) {
      if (this.verbose) console.error(`[PDF] Cache hit for ${path.basename(pdfAbsPath)}`);
      return cached.pages;
    }
    if (this.verbose) {
      console.error(
        `[PDF] ${cached ? "Cache stale (size mismatch)" : "Cache miss"} for ${path.basename(pdfAbsPath)}, extracting...`,
      );
    }

    const pages = await PdfExtractor.parse(await fs.readFile(pdfAbsPath));
    store.entries[pdfAbsPath] = {
      pdfSize,
      extractedAt: new Date().toISOString(),
      pages,
    };
    await this.saveCacheStore(store);
    return pages;
  }

  private static async parse(data: Buffer): Promise<string[]> {
    const parser = new PDFParse({ data });
    try {
      const result = await parser.getText();
      return [...result.pages].sort((a, b) => a.num - b.num).map((p) => p.text);
    } finally {
      await parser.destroy();
    }
  }

  /** True if the path has a .pdf extension (case-insensitive). */
  public static isPdf(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === ".pdf";
  }
}

export interface DocumentLoaderOptions {
  /** Where pdf-text-cache.json lives; defaults to the document's directory. */
  cacheDir?: string;
  /** Deadline for a whole load (default 60000). */
  timeoutMs?: number;
  verbose?: boolean;
}

/**
 * Turns a file on disk into a {@link Document}: PDFs page by page, anything
 * else as UTF-8 text with form feeds separating pages.
 */
export class DocumentLoader {
  private readonly opts: DocumentLoaderOptions;
  private readonly extractors = new Map<string, PdfExtractor>();

  public constructor(opts: DocumentLoaderOptions = {}) {
    this.opts = opts;
  }

  /**
   * @throws {DocumentLoadFailureError} if the file cannot be read or parsed.
   * @throws {TimeoutError} if loading exceeds the configured deadline.
   */
  public async load(filePath: string, opts: CancelOptions = {}): Promise<Document> {
    const abs = path.resolve(filePath);
    try {
      return await withTimeout(
        this.opts.timeoutMs ?? 60_000,
        `Loading ${path.basename(abs)}`,
        () => this.read(abs),
        opts.signal,
      );
    } catch (e) {
      if (e instanceof RagError) throw e;
      throw new DocumentLoadFailureError(abs, e);
    }
  }

  private async read(abs: string): Promise<Document> {
    const st = await fs.stat(abs);
    if (!st.isFile()) throw new Error("Not a regular file");
    if (PdfExtractor.isPdf(abs)) {
      const pages = await this.extractorFor(abs).extractPages(abs, st.size);
      console.error(`[RAG] Loaded PDF ${path.basename(abs)}: ${pages.length} pages.`);
      return Object.freeze({ source: abs, pages: Object.freeze(pages) });
    }
    const doc = documentFromText(await fs.readFile(abs, "utf8"), abs);
    console.error(`[RAG] Loaded text ${path.basename(abs)}: ${doc.pages.length} pages.`);
    return doc;
  }

  private extractorFor(abs: string): PdfExtractor {
    const dir = this.opts.cacheDir ?? path.dirname(abs);
    let extractor = this.extractors.get(dir);
    if (!extractor) {
      extractor = new PdfExtractor(dir, this.opts.verbose);
      this.extractors.set(dir, extractor);
    }
    return extractor;
  }
}
