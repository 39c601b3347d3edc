import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DocumentLoader, PdfExtractor } from "./document-loader";
import { CancelledError, DocumentLoadFailureError } from "./errors";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "rag-loader-"));
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

describe("DocumentLoader", () => {
  it("splits text files into pages on form feeds", async () => {
    const file = path.join(dir, "notes.txt");
    await fs.writeFile(file, "first page\fsecond page\f", "utf8");
    const document = await new DocumentLoader().load(file);
    expect(document.source).toBe(file);
    expect(document.pages).toEqual(["first page", "second page", ""]);
  });

  it("fails with DocumentLoadFailureError for a missing file", async () => {
    const file = path.join(dir, "missing.txt");
    const err = await new DocumentLoader().load(file).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DocumentLoadFailureError);
    expect(err).toHaveProperty("source", file);
    expect(err).toHaveProperty("code", "DOCUMENT_LOAD_FAILURE");
  });

  it("refuses directories", async () => {
    await expect(new DocumentLoader().load(dir)).rejects.toThrow(
      `Failed to load document ${dir}: Not a regular file`,
    );
  });

  it("serves PDF pages from the extraction cache when the size matches", async () => {
    const pdf = path.join(dir, "manual.pdf");
    await fs.writeFile(pdf, "%PDF-fake");
    const cacheDir = path.join(dir, "cache");
    await fs.mkdir(cacheDir);
    await fs.writeFile(
      path.join(cacheDir, "pdf-text-cache.json"),
      JSON.stringify({
        version: 2,
        entries: {
          [pdf]: { pdfSize: 9, extractedAt: "2024-01-01T00:00:00.000Z", pages: ["page one", "page two"] },
        },
      }),
    );
    const document = await new DocumentLoader({ cacheDir }).load(pdf);
    expect(document.pages).toEqual(["page one", "page two"]);
  });

  it("does not start when already cancelled", async () => {
    const file = path.join(dir, "notes.txt");
    await fs.writeFile(file, "text", "utf8");
    const controller = new AbortController();
    controller.abort();
    await expect(new DocumentLoader().load(file, { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    );
  });
});

describe("PdfExtractor.isPdf", () => {
  it("matches the extension case-insensitively", () => {
    expect(PdfExtractor.isPdf("/docs/Report.PDF")).toBe(true);
    expect(PdfExtractor.isPdf("/docs/report.txt")).toBe(false);
  });
});
