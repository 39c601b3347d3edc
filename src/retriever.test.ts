import { beforeAll, describe, expect, it } from "vitest";
import { DimensionMismatchError, InvalidConfigurationError } from "./errors";
import { IndexBuilder } from "./indexer";
import { retrieve, retrieveScored } from "./retriever";
import { FakeEmbedder } from "./test-utils/fake-embedder";
import { documentFromText, type Chunk } from "./types";
import type { VectorIndex } from "./vector-index";

function page(prefix: string): string {
  return Array.from({ length: 134 }, (_, i) => `${prefix}${String(i).padStart(3, "0")} `)
    .join("")
    .slice(0, 1200);
}

describe("retrieve", () => {
  const embedder = new FakeEmbedder();
  let index: VectorIndex;
  let chunks: Chunk[];

  beforeAll(async () => {
    const document = documentFromText(`${page("alpha")}\f${page("omega")}`, "doc.txt");
    const builder = new IndexBuilder({ embedder });
    chunks = builder.chunkDocument(document, 500, 50);
    index = await builder.build(document, 500, 50);
  });

  it("finds the chunk whose text is the query at distance 0", async () => {
    const [hit] = await retrieveScored(index, embedder, chunks[3].text, 1);
    expect(hit.chunk).toEqual(chunks[3]);
    expect(hit.distance).toBe(0);
  });

  it("returns k chunks ranked closest first, without scores", async () => {
    const results = await retrieve(index, embedder, chunks[1].text, 3);
    expect(results).toHaveLength(3);
    expect(results[0]).toEqual(chunks[1]);
  });

  it("caps results at the index size", async () => {
    expect(await retrieve(index, embedder, "anything", 50)).toHaveLength(6);
  });

  it("rejects a blank query or a non-positive k before embedding", async () => {
    const before = embedder.requests.length;
    await expect(retrieve(index, embedder, "   ", 1)).rejects.toThrow("query must be a non-empty string");
    await expect(retrieve(index, embedder, "q", 0)).rejects.toBeInstanceOf(InvalidConfigurationError);
    expect(embedder.requests.length).toBe(before);
  });

  it("reports a stale embedder as a dimension mismatch", async () => {
    const other = new FakeEmbedder({ vectorLength: 4 });
    await expect(retrieve(index, other, "q", 1)).rejects.toBeInstanceOf(DimensionMismatchError);
  });
});
