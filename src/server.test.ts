import { afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import type { AnswerGenerator } from "./answer";
import { IndexBuilder } from "./indexer";
import { CallToolResultSchema, Client, ErrorCode, InMemoryTransport } from "./mcp-sdk";
import { createRagServer, type RagServerDeps } from "./server";
import { FakeEmbedder } from "./test-utils/fake-embedder";
import { documentFromText } from "./types";
import type { VectorIndex } from "./vector-index";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const document = documentFromText("Cats purr.\fDogs bark.\fBirds sing.", "animals.txt");
const embedder = new FakeEmbedder();
let index: VectorIndex;
const clients: Client[] = [];

beforeAll(async () => {
  vi.spyOn(console, "error").mockImplementation(() => {});
  index = await new IndexBuilder({ embedder }).build(document, 100, 10);
});

afterEach(async () => {
  await Promise.all(clients.splice(0).map((c) => c.close()));
});

/** Connect a client to a fresh server over an in-process transport pair. */
async function connect(overrides: Partial<RagServerDeps> = {}): Promise<Client> {
  const server = createRagServer({
    index,
    embedder,
    document,
    defaultTopK: 2,
    documentLabel: "animals.txt",
    version: "0.0.0-test",
    ...overrides,
  });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: "test-client", version: "0.0.0" });
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  clients.push(client);
  return client;
}

async function callText(client: Client, name: string, args: Record<string, unknown>): Promise<string> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const [first] = result.content;
  if (first?.type !== "text") throw new Error(`Expected text content from ${name}`);
  return first.text;
}

const echoGenerator: AnswerGenerator = {
  answer: async (question, context) => `${question} -> ${context.join(" | ")}`,
};

// ---------------------------------------------------------------------------
// tools/list
// ---------------------------------------------------------------------------

describe("tools/list", () => {
  it("offers rag_answer only when a generator is configured", async () => {
    const plain = await connect();
    expect((await plain.listTools()).tools.map((t) => t.name)).toEqual(["rag_query", "read_page"]);

    const answering = await connect({ generator: echoGenerator });
    expect((await answering.listTools()).tools.map((t) => t.name)).toEqual([
      "rag_query",
      "read_page",
      "rag_answer",
    ]);
  });
});

// ---------------------------------------------------------------------------
// tools/call
// ---------------------------------------------------------------------------

describe("rag_query", () => {
  it("returns ranked matches with page and offsets", async () => {
    const client = await connect();
    const text = await callText(client, "rag_query", { query: "Dogs bark.", top_k: 1 });
    expect(JSON.parse(text)).toEqual({
      matches: [
        {
          sequenceIndex: 1,
          page: 1,
          startOffset: 0,
          endOffset: 10,
          distance: 0,
          snippet: "Dogs bark.",
        },
      ],
    });
  });

  it("uses the default top_k", async () => {
    const client = await connect();
    const text = await callText(client, "rag_query", { query: "Birds sing." });
    expect(JSON.parse(text).matches).toHaveLength(2);
  });

  it("rejects a missing or blank query", async () => {
    const client = await connect();
    await expect(client.callTool({ name: "rag_query", arguments: { query: "  " } })).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
    await expect(client.callTool({ name: "rag_query", arguments: {} })).rejects.toThrow("Missing query");
  });

  it("rejects a non-positive top_k", async () => {
    const client = await connect();
    await expect(
      client.callTool({ name: "rag_query", arguments: { query: "q", top_k: 0 } }),
    ).rejects.toThrow("top_k must be an integer >= 1");
  });

  it("reports pipeline errors with their code", async () => {
    const client = await connect({ embedder: new FakeEmbedder({ vectorLength: 4 }) });
    await expect(client.callTool({ name: "rag_query", arguments: { query: "q" } })).rejects.toMatchObject({
      code: ErrorCode.InternalError,
      data: { code: "DIMENSION_MISMATCH" },
    });
  });
});

describe("rag_answer", () => {
  it("answers from the retrieved passages and lists them as sources", async () => {
    const client = await connect({ generator: echoGenerator });
    const text = await callText(client, "rag_answer", { question: "Cats purr.", top_k: 1 });
    const result = JSON.parse(text);
    expect(result.answer).toBe("Cats purr. -> Cats purr.");
    expect(result.sources).toHaveLength(1);
    expect(result.sources[0]).toMatchObject({ sequenceIndex: 0, snippet: "Cats purr." });
  });

  it("is unknown without a generator", async () => {
    const client = await connect();
    await expect(
      client.callTool({ name: "rag_answer", arguments: { question: "q" } }),
    ).rejects.toMatchObject({ code: ErrorCode.MethodNotFound });
  });
});

describe("read_page", () => {
  it("returns the normalized page or a slice of it", async () => {
    const client = await connect();
    expect(await callText(client, "read_page", { page: 2 })).toBe("Birds sing.");
    expect(await callText(client, "read_page", { page: 0, start: 0, end: 4 })).toBe("Cats");
  });

  it("rejects pages past the end", async () => {
    const client = await connect();
    await expect(client.callTool({ name: "read_page", arguments: { page: 3 } })).rejects.toThrow(
      "page must be < 3",
    );
  });
});

describe("unknown tools", () => {
  it("are reported as method not found", async () => {
    const client = await connect();
    await expect(client.callTool({ name: "nope", arguments: {} })).rejects.toThrow("Unknown tool: nope");
  });
});
