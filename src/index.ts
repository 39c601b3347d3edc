/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load `.env` and resolve the runtime configuration (fails fast on bad values).
 * 2. Create the embedder and, unless ANSWER_MODEL=none, the answer generator.
 * 3. Load the document (PDF pages or form-feed separated text).
 * 4. Restore the persisted index if it matches document, model and chunk
 *    parameters; otherwise chunk, embed and build it, then persist it.
 * 5. Serve the MCP tools over stdio (default) or streamable HTTP
 *    (MCP_TRANSPORT=http), the latter with a /health readiness endpoint.
 *
 * Exposed tools:
 *  - rag_query  : nearest-neighbour search returning ranked chunks.
 *  - rag_answer : retrieval followed by a generated answer.
 *  - read_page  : normalized page text for follow-up reading.
 *
 * See src/config.ts for the environment variables.
 */
import path from "node:path";
import { OpenAIAnswerGenerator } from "./answer";
import { APP_VERSION, getConfig, loadEnv, type Config } from "./config";
import { DocumentLoader } from "./document-loader";
import { OpenAIEmbedder } from "./embeddings";
import { IndexBuilder } from "./indexer";
import { hashDocument, Persistence } from "./persistence";
import { createRagServer } from "./server";
import { StatusManager } from "./status";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";
import type { VectorIndex } from "./vector-index";

loadEnv();
const config: Config = getConfig();
const {
  DOCUMENT_PATH,
  INDEX_STORE_PATH,
  VERBOSE,
  CHUNK_SIZE,
  CHUNK_OVERLAP,
  TOP_K,
  DISTANCE_METRIC,
  MCP_TRANSPORT,
} = config;

const status = new StatusManager();
status.setDocumentPath(DOCUMENT_PATH);

const embedder = new OpenAIEmbedder({
  modelName: config.EMBEDDING_MODEL,
  dimensions: config.EMBEDDING_DIMENSIONS,
  apiKey: config.OPENAI_API_KEY,
  baseURL: config.OPENAI_BASE_URL,
  batchSize: config.EMBED_BATCH_SIZE,
  concurrency: config.EMBED_CONCURRENCY,
  timeoutMs: config.EMBED_TIMEOUT_MS,
  maxRetries: config.MAX_RETRIES,
  retryBaseDelayMs: config.RETRY_BASE_DELAY_MS,
  verbose: VERBOSE,
});
status.setModelName(embedder.modelName);

const generator =
  config.ANSWER_MODEL !== undefined
    ? new OpenAIAnswerGenerator({
        model: config.ANSWER_MODEL,
        apiKey: config.OPENAI_API_KEY,
        baseURL: config.OPENAI_BASE_URL,
        timeoutMs: config.ANSWER_TIMEOUT_MS,
      })
    : undefined;

const loader = new DocumentLoader({
  cacheDir: INDEX_STORE_PATH ? path.dirname(INDEX_STORE_PATH) : undefined,
  timeoutMs: config.LOAD_TIMEOUT_MS,
  verbose: VERBOSE,
});
const document = await loader.load(DOCUMENT_PATH);

const persistence = new Persistence(INDEX_STORE_PATH, VERBOSE);
const storeMeta = {
  chunkSize: CHUNK_SIZE,
  chunkOverlap: CHUNK_OVERLAP,
  modelName: embedder.modelName,
  metric: DISTANCE_METRIC,
  documentHash: hashDocument(document),
  dimension: embedder.dimension,
};

async function restoreIndex(): Promise<VectorIndex | null> {
  const restored = await persistence.load(storeMeta);
  if (!restored) return null;
  status.setIndexTotals(document.pages.length, restored.size);
  status.setEmbedded(restored.size);
  status.markReady();
  return restored;
}

async function buildIndex(): Promise<VectorIndex> {
  console.error(`[RAG] Cold build: indexing ${document.pages.length} pages of ${DOCUMENT_PATH}`);
  const builder = new IndexBuilder({ embedder, metric: DISTANCE_METRIC, status, verbose: VERBOSE });
  const built = await builder.build(document, CHUNK_SIZE, CHUNK_OVERLAP);
  try {
    await persistence.save({ ...storeMeta, index: built });
  } catch (e) {
    // Non-fatal: the in-memory index is complete.
    console.error(`[RAG] Failed to save index store:`, e);
  }
  return built;
}

const index: VectorIndex = (await restoreIndex()) ?? (await buildIndex());

const createServer = () =>
  createRagServer({
    index,
    embedder,
    document,
    generator,
    defaultTopK: TOP_K,
    documentLabel: path.basename(DOCUMENT_PATH),
    version: APP_VERSION,
  });

if (MCP_TRANSPORT === "http") {
  status.markTransport("http");
  await startHttpTransport(createServer, { port: config.MCP_PORT, host: config.HOST, status });
} else {
  status.markTransport("stdio");
  await startStdioTransport(createServer);
}
