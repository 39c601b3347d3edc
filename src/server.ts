import { askQuestion, type AnswerGenerator } from "./answer";
import type { Embedder } from "./embeddings";
import { InvalidConfigurationError, RagError } from "./errors";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  Server,
  type CallToolResult,
  type Tool,
} from "./mcp-sdk";
import { normalize } from "./normalizer";
import { retrieveScored } from "./retriever";
import type { Document, ScoredChunk, TextNormalizer } from "./types";
import type { VectorIndex } from "./vector-index";

/** Hard cap on `top_k` accepted from tool callers. */
export const MAX_TOP_K = 50;

/**
 * Shared state closed over by every server instance. The index is an
 * immutable snapshot, so one copy serves all sessions.
 */
export interface RagServerDeps {
  index: VectorIndex;
  embedder: Embedder;
  document: Document;
  /** Enables the rag_answer tool. */
  generator?: AnswerGenerator;
  /** Must be the normalizer the index was built with (default {@link normalize}). */
  normalize?: TextNormalizer;
  defaultTopK: number;
  /** Human-friendly document label used in tool descriptions. */
  documentLabel: string;
  version: string;
}

type ToolArgs = Record<string, unknown>;

function requireString(args: ToolArgs, key: string): string {
  const v = args[key];
  if (typeof v !== "string" || v.trim().length === 0) {
    throw new McpError(ErrorCode.InvalidParams, `Missing ${key}`);
  }
  return v;
}

function optionalInt(args: ToolArgs, key: string, min: number): number | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "number" || !Number.isInteger(v) || v < min) {
    throw new McpError(ErrorCode.InvalidParams, `${key} must be an integer >= ${min}`);
  }
  return v;
}

function textResult(value: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: typeof value === "string" ? value : JSON.stringify(value) }],
  };
}

function toMatch(r: ScoredChunk) {
  return {
    sequenceIndex: r.chunk.sequenceIndex,
    page: r.chunk.sourcePageIndex,
    startOffset: r.chunk.startOffset,
    endOffset: r.chunk.endOffset,
    distance: Number(r.distance.toFixed(4)),
    snippet: r.chunk.text,
  };
}

/** Pipeline errors become MCP errors; caller mistakes map to InvalidParams. */
function toMcpError(e: unknown): unknown {
  if (e instanceof McpError) return e;
  if (e instanceof InvalidConfigurationError) return new McpError(ErrorCode.InvalidParams, e.message);
  if (e instanceof RagError) return new McpError(ErrorCode.InternalError, e.message, { code: e.code });
  return e;
}

/**
 * Factory for an MCP Server exposing the retrieval tools.
 *
 * A fresh server instance is created per transport session (HTTP mode may
 * serve several clients); the index, embedder and document are shared.
 *
 * Tool contracts:
 *  rag_query
 *    Input:  { query: string, top_k?: number }
 *    Output: { matches: Array<{ sequenceIndex, page, startOffset, endOffset, distance, snippet }> }
 *
 *  rag_answer (only when a generator is configured)
 *    Input:  { question: string, top_k?: number }
 *    Output: { answer: string, sources: <rag_query matches> }
 *
 *  read_page
 *    Input:  { page: number, start?: number, end?: number }
 *    Output: normalized page text, or the [start, end) slice of it
 */
export function createRagServer(deps: RagServerDeps): Server {
  const { index, embedder, document, generator, defaultTopK, documentLabel } = deps;
  const norm = deps.normalize ?? normalize;

  const server = new Server(
    { name: "document-qa-server", version: deps.version },
    { capabilities: { tools: {} } },
  );

  const topKSchema = {
    type: "number",
    description: `Maximum number of chunks to return (1-${MAX_TOP_K}). Defaults to ${defaultTopK}.`,
    minimum: 1,
    maximum: MAX_TOP_K,
  };

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const tools: Tool[] = [
      {
        name: "rag_query",
        description: `Semantically search '${documentLabel}' and return the closest chunks (smaller distance is closer) with page and character offsets.`,
        inputSchema: {
          type: "object",
          properties: {
            query: { type: "string", description: "Natural language search query." },
            top_k: topKSchema,
          },
          required: ["query"],
        },
      },
      {
        name: "read_page",
        description: `Read one page of '${documentLabel}' (normalized text, optionally a character range as returned by rag_query).`,
        inputSchema: {
          type: "object",
          properties: {
            page: { type: "number", description: "0-based page index.", minimum: 0 },
            start: { type: "number", description: "Start offset (inclusive).", minimum: 0 },
            end: { type: "number", description: "End offset (exclusive).", minimum: 0 },
          },
          required: ["page"],
        },
      },
    ];
    if (generator) {
      tools.push({
        name: "rag_answer",
        description: `Answer a question about '${documentLabel}' from the closest chunks, citing them as sources.`,
        inputSchema: {
          type: "object",
          properties: {
            question: { type: "string", description: "Question to answer." },
            top_k: topKSchema,
          },
          required: ["question"],
        },
      });
    }
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (req): Promise<CallToolResult> => {
    const args: ToolArgs = req.params.arguments ?? {};
    const topK = () => Math.min(MAX_TOP_K, optionalInt(args, "top_k", 1) ?? defaultTopK);
    try {
      switch (req.params.name) {
        case "rag_query": {
          const query = requireString(args, "query");
          const results = await retrieveScored(index, embedder, query, topK());
          return textResult({ matches: results.map(toMatch) });
        }
        case "rag_answer": {
          if (!generator) break;
          const question = requireString(args, "question");
          const { answer, sources } = await askQuestion({
            index,
            embedder,
            generator,
            question,
            k: topK(),
          });
          return textResult({ answer, sources: sources.map(toMatch) });
        }
        case "read_page": {
          const pageIndex = optionalInt(args, "page", 0);
          if (pageIndex === undefined) throw new McpError(ErrorCode.InvalidParams, "Missing page");
          if (pageIndex >= document.pages.length) {
            throw new McpError(
              ErrorCode.InvalidParams,
              `page must be < ${document.pages.length}`,
            );
          }
          const text = norm(document.pages[pageIndex]);
          const start = optionalInt(args, "start", 0) ?? 0;
          const end = optionalInt(args, "end", 0) ?? text.length;
          return textResult(text.slice(start, end));
        }
      }
    } catch (e) {
      throw toMcpError(e);
    }
    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
  });

  return server;
}
