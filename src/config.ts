import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };
import { validateChunkParams } from "./chunker";
import { InvalidConfigurationError } from "./errors";
import { DISTANCE_METRICS, type DistanceMetric } from "./types";

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

/**
 * Load `.env` into `process.env` once at startup. Prefers the project-root file
 * (resolved relative to this module) and falls back to dotenv's cwd default.
 */
export function loadEnv(): void {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const rootEnv = path.resolve(path.dirname(__filename), "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[RAG] Could not resolve project .env, falling back to cwd:", e);
  }
  dotenv.config();
}

export type TransportMode = "stdio" | "http";

export interface Config {
  DOCUMENT_PATH: string;
  INDEX_STORE_PATH: string | undefined;
  VERBOSE: boolean;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  TOP_K: number;
  DISTANCE_METRIC: DistanceMetric;
  EMBEDDING_MODEL: string;
  EMBEDDING_DIMENSIONS: number | undefined;
  /** Undefined when answer generation is disabled (ANSWER_MODEL=none). */
  ANSWER_MODEL: string | undefined;
  OPENAI_API_KEY: string | undefined;
  OPENAI_BASE_URL: string | undefined;
  EMBED_BATCH_SIZE: number;
  EMBED_CONCURRENCY: number;
  EMBED_TIMEOUT_MS: number;
  ANSWER_TIMEOUT_MS: number;
  LOAD_TIMEOUT_MS: number;
  MAX_RETRIES: number;
  RETRY_BASE_DELAY_MS: number;
  MCP_TRANSPORT: TransportMode;
  MCP_PORT: number;
  HOST: string;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  return env[key]?.trim() || undefined;
}

/** Integer option; blank means default, anything unparsable is rejected. */
function readInt(env: Env, key: string, fallback: number, min: number): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new InvalidConfigurationError(`${key} must be an integer >= ${min} (got "${raw}")`);
  }
  return n;
}

/**
 * Resolve the runtime configuration from an environment map. Pure over `env`:
 * call {@link loadEnv} first to fold `.env` into `process.env`.
 *
 * @throws {InvalidConfigurationError} for malformed or inconsistent values.
 */
export function getConfig(env: Env = process.env): Config {
  // Conspicuous placeholder nudges configuration when unset.
  const DOCUMENT_PATH = readString(env, "DOCUMENT_PATH") ?? "/path/to/your/document.pdf";

  const INDEX_STORE_PATH = readString(env, "INDEX_STORE_PATH");

  // Tolerant truthy parsing (supports several common forms).
  const VERBOSE = (() => {
    const v = (env.VERBOSE ?? "").trim().toLowerCase();
    return v === "1" || v === "true" || v === "yes" || v === "on";
  })();

  const CHUNK_SIZE = readInt(env, "CHUNK_SIZE", 1000, 1);
  const CHUNK_OVERLAP = readInt(env, "CHUNK_OVERLAP", 200, 0);
  validateChunkParams(CHUNK_SIZE, CHUNK_OVERLAP);

  const TOP_K = readInt(env, "TOP_K", 4, 1);

  const DISTANCE_METRIC = (() => {
    const raw = (readString(env, "DISTANCE_METRIC") ?? "euclidean").toLowerCase();
    const metric = DISTANCE_METRICS.find((m) => m === raw);
    if (!metric) {
      throw new InvalidConfigurationError(
        `DISTANCE_METRIC must be one of ${DISTANCE_METRICS.join(", ")} (got "${raw}")`,
      );
    }
    return metric;
  })();

  const dims = readInt(env, "EMBEDDING_DIMENSIONS", 0, 0);

  const MCP_TRANSPORT = ((): TransportMode => {
    const raw = (readString(env, "MCP_TRANSPORT") ?? "stdio").toLowerCase();
    if (raw === "stdio") return "stdio";
    if (raw === "http" || raw === "streamable-http") return "http";
    throw new InvalidConfigurationError(`MCP_TRANSPORT must be stdio or http (got "${raw}")`);
  })();

  return {
    DOCUMENT_PATH,
    INDEX_STORE_PATH,
    VERBOSE,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    TOP_K,
    DISTANCE_METRIC,
    EMBEDDING_MODEL: readString(env, "EMBEDDING_MODEL") ?? "text-embedding-3-small",
    EMBEDDING_DIMENSIONS: dims > 0 ? dims : undefined,
    ANSWER_MODEL: (() => {
      const model = readString(env, "ANSWER_MODEL") ?? "gpt-4o-mini";
      return model.toLowerCase() === "none" ? undefined : model;
    })(),
    OPENAI_API_KEY: readString(env, "OPENAI_API_KEY"),
    OPENAI_BASE_URL: readString(env, "OPENAI_BASE_URL"),
    EMBED_BATCH_SIZE: readInt(env, "EMBED_BATCH_SIZE", 64, 1),
    EMBED_CONCURRENCY: readInt(env, "EMBED_CONCURRENCY", 4, 1),
    EMBED_TIMEOUT_MS: readInt(env, "EMBED_TIMEOUT_MS", 30_000, 1),
    ANSWER_TIMEOUT_MS: readInt(env, "ANSWER_TIMEOUT_MS", 60_000, 1),
    LOAD_TIMEOUT_MS: readInt(env, "LOAD_TIMEOUT_MS", 60_000, 1),
    MAX_RETRIES: readInt(env, "MAX_RETRIES", 3, 0),
    RETRY_BASE_DELAY_MS: readInt(env, "RETRY_BASE_DELAY_MS", 500, 0),
    MCP_TRANSPORT,
    MCP_PORT: readInt(env, "MCP_PORT", 3000, 1),
    HOST: readString(env, "HOST") ?? "127.0.0.1",
  };
}
