import type { Embedder } from "./embeddings";
import { InvalidConfigurationError } from "./errors";
import type { CancelOptions, Chunk, ScoredChunk } from "./types";
import { chunksOf, validateTopK, type VectorIndex } from "./vector-index";

/**
 * Online phase: embed `query` with the build-time embedder and return the `k`
 * nearest entries with their distances, closest first.
 *
 * @throws {InvalidConfigurationError} for a blank query or non-positive `k`.
 * @throws {DimensionMismatchError} if `embedder` is not the one the index was
 *   built with.
 */
export async function retrieveScored(
  index: VectorIndex,
  embedder: Embedder,
  query: string,
  k: number,
  opts: CancelOptions = {},
): Promise<ScoredChunk[]> {
  if (query.trim().length === 0) {
    throw new InvalidConfigurationError("query must be a non-empty string");
  }
  validateTopK(k);
  const vector = await embedder.embed(query, opts);
  return index.query(vector, k);
}

/** {@link retrieveScored} without the scores. */
export async function retrieve(
  index: VectorIndex,
  embedder: Embedder,
  query: string,
  k: number,
  opts: CancelOptions = {},
): Promise<Chunk[]> {
  return chunksOf(await retrieveScored(index, embedder, query, k, opts));
}
