import { describe, expect, it } from "vitest";
import { DimensionMismatchError, InvalidConfigurationError } from "./errors";
import type { Chunk, IndexEntry } from "./types";
import { chunksOf, InMemoryVectorIndex } from "./vector-index";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function chunk(sequenceIndex: number): Chunk {
  return {
    text: `chunk ${sequenceIndex}`,
    sourcePageIndex: 0,
    startOffset: 0,
    endOffset: 7,
    sequenceIndex,
  };
}

function entry(sequenceIndex: number, ...values: number[]): IndexEntry {
  return { chunk: chunk(sequenceIndex), vector: Float32Array.from(values) };
}

const v = (...xs: number[]) => Float32Array.from(xs);

// ---------------------------------------------------------------------------
// InMemoryVectorIndex
// ---------------------------------------------------------------------------

describe("InMemoryVectorIndex", () => {
  it("starts empty and answers queries with no results", () => {
    const index = new InMemoryVectorIndex();
    expect(index.size).toBe(0);
    expect(index.dimension).toBeUndefined();
    expect(index.query(v(1, 2), 3)).toEqual([]);
  });

  it("returns the nearest entries in ascending distance order", () => {
    const index = new InMemoryVectorIndex("euclidean");
    index.add([entry(0, 0, 0), entry(1, 1, 0), entry(2, 3, 0)]);
    const results = index.query(v(0.5, 0), 2);
    expect(results.map((r) => r.chunk.sequenceIndex)).toEqual([0, 1]);
    expect(results[0].distance).toBeCloseTo(0.5, 6);
    expect(results[1].distance).toBeCloseTo(0.5, 6);
  });

  it("orders by distance before sequence index", () => {
    const index = new InMemoryVectorIndex();
    index.add([entry(0, 0, 0), entry(1, 1, 0), entry(2, 3, 0)]);
    expect(chunksOf(index.query(v(2.9, 0), 3)).map((c) => c.sequenceIndex)).toEqual([2, 1, 0]);
  });

  it("breaks distance ties by the lower sequence index", () => {
    const index = new InMemoryVectorIndex();
    index.add([entry(5, 1, 1), entry(2, 1, 1)]);
    expect(index.query(v(1, 1), 2).map((r) => r.chunk.sequenceIndex)).toEqual([2, 5]);
  });

  it("returns min(k, size) results", () => {
    const index = new InMemoryVectorIndex();
    index.add([entry(0, 0, 0), entry(1, 1, 0)]);
    expect(index.query(v(0, 0), 10)).toHaveLength(2);
    expect(index.query(v(0, 0), 1)).toHaveLength(1);
  });

  it("rejects a non-positive or fractional k", () => {
    const index = new InMemoryVectorIndex();
    index.add([entry(0, 0, 0)]);
    expect(() => index.query(v(0, 0), 0)).toThrow(InvalidConfigurationError);
    expect(() => index.query(v(0, 0), -1)).toThrow("k must be a positive integer (got -1)");
    expect(() => index.query(v(0, 0), 1.5)).toThrow(InvalidConfigurationError);
  });

  it("rejects a batch with a mismatched vector and leaves the index unchanged", () => {
    const index = new InMemoryVectorIndex();
    index.add([entry(0, 1, 2)]);
    expect(() => index.add([entry(1, 1, 2), entry(2, 1, 2, 3)])).toThrow(DimensionMismatchError);
    expect(index.size).toBe(1);
    expect(index.dimension).toBe(2);
  });

  it("rejects a first batch whose vectors disagree with each other", () => {
    const index = new InMemoryVectorIndex();
    expect(() => index.add([entry(0, 1, 2), entry(1, 1)])).toThrow(
      "Vector index dimension mismatch: expected 2, got 1",
    );
    expect(index.size).toBe(0);
    expect(index.dimension).toBeUndefined();
  });

  it("rejects zero-length vectors", () => {
    const index = new InMemoryVectorIndex();
    expect(() => index.add([entry(0)])).toThrow(DimensionMismatchError);
  });

  it("rejects a query vector of the wrong length", () => {
    const index = new InMemoryVectorIndex();
    index.add([entry(0, 1, 2)]);
    expect(() => index.query(v(1, 2, 3), 1)).toThrow(
      "Query vector dimension mismatch: expected 2, got 3",
    );
  });

  it("ranks by cosine distance when configured", () => {
    const index = new InMemoryVectorIndex("cosine");
    index.add([entry(0, -1, 0), entry(1, 0, 1), entry(2, 5, 0)]);
    const results = index.query(v(2, 0), 3);
    expect(results.map((r) => r.chunk.sequenceIndex)).toEqual([2, 1, 0]);
    expect(results.map((r) => r.distance)).toEqual([0, 1, 2]);
  });

  it("stores copies of the inserted vectors", () => {
    const index = new InMemoryVectorIndex();
    const e = entry(0, 1, 1);
    index.add([e]);
    e.vector[0] = 100;
    expect(index.query(v(1, 1), 1)[0].distance).toBe(0);
  });

  it("hands out copies of stored vectors from entries()", () => {
    const index = new InMemoryVectorIndex();
    index.add([entry(0, 1, 1)]);
    index.entries()[0].vector[0] = 99;
    expect(index.entries()[0].vector).toEqual(v(1, 1));
    expect(index.query(v(1, 1), 1)[0].distance).toBe(0);
  });

  it("keeps insertion order in entries()", () => {
    const index = new InMemoryVectorIndex();
    index.add([entry(3, 0), entry(1, 1)]);
    index.add([entry(2, 2)]);
    expect(index.entries().map((e) => e.chunk.sequenceIndex)).toEqual([3, 1, 2]);
  });
});
