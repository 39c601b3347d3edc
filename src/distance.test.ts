import { describe, expect, it } from "vitest";
import { cosineDistance, cosineSimilarity, distanceFunction, euclidean } from "./distance";

const v = (...xs: number[]) => Float32Array.from(xs);

describe("euclidean", () => {
  it("computes the L2 distance", () => {
    expect(euclidean(v(0, 0), v(3, 4))).toBe(5);
  });

  it("is zero for identical vectors", () => {
    expect(euclidean(v(1, 2, 3), v(1, 2, 3))).toBe(0);
  });
});

describe("cosineSimilarity", () => {
  it("returns 1 for parallel vectors regardless of magnitude", () => {
    expect(cosineSimilarity(v(1, 2, 3), v(2, 4, 6))).toBeCloseTo(1, 6);
  });

  it("returns -1 for opposite vectors", () => {
    expect(cosineSimilarity(v(1, 0), v(-1, 0))).toBeCloseTo(-1, 10);
  });

  it("returns 0 when either vector is zero", () => {
    expect(cosineSimilarity(v(0, 0), v(1, 1))).toBe(0);
  });
});

describe("cosineDistance", () => {
  it("maps similarity onto an ascending distance", () => {
    expect(cosineDistance(v(1, 0), v(1, 0))).toBeCloseTo(0, 10);
    expect(cosineDistance(v(1, 0), v(0, 1))).toBeCloseTo(1, 10);
    expect(cosineDistance(v(1, 0), v(-1, 0))).toBeCloseTo(2, 10);
  });
});

describe("distanceFunction", () => {
  it("selects the function for the metric", () => {
    expect(distanceFunction("euclidean")).toBe(euclidean);
    expect(distanceFunction("cosine")).toBe(cosineDistance);
  });
});
