import { describe, it, expect } from "vitest";
import { cosineSimilarity, cosineToScore, mostSimilar, zeroVector } from "./similarity.js";

describe("cosineSimilarity", () => {
  it("should be 1 for a vector against itself", () => {
    expect(cosineSimilarity([0.3, -1.2, 4], [0.3, -1.2, 4])).toBeCloseTo(1, 10);
  });

  it("should be 0 when either vector is zero", () => {
    expect(cosineSimilarity(zeroVector(3), [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([1, 2, 3], zeroVector(3))).toBe(0);
  });

  it("should be 0 for vectors of different length", () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
  });

  it("should be -1 for opposite vectors", () => {
    expect(cosineSimilarity([1, 2], [-1, -2])).toBeCloseTo(-1, 10);
  });
});

describe("cosineToScore", () => {
  it("should map [-1, 1] onto [0, 1]", () => {
    expect(cosineToScore(1)).toBe(1);
    expect(cosineToScore(0)).toBe(0.5);
    expect(cosineToScore(-1)).toBe(0);
  });

  it("should clamp rounding overshoot", () => {
    expect(cosineToScore(1.0000000002)).toBe(1);
  });
});

describe("mostSimilar", () => {
  const candidates = [
    [0, 1],
    [1, 0],
    [1, 1],
    [1, 0],
  ];

  it("should rank by descending score and cap at topK", () => {
    const matches = mostSimilar([1, 0], candidates, 3);
    expect(matches.map((m) => m.index)).toEqual([1, 3, 2]);
    expect(matches[2]?.score).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it("should keep candidate order for ties", () => {
    const matches = mostSimilar([1, 0], candidates, 2);
    expect(matches).toEqual([
      { index: 1, score: 1 },
      { index: 3, score: 1 },
    ]);
  });

  it("should return nothing for an empty query or topK of 0", () => {
    expect(mostSimilar([], candidates, 3)).toEqual([]);
    expect(mostSimilar([1, 0], candidates, 0)).toEqual([]);
  });
});
