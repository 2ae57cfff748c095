import { describe, expect, it } from "vitest";
import { aggregate, computeRatios, round1, round2 } from "./aggregate.js";
import type { Origin, ScoredItem } from "../types.js";

const scored = (impactScore: number, origin: Origin = "domestic"): ScoredItem => ({
  text: `item ${impactScore}`,
  origin,
  metadata: {},
  category: "market",
  impactScore,
  reason: "",
});

describe("aggregate", () => {
  it("yields a zeroed record for an empty batch", () => {
    expect(aggregate([])).toEqual({
      totalScore: 0,
      domesticScore: 0,
      foreignScore: 0,
      domesticForeignGap: 0,
      newsCount: 0,
      zeroScoreCount: 0,
    });
  });

  it("averages per origin and in total, rounded to one decimal", () => {
    const rec = aggregate([scored(3), scored(0), scored(-2, "foreign")]);
    expect(rec).toEqual({
      totalScore: 0.3,
      domesticScore: 1.5,
      foreignScore: -2,
      domesticForeignGap: 3.5,
      newsCount: 3,
      zeroScoreCount: 1,
    });
  });

  it("counts an empty origin subset as 0", () => {
    const rec = aggregate([scored(6), scored(6)]);
    expect(rec.foreignScore).toBe(0);
    expect(rec.domesticScore).toBe(6);
    expect(rec.domesticForeignGap).toBe(6);
    expect(rec.totalScore).toBe(6);
  });

  it("rounds the gap from the unrounded means", () => {
    // domestic 1/3, foreign -1/3 → gap 0.666… → 0.7 (0.3 - -0.3 would give 0.6)
    const rec = aggregate([
      scored(1),
      scored(0),
      scored(0),
      scored(-1, "foreign"),
      scored(0, "foreign"),
      scored(0, "foreign"),
    ]);
    expect(rec.domesticScore).toBe(0.3);
    expect(rec.foreignScore).toBe(-0.3);
    expect(rec.domesticForeignGap).toBe(0.7);
    expect(rec.zeroScoreCount).toBe(4);
  });
});

describe("round1", () => {
  it("never returns negative zero", () => {
    expect(Object.is(round1(-0.04), 0)).toBe(true);
    expect(round1(-0.26)).toBe(-0.3);
  });

  it("rounds exact ties to even, whatever the sign", () => {
    expect(round1(0.25)).toBe(0.2);
    expect(round1(-0.25)).toBe(-0.2);
    expect(round1(0.75)).toBe(0.8);
    expect(round1(-0.75)).toBe(-0.8);
    expect(round2(0.125)).toBe(0.12);
  });

  it("rounds on the stored value, not the literal", () => {
    // 0.35 is stored just below 0.35, 0.45 just above
    expect(round1(0.35)).toBe(0.3);
    expect(round1(0.45)).toBe(0.5);
  });
});

describe("aggregate rounding", () => {
  it("gives mirrored scores for mirrored batches", () => {
    const pos = aggregate([scored(1), scored(0), scored(0), scored(0)]);
    const neg = aggregate([scored(-1), scored(0), scored(0), scored(0)]);
    expect(pos.totalScore).toBe(0.2);
    expect(neg.totalScore).toBe(-0.2);
    expect(pos.domesticForeignGap).toBe(-neg.domesticForeignGap);
  });
});

describe("computeRatios", () => {
  it("is all zero for an empty batch", () => {
    expect(computeRatios([], 3)).toEqual({
      zeroRatio: 0,
      plus2Ratio: 0,
      minus2Ratio: 0,
      macroRatio: 0,
    });
  });

  it("reports percentages of withheld, directional and macro items", () => {
    const r = computeRatios([scored(0), scored(0), scored(2), scored(-3), scored(1)], 2);
    expect(r.zeroRatio).toBeCloseTo(40);
    expect(r.plus2Ratio).toBeCloseTo(20);
    expect(r.minus2Ratio).toBeCloseTo(20);
    expect(r.macroRatio).toBeCloseTo(40);
  });

  it("gives 100% withheld for an all-zero batch", () => {
    const batch = Array.from({ length: 10 }, () => scored(0));
    expect(computeRatios(batch).zeroRatio).toBe(100);
  });
});
