// src/pipeline/aggregate.ts
import type { AggregateRecord, BatchRatios, ScoredItem } from "../types.js";

/**
 * Round to `digits` decimals on the exact value of the double, ties to even.
 * Symmetric in sign, so mirrored batches give mirrored scores. Never -0.
 */
export function roundTo(x: number, digits: number): number {
  if (!Number.isFinite(x) || Math.abs(x) >= 1e15) return x;
  const exact = Math.abs(x).toFixed(100);
  const cut = exact.indexOf(".") + 1 + digits;
  const rest = exact.slice(cut);
  let n = Number(exact.slice(0, cut).replace(".", ""));

  if (rest[0] > "5") n++;
  else if (rest[0] === "5") {
    const tie = !/[1-9]/.test(rest.slice(1));
    if (!tie || n % 2 === 1) n++;
  }

  const r = (Math.sign(x) * n) / 10 ** digits;
  return r === 0 ? 0 : r;
}

export const round1 = (x: number) => roundTo(x, 1);
export const round2 = (x: number) => roundTo(x, 2);

const mean = (xs: number[]) =>
  xs.length ? xs.reduce((a, b) => a + b, 0) / xs.length : 0;

const pctOf = (n: number, total: number) => (total > 0 ? (n / total) * 100 : 0);

/** Per-origin and total means of impact scores. Empty origin subsets count as 0. */
export function aggregate(items: readonly ScoredItem[]): AggregateRecord {
  if (!items.length) {
    return {
      totalScore: 0,
      domesticScore: 0,
      foreignScore: 0,
      domesticForeignGap: 0,
      newsCount: 0,
      zeroScoreCount: 0,
    };
  }

  const all = items.map((n) => n.impactScore);
  const domesticAvg = mean(
    items.filter((n) => n.origin === "domestic").map((n) => n.impactScore)
  );
  const foreignAvg = mean(
    items.filter((n) => n.origin === "foreign").map((n) => n.impactScore)
  );

  return {
    totalScore: round1(mean(all)),
    domesticScore: round1(domesticAvg),
    foreignScore: round1(foreignAvg),
    domesticForeignGap: round1(domesticAvg - foreignAvg),
    newsCount: items.length,
    zeroScoreCount: all.filter((s) => s === 0).length,
  };
}

/** Share (%) of withheld (0), clearly positive (≥2), clearly negative (≤-2) and macro items. */
export function computeRatios(
  items: readonly ScoredItem[],
  macroMatches = 0
): BatchRatios {
  const n = items.length;
  return {
    zeroRatio: pctOf(items.filter((it) => it.impactScore === 0).length, n),
    plus2Ratio: pctOf(items.filter((it) => it.impactScore >= 2).length, n),
    minus2Ratio: pctOf(items.filter((it) => it.impactScore <= -2).length, n),
    macroRatio: pctOf(macroMatches, n),
  };
}
