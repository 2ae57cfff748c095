// src/pipeline/score.ts
import { createHash } from "node:crypto";
import type { ClassifiedItem, ImpactScore, ScoredItem } from "../types.js";
import {
  CATEGORY_FACTOR,
  ORIGIN_FACTOR,
  SCORE_MAX,
  SCORE_MIN,
} from "../constants.js";
import { defaultKeywordTables, type KeywordTables } from "./keywords.js";

/** Phrases for a 0 score with no cue at all. Observation wording, not advice. */
export const NEUTRAL_REASONS = [
  "市場影響が限定的と判断",
  "定性的情報に留まり、価格材料不足",
  "市場全体への波及が不明確",
  "個別・話題性中心で指数影響は限定的",
  "事実報道で方向性を断定できず",
] as const;

const ONE_SIDED_NEUTRAL = "定性的情報に留まり、価格材料不足";

/** Maps item text to an index into NEUTRAL_REASONS. */
export type NeutralPicker = (text: string, poolSize: number) => number;

export const hashPick: NeutralPicker = (text, poolSize) =>
  createHash("sha256").update(text).digest().readUInt32BE(0) % poolSize;

export const clampScore = (x: number) =>
  Math.max(SCORE_MIN, Math.min(SCORE_MAX, x));

const top = (xs: string[], n: number) => xs.slice(0, n).join(", ");

function explain(
  s: number,
  positive: string[],
  negative: string[],
  neutral: () => string
): string {
  if (s === 0) {
    if (!positive.length && !negative.length) return neutral();
    if (positive.length && negative.length)
      return `好悪材料が混在（+: ${top(positive, 2)} / -: ${top(negative, 2)}）`;
    return ONE_SIDED_NEUTRAL;
  }
  if (s > 0) {
    if (s >= 5) return `強い好材料あり（${top(positive, 3)}）`;
    if (s >= 2) return `やや好材料（${top(positive, 2)}）`;
    return `弱い好材料の示唆（${top(positive, 2)}）`;
  }
  if (s <= -5) return `強い懸念材料あり（${top(negative, 3)}）`;
  if (s <= -2) return `やや懸念材料（${top(negative, 2)}）`;
  return `弱い懸念材料の示唆（${top(negative, 2)}）`;
}

/**
 * Weighted-keyword impact score in [-10, 10].
 *
 * sum(weights of every matched cue) → ×category (truncate) → ×origin (truncate) → clamp.
 * The explanation only ever varies in wording for a neutral item with no cues.
 */
export class ImpactScorer {
  private readonly positive: [string, number][];
  private readonly negative: [string, number][];

  constructor(
    tables: KeywordTables["scorer"] = defaultKeywordTables().scorer,
    private readonly pickNeutral: NeutralPicker = hashPick
  ) {
    this.positive = Object.entries(tables.positive);
    this.negative = Object.entries(tables.negative);
  }

  score(item: ClassifiedItem): ImpactScore {
    const text = item.text.toLowerCase();
    let s = 0;
    const matchedPositive: string[] = [];
    const matchedNegative: string[] = [];

    for (const [kw, w] of this.positive) {
      if (text.includes(kw.toLowerCase())) {
        s += w;
        matchedPositive.push(kw);
      }
    }
    for (const [kw, w] of this.negative) {
      if (text.includes(kw.toLowerCase())) {
        s += w;
        matchedNegative.push(kw);
      }
    }

    s = Math.trunc(s * CATEGORY_FACTOR[item.category]);
    s = Math.trunc(s * ORIGIN_FACTOR[item.origin]);
    s = clampScore(s);

    const reason = explain(s, matchedPositive, matchedNegative, () => {
      const i = this.pickNeutral(item.text, NEUTRAL_REASONS.length);
      return NEUTRAL_REASONS[i] ?? NEUTRAL_REASONS[0];
    });
    return { impactScore: s, reason };
  }

  scoreItem(item: ClassifiedItem): ScoredItem {
    return { ...item, ...this.score(item) };
  }

  scoreBatch(items: readonly ClassifiedItem[]): ScoredItem[] {
    return items.map((it) => this.scoreItem(it));
  }
}
