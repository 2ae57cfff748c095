// src/pipeline/keywords.ts
import { readFileSync } from "node:fs";
import { z } from "zod";

const KeywordList = z.array(z.string().min(1));
const KeywordGroups = z.record(z.string(), KeywordList);

/** Weighted cues: strong ±3, medium ±2, weak ±1. */
const PositiveWeights = z.record(z.string(), z.number().int().min(1).max(3));
const NegativeWeights = z.record(z.string(), z.number().int().min(-3).max(-1));

export const KeywordTablesSchema = z.object({
  classifier: z.object({
    market: KeywordList,
    sector: KeywordGroups,
    theme: KeywordGroups,
  }),
  scorer: z.object({
    positive: PositiveWeights,
    negative: NegativeWeights,
  }),
  macro: z.object({
    fx: KeywordList,
    rates: KeywordList,
    data: KeywordList,
  }),
  /** keyword → display name / context label; first match in file order wins */
  political: z.object({
    speakers: z.record(z.string(), z.string().min(1)),
    contexts: z.record(z.string(), z.string().min(1)),
    summaries: z.record(z.string(), z.record(z.string(), z.string())),
  }),
  priorityMacro: z.object({
    fed: KeywordList,
    treasury: KeywordList,
    usdjpy: KeywordList,
    dxy: KeywordList,
    employment: KeywordList,
    inflation: KeywordList,
    ism: KeywordList,
  }),
});

export type KeywordTables = z.infer<typeof KeywordTablesSchema>;

const DEFAULT_PATH = new URL("../../data/keywords.json", import.meta.url);

function deepFreeze<T>(x: T): T {
  if (typeof x === "object" && x !== null) {
    for (const v of Object.values(x)) deepFreeze(v);
    Object.freeze(x);
  }
  return x;
}

/** Read & validate a keyword table file. Throws on a malformed file. */
export function loadKeywordTables(path?: string): KeywordTables {
  const raw: unknown = JSON.parse(readFileSync(path ?? DEFAULT_PATH, "utf8"));
  return deepFreeze(KeywordTablesSchema.parse(raw));
}

let cached: KeywordTables | undefined;

/** Bundled tables, loaded once per process. */
export function defaultKeywordTables(): KeywordTables {
  if (!cached) cached = loadKeywordTables();
  return cached;
}

/** Case-insensitive substring hits, in table order. */
export function matchKeywords(text: string, keywords: readonly string[]): string[] {
  const t = text.toLowerCase();
  return keywords.filter((kw) => t.includes(kw.toLowerCase()));
}
