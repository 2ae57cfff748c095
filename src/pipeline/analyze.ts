// src/pipeline/analyze.ts
import type { NewsItem, ScoredItem } from "../types.js";
import type { TextClassifier } from "./classify.js";
import type { ImpactScorer } from "./score.js";
import type { LlmClassifier } from "./llmClassify.js";
import { logger } from "../logger.js";

const log = logger("ANALYZE");

export type RuleBased = {
  classifier: TextClassifier;
  scorer: ImpactScorer;
};

export type Analysis = {
  scored: ScoredItem[];
  /** Items handed in */
  submitted: number;
  /** Items dropped because classification or scoring threw */
  skipped: number;
};

/** Classify + score item by item; one bad item never aborts the batch. */
export function analyzeItems(
  items: readonly NewsItem[],
  { classifier, scorer }: RuleBased
): Analysis {
  const scored: ScoredItem[] = [];
  let skipped = 0;
  items.forEach((it, index) => {
    try {
      scored.push(scorer.scoreItem(classifier.classifyItem(it)));
    } catch (err) {
      skipped++;
      log.warn("item skipped", { index, err: String(err) });
    }
  });
  return { scored, submitted: items.length, skipped };
}

/** First `limit` items through the LLM, the rest through the keyword rules. */
export async function analyzeItemsHybrid(
  items: readonly NewsItem[],
  opts: RuleBased & { llm: LlmClassifier; limit: number }
): Promise<Analysis> {
  const head = items.slice(0, opts.limit);
  const scored: ScoredItem[] = [];
  let skipped = 0;

  for (const [index, it] of head.entries()) {
    try {
      scored.push(await opts.llm.scoreItem(it));
    } catch (err) {
      skipped++;
      log.warn("item skipped", { index, err: String(err) });
    }
  }

  const rest = analyzeItems(items.slice(opts.limit), opts);
  return {
    scored: [...scored, ...rest.scored],
    submitted: items.length,
    skipped: skipped + rest.skipped,
  };
}
