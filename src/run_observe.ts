#!/usr/bin/env node
// src/run_observe.ts
import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { cfg } from "./config.js";
import { HistoryStore } from "./db/HistoryStore.js";
import { loadKeywordTables } from "./pipeline/keywords.js";
import { TextClassifier } from "./pipeline/classify.js";
import { ImpactScorer } from "./pipeline/score.js";
import { MacroObserver } from "./pipeline/macro.js";
import { PriorityMacroObserver } from "./pipeline/priorityMacro.js";
import { PoliticalEventDetector } from "./pipeline/political.js";
import { AlertDetector } from "./pipeline/alerts.js";
import { parseNewsItems } from "./pipeline/ingest.js";
import {
  analyzeItems,
  analyzeItemsHybrid,
  type Analysis,
  type RuleBased,
} from "./pipeline/analyze.js";
import { LlmClassifier, createOpenAiClient } from "./pipeline/llmClassify.js";
import { runObservation } from "./pipeline/observe.js";
import { logger } from "./logger.js";

const log = logger("CLI");

async function analyze(
  items: ReturnType<typeof parseNewsItems>,
  rules: RuleBased
): Promise<Analysis> {
  if (!cfg.USE_LLM) return analyzeItems(items, rules);
  if (!cfg.OPENAI_API_KEY) {
    log.warn("USE_LLM set without OPENAI_API_KEY; keyword rules only");
    return analyzeItems(items, rules);
  }
  const llm = new LlmClassifier(
    createOpenAiClient({
      apiKey: cfg.OPENAI_API_KEY,
      model: cfg.LLM_MODEL,
      baseURL: cfg.OPENAI_BASE_URL,
    }),
    rules
  );
  return analyzeItemsHybrid(items, { ...rules, llm, limit: cfg.LLM_LIMIT });
}

async function main() {
  const inputPath = process.argv[2] ?? cfg.INPUT_PATH;
  if (!inputPath)
    throw new Error("usage: market-observer <items.json> (or set INPUT_PATH)");

  const tables = loadKeywordTables(cfg.KEYWORDS_PATH);
  const rules: RuleBased = {
    classifier: new TextClassifier(tables.classifier),
    scorer: new ImpactScorer(tables.scorer),
  };
  const raw: unknown = JSON.parse(readFileSync(inputPath, "utf8"));
  const items = parseNewsItems(raw);

  const history = new HistoryStore(cfg.HISTORY_DB_PATH);
  try {
    // Continuity for day-over-day alerts comes from the persisted log
    const alerts = new AlertDetector();
    for (const e of history.entriesBefore(history.today())) alerts.addDailyScore(e);

    const analysis = await analyze(items, rules);
    const result = runObservation(analysis, {
      history,
      alerts,
      macro: new MacroObserver(tables.macro),
      priorityMacro: new PriorityMacroObserver(tables.priorityMacro),
      political: new PoliticalEventDetector(tables.political),
    });

    mkdirSync(dirname(cfg.OUTPUT_PATH), { recursive: true });
    writeFileSync(cfg.OUTPUT_PATH, JSON.stringify(result, null, 2));
    log.info("wrote", {
      path: cfg.OUTPUT_PATH,
      submitted: result.counts.submitted,
      scored: result.counts.scored,
    });
  } finally {
    history.close();
  }
}

main().catch((err) => {
  log.error("observe run failed:", err);
  process.exitCode = 1;
});
