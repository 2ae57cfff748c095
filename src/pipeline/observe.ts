// src/pipeline/observe.ts
import type {
  AggregateRecord,
  Alert,
  BatchRatios,
  HistoryComparison,
  MacroTopic,
  PriorityTopic,
  ScoredItem,
  SpeakerGroup,
  Trigger,
} from "../types.js";
import type { HistoryStore } from "../db/HistoryStore.js";
import type { Analysis } from "./analyze.js";
import type { AlertDetector } from "./alerts.js";
import { aggregate, computeRatios } from "./aggregate.js";
import { MacroObserver } from "./macro.js";
import { TriggerDetector } from "./triggers.js";
import { PoliticalEventDetector, groupBySpeaker } from "./political.js";
import {
  PriorityMacroObserver,
  digestTopic,
  type PriorityDigest,
} from "./priorityMacro.js";
import { HISTORY } from "../constants.js";
import { logger } from "../logger.js";

const log = logger("OBSERVE");

export type ObservationResult = {
  date: string;
  aggregate: AggregateRecord;
  ratios: BatchRatios;
  scored: ScoredItem[];
  alerts: Alert[];
  triggers: Trigger[];
  comparison: HistoryComparison;
  consecutiveHighZeroDays: number;
  macro: {
    counts: Record<MacroTopic, number>;
    keywords: Record<MacroTopic, string[]>;
    totalCount: number;
  };
  priorityMacro: {
    hasAny: boolean;
    totalCount: number;
    topics: Record<PriorityTopic, PriorityDigest>;
  };
  politicalEvents: SpeakerGroup[];
  counts: { submitted: number; scored: number; skipped: number };
};

export type ObservationDeps = {
  history: HistoryStore;
  alerts: AlertDetector;
  macro?: MacroObserver;
  triggers?: TriggerDetector;
  political?: PoliticalEventDetector;
  priorityMacro?: PriorityMacroObserver;
};

/**
 * One observation run over an analysed batch:
 * aggregate → ratios → priority / political observers → 7-day comparison →
 * today's history write → notes → alerts.
 */
export function runObservation(
  analysis: Analysis,
  deps: ObservationDeps
): ObservationResult {
  const { scored } = analysis;
  const macroObserver = deps.macro ?? new MacroObserver();
  const triggerDetector = deps.triggers ?? new TriggerDetector();
  const politicalDetector = deps.political ?? new PoliticalEventDetector();
  const priorityObserver = deps.priorityMacro ?? new PriorityMacroObserver();

  const agg = aggregate(scored);
  const macro = macroObserver.observe(scored);
  const ratios = computeRatios(scored, macro.totalCount);
  const priority = priorityObserver.observe(scored);
  const political = politicalDetector.detect(scored);

  // Compare against prior days before today's row is written
  const comparison = deps.history.get7DayComparison({
    totalScore: agg.totalScore,
    ...ratios,
  });
  const consecutiveHighZeroDays =
    deps.history.getConsecutiveHighZeroDays() +
    (ratios.zeroRatio > HISTORY.HIGH_ZERO_RATIO ? 1 : 0);

  const entry = deps.history.addDailyRecord({
    totalScore: agg.totalScore,
    zeroRatio: ratios.zeroRatio,
    plus2Ratio: ratios.plus2Ratio,
    minus2Ratio: ratios.minus2Ratio,
    newsCount: agg.newsCount,
    macroRatio: ratios.macroRatio,
  });

  const triggers = triggerDetector.detect({ ...ratios, consecutiveHighZeroDays });

  const alerts = deps.alerts.detectAlerts(agg);
  deps.alerts.addDailyScore(agg);

  log.info("run", {
    date: entry.date,
    total: agg.totalScore,
    scored: scored.length,
    skipped: analysis.skipped,
    alerts: alerts.length,
    triggers: triggers.map((t) => t.id),
    priority: priority.totalCount,
    political: political.length,
  });

  const topics: Record<PriorityTopic, PriorityDigest> = {
    fed: digestTopic(priority.fed),
    treasury: digestTopic(priority.treasury),
    usdjpy: digestTopic(priority.usdjpy),
    dxy: digestTopic(priority.dxy),
    employment: digestTopic(priority.employment),
    inflation: digestTopic(priority.inflation),
    ism: digestTopic(priority.ism),
  };

  return {
    date: entry.date,
    aggregate: agg,
    ratios,
    scored,
    alerts,
    triggers,
    comparison,
    consecutiveHighZeroDays,
    macro: {
      counts: {
        fx: macro.fx.items.length,
        rates: macro.rates.items.length,
        data: macro.data.items.length,
      },
      keywords: {
        fx: macro.fx.keywords,
        rates: macro.rates.keywords,
        data: macro.data.keywords,
      },
      totalCount: macro.totalCount,
    },
    priorityMacro: {
      hasAny: priority.hasAny,
      totalCount: priority.totalCount,
      topics,
    },
    politicalEvents: groupBySpeaker(political),
    counts: {
      submitted: analysis.submitted,
      scored: scored.length,
      skipped: analysis.skipped,
    },
  };
}
