/**
 * Shared types across the pipeline
 */
export type Origin = "domestic" | "foreign";

export type Category = "market" | "sector" | "theme";

export type NewsItem = {
  text: string;
  origin: Origin;
  /** Caller-supplied passthrough fields (title, url, source name, timestamp...) */
  metadata: Readonly<Record<string, unknown>>;
};

export type Classification = {
  category: Category;
  subCategory?: string;
};

export interface ClassifiedItem extends NewsItem, Classification {}

export type ImpactScore = {
  /** Integer in [-10, 10] */
  impactScore: number;
  reason: string;
};

export interface ScoredItem extends ClassifiedItem, ImpactScore {}

export type AggregateRecord = {
  totalScore: number;
  domesticScore: number;
  foreignScore: number;
  domesticForeignGap: number;
  newsCount: number;
  zeroScoreCount: number;
};

/** Percentages (0..100) over a scored batch */
export type BatchRatios = {
  zeroRatio: number;
  plus2Ratio: number;
  minus2Ratio: number;
  macroRatio: number;
};

export type HistoryEntry = {
  date: string; // YYYY-MM-DD, local time
  totalScore: number;
  zeroRatio: number;
  plus2Ratio: number;
  minus2Ratio: number;
  newsCount: number;
  macroRatio: number;
};

export type DailyRecordInput = Omit<HistoryEntry, "date">;

export type ComparisonInput = Pick<
  HistoryEntry,
  "totalScore" | "zeroRatio" | "plus2Ratio" | "minus2Ratio"
>;

export type HistoryComparison =
  | { hasHistory: false; daysCount: 0 }
  | {
      hasHistory: true;
      daysCount: number;
      avgTotalScore: number;
      avgZeroRatio: number;
      avgPlus2Ratio: number;
      avgMinus2Ratio: number;
      currentTotalScore: number;
      currentZeroRatio: number;
      currentPlus2Ratio: number;
      currentMinus2Ratio: number;
    };

export type AlertType = "daily_change" | "ma_reversal" | "domestic_foreign_gap";

export type Alert = {
  type: AlertType;
  severity: "info" | "warning";
  message: string;
};

export type TriggerId = "A" | "B" | "C" | "D";

export type Trigger = {
  id: TriggerId;
  name: string;
  message: string;
  fired: boolean;
};

export type MacroTopic = "fx" | "rates" | "data";

/** Headline topics surfaced first in the report, regardless of score */
export type PriorityTopic =
  | "fed"
  | "treasury"
  | "usdjpy"
  | "dxy"
  | "employment"
  | "inflation"
  | "ism";

/** A named speaker on a market-sensitive subject. Observation only, never scored. */
export type PoliticalEvent = {
  speaker: string;
  /** Context label of the first matched keyword, e.g. 関税政策 */
  context: string;
  summary: string;
  /** Every market-sensitive keyword found, in table order */
  keywords: string[];
  sourceName: string;
  /** First 200 chars of the article text */
  excerpt: string;
  url?: string;
};

export type SpeakerGroup = {
  speaker: string;
  themes: { name: string; count: number }[];
  /** Distinct by summary, at most 5 */
  events: PoliticalEvent[];
  /** Events left after de-duplicating by summary */
  count: number;
  /** Distinct source names, at most 3 */
  sources: string[];
};
