// src/pipeline/priorityMacro.ts
import type { NewsItem, PriorityTopic, ScoredItem } from "../types.js";
import {
  defaultKeywordTables,
  matchKeywords,
  type KeywordTables,
} from "./keywords.js";
import { round1 } from "./aggregate.js";

export const PRIORITY_TOPICS: readonly PriorityTopic[] = [
  "fed",
  "treasury",
  "usdjpy",
  "dxy",
  "employment",
  "inflation",
  "ism",
];

/** The dollar index is collected and counted but does not set `hasAny`. */
const HEADLINE_TOPICS = PRIORITY_TOPICS.filter((t) => t !== "dxy");

const DIGEST_ARTICLES = 5;
const TITLE_CHARS = 60;

export type PriorityMacroObservation<T extends NewsItem = NewsItem> = Record<
  PriorityTopic,
  T[]
> & {
  hasAny: boolean;
  /** Sum over every topic, dxy included; an item on two topics counts twice. */
  totalCount: number;
};

export type PriorityArticle = {
  title: string;
  url?: string;
  impactScore: number;
  reason: string;
};

export type PriorityDigest = {
  count: number;
  /** Mean score of the listed articles */
  avgScore: number;
  articles: PriorityArticle[];
};

/**
 * Rates, FX and headline data releases. Their presence matters more than
 * their volume, so any hit is reported even on an otherwise quiet day.
 */
export class PriorityMacroObserver {
  constructor(
    private readonly tables: KeywordTables["priorityMacro"] = defaultKeywordTables()
      .priorityMacro
  ) {}

  observe<T extends NewsItem>(items: readonly T[]): PriorityMacroObservation<T> {
    const hits: Record<PriorityTopic, T[]> = {
      fed: [],
      treasury: [],
      usdjpy: [],
      dxy: [],
      employment: [],
      inflation: [],
      ism: [],
    };
    for (const it of items) {
      for (const topic of PRIORITY_TOPICS) {
        if (matchKeywords(it.text, this.tables[topic]).length) hits[topic].push(it);
      }
    }
    return {
      ...hits,
      hasAny: HEADLINE_TOPICS.some((t) => hits[t].length > 0),
      totalCount: PRIORITY_TOPICS.reduce((n, t) => n + hits[t].length, 0),
    };
  }
}

const titleOf = (it: ScoredItem) => {
  const title = it.metadata.title;
  return typeof title === "string" && title ? title : it.text.slice(0, TITLE_CHARS);
};

/** Report view of one topic: count plus the first few articles and their mean score. */
export function digestTopic(items: readonly ScoredItem[]): PriorityDigest {
  const listed = items.slice(0, DIGEST_ARTICLES);
  const articles = listed.map((it) => {
    const a: PriorityArticle = {
      title: titleOf(it),
      impactScore: it.impactScore,
      reason: it.reason,
    };
    const url = it.metadata.url;
    if (typeof url === "string" && url) a.url = url;
    return a;
  });
  const avgScore = listed.length
    ? round1(listed.reduce((s, it) => s + it.impactScore, 0) / listed.length)
    : 0;
  return { count: items.length, avgScore, articles };
}
