// src/pipeline/macro.ts
import type { MacroTopic, NewsItem } from "../types.js";
import {
  defaultKeywordTables,
  matchKeywords,
  type KeywordTables,
} from "./keywords.js";

export type MacroBucket<T extends NewsItem> = {
  items: T[];
  /** Distinct keywords seen across the bucket */
  keywords: string[];
};

export type MacroObservation<T extends NewsItem = NewsItem> = Record<
  MacroTopic,
  MacroBucket<T>
> & {
  /** Sum of per-topic item counts; an item on two topics counts twice. */
  totalCount: number;
};

const TOPICS: readonly MacroTopic[] = ["fx", "rates", "data"];

/**
 * Spots FX / rates / economic-data references.
 * Identification only: nothing here feeds the impact score.
 */
export class MacroObserver {
  constructor(
    private readonly tables: KeywordTables["macro"] = defaultKeywordTables().macro
  ) {}

  observe<T extends NewsItem>(items: readonly T[]): MacroObservation<T> {
    const buckets: Record<MacroTopic, { items: T[]; keywords: Set<string> }> = {
      fx: { items: [], keywords: new Set() },
      rates: { items: [], keywords: new Set() },
      data: { items: [], keywords: new Set() },
    };

    for (const it of items) {
      for (const topic of TOPICS) {
        const hits = matchKeywords(it.text, this.tables[topic]);
        if (!hits.length) continue;
        buckets[topic].items.push(it);
        for (const kw of hits) buckets[topic].keywords.add(kw);
      }
    }

    const out = (topic: MacroTopic): MacroBucket<T> => ({
      items: buckets[topic].items,
      keywords: [...buckets[topic].keywords],
    });
    return {
      fx: out("fx"),
      rates: out("rates"),
      data: out("data"),
      totalCount:
        buckets.fx.items.length +
        buckets.rates.items.length +
        buckets.data.items.length,
    };
  }
}
