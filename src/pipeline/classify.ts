// src/pipeline/classify.ts
import type { Classification, ClassifiedItem, NewsItem } from "../types.js";
import {
  defaultKeywordTables,
  matchKeywords,
  type KeywordTables,
} from "./keywords.js";

/** First group (in table order) with any keyword present in the text. */
function firstGroup(
  text: string,
  groups: Readonly<Record<string, readonly string[]>>
): string | undefined {
  for (const [name, keywords] of Object.entries(groups)) {
    if (matchKeywords(text, keywords).length > 0) return name;
  }
  return undefined;
}

/**
 * Rule-based market / sector / theme tagging.
 * Precedence: sector < theme < market (a market keyword clears the sub-category).
 */
export class TextClassifier {
  constructor(
    private readonly tables: KeywordTables["classifier"] = defaultKeywordTables()
      .classifier
  ) {}

  classify(text: string): Classification {
    let result: Classification = { category: "market" };

    const sector = firstGroup(text, this.tables.sector);
    if (sector) result = { category: "sector", subCategory: sector };

    const theme = firstGroup(text, this.tables.theme);
    if (theme) result = { category: "theme", subCategory: theme };

    if (matchKeywords(text, this.tables.market).length > 0)
      result = { category: "market" };

    return result;
  }

  classifyItem(item: NewsItem): ClassifiedItem {
    const { category, subCategory } = this.classify(item.text);
    const out: ClassifiedItem = {
      text: item.text,
      origin: item.origin,
      metadata: item.metadata,
      category,
    };
    if (subCategory !== undefined) out.subCategory = subCategory;
    return out;
  }

  /** Public API */
  classifyBatch(items: readonly NewsItem[]): ClassifiedItem[] {
    return items.map((it) => this.classifyItem(it));
  }
}
