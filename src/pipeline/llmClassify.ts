// src/pipeline/llmClassify.ts
import OpenAI from "openai";
import { z } from "zod";
import type { Classification, NewsItem, ScoredItem } from "../types.js";
import type { RuleBased } from "./analyze.js";
import { clampScore } from "./score.js";
import { SIMILARITY_THRESHOLD } from "../constants.js";
import { logger } from "../logger.js";

const log = logger("LLM");

/** The one call the classifier needs from a model provider. */
export interface LlmTextClient {
  complete(req: { instructions: string; input: string }): Promise<string>;
}

const MAX_INPUT_CHARS = 1500;

const INSTRUCTIONS = `あなたは日米の株式市場とマクロ経済に詳しい証券アナリストです。
ニュース1件を読み、市場観測のための分類と投資インパクトスコアを返してください。
売買の推奨や将来の価格予測は行いません。

category:
- market: 市場全体（金融政策、GDP、雇用統計など）
- sector: 特定セクター（テクノロジー、金融、自動車など）
- theme: テーマ（地政学リスク、規制・政策、決算・業績、M&Aなど）

impact_score: -10〜+10 の整数。判断材料が乏しい、または好悪材料が相殺される場合は 0。
reason: 判定理由（日本語、100字以内）。`;

/** Strict JSON schema for the Responses API `text.format`. */
const VERDICT_FORMAT = {
  name: "news_classification",
  strict: true,
  schema: {
    type: "object",
    additionalProperties: false,
    required: ["category", "sub_category", "impact_score", "reason"],
    properties: {
      category: { type: "string", enum: ["market", "sector", "theme"] },
      sub_category: { type: ["string", "null"] },
      impact_score: { type: "integer" },
      reason: { type: "string" },
    },
  },
};

const VerdictSchema = z.object({
  category: z.enum(["market", "sector", "theme"]).catch("market"),
  sub_category: z.string().nullable().catch(null),
  impact_score: z.coerce.number().catch(0),
  reason: z.string().catch(""),
});

type Verdict = Classification & { impactScore: number; reason: string };

export function createOpenAiClient(opts: {
  apiKey: string;
  model: string;
  baseURL?: string;
}): LlmTextClient {
  const client = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL });
  return {
    async complete({ instructions, input }) {
      const resp = await client.responses.create({
        model: opts.model,
        instructions,
        input,
        text: { format: { type: "json_schema", ...VERDICT_FORMAT } },
      });
      return resp.output_text;
    },
  };
}

/** Parse model output (tolerates a ```json fence). Throws on non-JSON. */
export function parseVerdict(text: string): Verdict {
  const body = text
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");
  const v = VerdictSchema.parse(JSON.parse(body));
  const out: Verdict = {
    category: v.category,
    impactScore: clampScore(Math.trunc(v.impact_score)),
    reason: v.reason || "LLM分類",
  };
  if (v.sub_category) out.subCategory = v.sub_category;
  return out;
}

const wordSet = (text: string) =>
  new Set(text.toLowerCase().split(/\s+/).filter(Boolean));

function jaccard(a: Set<string>, b: Set<string>): number {
  let inter = 0;
  for (const w of a) if (b.has(w)) inter++;
  const union = a.size + b.size - inter;
  return union > 0 ? inter / union : 0;
}

function toScored(item: NewsItem, v: Verdict, reason: string): ScoredItem {
  const out: ScoredItem = {
    text: item.text,
    origin: item.origin,
    metadata: item.metadata,
    category: v.category,
    impactScore: v.impactScore,
    reason,
  };
  if (v.subCategory !== undefined) out.subCategory = v.subCategory;
  return out;
}

/**
 * Model-backed classifier with the same output contract as the keyword rules.
 * Near-duplicate articles reuse an earlier verdict; any failure falls back to
 * the rules for that item.
 */
export class LlmClassifier {
  private readonly seen: { words: Set<string>; verdict: Verdict }[] = [];

  constructor(
    private readonly client: LlmTextClient,
    private readonly fallback: RuleBased,
    private readonly similarity: number = SIMILARITY_THRESHOLD
  ) {}

  get cacheSize(): number {
    return this.seen.length;
  }

  private findSimilar(words: Set<string>): Verdict | undefined {
    return this.seen.find((s) => jaccard(words, s.words) >= this.similarity)
      ?.verdict;
  }

  async scoreItem(item: NewsItem): Promise<ScoredItem> {
    const words = wordSet(item.text);
    const similar = this.findSimilar(words);
    if (similar) return toScored(item, similar, `[類似記事] ${similar.reason}`);

    try {
      const raw = await this.client.complete({
        instructions: INSTRUCTIONS,
        input: `【ニュース】\n${item.text.slice(0, MAX_INPUT_CHARS)}`,
      });
      const verdict = parseVerdict(raw);
      this.seen.push({ words, verdict });
      return toScored(item, verdict, verdict.reason);
    } catch (err) {
      log.warn("classification failed, using keyword rules", {
        err: String(err),
      });
      const { classifier, scorer } = this.fallback;
      return scorer.scoreItem(classifier.classifyItem(item));
    }
  }

  async scoreBatch(items: readonly NewsItem[]): Promise<ScoredItem[]> {
    const out: ScoredItem[] = [];
    for (const it of items) out.push(await this.scoreItem(it));
    return out;
  }
}
