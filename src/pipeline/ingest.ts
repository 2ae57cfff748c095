// src/pipeline/ingest.ts
import { z } from "zod";
import type { NewsItem } from "../types.js";
import { logger } from "../logger.js";

const log = logger("INGEST");

/** Missing or unknown origin falls back to "domestic"; every other key is passed through. */
const RawNews = z
  .object({
    text: z.string().optional().catch(undefined),
    origin: z.enum(["domestic", "foreign"]).catch("domestic"),
  })
  .passthrough();

const str = (x: unknown) => (typeof x === "string" ? x.trim() : "");

/**
 * Normalize caller-supplied items. `text` wins; otherwise title + description.
 * Items without any usable text are dropped.
 */
export function parseNewsItems(raw: unknown): NewsItem[] {
  if (!Array.isArray(raw)) {
    log.warn("expected an array of news items", { got: typeof raw });
    return [];
  }

  const out: NewsItem[] = [];
  raw.forEach((entry: unknown, index) => {
    const parsed = RawNews.safeParse(entry);
    if (!parsed.success) {
      log.warn("skipping non-object item", { index });
      return;
    }
    const { text, origin, ...metadata } = parsed.data;
    const body =
      str(text) ||
      [str(metadata.title), str(metadata.description)].filter(Boolean).join(" ");
    if (!body) {
      log.warn("skipping item without text", { index });
      return;
    }
    out.push({ text: body, origin, metadata: Object.freeze(metadata) });
  });
  return out;
}
