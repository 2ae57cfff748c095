// src/pipeline/political.ts
import type { NewsItem, PoliticalEvent, SpeakerGroup } from "../types.js";
import {
  defaultKeywordTables,
  matchKeywords,
  type KeywordTables,
} from "./keywords.js";

const EXCERPT_CHARS = 200;
const GROUP_EVENTS = 5;
const GROUP_SOURCES = 3;
const FALLBACK_SUMMARY = "市場感応度の高い発言";

const str = (x: unknown) => (typeof x === "string" && x ? x : undefined);

/**
 * Spots a known speaker talking about something markets react to
 * (tariffs, the Fed, sanctions...). Surfaced for reading, not scored.
 */
export class PoliticalEventDetector {
  private readonly speakerKeys: string[];
  private readonly contextKeys: string[];

  constructor(
    private readonly tables: KeywordTables["political"] = defaultKeywordTables()
      .political
  ) {
    this.speakerKeys = Object.keys(tables.speakers);
    this.contextKeys = Object.keys(tables.contexts);
  }

  /** Template keyed by the first matched keyword, else the context default. */
  summarize(context: string, keywords: readonly string[]): string {
    const templates = this.tables.summaries[context] ?? {};
    for (const kw of keywords) {
      const hit = templates[kw];
      if (hit) return hit;
    }
    return templates.default ?? FALLBACK_SUMMARY;
  }

  detectOne(item: NewsItem): PoliticalEvent | undefined {
    const [speakerKey] = matchKeywords(item.text, this.speakerKeys);
    if (!speakerKey) return undefined;

    const keywords = matchKeywords(item.text, this.contextKeys);
    if (!keywords.length) return undefined;

    const context = this.tables.contexts[keywords[0]];
    const event: PoliticalEvent = {
      speaker: this.tables.speakers[speakerKey],
      context,
      summary: this.summarize(context, keywords),
      keywords,
      sourceName: str(item.metadata.source_name) ?? "Unknown",
      excerpt: item.text.slice(0, EXCERPT_CHARS),
    };
    const url = str(item.metadata.url);
    if (url) event.url = url;
    return event;
  }

  detect(items: readonly NewsItem[]): PoliticalEvent[] {
    const out: PoliticalEvent[] = [];
    for (const it of items) {
      const ev = this.detectOne(it);
      if (ev) out.push(ev);
    }
    return out;
  }
}

/** Per speaker, in first-seen order; repeated summaries collapse to the first. */
export function groupBySpeaker(events: readonly PoliticalEvent[]): SpeakerGroup[] {
  const groups = new Map<
    string,
    { themes: Map<string, number>; events: PoliticalEvent[]; summaries: Set<string>; sources: Set<string> }
  >();

  for (const ev of events) {
    let g = groups.get(ev.speaker);
    if (!g) {
      g = { themes: new Map(), events: [], summaries: new Set(), sources: new Set() };
      groups.set(ev.speaker, g);
    }
    g.themes.set(ev.context, (g.themes.get(ev.context) ?? 0) + 1);
    g.sources.add(ev.sourceName);
    if (g.summaries.has(ev.summary)) continue;
    g.summaries.add(ev.summary);
    g.events.push(ev);
  }

  return [...groups].map(([speaker, g]) => ({
    speaker,
    themes: [...g.themes].map(([name, count]) => ({ name, count })),
    events: g.events.slice(0, GROUP_EVENTS),
    count: g.events.length,
    sources: [...g.sources].slice(0, GROUP_SOURCES),
  }));
}
