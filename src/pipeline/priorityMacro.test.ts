import { describe, expect, it } from "vitest";
import { PriorityMacroObserver, digestTopic } from "./priorityMacro.js";
import type { NewsItem, ScoredItem } from "../types.js";

const news = (text: string): NewsItem => ({ text, origin: "foreign", metadata: {} });

const scored = (
  impactScore: number,
  text = `item ${impactScore}`,
  metadata: Record<string, unknown> = {}
): ScoredItem => ({
  text,
  origin: "foreign",
  metadata,
  category: "market",
  impactScore,
  reason: `reason ${impactScore}`,
});

describe("PriorityMacroObserver", () => {
  const observer = new PriorityMacroObserver();

  it("files an item under every topic it mentions", () => {
    const obs = observer.observe([news("Fed holds rates; USD/JPY steadies")]);
    expect(obs.fed).toHaveLength(1);
    expect(obs.usdjpy).toHaveLength(1);
    expect(obs.treasury).toHaveLength(0);
    expect(obs.hasAny).toBe(true);
    expect(obs.totalCount).toBe(2);
  });

  it("matches Japanese data releases", () => {
    const obs = observer.observe([news("雇用統計とCPIが焦点")]);
    expect(obs.employment).toHaveLength(1);
    expect(obs.inflation).toHaveLength(1);
    expect(obs.totalCount).toBe(2);
  });

  it("counts the dollar index without flagging a priority day", () => {
    const obs = observer.observe([news("Dollar index climbs")]);
    expect(obs.dxy).toHaveLength(1);
    expect(obs.hasAny).toBe(false);
    expect(obs.totalCount).toBe(1);
  });

  it("is empty for unrelated news", () => {
    const obs = observer.observe([news("新製品を発表")]);
    expect(obs.hasAny).toBe(false);
    expect(obs.totalCount).toBe(0);
  });
});

describe("digestTopic", () => {
  it("lists the first five articles and averages their scores", () => {
    const long = "a".repeat(80);
    const items = [
      scored(2, "minutes", { title: "FOMC minutes", url: "https://example.com/fomc" }),
      scored(2, long),
      scored(1),
      scored(0),
      scored(0),
      scored(-5),
    ];
    const d = digestTopic(items);
    expect(d.count).toBe(6);
    expect(d.avgScore).toBe(1);
    expect(d.articles).toHaveLength(5);
    expect(d.articles[0]).toEqual({
      title: "FOMC minutes",
      url: "https://example.com/fomc",
      impactScore: 2,
      reason: "reason 2",
    });
    expect(d.articles[1].title).toBe("a".repeat(60));
    expect(d.articles[1].url).toBeUndefined();
  });

  it("is zeroed for a quiet topic", () => {
    expect(digestTopic([])).toEqual({ count: 0, avgScore: 0, articles: [] });
  });
});
