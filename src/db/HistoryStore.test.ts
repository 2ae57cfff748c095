import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import Database from "better-sqlite3";
import { HistoryStore, addDays, localDate } from "./HistoryStore.js";
import type { DailyRecordInput } from "../types.js";

const day = (overrides: Partial<DailyRecordInput> = {}): DailyRecordInput => ({
  totalScore: 0,
  zeroRatio: 0,
  plus2Ratio: 0,
  minus2Ratio: 0,
  newsCount: 10,
  macroRatio: 0,
  ...overrides,
});

describe("date helpers", () => {
  it("formats local dates and crosses month ends", () => {
    expect(localDate(new Date(2026, 0, 5, 23, 59))).toBe("2026-01-05");
    expect(localDate(addDays(new Date(2026, 2, 1), -1))).toBe("2026-02-28");
    expect(localDate(addDays(new Date(2026, 2, 14), -30))).toBe("2026-02-12");
  });
});

describe("HistoryStore", () => {
  let now: Date;
  let store: HistoryStore;
  const at = (month: number, date: number) => {
    now = new Date(2026, month - 1, date, 12);
  };

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    at(3, 15);
    store = new HistoryStore(":memory:", { now: () => now });
  });
  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
  });

  it("keeps one entry per day, last write wins", () => {
    store.addDailyRecord(day({ totalScore: 1.5 }));
    const entry = store.addDailyRecord(day({ totalScore: -2, newsCount: 4 }));
    expect(entry.date).toBe("2026-03-15");
    expect(store.entries()).toEqual([
      {
        date: "2026-03-15",
        totalScore: -2,
        zeroRatio: 0,
        plus2Ratio: 0,
        minus2Ratio: 0,
        newsCount: 4,
        macroRatio: 0,
      },
    ]);
  });

  it("prunes entries older than 30 days on write", () => {
    for (let d = new Date(2026, 1, 8, 12); d <= new Date(2026, 2, 14, 12); d = addDays(d, 1)) {
      now = new Date(d.getFullYear(), d.getMonth(), d.getDate(), 12);
      store.addDailyRecord(day());
    }
    const entries = store.entries();
    expect(entries).toHaveLength(31);
    expect(entries[0].date).toBe("2026-02-12");
    expect(entries[entries.length - 1].date).toBe("2026-03-14");
  });

  it("returns the seven days before today, today excluded", () => {
    for (const d of [7, 8, 14, 15]) {
      at(3, d);
      store.addDailyRecord(day({ totalScore: d }));
    }
    expect(store.getLastNDays().map((e) => e.date)).toEqual(["2026-03-08", "2026-03-14"]);
    expect(store.getLastNDays(8).map((e) => e.date)).toEqual([
      "2026-03-07",
      "2026-03-08",
      "2026-03-14",
    ]);
  });

  it("reports no history before the first prior day", () => {
    store.addDailyRecord(day({ totalScore: 4 }));
    expect(
      store.get7DayComparison({ totalScore: 1, zeroRatio: 0, plus2Ratio: 0, minus2Ratio: 0 })
    ).toEqual({ hasHistory: false, daysCount: 0 });
  });

  it("averages the prior week", () => {
    at(3, 13);
    store.addDailyRecord(day({ totalScore: 1, zeroRatio: 50, plus2Ratio: 10, minus2Ratio: 0 }));
    at(3, 14);
    store.addDailyRecord(day({ totalScore: 2, zeroRatio: 61, plus2Ratio: 20, minus2Ratio: 5 }));
    at(3, 15);
    expect(
      store.get7DayComparison({ totalScore: 0.4, zeroRatio: 70, plus2Ratio: 5, minus2Ratio: 5 })
    ).toEqual({
      hasHistory: true,
      daysCount: 2,
      avgTotalScore: 1.5,
      avgZeroRatio: 55.5,
      avgPlus2Ratio: 15,
      avgMinus2Ratio: 2.5,
      currentTotalScore: 0.4,
      currentZeroRatio: 70,
      currentPlus2Ratio: 5,
      currentMinus2Ratio: 5,
    });
  });

  it("counts the latest run of high-zero entries, skipping today and calendar gaps", () => {
    const zeros: [number, number][] = [
      [10, 50],
      [11, 90],
      [13, 85],
      [14, 81],
      [15, 95],
    ];
    for (const [d, zeroRatio] of zeros) {
      at(3, d);
      store.addDailyRecord(day({ zeroRatio }));
    }
    expect(store.getConsecutiveHighZeroDays()).toBe(3);
  });

  it("does not count a zero ratio of exactly 80", () => {
    at(3, 14);
    store.addDailyRecord(day({ zeroRatio: 80 }));
    at(3, 15);
    expect(store.getConsecutiveHighZeroDays()).toBe(0);
  });
});

describe("HistoryStore on disk", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "history-"));
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });
  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("persists across reopen", () => {
    const path = join(dir, "nested", "history.db");
    const now = () => new Date(2026, 2, 15, 12);
    const first = new HistoryStore(path, { now });
    first.addDailyRecord(day({ totalScore: 3.2 }));
    first.close();

    const second = new HistoryStore(path, { now });
    expect(second.entries().map((e) => [e.date, e.totalScore])).toEqual([["2026-03-15", 3.2]]);
    second.close();
  });

  it("moves a corrupt file aside and starts empty", () => {
    const path = join(dir, "history.db");
    writeFileSync(path, "this is not a database\n".repeat(200));
    const store = new HistoryStore(path);
    expect(store.entries()).toEqual([]);
    expect(existsSync(`${path}.corrupt`)).toBe(true);
    expect(console.warn).toHaveBeenCalledTimes(1);
    store.close();
  });

  it("moves aside a file whose history table has other columns", () => {
    const path = join(dir, "history.db");
    const foreign = new Database(path);
    foreign.exec("CREATE TABLE history (date TEXT PRIMARY KEY, total_score REAL)");
    foreign.prepare("INSERT INTO history VALUES ('2026-03-14', 1.5)").run();
    foreign.close();

    const store = new HistoryStore(path, { now: () => new Date(2026, 2, 15, 12) });
    expect(store.entries()).toEqual([]);
    expect(existsSync(`${path}.corrupt`)).toBe(true);
    expect(console.warn).toHaveBeenCalledTimes(1);

    store.addDailyRecord(day({ totalScore: 2 }));
    expect(store.entries().map((e) => [e.date, e.totalScore])).toEqual([["2026-03-15", 2]]);
    store.close();
  });
});
