import Database from "better-sqlite3";
import { existsSync, mkdirSync, renameSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type {
  ComparisonInput,
  DailyRecordInput,
  HistoryComparison,
  HistoryEntry,
} from "../types.js";
import { HISTORY } from "../constants.js";
import { round1, round2 } from "../pipeline/aggregate.js";
import { logger } from "../logger.js";

const log = logger("HISTORY");

const HistoryRow = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  total_score: z.number(),
  zero_ratio: z.number(),
  plus2_ratio: z.number(),
  minus2_ratio: z.number(),
  news_count: z.number().int(),
  macro_ratio: z.number(),
});

const COLUMNS =
  "date, total_score, zero_ratio, plus2_ratio, minus2_ratio, news_count, macro_ratio";

/** Local-time YYYY-MM-DD */
export function localDate(d: Date): string {
  return `${d.getFullYear()}-${String(d.getMonth() + 1).padStart(
    2,
    "0"
  )}-${String(d.getDate()).padStart(2, "0")}`;
}

export function addDays(d: Date, days: number): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate() + days);
}

type Statements = {
  all: Database.Statement;
  range: Database.Statement;
  upsert: Database.Statement;
  prune: Database.Statement;
};

type OpenedDb = { db: Database.Database; q: Statements };

/** Open, create the table and prepare every statement; any failure closes the handle and throws. */
function openDb(path: string): OpenedDb {
  const db = new Database(path);
  try {
    db.pragma("journal_mode = WAL");
    db.exec(`CREATE TABLE IF NOT EXISTS history (
      date TEXT PRIMARY KEY,
      total_score REAL NOT NULL DEFAULT 0,
      zero_ratio REAL NOT NULL DEFAULT 0,
      plus2_ratio REAL NOT NULL DEFAULT 0,
      minus2_ratio REAL NOT NULL DEFAULT 0,
      news_count INTEGER NOT NULL DEFAULT 0,
      macro_ratio REAL NOT NULL DEFAULT 0,
      updated_at TEXT DEFAULT (datetime('now'))
    );`);
    // A `history` table from some other schema fails here, not mid-run
    const q: Statements = {
      all: db.prepare(`SELECT ${COLUMNS} FROM history ORDER BY date`),
      range: db.prepare(
        `SELECT ${COLUMNS} FROM history WHERE date >= ? AND date < ? ORDER BY date`
      ),
      upsert: db.prepare(`INSERT INTO history (${COLUMNS})
        VALUES (@date, @total_score, @zero_ratio, @plus2_ratio, @minus2_ratio, @news_count, @macro_ratio)
        ON CONFLICT(date) DO UPDATE SET
          total_score = excluded.total_score,
          zero_ratio = excluded.zero_ratio,
          plus2_ratio = excluded.plus2_ratio,
          minus2_ratio = excluded.minus2_ratio,
          news_count = excluded.news_count,
          macro_ratio = excluded.macro_ratio,
          updated_at = datetime('now')`),
      prune: db.prepare("DELETE FROM history WHERE date < ?"),
    };
    db.prepare("SELECT count(*) FROM history").get();
    return { db, q };
  } catch (err) {
    db.close();
    throw err;
  }
}

/** Open the log; a corrupt or foreign file is moved aside and the store starts empty. */
function openHistoryDb(path: string): OpenedDb {
  if (path === ":memory:") return openDb(path);
  try {
    mkdirSync(dirname(path), { recursive: true });
    return openDb(path);
  } catch (err) {
    log.warn("unreadable history db, starting empty", {
      path,
      err: String(err),
    });
  }
  try {
    for (const f of [path, `${path}-wal`, `${path}-shm`]) {
      if (existsSync(f)) renameSync(f, `${f}.corrupt`);
    }
    return openDb(path);
  } catch (err) {
    log.warn("falling back to in-memory history", {
      path,
      err: String(err),
    });
    return openDb(":memory:");
  }
}

export type HistoryStoreOptions = {
  /** Clock used for "today"; defaults to the system clock. */
  now?: () => Date;
  retentionDays?: number;
};

/**
 * One row per calendar day. Every write upserts today's row and prunes rows
 * older than the retention window inside a single immediate transaction, so
 * overlapping runs serialize on the SQLite write lock.
 */
export class HistoryStore {
  private readonly db: Database.Database;
  private readonly q: Statements;
  private readonly now: () => Date;
  private readonly retentionDays: number;

  constructor(path: string, opts: HistoryStoreOptions = {}) {
    this.now = opts.now ?? (() => new Date());
    this.retentionDays = opts.retentionDays ?? HISTORY.RETENTION_DAYS;
    const { db, q } = openHistoryDb(path);
    this.db = db;
    this.q = q;
  }

  today(): string {
    return localDate(this.now());
  }

  private rows(raw: unknown[]): HistoryEntry[] {
    const out: HistoryEntry[] = [];
    for (const r of raw) {
      const parsed = HistoryRow.safeParse(r);
      if (!parsed.success) {
        log.warn("skipping malformed row", parsed.error.issues);
        continue;
      }
      const x = parsed.data;
      out.push({
        date: x.date,
        totalScore: x.total_score,
        zeroRatio: x.zero_ratio,
        plus2Ratio: x.plus2_ratio,
        minus2Ratio: x.minus2_ratio,
        newsCount: x.news_count,
        macroRatio: x.macro_ratio,
      });
    }
    return out;
  }

  /** All entries, oldest first. */
  entries(): HistoryEntry[] {
    return this.rows(this.q.all.all());
  }

  /** Entries dated strictly before `date` (YYYY-MM-DD), oldest first. */
  entriesBefore(date: string): HistoryEntry[] {
    return this.entries().filter((e) => e.date < date);
  }

  /** Upsert today's entry, then drop entries older than the retention window. */
  addDailyRecord(record: DailyRecordInput): HistoryEntry {
    const now = this.now();
    const entry: HistoryEntry = { date: localDate(now), ...record };
    const cutoff = localDate(addDays(now, -this.retentionDays));

    const write = this.db.transaction(() => {
      this.q.upsert.run({
        date: entry.date,
        total_score: entry.totalScore,
        zero_ratio: entry.zeroRatio,
        plus2_ratio: entry.plus2Ratio,
        minus2_ratio: entry.minus2Ratio,
        news_count: entry.newsCount,
        macro_ratio: entry.macroRatio,
      });
      return this.q.prune.run(cutoff).changes;
    });
    const pruned = write.immediate();
    if (pruned > 0) log.info("pruned", { pruned, before: cutoff });
    return entry;
  }

  /** Entries in [today - n, today), today excluded. */
  getLastNDays(n: number = HISTORY.COMPARISON_DAYS): HistoryEntry[] {
    const now = this.now();
    return this.rows(
      this.q.range.all(localDate(addDays(now, -n)), localDate(now))
    );
  }

  get7DayComparison(current: ComparisonInput): HistoryComparison {
    const past = this.getLastNDays(HISTORY.COMPARISON_DAYS);
    if (!past.length) return { hasHistory: false, daysCount: 0 };

    const avgOf = (pick: (e: HistoryEntry) => number) =>
      past.reduce((a, e) => a + pick(e), 0) / past.length;

    return {
      hasHistory: true,
      daysCount: past.length,
      avgTotalScore: round2(avgOf((e) => e.totalScore)),
      avgZeroRatio: round1(avgOf((e) => e.zeroRatio)),
      avgPlus2Ratio: round1(avgOf((e) => e.plus2Ratio)),
      avgMinus2Ratio: round1(avgOf((e) => e.minus2Ratio)),
      currentTotalScore: current.totalScore,
      currentZeroRatio: current.zeroRatio,
      currentPlus2Ratio: current.plus2Ratio,
      currentMinus2Ratio: current.minus2Ratio,
    };
  }

  /**
   * Run of the most recent recorded entries (today excluded) with a zero ratio
   * above 80. Counts entries, not calendar days: a day without an entry does
   * not break the run.
   */
  getConsecutiveHighZeroDays(): number {
    const today = this.today();
    let count = 0;
    for (const e of this.entries().reverse()) {
      if (e.date === today) continue;
      if (e.zeroRatio > HISTORY.HIGH_ZERO_RATIO) count++;
      else break;
    }
    return count;
  }

  close() {
    this.db.close();
  }
}
