// src/pipeline/alerts.ts
import type { AggregateRecord, Alert } from "../types.js";
import { ALERTS } from "../constants.js";

/** Anything carrying a day's total score: an AggregateRecord or a persisted HistoryEntry. */
export type DailyScore = { totalScore: number };

export type AlertThresholds = {
  dailyChange: number;
  dailyChangeWarning: number;
  maWindow: number;
  domesticForeignGap: number;
};

const DEFAULTS: AlertThresholds = {
  dailyChange: ALERTS.DAILY_CHANGE,
  dailyChangeWarning: ALERTS.DAILY_CHANGE_WARNING,
  maWindow: ALERTS.MA_WINDOW,
  domesticForeignGap: ALERTS.DOMESTIC_FOREIGN_GAP,
};

/** `{:+.1f}` style */
const signed = (x: number) => `${x >= 0 ? "+" : ""}${x.toFixed(1)}`;

const avg = (xs: DailyScore[]) =>
  xs.reduce((a, h) => a + h.totalScore, 0) / xs.length;

/**
 * Day-over-day change detector.
 *
 * Keeps the daily scores it is fed for the life of the process; callers that
 * need continuity across runs seed it from the history store.
 */
export class AlertDetector {
  private readonly history: DailyScore[] = [];
  private readonly t: AlertThresholds;

  constructor(thresholds: Partial<AlertThresholds> = {}) {
    this.t = { ...DEFAULTS, ...thresholds };
  }

  /** Appends unconditionally; no per-date de-duplication here. */
  addDailyScore(record: DailyScore): void {
    this.history.push({ totalScore: record.totalScore });
  }

  get size(): number {
    return this.history.length;
  }

  /** Mean of the last `window` scores, or null with fewer records. */
  movingAverage(window: number = this.t.maWindow): number | null {
    if (window <= 0 || this.history.length < window) return null;
    return avg(this.history.slice(-window));
  }

  detectAlerts(current: AggregateRecord): Alert[] {
    const alerts: Alert[] = [];

    // 1) Day-over-day change
    const prev = this.history[this.history.length - 1];
    if (prev) {
      const delta = current.totalScore - prev.totalScore;
      if (Math.abs(delta) >= this.t.dailyChange) {
        const direction = delta > 0 ? "上昇" : "下落";
        alerts.push({
          type: "daily_change",
          severity:
            Math.abs(delta) >= this.t.dailyChangeWarning ? "warning" : "info",
          message: `総合スコアが前日比 ${signed(delta)} 変化（${direction}傾向への変化）`,
        });
      }
    }

    // 2) Moving-average sign flip (window vs. the window one record earlier)
    const w = this.t.maWindow;
    if (w > 0 && this.history.length > w) {
      const ma = avg(this.history.slice(-w));
      const prevMa = avg(this.history.slice(-(w + 1), -1));
      if (ma >= 0 && prevMa < 0) {
        alerts.push({
          type: "ma_reversal",
          severity: "info",
          message: `${w}日移動平均がプラス圏に転換（市場センチメント改善の可能性）`,
        });
      } else if (ma < 0 && prevMa >= 0) {
        alerts.push({
          type: "ma_reversal",
          severity: "warning",
          message: `${w}日移動平均がマイナス圏に転換（市場センチメント悪化の可能性）`,
        });
      }
    }

    // 3) Domestic vs. foreign divergence
    const gap = current.domesticForeignGap;
    if (Math.abs(gap) >= this.t.domesticForeignGap) {
      alerts.push(
        gap > 0
          ? {
              type: "domestic_foreign_gap",
              severity: "info",
              message: `国内スコアが海外より ${signed(gap)} 高い（国内市場が海外より楽観的）`,
            }
          : {
              type: "domestic_foreign_gap",
              severity: "warning",
              message: `国内スコアが海外より ${gap.toFixed(1)} 低い（国内市場が海外より悲観的）`,
            }
      );
    }

    return alerts;
  }
}
