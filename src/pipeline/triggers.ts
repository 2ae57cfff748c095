// src/pipeline/triggers.ts
import type { Trigger, TriggerId } from "../types.js";
import { TRIGGERS } from "../constants.js";

export type TriggerInput = {
  /** % of items scored exactly 0 */
  zeroRatio: number;
  /** % of items scored ≥ +2 */
  plus2Ratio: number;
  /** % of items scored ≤ -2 */
  minus2Ratio: number;
  /** % macro references (FX / rates / data) */
  macroRatio: number;
  /** Run of prior days with zeroRatio > 80, today included when it qualifies */
  consecutiveHighZeroDays: number;
};

type Rule = {
  id: TriggerId;
  name: string;
  message: string;
  when: (x: TriggerInput) => boolean;
};

/**
 * Observation notes. They never suggest a trade and are independent of the
 * aggregate score: a note is either raised or not.
 */
const RULES: readonly Rule[] = [
  {
    id: "A",
    name: "材料出揃いの兆候",
    message: "市場が評価可能な材料に反応し始めている可能性があります。",
    when: (x) =>
      x.zeroRatio < TRIGGERS.ALIGNMENT_MAX_ZERO &&
      (x.plus2Ratio > TRIGGERS.ALIGNMENT_MIN_DIRECTIONAL ||
        x.minus2Ratio > TRIGGERS.ALIGNMENT_MIN_DIRECTIONAL),
  },
  {
    id: "B",
    name: "ノイズ優勢状態",
    message: "判断材料として使いにくいニュースが多い状態が続いています。",
    when: (x) =>
      x.zeroRatio > TRIGGERS.NOISE_MIN_ZERO &&
      x.consecutiveHighZeroDays >= TRIGGERS.NOISE_MIN_DAYS,
  },
  {
    id: "C",
    name: "評価の偏り",
    message: "市場の受け止め方が一方向に偏っている可能性があります。",
    when: (x) =>
      x.plus2Ratio > TRIGGERS.SKEW_MIN_DIRECTIONAL ||
      x.minus2Ratio > TRIGGERS.SKEW_MIN_DIRECTIONAL,
  },
  {
    id: "D",
    name: "マクロ前提変化",
    message: "株価以外の前提条件（金利・為替など）への注目が高まっています。",
    when: (x) => x.macroRatio > TRIGGERS.MACRO_MIN,
  },
];

export class TriggerDetector {
  /** All four notes with their fired flag. */
  evaluate(input: TriggerInput): Trigger[] {
    return RULES.map(({ id, name, message, when }) => ({
      id,
      name,
      message,
      fired: when(input),
    }));
  }

  /** Only the notes that fired, in A..D order. */
  detect(input: TriggerInput): Trigger[] {
    return this.evaluate(input).filter((t) => t.fired);
  }
}
