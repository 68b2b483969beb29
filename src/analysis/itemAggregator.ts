import { parseOperands } from "../trials/operands";
import type { Trial } from "../trials/types";
import type { ItemDescriptive } from "./types";

export const mean = (values: readonly number[]): number => {
  if (values.length === 0) return Number.NaN;
  return values.reduce((a, b) => a + b, 0) / values.length;
};

/** Sample (n - 1) standard deviation; null below two values. */
export const sampleStandardDeviation = (values: readonly number[]): number | null => {
  if (values.length < 2) return null;
  const avg = mean(values);
  const squares = values.reduce((acc, v) => acc + (v - avg) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
};

export const standardError = (values: readonly number[]): number | null => {
  const sd = sampleStandardDeviation(values);
  if (sd === null) return null;
  return sd / Math.sqrt(values.length);
};

type ItemRow = Pick<Trial, "level" | "itemKey" | "correct">;

// NaN operands (cues without digits) sort after every number.
const compareNumbers = (x: number, y: number): number => {
  if (Number.isNaN(x)) return Number.isNaN(y) ? 0 : 1;
  if (Number.isNaN(y)) return -1;
  return x - y;
};

const compareItems = (a: ItemDescriptive, b: ItemDescriptive): number => {
  if (a.level !== b.level) return a.level - b.level;
  const byA = compareNumbers(a.operandA, b.operandA);
  if (byA !== 0) return byA;
  const byB = compareNumbers(a.operandB, b.operandB);
  if (byB !== 0) return byB;
  return a.itemKey < b.itemKey ? -1 : a.itemKey > b.itemKey ? 1 : 0;
};

/**
 * Per-item accuracy over exactly the rows given. Items are keyed by level and
 * cue, and sorted by level then operands for plotting.
 */
export const aggregateItems = (rows: readonly ItemRow[]): ItemDescriptive[] => {
  const groups = new Map<string, { level: ItemRow["level"]; itemKey: string; correct: number[] }>();

  for (const row of rows) {
    const key = JSON.stringify([row.level, row.itemKey]);
    const current = groups.get(key) ?? { level: row.level, itemKey: row.itemKey, correct: [] };
    current.correct.push(row.correct);
    groups.set(key, current);
  }

  const items: ItemDescriptive[] = [];
  for (const group of groups.values()) {
    const operands = parseOperands(group.itemKey);
    items.push({
      level: group.level,
      itemKey: group.itemKey,
      operandA: operands?.operandA ?? Number.NaN,
      operandB: operands?.operandB ?? Number.NaN,
      n: group.correct.length,
      meanAccuracy: mean(group.correct),
      standardError: standardError(group.correct)
    });
  }

  return items.sort(compareItems);
};
