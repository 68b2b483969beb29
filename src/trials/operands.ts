import type { ItemOperands, Level } from "./types";

const DIGIT_RUN = /[0-9]+/g;

/**
 * Reads the two operands of a fact out of its cue text: the first and the last
 * run of digits. "3x4" gives 3 and 4; a cue with a single number gives that
 * number twice with `digitRuns` set to 1.
 */
export const parseOperands = (itemKey: string): ItemOperands | null => {
  const runs = itemKey.match(DIGIT_RUN) ?? [];
  const first = runs[0];
  if (first === undefined) return null;

  const last = runs[runs.length - 1] ?? first;

  return {
    operandA: Number.parseInt(first, 10),
    operandB: Number.parseInt(last, 10),
    digitRuns: runs.length
  };
};

export const requiredDigitRuns = (level: Level): number => (level === 1 ? 1 : 2);
