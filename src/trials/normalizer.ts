import { logger } from "../utils/logger";
import { assertLevel } from "./levels";
import { parseOperands, requiredDigitRuns } from "./operands";
import type {
  Correctness,
  NormalizationResult,
  RawTrial,
  RawValue,
  RejectedRow,
  RejectionReason,
  Trial
} from "./types";

const INTEGER_TEXT = /^\d+$/;
const NUMERIC_TEXT = /^-?\d+(\.\d+)?$/;

export const MIN_RESPONSE = 0;
export const MAX_RESPONSE = 100;

const asText = (value: RawValue): string => {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
};

export const coerceCorrect = (value: RawValue): Correctness | null => {
  if (typeof value === "boolean") return value ? 1 : 0;

  let numeric: number | null = null;
  if (typeof value === "number") {
    numeric = value;
  } else if (typeof value === "string") {
    const text = value.trim().toLowerCase();
    if (text === "true") return 1;
    if (text === "false") return 0;
    if (NUMERIC_TEXT.test(text)) numeric = Number(text);
  }

  if (numeric === 0) return 0;
  if (numeric === 1) return 1;
  return null;
};

export const parseResponse = (value: RawValue): number | null => {
  let parsed: number | null = null;

  if (typeof value === "number") {
    parsed = Number.isInteger(value) ? value : null;
  } else if (typeof value === "string") {
    const text = value.trim();
    parsed = INTEGER_TEXT.test(text) ? Number.parseInt(text, 10) : null;
  }

  if (parsed === null || parsed < MIN_RESPONSE || parsed > MAX_RESPONSE) return null;
  return parsed;
};

export const parsePresentationTime = (value: RawValue): number | null => {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;

  const text = value.trim();
  if (!text) return null;
  if (NUMERIC_TEXT.test(text)) return Number(text);

  const ms = Date.parse(text);
  return Number.isNaN(ms) ? null : ms;
};

type RowOutcome = { ok: true; trial: Trial } | { ok: false; reason: RejectionReason };

const normalizeRow = (raw: RawTrial, sourceIndex: number): RowOutcome => {
  const userId = asText(raw.user_id);
  const itemKey = asText(raw.item_key);
  if (!userId || !itemKey) return { ok: false, reason: "missing_identifier" };

  const level = assertLevel(raw.level);

  const correct = coerceCorrect(raw.correct);
  if (correct === null) return { ok: false, reason: "invalid_correct" };

  const givenResponse = parseResponse(raw.given_response);
  if (givenResponse === null) return { ok: false, reason: "invalid_response" };

  const presentationTime = parsePresentationTime(raw.presentation_time);
  if (presentationTime === null) return { ok: false, reason: "invalid_time" };

  const operands = parseOperands(itemKey);
  if (!operands || operands.digitRuns < requiredDigitRuns(level)) {
    return { ok: false, reason: "malformed_cue" };
  }

  return {
    ok: true,
    trial: {
      userId,
      sessionId: asText(raw.session_id),
      level,
      itemKey,
      presentationTime,
      givenResponse,
      correct,
      operandA: operands.operandA,
      operandB: operands.operandB,
      sourceIndex
    }
  };
};

/**
 * Cleans raw trial rows. Malformed rows are dropped and reported in `rejected`;
 * a level outside 1-3 throws.
 */
export const normalizeTrials = (rawTrials: readonly RawTrial[]): NormalizationResult => {
  const trials: Trial[] = [];
  const rejected: RejectedRow[] = [];

  rawTrials.forEach((raw, index) => {
    const outcome = normalizeRow(raw, index);
    if (outcome.ok) {
      trials.push(outcome.trial);
    } else {
      rejected.push({ index, reason: outcome.reason });
    }
  });

  logger.debug({ received: rawTrials.length, kept: trials.length, rejected: rejected.length }, "trials_normalized");

  return { trials, rejected };
};

export const countRejections = (rejected: readonly RejectedRow[]): Record<RejectionReason, number> => {
  const counts: Record<RejectionReason, number> = {
    missing_identifier: 0,
    invalid_correct: 0,
    invalid_response: 0,
    invalid_time: 0,
    malformed_cue: 0
  };
  for (const row of rejected) {
    counts[row.reason] += 1;
  }
  return counts;
};
