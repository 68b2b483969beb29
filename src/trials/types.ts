export type Level = 1 | 2 | 3;

export type RawValue = string | number | boolean | null | undefined;

/** A trial row as handed over by the loader, before any cleaning. */
export interface RawTrial {
  user_id?: RawValue;
  session_id?: RawValue;
  level?: RawValue;
  item_key?: RawValue;
  presentation_time?: RawValue;
  given_response?: RawValue;
  correct?: RawValue;
}

export type Correctness = 0 | 1;

export interface Trial {
  userId: string;
  sessionId: string;
  level: Level;
  itemKey: string;
  presentationTime: number;
  givenResponse: number;
  correct: Correctness;
  operandA: number;
  operandB: number;
  /** Position in the raw input; breaks ties between equal timestamps. */
  sourceIndex: number;
}

export type RejectionReason =
  | "missing_identifier"
  | "invalid_correct"
  | "invalid_response"
  | "invalid_time"
  | "malformed_cue";

export interface RejectedRow {
  index: number;
  reason: RejectionReason;
}

export interface NormalizationResult {
  trials: Trial[];
  rejected: RejectedRow[];
}

export interface ItemOperands {
  operandA: number;
  operandB: number;
  digitRuns: number;
}
