import type { EncounterGroup, EncounterRecord } from "../encounters/types";
import type { Level, RejectedRow, RejectionReason, Trial } from "../trials/types";

export interface ItemDescriptive {
  level: Level;
  itemKey: string;
  operandA: number;
  operandB: number;
  n: number;
  meanAccuracy: number;
  /** Null when fewer than two trials contribute. */
  standardError: number | null;
}

export type ItemSubset = "all" | EncounterGroup;

export interface LevelSummary {
  level: Level;
  trialCount: number;
  userCount: number;
  itemCount: number;
  maxEncounters: number;
}

export interface LevelAnalysis {
  level: Level;
  trials: Trial[];
  encounters: EncounterRecord[];
  groups: Record<EncounterGroup, EncounterRecord[]>;
  items: Record<ItemSubset, ItemDescriptive[]>;
  summary: LevelSummary;
}

export interface AnalysisResult {
  levels: Record<Level, LevelAnalysis>;
  rejected: RejectedRow[];
  rejectionCounts: Record<RejectionReason, number>;
  generatedAt: string;
}

export interface ExportRow {
  user_id: string;
  item_key: string;
  correct: number;
}
