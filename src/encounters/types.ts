import type { Trial } from "../trials/types";

export type EncounterGroup = "first" | "middle" | "last";

export interface EncounterRecord extends Trial {
  /** 1-based position of this trial within its (level, user, item) history. */
  encounterNum: number;
  /** Length of that history. */
  groupSize: number;
}
