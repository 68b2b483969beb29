import type { Trial } from "../trials/types";
import { logger } from "../utils/logger";
import type { EncounterRecord } from "./types";

export const encounterKey = (trial: Pick<Trial, "level" | "userId" | "itemKey">): string =>
  JSON.stringify([trial.level, trial.userId, trial.itemKey]);

export const compareChronologically = (a: Trial, b: Trial): number => {
  if (a.presentationTime !== b.presentationTime) return a.presentationTime - b.presentationTime;
  return a.sourceIndex - b.sourceIndex;
};

/**
 * Numbers each user's encounters with each item in presentation order.
 * Histories are keyed by level as well, so the same cue at two levels stays
 * two separate histories. Output follows input order.
 */
export const indexEncounters = (trials: readonly Trial[]): EncounterRecord[] => {
  const histories = new Map<string, number[]>();

  trials.forEach((trial, position) => {
    const key = encounterKey(trial);
    const list = histories.get(key) ?? [];
    list.push(position);
    histories.set(key, list);
  });

  const encounterNums = new Array<number>(trials.length).fill(0);
  const groupSizes = new Array<number>(trials.length).fill(0);

  for (const positions of histories.values()) {
    const ordered = positions.slice().sort((pa, pb) => {
      const a = trials[pa];
      const b = trials[pb];
      if (!a || !b) return pa - pb;
      return compareChronologically(a, b);
    });

    ordered.forEach((position, rank) => {
      encounterNums[position] = rank + 1;
      groupSizes[position] = ordered.length;
    });
  }

  logger.debug({ trials: trials.length, histories: histories.size }, "encounters_indexed");

  return trials.map((trial, position) => ({
    ...trial,
    encounterNum: encounterNums[position] ?? 0,
    groupSize: groupSizes[position] ?? 0
  }));
};
