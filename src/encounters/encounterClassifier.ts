import { UnknownEncounterGroupError } from "../utils/errors";
import type { EncounterGroup, EncounterRecord } from "./types";

export const ENCOUNTER_GROUPS: readonly EncounterGroup[] = ["first", "middle", "last"];

export const isEncounterGroup = (value: unknown): value is EncounterGroup =>
  value === "first" || value === "middle" || value === "last";

export const parseEncounterGroup = (value: unknown): EncounterGroup => {
  if (isEncounterGroup(value)) return value;
  throw new UnknownEncounterGroupError(value);
};

/**
 * The encounter that stands for the middle of a history of length n:
 * ceil(n / 2). The only case that rule would send to encounter 1 with n > 1
 * is n = 2, which uses the second encounter instead.
 *
 * n:      1  2  3  4  5  6
 * middle: 1  2  2  2  3  3
 */
export const middleEncounterNum = (groupSize: number): number => {
  const m = Math.ceil(groupSize / 2);
  if (m === 1 && groupSize > 1) return 2;
  return m;
};

export const isInEncounterGroup = (
  record: Pick<EncounterRecord, "encounterNum" | "groupSize">,
  group: EncounterGroup
): boolean => {
  if (record.groupSize < 1) return false;

  switch (group) {
    case "first":
      return record.encounterNum === 1;
    case "middle":
      return record.encounterNum === middleEncounterNum(record.groupSize);
    case "last":
      return record.encounterNum === record.groupSize;
    default: {
      const unreachable: never = group;
      throw new UnknownEncounterGroupError(unreachable);
    }
  }
};

/** Rows of the requested group, in input order. A one-encounter history lands in all three. */
export const classifyEncounters = (
  records: readonly EncounterRecord[],
  group: EncounterGroup
): EncounterRecord[] => {
  parseEncounterGroup(group);
  return records.filter((record) => isInEncounterGroup(record, group));
};

export const classifyAllGroups = (
  records: readonly EncounterRecord[]
): Record<EncounterGroup, EncounterRecord[]> => ({
  first: classifyEncounters(records, "first"),
  middle: classifyEncounters(records, "middle"),
  last: classifyEncounters(records, "last")
});
