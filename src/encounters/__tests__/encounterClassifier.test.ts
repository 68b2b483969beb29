import { describe, expect, it } from "vitest";

import { UnknownEncounterGroupError } from "../../utils/errors";
import {
  classifyAllGroups,
  classifyEncounters,
  ENCOUNTER_GROUPS,
  isInEncounterGroup,
  middleEncounterNum,
  parseEncounterGroup
} from "../encounterClassifier";
import { indexEncounters } from "../encounterIndexer";
import { makeTrial } from "./fixtures";

const history = (userId: string, length: number) =>
  Array.from({ length }, (_, i) => makeTrial({ userId, itemKey: "6x7", presentationTime: i, sourceIndex: i }));

describe("middleEncounterNum", () => {
  it.each([
    [1, 1],
    [2, 2],
    [3, 2],
    [4, 2],
    [5, 3],
    [6, 3],
    [7, 4]
  ])("picks encounter %i -> %i", (n, expected) => {
    expect(middleEncounterNum(n)).toBe(expected);
  });

  it("departs from ceil(n / 2) only for two-encounter histories", () => {
    const departures = [1, 2, 3, 4, 5, 6, 7, 8].filter((n) => middleEncounterNum(n) !== Math.ceil(n / 2));
    expect(departures).toEqual([2]);
  });
});

describe("isInEncounterGroup", () => {
  it("matches first and last by position", () => {
    expect(isInEncounterGroup({ encounterNum: 1, groupSize: 4 }, "first")).toBe(true);
    expect(isInEncounterGroup({ encounterNum: 4, groupSize: 4 }, "last")).toBe(true);
    expect(isInEncounterGroup({ encounterNum: 3, groupSize: 4 }, "last")).toBe(false);
  });

  it("never matches an empty history", () => {
    for (const group of ENCOUNTER_GROUPS) {
      expect(isInEncounterGroup({ encounterNum: 0, groupSize: 0 }, group)).toBe(false);
    }
  });
});

describe("classifyEncounters", () => {
  it("puts a single encounter in every group", () => {
    const records = indexEncounters(history("solo", 1));
    const groups = classifyAllGroups(records);

    expect(groups.first).toEqual(records);
    expect(groups.middle).toEqual(records);
    expect(groups.last).toEqual(records);
  });

  it("uses the second encounter as the middle of a two-encounter history", () => {
    const records = indexEncounters(history("pair", 2));

    expect(classifyEncounters(records, "first").map((r) => r.encounterNum)).toEqual([1]);
    expect(classifyEncounters(records, "middle").map((r) => r.encounterNum)).toEqual([2]);
    expect(classifyEncounters(records, "last").map((r) => r.encounterNum)).toEqual([2]);
  });

  it("selects one row per history for each group", () => {
    const records = indexEncounters([...history("a", 3), ...history("b", 4), ...history("c", 5)]);

    const middle = classifyEncounters(records, "middle");
    expect(middle.map((r) => [r.userId, r.encounterNum])).toEqual([
      ["a", 2],
      ["b", 2],
      ["c", 3]
    ]);

    const last = classifyEncounters(records, "last");
    expect(last.map((r) => [r.userId, r.encounterNum])).toEqual([
      ["a", 3],
      ["b", 4],
      ["c", 5]
    ]);
  });

  it("returns nothing for no records", () => {
    expect(classifyEncounters([], "middle")).toEqual([]);
  });

  it("rejects an unknown group label", () => {
    expect(() => parseEncounterGroup("median")).toThrow(UnknownEncounterGroupError);
    expect(() => parseEncounterGroup("median")).toThrow("Unknown encounter group: median");
    expect(parseEncounterGroup("last")).toBe("last");
  });
});

describe("three encounters of one fact", () => {
  it("splits them into first, middle and last", () => {
    const records = indexEncounters([
      makeTrial({ userId: "U1", itemKey: "3x4", presentationTime: 1, sourceIndex: 0, correct: 0 }),
      makeTrial({ userId: "U1", itemKey: "3x4", presentationTime: 2, sourceIndex: 1, correct: 1 }),
      makeTrial({ userId: "U1", itemKey: "3x4", presentationTime: 3, sourceIndex: 2, correct: 1 })
    ]);

    expect(records.map((r) => r.encounterNum)).toEqual([1, 2, 3]);

    const groups = classifyAllGroups(records);
    expect(groups.first.map((r) => [r.sourceIndex, r.correct])).toEqual([[0, 0]]);
    expect(groups.middle.map((r) => [r.sourceIndex, r.correct])).toEqual([[1, 1]]);
    expect(groups.last.map((r) => [r.sourceIndex, r.correct])).toEqual([[2, 1]]);
  });
});
