import { describe, expect, it } from "vitest";

import {
  encounterExportFileName,
  escapeCSV,
  formatEncounterExport,
  formatItemTable,
  itemTableFileName
} from "../exportFormatter";

describe("formatEncounterExport", () => {
  it("writes header-less user,item,correct lines", () => {
    const text = formatEncounterExport([
      { user_id: "U1", item_key: "3x4", correct: 0 },
      { user_id: "U2", item_key: "6x7", correct: 1 }
    ]);

    expect(text).toBe("U1,3x4,0.0\nU2,6x7,1.0\n");
  });

  it("writes nothing for no rows", () => {
    expect(formatEncounterExport([])).toBe("");
  });

  it("quotes fields that contain delimiters", () => {
    expect(escapeCSV('3, "x" 4')).toBe('"3, ""x"" 4"');
    expect(formatEncounterExport([{ user_id: "U1", item_key: "3,4", correct: 1 }])).toBe('U1,"3,4",1.0\n');
  });
});

describe("formatItemTable", () => {
  it("writes a header and leaves undefined errors empty", () => {
    const text = formatItemTable([
      { level: 2, itemKey: "3x4", operandA: 3, operandB: 4, n: 4, meanAccuracy: 0.75, standardError: 0.25 },
      { level: 2, itemKey: "6x7", operandA: 6, operandB: 7, n: 1, meanAccuracy: 1, standardError: null },
      { level: 2, itemKey: "8x9", operandA: 8, operandB: 9, n: 3, meanAccuracy: 2 / 3, standardError: 0 }
    ]);

    expect(text.split("\n")).toEqual([
      "level,item_key,operand_a,operand_b,n,mean_accuracy,standard_error",
      "2,3x4,3,4,4,0.75,0.25",
      "2,6x7,6,7,1,1,",
      "2,8x9,8,9,3,0.666667,0",
      ""
    ]);
  });
});

describe("file names", () => {
  it("names one file per level and group", () => {
    expect(encounterExportFileName(1, "middle")).toBe("level1_middle.csv");
    expect(itemTableFileName(3, "all")).toBe("level3_all_items.csv");
  });
});
