import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";

import { DatasetLoadError } from "../../utils/errors";
import { loadDatasetFile, parseDatasetBuffer, rowsToRawTrials } from "../datasetLoader";

describe("rowsToRawTrials", () => {
  it("maps loosely named columns onto trial fields", () => {
    const trials = rowsToRawTrials([
      {
        "User ID": "u1",
        Session: "s1",
        Level: 2,
        Cue: "3 x 4",
        presentation_start_time: 1500,
        Response: "12",
        Correct: true,
        notes: "ignored"
      }
    ]);

    expect(trials).toEqual([
      {
        user_id: "u1",
        session_id: "s1",
        level: 2,
        item_key: "3 x 4",
        presentation_time: 1500,
        given_response: "12",
        correct: true
      }
    ]);
  });

  it("stamps the given level when the sheet has no level column", () => {
    const [trial] = rowsToRawTrials([{ user: "u1", fact: "7" }], { level: 1 });

    expect(trial?.level).toBe(1);
    expect(trial?.given_response).toBeNull();
  });

  it("prefers the sheet's own level column", () => {
    const [trial] = rowsToRawTrials([{ user: "u1", level: "3" }], { level: 1 });
    expect(trial?.level).toBe("3");
  });
});

describe("parseDatasetBuffer", () => {
  it("reads delimited text as strings", () => {
    const csv = "user_id,level,cue,presentation_time,given_response,correct\nu1,2,3x4,100,12,1\n";
    const trials = parseDatasetBuffer(Buffer.from(csv, "utf8"));

    expect(trials).toEqual([
      {
        user_id: "u1",
        session_id: null,
        level: "2",
        item_key: "3x4",
        presentation_time: "100",
        given_response: "12",
        correct: "1"
      }
    ]);
  });
});

describe("loadDatasetFile", () => {
  it("wraps a missing file in a load error", async () => {
    const missing = path.join(os.tmpdir(), "factcurve-missing", "trials.csv");
    await expect(loadDatasetFile(missing)).rejects.toBeInstanceOf(DatasetLoadError);
  });

  it("ships sample cues as compact alphanumeric identifiers", async () => {
    const trials = await loadDatasetFile(path.resolve(process.cwd(), "data/trials.csv"));

    expect(trials).toHaveLength(19);
    for (const trial of trials) {
      expect(String(trial.item_key)).toMatch(/^[A-Za-z0-9]+$/);
    }
  });
});
