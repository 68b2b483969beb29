import fs from "fs/promises";
import * as XLSX from "xlsx";

import type { Level, RawTrial, RawValue } from "../trials/types";
import { DatasetLoadError } from "../utils/errors";
import { logger } from "../utils/logger";

type RawField = keyof RawTrial;

const RAW_FIELDS: readonly RawField[] = [
  "user_id",
  "session_id",
  "level",
  "item_key",
  "presentation_time",
  "given_response",
  "correct"
];

const COLUMN_CANDIDATES: Record<RawField, string[]> = {
  user_id: ["user_id", "userId", "user", "participant", "subject"],
  session_id: ["session_id", "sessionId", "session"],
  level: ["level", "difficulty"],
  item_key: ["item_key", "itemKey", "cue", "fact", "fact_id", "item", "question"],
  presentation_time: ["presentation_time", "presentation_start_time", "timestamp", "time", "trial_start"],
  given_response: ["given_response", "givenResponse", "response", "answer"],
  correct: ["correct", "correctness", "is_correct", "accuracy"]
};

const normKey = (k: string): string => k.toLowerCase().replace(/[^a-z0-9]/g, "");

const toRawValue = (value: unknown): RawValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (value instanceof Date) return value.toISOString();
  return null;
};

const buildColumnMap = (headers: readonly string[]): Partial<Record<RawField, string>> => {
  const byNorm = new Map<string, string>();
  for (const h of headers) byNorm.set(normKey(h), h);

  const out: Partial<Record<RawField, string>> = {};
  for (const field of RAW_FIELDS) {
    for (const candidate of COLUMN_CANDIDATES[field]) {
      const header = byNorm.get(normKey(candidate));
      if (header !== undefined) {
        out[field] = header;
        break;
      }
    }
  }
  return out;
};

export interface LoadOptions {
  /** Used for every row when the sheet has no level column. */
  level?: Level;
}

/** Maps loosely named sheet rows onto raw trial fields. */
export const rowsToRawTrials = (rows: ReadonlyArray<Record<string, unknown>>, opts?: LoadOptions): RawTrial[] => {
  const headers = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) headers.add(key);
  }
  const columns = buildColumnMap([...headers]);

  const cell = (row: Record<string, unknown>, field: RawField): RawValue => {
    const header = columns[field];
    return header === undefined ? null : toRawValue(row[header]);
  };

  return rows.map((row) => ({
    user_id: cell(row, "user_id"),
    session_id: cell(row, "session_id"),
    level: columns.level === undefined && opts?.level !== undefined ? opts.level : cell(row, "level"),
    item_key: cell(row, "item_key"),
    presentation_time: cell(row, "presentation_time"),
    given_response: cell(row, "given_response"),
    correct: cell(row, "correct")
  }));
};

export const parseDatasetBuffer = (buf: Buffer, opts?: LoadOptions): RawTrial[] => {
  // raw: keep delimited text as strings; the normalizer does all coercion.
  const wb = XLSX.read(buf, { type: "buffer", raw: true });
  const sheetName = wb.SheetNames[0];
  const ws = sheetName === undefined ? undefined : wb.Sheets[sheetName];
  if (!ws) return [];

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(ws, { defval: null, raw: true });
  return rowsToRawTrials(rows, opts);
};

export const loadDatasetFile = async (filePath: string, opts?: LoadOptions): Promise<RawTrial[]> => {
  let buf: Buffer;
  try {
    buf = await fs.readFile(filePath);
  } catch (err) {
    throw new DatasetLoadError(filePath, err);
  }

  const trials = parseDatasetBuffer(buf, opts);
  logger.debug({ filePath, rows: trials.length }, "dataset_file_parsed");
  return trials;
};
