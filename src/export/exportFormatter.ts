import type { ItemDescriptive, ItemSubset, ExportRow } from "../analysis/types";
import type { EncounterGroup } from "../encounters/types";
import type { Level } from "../trials/types";

export const escapeCSV = (value: string): string => {
  const needsQuotes = /[",\r\n]/.test(value);
  const sanitized = value.replace(/"/g, '""');
  return needsQuotes ? `"${sanitized}"` : sanitized;
};

const joinLines = (lines: readonly string[]): string => (lines.length === 0 ? "" : `${lines.join("\n")}\n`);

/** Correctness is written as a real number, e.g. 1.0. */
export const formatCorrect = (correct: number): string => correct.toFixed(1);

/**
 * Rows for the learning-curve tool: no header, user,item,correct in that
 * order.
 */
export const formatEncounterExport = (rows: readonly ExportRow[]): string =>
  joinLines(rows.map((r) => [escapeCSV(r.user_id), escapeCSV(r.item_key), formatCorrect(r.correct)].join(",")));

export const ITEM_TABLE_HEADER = "level,item_key,operand_a,operand_b,n,mean_accuracy,standard_error";

const formatNumber = (value: number | null): string => {
  if (value === null || !Number.isFinite(value)) return "";
  return String(Number(value.toFixed(6)));
};

export const formatItemTable = (items: readonly ItemDescriptive[]): string =>
  joinLines([
    ITEM_TABLE_HEADER,
    ...items.map((item) =>
      [
        String(item.level),
        escapeCSV(item.itemKey),
        formatNumber(item.operandA),
        formatNumber(item.operandB),
        String(item.n),
        formatNumber(item.meanAccuracy),
        formatNumber(item.standardError)
      ].join(",")
    )
  ]);

export const encounterExportFileName = (level: Level, group: EncounterGroup): string => `level${level}_${group}.csv`;

export const itemTableFileName = (level: Level, subset: ItemSubset): string => `level${level}_${subset}_items.csv`;
