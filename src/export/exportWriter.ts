import fs from "fs/promises";
import path from "path";

import { toExportRows } from "../analysis/analysisPipeline";
import type { AnalysisResult, ItemSubset } from "../analysis/types";
import { ENCOUNTER_GROUPS } from "../encounters/encounterClassifier";
import { LEVELS } from "../trials/levels";
import { logger } from "../utils/logger";
import {
  encounterExportFileName,
  formatEncounterExport,
  formatItemTable,
  itemTableFileName
} from "./exportFormatter";

const ITEM_SUBSETS: readonly ItemSubset[] = ["all", ...ENCOUNTER_GROUPS];

export interface WrittenExports {
  encounterFiles: string[];
  itemFiles: string[];
}

const writeAtomic = async (filePath: string, content: string): Promise<void> => {
  const tmp = `${filePath}.tmp`;
  await fs.writeFile(tmp, content, "utf8");
  await fs.rename(tmp, filePath);
};

/** Writes one encounter file per level and group, plus the item tables. */
export const writeExports = async (result: AnalysisResult, outDir: string): Promise<WrittenExports> => {
  await fs.mkdir(outDir, { recursive: true });

  const encounterFiles: string[] = [];
  const itemFiles: string[] = [];

  for (const level of LEVELS) {
    const analysis = result.levels[level];

    for (const group of ENCOUNTER_GROUPS) {
      const filePath = path.join(outDir, encounterExportFileName(level, group));
      const rows = toExportRows(analysis.groups[group]);
      await writeAtomic(filePath, formatEncounterExport(rows));
      encounterFiles.push(filePath);
      logger.debug({ filePath, rows: rows.length }, "encounter_export_written");
    }

    for (const subset of ITEM_SUBSETS) {
      const filePath = path.join(outDir, itemTableFileName(level, subset));
      await writeAtomic(filePath, formatItemTable(analysis.items[subset]));
      itemFiles.push(filePath);
    }
  }

  logger.info({ outDir, files: encounterFiles.length + itemFiles.length }, "exports_written");

  return { encounterFiles, itemFiles };
};
