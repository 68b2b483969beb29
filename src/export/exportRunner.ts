import path from "path";
import { parseArgs } from "util";

import { runAnalysis } from "../analysis/analysisPipeline";
import type { AppConfig } from "../config/env";
import { assertLevel } from "../trials/levels";
import type { Level } from "../trials/types";
import { logger } from "../utils/logger";
import { loadDatasetFile } from "./datasetLoader";
import { writeExports, type WrittenExports } from "./exportWriter";

export interface ExportRunOptions {
  input: string;
  outDir: string;
  level?: Level;
}

export const parseExportArgs = (
  argv: string[],
  defaults: Pick<AppConfig, "dataFile" | "exportDir">
): ExportRunOptions => {
  const { values } = parseArgs({
    args: argv,
    options: {
      input: { type: "string", short: "i" },
      out: { type: "string", short: "o" },
      level: { type: "string", short: "l" }
    },
    strict: true
  });

  return {
    input: values.input ? path.resolve(values.input) : defaults.dataFile,
    outDir: values.out ? path.resolve(values.out) : defaults.exportDir,
    level: values.level === undefined ? undefined : assertLevel(values.level)
  };
};

export const runExport = async (opts: ExportRunOptions): Promise<WrittenExports> => {
  const rawTrials = await loadDatasetFile(opts.input, { level: opts.level });
  const result = await runAnalysis(rawTrials);
  const written = await writeExports(result, opts.outDir);

  logger.info(
    {
      input: opts.input,
      outDir: opts.outDir,
      rejected: result.rejectionCounts,
      encounterFiles: written.encounterFiles.length,
      itemFiles: written.itemFiles.length
    },
    "export_run_complete"
  );

  return written;
};
