#!/usr/bin/env node
import "dotenv/config";

import { config } from "./config/env";
import { parseExportArgs, runExport } from "./export/exportRunner";
import { logger } from "./utils/logger";

const main = async (): Promise<void> => {
  const opts = parseExportArgs(process.argv.slice(2), config);
  await runExport(opts);
};

main().catch((err: unknown) => {
  logger.error({ err }, "export_run_failed");
  process.exitCode = 1;
});
