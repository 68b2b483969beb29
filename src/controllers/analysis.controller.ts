import type { Request, Response } from "express";
import { z } from "zod";

import { runAnalysis, toExportRows } from "../analysis/analysisPipeline";
import { trialStore, type TrialStore } from "../analysis/trialStore";
import type { AnalysisResult, ItemSubset } from "../analysis/types";
import { encounterExportFileName, formatEncounterExport } from "../export/exportFormatter";
import { LEVELS } from "../trials/levels";
import type { Level, RawTrial } from "../trials/types";
import { HttpError } from "../utils/errors";
import { logger } from "../utils/logger";

const MAX_TRIALS_PER_REQUEST = 200_000;

const rawValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]).optional();

const rawTrialSchema = z.object({
  user_id: rawValueSchema,
  session_id: rawValueSchema,
  level: rawValueSchema,
  item_key: rawValueSchema,
  presentation_time: rawValueSchema,
  given_response: rawValueSchema,
  correct: rawValueSchema
});

const datasetBodySchema = z.object({
  trials: z.array(rawTrialSchema).max(MAX_TRIALS_PER_REQUEST)
});

const levelSchema = z.enum(["1", "2", "3"]).transform((v): Level => (v === "1" ? 1 : v === "2" ? 2 : 3));
const groupSchema = z.enum(["first", "middle", "last"]);

const levelParamSchema = z.object({ level: levelSchema });
const levelGroupParamSchema = z.object({ level: levelSchema, group: groupSchema });
const itemsQuerySchema = z.object({
  subset: z.enum(["all", "first", "middle", "last"]).default("all")
});

const summaryOf = (result: AnalysisResult) => ({
  generatedAt: result.generatedAt,
  rejected: result.rejected.length,
  rejectionCounts: result.rejectionCounts,
  levels: LEVELS.map((level) => result.levels[level].summary)
});

export class AnalysisController {
  constructor(private readonly store: TrialStore = trialStore) {}

  async getSummary(_req: Request, res: Response): Promise<void> {
    const result = await this.store.getAnalysis();
    res.status(200).json({ ok: true, data: summaryOf(result) });
  }

  async getItems(req: Request, res: Response): Promise<void> {
    const parsedParams = levelParamSchema.safeParse(req.params);
    if (!parsedParams.success) {
      throw new HttpError(400, "Invalid level", parsedParams.error.flatten());
    }
    const parsedQuery = itemsQuerySchema.safeParse(req.query);
    if (!parsedQuery.success) {
      throw new HttpError(400, "Invalid item subset", parsedQuery.error.flatten());
    }

    const { level } = parsedParams.data;
    const subset: ItemSubset = parsedQuery.data.subset;
    const result = await this.store.getAnalysis();

    res.status(200).json({
      ok: true,
      data: { level, subset, items: result.levels[level].items[subset] }
    });
  }

  async getEncounters(req: Request, res: Response): Promise<void> {
    const parsedParams = levelGroupParamSchema.safeParse(req.params);
    if (!parsedParams.success) {
      throw new HttpError(400, "Invalid level or encounter group", parsedParams.error.flatten());
    }

    const { level, group } = parsedParams.data;
    const result = await this.store.getAnalysis();
    const rows = toExportRows(result.levels[level].groups[group]);

    res.status(200).json({ ok: true, data: { level, group, rows } });
  }

  async exportEncounters(req: Request, res: Response): Promise<void> {
    const parsedParams = levelGroupParamSchema.safeParse(req.params);
    if (!parsedParams.success) {
      throw new HttpError(400, "Invalid level or encounter group", parsedParams.error.flatten());
    }

    const { level, group } = parsedParams.data;
    const result = await this.store.getAnalysis();
    const csv = formatEncounterExport(toExportRows(result.levels[level].groups[group]));

    res.setHeader("content-type", "text/csv; charset=utf-8");
    res.setHeader("content-disposition", `attachment; filename="${encounterExportFileName(level, group)}"`);
    res.status(200).send(csv);
  }

  async runAnalysis(req: Request, res: Response): Promise<void> {
    const trials = this.parseDataset(req.body);
    const result = await runAnalysis(trials);

    res.status(200).json({
      ok: true,
      data: {
        ...summaryOf(result),
        items: LEVELS.map((level) => ({ level, items: result.levels[level].items }))
      }
    });
  }

  async replaceDataset(req: Request, res: Response): Promise<void> {
    const trials = this.parseDataset(req.body);
    const result = await runAnalysis(trials);
    this.store.replace(trials, result);

    logger.info({ rows: trials.length }, "dataset_replaced_via_api");

    res.status(200).json({ ok: true, data: summaryOf(result) });
  }

  private parseDataset(body: unknown): RawTrial[] {
    const parsedBody = datasetBodySchema.safeParse(body);
    if (!parsedBody.success) {
      throw new HttpError(400, "Invalid trial dataset", parsedBody.error.flatten());
    }
    return parsedBody.data.trials;
  }
}

export const analysisController = new AnalysisController();
