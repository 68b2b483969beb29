import { classifyAllGroups } from "../encounters/encounterClassifier";
import { indexEncounters } from "../encounters/encounterIndexer";
import type { EncounterRecord } from "../encounters/types";
import { LEVELS } from "../trials/levels";
import { countRejections, normalizeTrials } from "../trials/normalizer";
import type { Level, RawTrial, Trial } from "../trials/types";
import { logger } from "../utils/logger";
import { aggregateItems } from "./itemAggregator";
import type { AnalysisResult, ExportRow, LevelAnalysis, LevelSummary } from "./types";

export const partitionByLevel = (trials: readonly Trial[]): Record<Level, Trial[]> => {
  const out: Record<Level, Trial[]> = { 1: [], 2: [], 3: [] };
  for (const trial of trials) {
    out[trial.level].push(trial);
  }
  return out;
};

const summarize = (level: Level, encounters: readonly EncounterRecord[]): LevelSummary => ({
  level,
  trialCount: encounters.length,
  userCount: new Set(encounters.map((e) => e.userId)).size,
  itemCount: new Set(encounters.map((e) => e.itemKey)).size,
  maxEncounters: encounters.reduce((max, e) => Math.max(max, e.groupSize), 0)
});

/**
 * Index, classify and aggregate one level. Indexing finishes before any
 * classification so every record already carries its full history length.
 */
export const analyzeLevel = (level: Level, trials: readonly Trial[]): LevelAnalysis => {
  const levelTrials = trials.filter((t) => t.level === level);
  const encounters = indexEncounters(levelTrials);
  const groups = classifyAllGroups(encounters);

  return {
    level,
    trials: levelTrials,
    encounters,
    groups,
    items: {
      all: aggregateItems(encounters),
      first: aggregateItems(groups.first),
      middle: aggregateItems(groups.middle),
      last: aggregateItems(groups.last)
    },
    summary: summarize(level, encounters)
  };
};

export const runAnalysis = async (rawTrials: readonly RawTrial[]): Promise<AnalysisResult> => {
  const { trials, rejected } = normalizeTrials(rawTrials);
  const byLevel = partitionByLevel(trials);

  // Levels share nothing, so they run side by side and join here.
  const run = async (level: Level): Promise<LevelAnalysis> => analyzeLevel(level, byLevel[level]);
  const [one, two, three] = await Promise.all([run(1), run(2), run(3)]);
  const levels: Record<Level, LevelAnalysis> = { 1: one, 2: two, 3: three };
  const analyses = LEVELS.map((level) => levels[level]);

  const rejectionCounts = countRejections(rejected);

  logger.info(
    {
      received: rawTrials.length,
      rejected: rejected.length,
      levels: analyses.map((a) => a.summary)
    },
    "analysis_completed"
  );

  return { levels, rejected, rejectionCounts, generatedAt: new Date().toISOString() };
};

export const toExportRows = (records: readonly Pick<Trial, "userId" | "itemKey" | "correct">[]): ExportRow[] =>
  records.map((r) => ({ user_id: r.userId, item_key: r.itemKey, correct: r.correct }));
