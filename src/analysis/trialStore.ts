import { config } from "../config/env";
import { loadDatasetFile } from "../export/datasetLoader";
import type { RawTrial } from "../trials/types";
import { logger } from "../utils/logger";
import { AnalysisCache } from "./analysisCache";
import { runAnalysis } from "./analysisPipeline";
import type { AnalysisResult } from "./types";

const CACHE_PREFIX = "analysis:";

export interface TrialStoreOptions {
  dataFile: string;
  cacheTtlMs: number;
  load?: (filePath: string) => Promise<RawTrial[]>;
}

/**
 * Holds the raw dataset for the API. The file is read once, on first use;
 * `replace` swaps in another dataset and drops cached results.
 */
export class TrialStore {
  private readonly dataFile: string;
  private readonly cacheTtlMs: number;
  private readonly load: (filePath: string) => Promise<RawTrial[]>;
  private readonly cache = new AnalysisCache<AnalysisResult>();
  private initialized: Promise<void> | null = null;
  private rawTrials: RawTrial[] = [];
  private version = 0;

  constructor(opts: TrialStoreOptions) {
    this.dataFile = opts.dataFile;
    this.cacheTtlMs = opts.cacheTtlMs;
    this.load = opts.load ?? loadDatasetFile;
  }

  private async ensureInitialized(): Promise<void> {
    if (this.initialized) return this.initialized;

    // A `replace` that lands while the file is still loading wins.
    const startVersion = this.version;
    const pending = (async () => {
      const rows = await this.load(this.dataFile);
      if (this.version !== startVersion) {
        logger.debug({ dataFile: this.dataFile, version: this.version }, "dataset_load_superseded");
        return;
      }
      this.rawTrials = rows;
      logger.info({ dataFile: this.dataFile, rows: rows.length }, "dataset_loaded");
    })();
    this.initialized = pending;

    try {
      await pending;
    } catch (err) {
      if (this.version !== startVersion) {
        logger.warn({ err, dataFile: this.dataFile }, "dataset_load_failed_after_replace");
        return;
      }
      this.initialized = null;
      throw err;
    }
  }

  async getRawTrials(): Promise<readonly RawTrial[]> {
    await this.ensureInitialized();
    return this.rawTrials;
  }

  async getAnalysis(): Promise<AnalysisResult> {
    await this.ensureInitialized();

    const cacheKey = `${CACHE_PREFIX}${this.version}`;
    const cached = this.cache.get(cacheKey);
    if (cached) return cached;

    const result = await runAnalysis(this.rawTrials);
    this.cache.set(cacheKey, result, this.cacheTtlMs);
    return result;
  }

  /**
   * Swaps in a new dataset. Pass the analysis already computed for it to
   * seed the cache; callers that need validation run `runAnalysis` first
   * so a rejected dataset never replaces the current one.
   */
  replace(rawTrials: readonly RawTrial[], analysis?: AnalysisResult): void {
    this.rawTrials = [...rawTrials];
    this.initialized = Promise.resolve();
    this.version += 1;
    this.cache.invalidate(CACHE_PREFIX);
    if (analysis) {
      this.cache.set(`${CACHE_PREFIX}${this.version}`, analysis, this.cacheTtlMs);
    }
    logger.info({ rows: this.rawTrials.length, version: this.version }, "dataset_replaced");
  }
}

export const trialStore = new TrialStore({
  dataFile: config.dataFile,
  cacheTtlMs: config.analysisCacheTtlMs
});
