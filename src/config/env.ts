import path from "path";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
  DATA_FILE: z.string().min(1).default("data/trials.csv"),
  EXPORT_DIR: z.string().min(1).default("exports"),
  ANALYSIS_CACHE_TTL_MS: z.coerce.number().int().min(0).default(60_000),
  CORS_ORIGIN: z.string().optional()
});

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  dataFile: string;
  exportDir: string;
  analysisCacheTtlMs: number;
  corsOrigins: string[] | null;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new Error(`Invalid environment configuration: ${fields}`);
  }

  const data = parsed.data;
  const origins = (data.CORS_ORIGIN ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);

  return {
    nodeEnv: data.NODE_ENV,
    port: data.PORT,
    dataFile: path.resolve(process.cwd(), data.DATA_FILE),
    exportDir: path.resolve(process.cwd(), data.EXPORT_DIR),
    analysisCacheTtlMs: data.ANALYSIS_CACHE_TTL_MS,
    corsOrigins: origins.length > 0 ? origins : null
  };
};

export const config = loadConfig();
