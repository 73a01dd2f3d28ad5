import "dotenv/config";
import { z } from "zod";
import { ConfigError } from "./errors";

export const DEFAULT_BASE_URL = "https://api.football-data-api.com";

// 1800 requests/hour is the documented ceiling: one request every 2s stays under it.
export const DEFAULT_REQUEST_DELAY_MS = 2000;

const envSchema = z.object({
  API_KEY: z.string().trim().min(1).optional(),
  FOOTYSTATS_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(DEFAULT_REQUEST_DELAY_MS),
  DATABASE_PATH: z.string().min(1).default("footystats.db"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  // Blank values in .env count as unset
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function requireApiKey(env: Env): string {
  if (!env.API_KEY) {
    throw new ConfigError("API_KEY is not set. Copy .env.example to .env and add your FootyStats key.");
  }
  return env.API_KEY;
}
