import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().default("0.0.0.0"),
  OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
  OLLAMA_MODEL: z.string().min(1).default("llama3.2:3b"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  DATABASE_PATH: z.string().min(1).default("tasks.db"),
  CORS_ORIGIN: z.string().default("*"),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(10),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type Config = {
  port: number;
  host: string;
  ollamaBaseUrl: string;
  ollamaModel: string;
  llmTimeoutMs: number;
  llmMaxRetries: number;
  databasePath: string;
  corsOrigin: string;
  rateLimitPerMinute: number;
  cacheMaxEntries: number;
  logLevel: string;
};

export const SERVICE_NAME = "TaskFlow API";
export const SERVICE_VERSION = "1.0.0";

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    ollamaBaseUrl: e.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaModel: e.OLLAMA_MODEL,
    llmTimeoutMs: e.LLM_TIMEOUT_MS,
    llmMaxRetries: e.LLM_MAX_RETRIES,
    databasePath: e.DATABASE_PATH,
    corsOrigin: e.CORS_ORIGIN,
    rateLimitPerMinute: e.RATE_LIMIT_PER_MINUTE,
    cacheMaxEntries: e.CACHE_MAX_ENTRIES,
    logLevel: e.LOG_LEVEL,
  };
}
