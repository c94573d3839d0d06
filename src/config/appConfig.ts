import path from "node:path";
import dotenv from "dotenv";
import * as z from "zod";

const PROJECT_ROOT = path.resolve(__dirname, "../..");

const optionalString = z.string().trim().min(1).optional();

const EnvSchema = z.object({
  DATABASE_URL: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: optionalString,
  PG_SCHEMA: z.string().trim().min(1).default("public"),
  MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  RECURSION_LIMIT: z.coerce.number().int().min(1).default(50),
  STATEMENT_TIMEOUT_MS: z.coerce.number().int().min(1).default(15000),
  MAX_RESULT_ROWS: z.coerce.number().int().min(1).default(1000),
  CHECKPOINT_DIR: optionalString,
  CHECKPOINT_TTL_MS: z.coerce.number().int().min(1).optional(),
  PROMPTS_PATH: optionalString,
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface ResolvedAppConfig {
  databaseUrl: string | null;
  openAiApiKey: string | null;
  openAiModel: string | null;
  pgSchema: string;
  maxRetries: number;
  recursionLimit: number;
  statementTimeoutMs: number;
  maxResultRows: number;
  checkpointDir: string | null;
  checkpointTtlMs: number | null;
  promptsPath: string;
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
}

function resolvePath(value: string): string {
  return path.isAbsolute(value) ? value : path.resolve(PROJECT_ROOT, value);
}

/**
 * Validate environment variables into a typed config.
 * Throws with every offending variable named if validation fails.
 */
export function parseAppConfig(env: NodeJS.ProcessEnv): ResolvedAppConfig {
  // Unset and blank numeric variables fall back to their defaults.
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  const vars = parsed.data;
  return {
    databaseUrl: vars.DATABASE_URL ?? null,
    openAiApiKey: vars.OPENAI_API_KEY ?? null,
    openAiModel: vars.OPENAI_MODEL ?? null,
    pgSchema: vars.PG_SCHEMA,
    maxRetries: vars.MAX_RETRIES,
    recursionLimit: vars.RECURSION_LIMIT,
    statementTimeoutMs: vars.STATEMENT_TIMEOUT_MS,
    maxResultRows: vars.MAX_RESULT_ROWS,
    checkpointDir: vars.CHECKPOINT_DIR ? resolvePath(vars.CHECKPOINT_DIR) : null,
    checkpointTtlMs: vars.CHECKPOINT_TTL_MS ?? null,
    promptsPath: resolvePath(vars.PROMPTS_PATH ?? "config/prompts.yaml"),
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
  };
}

/**
 * Load `.env` (if present) and resolve the config for server startup.
 */
export function resolveAppConfig(): ResolvedAppConfig {
  dotenv.config({ path: path.join(PROJECT_ROOT, ".env") });
  return parseAppConfig(process.env);
}
