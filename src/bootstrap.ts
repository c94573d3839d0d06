import { QueryEngine } from "./langgraph/engine.js";
import { InMemoryCheckpointStore, type CheckpointStore } from "./langgraph/core/checkpoint/checkpoint-store.js";
import { FileCheckpointStore } from "./langgraph/core/checkpoint/file-checkpoint-store.js";
import { createModelResolver } from "./langgraph/core/config/model-factory.js";
import { loadPrompts } from "./langgraph/core/config/prompts.js";
import { createChatModelCollaborators } from "./langgraph/core/services/ai/chat-collaborators.js";
import { PgSqlStore, createPgPool } from "./langgraph/core/services/pg-store.js";
import type { ResolvedAppConfig } from "./config/appConfig.js";
import type { Logger } from "./observability/logger.js";

export type EngineRuntime = {
  engine: QueryEngine;
  close: () => Promise<void>;
};

export function createCheckpointStore(config: ResolvedAppConfig): CheckpointStore {
  const ttlMs = config.checkpointTtlMs ?? undefined;
  if (config.checkpointDir) return new FileCheckpointStore({ directory: config.checkpointDir, ttlMs });
  return new InMemoryCheckpointStore({ ttlMs });
}

/**
 * Wire the engine to Postgres and the OpenAI-backed collaborators.
 */
export function createEngineRuntime(config: ResolvedAppConfig, logger: Logger): EngineRuntime {
  if (!config.databaseUrl) throw new Error("DATABASE_URL is required to start the query engine.");
  if (!config.openAiApiKey) throw new Error("OPENAI_API_KEY is required to start the query engine.");
  const models = createModelResolver(config);

  const pool = createPgPool(config.databaseUrl);
  const store = new PgSqlStore(pool, {
    schema: config.pgSchema,
    statementTimeoutMs: config.statementTimeoutMs,
    maxRows: config.maxResultRows,
    logger: logger.child({ component: "pg-store" }),
  });
  const collaborators = createChatModelCollaborators({
    model: (alias) => models.getModel(alias),
    prompts: loadPrompts(config.promptsPath),
    logger: logger.child({ component: "collaborators" }),
  });

  const engine = new QueryEngine({
    collaborators: { ...collaborators, schema: store, executor: store, catalog: store },
    checkpointStore: createCheckpointStore(config),
    logger,
    defaults: { maxRetries: config.maxRetries, recursionLimit: config.recursionLimit },
  });

  return { engine, close: () => pool.end() };
}
