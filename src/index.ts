export { QueryEngine } from "./langgraph/engine.js";
export type { QueryEngineOptions, QueryEngineDefaults, StartOptions, ResumeOptions } from "./langgraph/engine.js";
export type { QueryResult, QueryStatus } from "./langgraph/result-view.js";
export { QueryStateSchema, NODE_NAMES } from "./langgraph/state.js";
export type { QueryState, HistoryEntry, TabularResult, NodeName } from "./langgraph/state.js";
export * from "./langgraph/errors.js";
export type * from "./langgraph/core/collaborators/types.js";
export { passthroughRedactor } from "./langgraph/core/collaborators/types.js";
export { InMemoryCheckpointStore } from "./langgraph/core/checkpoint/checkpoint-store.js";
export type { CheckpointStore, CheckpointRecord } from "./langgraph/core/checkpoint/checkpoint-store.js";
export { FileCheckpointStore } from "./langgraph/core/checkpoint/file-checkpoint-store.js";
export { SqlSafetyValidator } from "./langgraph/core/guards/sql-safety.js";
export { createChatModelCollaborators } from "./langgraph/core/services/ai/chat-collaborators.js";
export { PgSqlStore, createPgPool } from "./langgraph/core/services/pg-store.js";
export { createLogger, noopLogger } from "./observability/logger.js";
export type { Logger, LogLevel } from "./observability/logger.js";
