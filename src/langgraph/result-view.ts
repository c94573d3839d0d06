import type { HistoryEntry, NodeName, QueryState, TabularResult } from "./state.js";
import { hasRows } from "./core/helpers/tabular.js";
import type { EngineErrorCode } from "./errors.js";

export type ResultError = { code: EngineErrorCode; message: string };

export type QueryStatus = "completed" | "awaiting_clarification" | "blocked" | "failed" | "no_results";

export type QueryResult = {
  threadId: string;
  status: QueryStatus;
  sql: string | null;
  summary: string | null;
  businessInterpretation: string | null;
  history: HistoryEntry[];
  clarificationQuestion: string | null;
  clarificationNeeded: boolean;
  executionResult: TabularResult | null;
  executionError: string | null;
  validationError: string | null;
  completedNodes: NodeName[];
  operationNotPermitted: boolean;
  operationFeedback: string | null;
  retryCount: number;
  error: string | null;
  errorCode: EngineErrorCode | null;
};

export function isSuspended(state: QueryState): boolean {
  return state.clarification_needed && !state.user_clarification_response;
}

// Order matters: an engine error or a security halt overrides whatever else the state holds.
export function deriveStatus(state: QueryState, error: ResultError | null = null): QueryStatus {
  if (error) return "failed";
  if (state.operation_not_permitted) return "blocked";
  if (isSuspended(state)) return "awaiting_clarification";
  if (hasRows(state.execution_result)) return state.summary ? "completed" : "failed";
  if (state.validated_sql && !state.execution_error && state.current_node === "execute_sql") return "no_results";
  return "failed";
}

export function buildQueryResult(threadId: string, state: QueryState, error: ResultError | null = null): QueryResult {
  return {
    threadId,
    status: deriveStatus(state, error),
    sql: state.validated_sql || null,
    summary: state.summary,
    businessInterpretation: state.business_interpretation,
    history: state.history,
    clarificationQuestion: state.clarification_question,
    clarificationNeeded: isSuspended(state),
    executionResult: state.execution_result,
    executionError: state.execution_error,
    validationError: state.validation_error,
    completedNodes: state.completed_nodes,
    operationNotPermitted: state.operation_not_permitted,
    operationFeedback: state.operation_feedback,
    retryCount: state.retry_count,
    error: error?.message ?? null,
    errorCode: error?.code ?? null,
  };
}

// Result for a turn that failed before any state could be built or loaded.
export function buildFailureResult(threadId: string, error: ResultError, history: HistoryEntry[] = []): QueryResult {
  return {
    threadId,
    status: "failed",
    sql: null,
    summary: null,
    businessInterpretation: null,
    history,
    clarificationQuestion: null,
    clarificationNeeded: false,
    executionResult: null,
    executionError: null,
    validationError: null,
    completedNodes: [],
    operationNotPermitted: false,
    operationFeedback: null,
    retryCount: 0,
    error: error.message,
    errorCode: error.code,
  };
}
