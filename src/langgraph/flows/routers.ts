import type { NodeName, QueryState } from "../state.js";
import { hasRows } from "../core/helpers/tabular.js";

// Route labels returned by the decision functions. graph.ts maps each label to a node or END.
export type EntryRoute = "intent" | "clarification";
export type IntentRoute = "operation_not_permitted" | "clarification" | "lookup_schema";
export type ClarificationRoute = "lookup_schema" | "wait_for_user";
export type ValidationRoute = "execute_sql" | "retry_generation" | "error";
export type ExecutionRoute = "summarize" | "fix_error" | "error";
export type ErrorFixRoute = "validate_sql" | "error";

// Edges that count against the retry budget, keyed by target node.
export const BACKWARD_TRANSITIONS: ReadonlyArray<{ from: NodeName; to: NodeName }> = [
  { from: "validate_sql", to: "generate_sql" },
  { from: "fix_sql_error", to: "validate_sql" },
];

export function isBackwardTransition(from: NodeName | null, to: NodeName): boolean {
  return BACKWARD_TRANSITIONS.some((edge) => edge.from === from && edge.to === to);
}

// A resumed conversation carries the user's answer and re-enters at clarification.
export function routeEntry(state: QueryState): EntryRoute {
  return state.user_clarification_response ? "clarification" : "intent";
}

// Security halt outranks clarification.
export function decideAfterIntent(state: QueryState): IntentRoute {
  if (state.operation_not_permitted) return "operation_not_permitted";
  if (state.clarification_needed) return "clarification";
  return "lookup_schema";
}

export function decideAfterClarification(state: QueryState): ClarificationRoute {
  return state.user_clarification_response ? "lookup_schema" : "wait_for_user";
}

// Regeneration is charged one retry on entry, so the budget check looks one step ahead.
export function decideAfterValidation(state: QueryState): ValidationRoute {
  if (state.validated_sql) return "execute_sql";
  if (state.retry_count + 1 < state.max_retries) return "retry_generation";
  return "error";
}

export function decideAfterExecution(state: QueryState): ExecutionRoute {
  if (hasRows(state.execution_result)) return "summarize";
  if (state.execution_error && state.retry_count < state.max_retries) return "fix_error";
  return "error";
}

export function decideAfterErrorFix(state: QueryState): ErrorFixRoute {
  if (state.generated_sql && state.retry_count < state.max_retries) return "validate_sql";
  return "error";
}
