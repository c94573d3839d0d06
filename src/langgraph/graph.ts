import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import type { RunnableConfig } from "@langchain/core/runnables";
import type {
  HistoryEntry,
  NodeLogEntry,
  NodeName,
  PiiFinding,
  QueryState,
  TabularResult,
} from "./state.js";
import type { QueryNodes } from "./nodes/index.js";
import {
  decideAfterClarification,
  decideAfterErrorFix,
  decideAfterExecution,
  decideAfterIntent,
  decideAfterValidation,
  routeEntry,
} from "./flows/routers.js";
import { noopLogger, type Logger } from "../observability/logger.js";

// Every node returns the whole state, so each channel keeps the last value written.
function lastWrite<T>(fallback: () => T) {
  return Annotation<T>({ reducer: (_left: T, right: T) => right, default: fallback });
}

export const QueryStateAnnotation = Annotation.Root({
  question: lastWrite<string>(() => ""),
  history: lastWrite<HistoryEntry[]>(() => []),
  schema: lastWrite<string | null>(() => null),
  generated_sql: lastWrite<string | null>(() => null),
  sql_explanation: lastWrite<string | null>(() => null),
  validated_sql: lastWrite<string | null>(() => null),
  validation_error: lastWrite<string | null>(() => null),
  execution_result: lastWrite<TabularResult | null>(() => null),
  execution_error: lastWrite<string | null>(() => null),
  pii_findings: lastWrite<Record<string, PiiFinding[]>>(() => ({})),
  summary: lastWrite<string | null>(() => null),
  business_interpretation: lastWrite<string | null>(() => null),
  clarification_needed: lastWrite<boolean>(() => false),
  clarification_question: lastWrite<string | null>(() => null),
  user_clarification_response: lastWrite<string | null>(() => null),
  retry_count: lastWrite<number>(() => 0),
  max_retries: lastWrite<number>(() => 3),
  operation_not_permitted: lastWrite<boolean>(() => false),
  operation_feedback: lastWrite<string | null>(() => null),
  completed_nodes: lastWrite<NodeName[]>(() => []),
  current_node: lastWrite<NodeName | null>(() => null),
  node_log: lastWrite<NodeLogEntry[]>(() => []),
});

export type QueryGraphState = typeof QueryStateAnnotation.State;

function isLogger(value: unknown): value is Logger {
  return (
    typeof value === "object" &&
    value !== null &&
    "child" in value &&
    typeof value.child === "function" &&
    "info" in value &&
    typeof value.info === "function"
  );
}

// The engine hands its per-thread logger to the nodes through the run config.
export function loggerFromConfig(config: RunnableConfig | undefined, fallback: Logger = noopLogger): Logger {
  const candidate: unknown = config?.configurable?.logger;
  return isLogger(candidate) ? candidate : fallback;
}

export function buildQueryGraph(nodes: QueryNodes) {
  const step =
    (name: NodeName) =>
    (state: QueryState, config?: RunnableConfig): Promise<QueryState> =>
      nodes[name].invoke(state, loggerFromConfig(config));

  return new StateGraph(QueryStateAnnotation)
    .addNode("intent", step("intent"))
    .addNode("clarification", step("clarification"))
    .addNode("lookup_schema", step("lookup_schema"))
    .addNode("generate_sql", step("generate_sql"))
    .addNode("validate_sql", step("validate_sql"))
    .addNode("execute_sql", step("execute_sql"))
    .addNode("fix_sql_error", step("fix_sql_error"))
    .addNode("summarize", step("summarize"))
    .addNode("interpret_results", step("interpret_results"))
    .addConditionalEdges(START, routeEntry, {
      intent: "intent",
      clarification: "clarification",
    })
    .addConditionalEdges("intent", decideAfterIntent, {
      operation_not_permitted: END,
      clarification: "clarification",
      lookup_schema: "lookup_schema",
    })
    .addConditionalEdges("clarification", decideAfterClarification, {
      lookup_schema: "lookup_schema",
      wait_for_user: END,
    })
    .addEdge("lookup_schema", "generate_sql")
    .addEdge("generate_sql", "validate_sql")
    .addConditionalEdges("validate_sql", decideAfterValidation, {
      execute_sql: "execute_sql",
      retry_generation: "generate_sql",
      error: END,
    })
    .addConditionalEdges("execute_sql", decideAfterExecution, {
      summarize: "summarize",
      fix_error: "fix_sql_error",
      error: END,
    })
    .addConditionalEdges("fix_sql_error", decideAfterErrorFix, {
      validate_sql: "validate_sql",
      error: END,
    })
    .addEdge("summarize", "interpret_results")
    .addEdge("interpret_results", END)
    .compile();
}

export type QueryGraph = ReturnType<typeof buildQueryGraph>;
