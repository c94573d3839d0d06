import * as z from "zod";

// Pipeline step identifiers, in graph order.
export const NODE_NAMES = [
  "intent",
  "clarification",
  "lookup_schema",
  "generate_sql",
  "validate_sql",
  "execute_sql",
  "fix_sql_error",
  "summarize",
  "interpret_results",
] as const;

export type NodeName = (typeof NODE_NAMES)[number];

export const NodeNameSchema = z.enum(NODE_NAMES);

// One transcript entry. Assistant entries that answered with a query carry it in `sql`.
export const HistoryEntrySchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  sql: z.string().optional(),
});

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

export const CellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export type CellValue = z.infer<typeof CellValueSchema>;

// Normalized execution output: every store result is reduced to this shape once, in execute_sql.
export const TabularResultSchema = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.record(z.string(), CellValueSchema)),
  shape: z.tuple([z.number().int().min(0), z.number().int().min(0)]),
});

export type TabularResult = z.infer<typeof TabularResultSchema>;

export const PiiFindingSchema = z.object({
  type: z.string(),
  replacement: z.string(),
});

export type PiiFinding = z.infer<typeof PiiFindingSchema>;

// Timing entry for each node invocation.
export const NodeLogSchema = z.object({
  node_name: NodeNameSchema,
  start_time: z.number(),
  end_time: z.number(),
  status: z.enum(["ok", "recovered"]).default("ok"),
});

export type NodeLogEntry = z.infer<typeof NodeLogSchema>;

// Full conversation state threaded through the graph and persisted per thread.
export const QueryStateSchema = z.object({
  question: z.string(),
  history: z.array(HistoryEntrySchema).default([]),
  schema: z.string().nullable().default(null),
  generated_sql: z.string().nullable().default(null),
  sql_explanation: z.string().nullable().default(null),
  validated_sql: z.string().nullable().default(null),
  validation_error: z.string().nullable().default(null),
  execution_result: TabularResultSchema.nullable().default(null),
  execution_error: z.string().nullable().default(null),
  pii_findings: z.record(z.string(), z.array(PiiFindingSchema)).default({}),
  summary: z.string().nullable().default(null),
  business_interpretation: z.string().nullable().default(null),
  clarification_needed: z.boolean().default(false),
  clarification_question: z.string().nullable().default(null),
  user_clarification_response: z.string().nullable().default(null),
  retry_count: z.number().int().min(0).default(0),
  max_retries: z.number().int().min(1).default(3),
  operation_not_permitted: z.boolean().default(false),
  operation_feedback: z.string().nullable().default(null),
  completed_nodes: z.array(NodeNameSchema).default([]),
  current_node: NodeNameSchema.nullable().default(null),
  node_log: z.array(NodeLogSchema).default([]),
});

export type QueryState = z.infer<typeof QueryStateSchema>;

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RECURSION_LIMIT = 50;
