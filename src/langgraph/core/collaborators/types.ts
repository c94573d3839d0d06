import type { HistoryEntry, PiiFinding, TabularResult } from "../../state.js";

// Contracts for the systems the pipeline calls out to. Implementations may throw;
// the nodes turn every failure into state fields.

export type IntentVerdict = {
  blocked: boolean;
  reason: string | null;
  ambiguous: boolean;
  clarifyingQuestion: string | null;
};

export interface IntentCollaborator {
  classify(question: string, history: HistoryEntry[]): Promise<IntentVerdict>;
}

export interface SchemaCollaborator {
  describeSchema(): Promise<string>;
}

export type SqlGenerationRequest = {
  question: string;
  schema: string;
  history: HistoryEntry[];
  lastSql: string | null;
};

// An empty `sql` means "could not generate", not a failure.
export type SqlGenerationResult = {
  sql: string;
  explanation: string;
};

export interface SqlGenerationCollaborator {
  generate(request: SqlGenerationRequest): Promise<SqlGenerationResult>;
}

export type RawRecord = Record<string, unknown>;

// What a store may hand back before normalization: records, positional rows with
// column names, a bare list, or a scalar.
export type RawQueryOutput =
  | { columns?: string[]; rows: RawRecord[] | unknown[][] }
  | RawRecord[]
  | unknown[][]
  | string
  | number
  | boolean
  | bigint
  | null
  | undefined;

export interface SqlExecutionCollaborator {
  execute(sql: string): Promise<RawQueryOutput>;
}

// Live table catalog used by the schema-compliance gate.
export interface CatalogProvider {
  listTables(): Promise<string[]>;
}

export type ErrorFixRequest = {
  sql: string;
  error: string;
  schema: string;
};

export interface ErrorFixCollaborator {
  fix(request: ErrorFixRequest): Promise<{ fixedSql: string } | null>;
}

export type NarrativeRequest = {
  question: string;
  sql: string;
  result: TabularResult | null;
};

export interface SummarizationCollaborator {
  summarize(request: NarrativeRequest): Promise<string>;
}

export interface InterpretationCollaborator {
  interpret(request: NarrativeRequest): Promise<string>;
}

export type RedactionOutcome = {
  value: string;
  findings: PiiFinding[];
};

// Treated as an opaque transform that always succeeds.
export interface PiiRedactor {
  redact(value: string): RedactionOutcome;
}

export type QueryCollaborators = {
  intent: IntentCollaborator;
  schema: SchemaCollaborator;
  generator: SqlGenerationCollaborator;
  executor: SqlExecutionCollaborator;
  catalog?: CatalogProvider;
  errorFixer: ErrorFixCollaborator;
  summarizer: SummarizationCollaborator;
  interpreter: InterpretationCollaborator;
  redactor?: PiiRedactor;
};

export const passthroughRedactor: PiiRedactor = {
  redact: (value) => ({ value, findings: [] }),
};
