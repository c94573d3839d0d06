import { createInitialState, mergeStatePatch } from "../core/helpers/state.js";
import type { QueryState } from "../state.js";
import type { PiiRedactor } from "../core/collaborators/types.js";
import {
  ClarificationNode,
  DEFAULT_OPERATION_FEEDBACK,
  ExecuteSqlNode,
  FixSqlErrorNode,
  GENERIC_CLARIFICATION_QUESTION,
  GenerateSqlNode,
  IntentNode,
  InterpretResultsNode,
  LookupSchemaNode,
  NO_RESULTS_INTERPRETATION,
  SummarizeNode,
  ValidateSqlNode,
} from "../nodes/index.js";
import { CLEAR, SALES_SCHEMA, createFakeCollaborators } from "./helpers/fakeCollaborators.js";

function stateWith(patch: Partial<QueryState> = {}): QueryState {
  return mergeStatePatch(createInitialState({ question: "total sales by region" }), patch);
}

const ONE_ROW = { columns: ["region", "total"], rows: [{ region: "north", total: 10 }], shape: [1, 2] as [number, number] };

describe("PipelineNode bookkeeping", () => {
  it("records the step in current_node, completed_nodes and node_log", async () => {
    const { collaborators } = createFakeCollaborators();
    const next = await new LookupSchemaNode(collaborators.schema).invoke(stateWith({ completed_nodes: ["intent"] }));
    expect(next.current_node).toBe("lookup_schema");
    expect(next.completed_nodes).toEqual(["intent", "lookup_schema"]);
    expect(next.node_log).toHaveLength(1);
    expect(next.node_log[0].node_name).toBe("lookup_schema");
    expect(next.node_log[0].status).toBe("ok");
    expect(next.node_log[0].end_time).toBeGreaterThanOrEqual(next.node_log[0].start_time);
  });

  it("charges a retry when entering generate_sql from validate_sql", async () => {
    const { collaborators } = createFakeCollaborators();
    const node = new GenerateSqlNode(collaborators.generator);
    const forward = await node.invoke(stateWith({ schema: SALES_SCHEMA, current_node: "lookup_schema" }));
    const backward = await node.invoke(stateWith({ schema: SALES_SCHEMA, current_node: "validate_sql", retry_count: 1 }));
    expect(forward.retry_count).toBe(0);
    expect(backward.retry_count).toBe(2);
  });

  it("charges a retry when entering validate_sql from fix_sql_error", async () => {
    const node = new ValidateSqlNode(null);
    const fromGenerate = await node.invoke(stateWith({ generated_sql: "SELECT 1", current_node: "generate_sql" }));
    const fromFix = await node.invoke(stateWith({ generated_sql: "SELECT 1", current_node: "fix_sql_error" }));
    expect(fromGenerate.retry_count).toBe(0);
    expect(fromFix.retry_count).toBe(1);
  });

  it("turns an unexpected throw into the node's recovery patch", async () => {
    const exploding: PiiRedactor = {
      redact: () => {
        throw new Error("redactor offline");
      },
    };
    const { collaborators } = createFakeCollaborators();
    const node = new ExecuteSqlNode(collaborators.executor, exploding);
    const next = await node.invoke(stateWith({ validated_sql: "SELECT region, total FROM orders" }));
    expect(next.execution_error).toBe("redactor offline");
    expect(next.execution_result).toBeNull();
    expect(next.node_log[0].status).toBe("recovered");
    expect(next.completed_nodes).toEqual(["execute_sql"]);
  });
});

describe("IntentNode", () => {
  it("blocks write requests with the default feedback when no reason is given", async () => {
    const { collaborators } = createFakeCollaborators({
      verdicts: [{ ...CLEAR, blocked: true, reason: null }],
    });
    const next = await new IntentNode(collaborators.intent).invoke(stateWith());
    expect(next.operation_not_permitted).toBe(true);
    expect(next.operation_feedback).toBe(DEFAULT_OPERATION_FEEDBACK);
  });

  it("flags ambiguous questions with the classifier's question", async () => {
    const { collaborators } = createFakeCollaborators({
      verdicts: [{ ...CLEAR, ambiguous: true, clarifyingQuestion: "Which period?" }],
    });
    const next = await new IntentNode(collaborators.intent).invoke(stateWith());
    expect(next.clarification_needed).toBe(true);
    expect(next.clarification_question).toBe("Which period?");
    expect(next.operation_not_permitted).toBe(false);
  });

  it("proceeds when the classifier fails", async () => {
    const node = new IntentNode({
      classify: async () => {
        throw new Error("model unavailable");
      },
    });
    const next = await node.invoke(stateWith());
    expect(next.operation_not_permitted).toBe(false);
    expect(next.clarification_needed).toBe(false);
    expect(next.node_log[0].status).toBe("ok");
  });
});

describe("ClarificationNode", () => {
  it("asks the generic question when the classifier gave none", async () => {
    const next = await new ClarificationNode().invoke(stateWith({ clarification_needed: true }));
    expect(next.clarification_needed).toBe(true);
    expect(next.clarification_question).toBe(GENERIC_CLARIFICATION_QUESTION);
    expect(next.history).toEqual([{ role: "assistant", content: GENERIC_CLARIFICATION_QUESTION }]);
  });

  it("folds the user's answer into the question", async () => {
    const next = await new ClarificationNode().invoke(
      stateWith({ question: "show data", clarification_question: "Which data?", user_clarification_response: "last quarter's sales" })
    );
    expect(next.question).toBe("show data last quarter's sales");
    expect(next.clarification_needed).toBe(false);
    expect(next.clarification_question).toBeNull();
    expect(next.history).toEqual([{ role: "user", content: "last quarter's sales" }]);
  });
});

describe("LookupSchemaNode", () => {
  it("records lookup failures in the schema field", async () => {
    const node = new LookupSchemaNode({
      describeSchema: async () => {
        throw new Error("timeout");
      },
    });
    expect((await node.invoke(stateWith())).schema).toBe("Error retrieving schema: timeout");
  });
});

describe("GenerateSqlNode", () => {
  it("needs a schema", async () => {
    const { collaborators, calls } = createFakeCollaborators();
    const next = await new GenerateSqlNode(collaborators.generator).invoke(stateWith());
    expect(next.generated_sql).toBe("");
    expect(next.sql_explanation).toBe("No schema available");
    expect(calls.generated).toHaveLength(0);
  });

  it("strips fences and passes the last assistant query as context", async () => {
    const { collaborators, calls } = createFakeCollaborators({ sql: ["```sql\nSELECT total FROM orders;\n```"] });
    const history = [
      { role: "user" as const, content: "orders?" },
      { role: "assistant" as const, content: "Here they are.", sql: "SELECT * FROM orders" },
    ];
    const next = await new GenerateSqlNode(collaborators.generator).invoke(stateWith({ schema: SALES_SCHEMA, history }));
    expect(next.generated_sql).toBe("SELECT total FROM orders");
    expect(next.sql_explanation).toBeNull();
    expect(calls.generated[0].lastSql).toBe("SELECT * FROM orders");
  });

  it("records generator failures", async () => {
    const node = new GenerateSqlNode({
      generate: async () => {
        throw new Error("rate limited");
      },
    });
    const next = await node.invoke(stateWith({ schema: SALES_SCHEMA }));
    expect(next.generated_sql).toBe("");
    expect(next.sql_explanation).toBe("Error generating SQL: rate limited");
  });

  it("explains an empty generation", async () => {
    const { collaborators } = createFakeCollaborators({ sql: [""] });
    const next = await new GenerateSqlNode(collaborators.generator).invoke(stateWith({ schema: SALES_SCHEMA }));
    expect(next.sql_explanation).toBe("The generator returned no SQL");
  });
});

describe("ValidateSqlNode", () => {
  it("promotes safe SQL to validated_sql", async () => {
    const { collaborators } = createFakeCollaborators();
    const node = new ValidateSqlNode(collaborators.catalog ?? null);
    const next = await node.invoke(stateWith({ generated_sql: "SELECT region FROM orders" }));
    expect(next.validated_sql).toBe("SELECT region FROM orders");
    expect(next.validation_error).toBeNull();
  });

  it("clears validated_sql and records the reason on rejection", async () => {
    const node = new ValidateSqlNode(null);
    const next = await node.invoke(stateWith({ generated_sql: "DROP TABLE customers", validated_sql: "SELECT 1" }));
    expect(next.validated_sql).toBe("");
    expect(next.validation_error).toBe("SQL contains potentially dangerous keyword: DROP");
  });

  it("rejects a missing candidate", async () => {
    const next = await new ValidateSqlNode(null).invoke(stateWith({ generated_sql: "" }));
    expect(next.validation_error).toBe("No SQL to validate");
  });
});

describe("ExecuteSqlNode", () => {
  it("refuses to run a query that failed validation", async () => {
    const { collaborators, calls } = createFakeCollaborators();
    const next = await new ExecuteSqlNode(collaborators.executor).invoke(
      stateWith({ validated_sql: "", validation_error: "Table 'ghosts' does not exist in the database" })
    );
    expect(next.execution_error).toBe("Query blocked by validation: Table 'ghosts' does not exist in the database");
    expect(calls.executed).toHaveLength(0);
  });

  it("records executor errors", async () => {
    const { collaborators } = createFakeCollaborators({ executions: [new Error("column \"x\" does not exist")] });
    const next = await new ExecuteSqlNode(collaborators.executor).invoke(stateWith({ validated_sql: "SELECT x FROM orders" }));
    expect(next.execution_result).toBeNull();
    expect(next.execution_error).toBe("column \"x\" does not exist");
  });

  it("normalizes and redacts rows", async () => {
    const redactor: PiiRedactor = {
      redact: (value) =>
        value === "north" ? { value: "[REGION]", findings: [{ type: "region", replacement: "[REGION]" }] } : { value, findings: [] },
    };
    const { collaborators } = createFakeCollaborators();
    const next = await new ExecuteSqlNode(collaborators.executor, redactor).invoke(
      stateWith({ validated_sql: "SELECT region, total FROM orders", execution_error: "stale" })
    );
    expect(next.execution_error).toBeNull();
    expect(next.execution_result).toEqual({
      columns: ["region", "total"],
      rows: [{ region: "[REGION]", total: 10 }],
      shape: [1, 2],
    });
    expect(next.pii_findings).toEqual({ region: [{ type: "region", replacement: "[REGION]" }] });
  });
});

describe("FixSqlErrorNode", () => {
  it("proposes a fix and clears the previous attempt", async () => {
    const { collaborators, calls } = createFakeCollaborators({ fixes: ["SELECT region FROM orders"] });
    const next = await new FixSqlErrorNode(collaborators.errorFixer).invoke(
      stateWith({ validated_sql: "SELECT reg FROM orders", execution_error: "column \"reg\" does not exist" })
    );
    expect(calls.fixed).toEqual([{ sql: "SELECT reg FROM orders", error: "column \"reg\" does not exist" }]);
    expect(next.generated_sql).toBe("SELECT region FROM orders");
    expect(next.validated_sql).toBeNull();
    expect(next.execution_error).toBeNull();
    expect(next.sql_explanation).toBe("Revised after execution error: column \"reg\" does not exist");
  });

  it("reports when no fix is proposed", async () => {
    const { collaborators } = createFakeCollaborators({ fixes: [null] });
    const next = await new FixSqlErrorNode(collaborators.errorFixer).invoke(
      stateWith({ validated_sql: "SELECT reg FROM orders", execution_error: "boom" })
    );
    expect(next.generated_sql).toBe("");
    expect(next.sql_explanation).toBe("No fix could be proposed for the failing query");
  });

  it("needs a failing query", async () => {
    const { collaborators } = createFakeCollaborators();
    const next = await new FixSqlErrorNode(collaborators.errorFixer).invoke(stateWith());
    expect(next.sql_explanation).toBe("No failed query to fix");
  });
});

describe("SummarizeNode", () => {
  it("stores the summary and answers in history with the query", async () => {
    const { collaborators } = createFakeCollaborators();
    const next = await new SummarizeNode(collaborators.summarizer).invoke(
      stateWith({ validated_sql: "SELECT region, total FROM orders", execution_result: ONE_ROW })
    );
    expect(next.summary).toBe("Totals by region.");
    expect(next.history).toEqual([
      { role: "assistant", content: "Totals by region.", sql: "SELECT region, total FROM orders" },
    ]);
  });

  it("falls back to the clause breakdown on an empty summary", async () => {
    const { collaborators } = createFakeCollaborators({ summary: "  " });
    const next = await new SummarizeNode(collaborators.summarizer).invoke(
      stateWith({ validated_sql: "SELECT region FROM orders", execution_result: ONE_ROW })
    );
    expect(next.summary?.split("\n")[4]).toBe("| 1. SELECT | SELECT region | Retrieves the listed columns. |");
    expect(next.summary?.endsWith("**Execution Status:** Successfully executed")).toBe(true);
  });
});

describe("InterpretResultsNode", () => {
  it("skips interpretation without rows", async () => {
    const { collaborators } = createFakeCollaborators();
    const next = await new InterpretResultsNode(collaborators.interpreter).invoke(stateWith());
    expect(next.business_interpretation).toBe(NO_RESULTS_INTERPRETATION);
  });

  it("redacts the interpretation", async () => {
    const redactor: PiiRedactor = {
      redact: (value) => ({ value: value.replace("North", "[REGION]"), findings: [{ type: "region", replacement: "[REGION]" }] }),
    };
    const { collaborators } = createFakeCollaborators();
    const next = await new InterpretResultsNode(collaborators.interpreter, redactor).invoke(
      stateWith({ validated_sql: "SELECT region, total FROM orders", execution_result: ONE_ROW })
    );
    expect(next.business_interpretation).toBe("[REGION] leads with 10.");
  });

  it("records interpreter failures", async () => {
    const node = new InterpretResultsNode({
      interpret: async () => {
        throw new Error("quota");
      },
    });
    const next = await node.invoke(stateWith({ validated_sql: "SELECT 1", execution_result: ONE_ROW }));
    expect(next.business_interpretation).toBe("Error generating business interpretation: quota");
  });
});
