import type { QueryState } from "../state.js";
import type { ErrorFixCollaborator } from "../core/collaborators/types.js";
import { settle } from "../core/helpers/state.js";
import { stripSqlFences } from "../core/helpers/sql-text.js";
import { errorFields, errorMessage, type Logger } from "../../observability/logger.js";
import { PipelineNode } from "./pipeline-node.js";

// Proposes a corrected query after an execution failure. The proposal goes back through validation.
export class FixSqlErrorNode extends PipelineNode {
  readonly name = "fix_sql_error";

  constructor(private readonly fixer: ErrorFixCollaborator, logger?: Logger) {
    super(logger);
  }

  protected async run(state: QueryState, logger: Logger): Promise<Partial<QueryState>> {
    const failing = state.validated_sql || state.generated_sql;
    if (!state.execution_error || !failing) {
      return { generated_sql: "", sql_explanation: "No failed query to fix" };
    }

    const outcome = await settle(() =>
      this.fixer.fix({ sql: failing, error: state.execution_error ?? "", schema: state.schema ?? "" })
    );
    if (!outcome.ok) {
      logger.warn("error fix failed", errorFields(outcome.error));
      return { generated_sql: "", sql_explanation: `Error fixing SQL: ${errorMessage(outcome.error)}` };
    }

    const fixed = outcome.value ? stripSqlFences(outcome.value.fixedSql) : "";
    if (!fixed) return { generated_sql: "", sql_explanation: "No fix could be proposed for the failing query" };

    logger.info("fix proposed", { previousError: state.execution_error });
    return {
      generated_sql: fixed,
      sql_explanation: `Revised after execution error: ${state.execution_error}`,
      validated_sql: null,
      execution_error: null,
    };
  }

  protected recover(_state: QueryState, error: unknown): Partial<QueryState> {
    return { generated_sql: "", sql_explanation: `Error fixing SQL: ${errorMessage(error)}` };
  }
}
