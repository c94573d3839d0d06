import type { QueryState } from "../state.js";
import type { PiiRedactor, SqlExecutionCollaborator } from "../core/collaborators/types.js";
import { passthroughRedactor } from "../core/collaborators/types.js";
import { settle } from "../core/helpers/state.js";
import { normalizeExecutionResult, redactTabularResult } from "../core/helpers/tabular.js";
import { errorFields, errorMessage, type Logger } from "../../observability/logger.js";
import { PipelineNode } from "./pipeline-node.js";

export class ExecuteSqlNode extends PipelineNode {
  readonly name = "execute_sql";

  constructor(
    private readonly executor: SqlExecutionCollaborator,
    private readonly redactor: PiiRedactor = passthroughRedactor,
    logger?: Logger
  ) {
    super(logger);
  }

  protected async run(state: QueryState, logger: Logger): Promise<Partial<QueryState>> {
    if (state.validation_error) {
      return { execution_result: null, execution_error: `Query blocked by validation: ${state.validation_error}` };
    }
    const sql = state.validated_sql;
    if (!sql) return { execution_result: null, execution_error: "No validated SQL query to execute" };

    const outcome = await settle(() => this.executor.execute(sql));
    if (!outcome.ok) {
      logger.warn("sql execution failed", errorFields(outcome.error));
      return { execution_result: null, execution_error: errorMessage(outcome.error) };
    }

    const normalized = normalizeExecutionResult(outcome.value);
    if (!normalized) return { execution_result: null, execution_error: null, pii_findings: {} };

    const { result, findings } = redactTabularResult(normalized, this.redactor);
    logger.info("sql executed", { rows: result.shape[0], columns: result.shape[1] });
    return { execution_result: result, execution_error: null, pii_findings: findings };
  }

  protected recover(_state: QueryState, error: unknown): Partial<QueryState> {
    return { execution_result: null, execution_error: errorMessage(error) };
  }
}
