import type { QueryState } from "../state.js";
import type { SqlGenerationCollaborator } from "../core/collaborators/types.js";
import { lastAssistantSql, settle } from "../core/helpers/state.js";
import { stripSqlFences } from "../core/helpers/sql-text.js";
import { errorFields, errorMessage, type Logger } from "../../observability/logger.js";
import { PipelineNode } from "./pipeline-node.js";

export class GenerateSqlNode extends PipelineNode {
  readonly name = "generate_sql";

  constructor(private readonly generator: SqlGenerationCollaborator, logger?: Logger) {
    super(logger);
  }

  protected async run(state: QueryState, logger: Logger): Promise<Partial<QueryState>> {
    if (!state.question) return { generated_sql: "", sql_explanation: "No question provided" };
    if (!state.schema) return { generated_sql: "", sql_explanation: "No schema available" };

    const outcome = await settle(() =>
      this.generator.generate({
        question: state.question,
        schema: state.schema ?? "",
        history: state.history,
        lastSql: lastAssistantSql(state.history),
      })
    );
    if (!outcome.ok) {
      logger.warn("sql generation failed", errorFields(outcome.error));
      return { generated_sql: "", sql_explanation: `Error generating SQL: ${errorMessage(outcome.error)}` };
    }

    const sql = stripSqlFences(outcome.value.sql);
    logger.info("sql generated", { generated: sql.length > 0, retryCount: state.retry_count });
    return {
      generated_sql: sql,
      sql_explanation: outcome.value.explanation || (sql ? null : "The generator returned no SQL"),
    };
  }

  protected recover(_state: QueryState, error: unknown): Partial<QueryState> {
    return { generated_sql: "", sql_explanation: `Error generating SQL: ${errorMessage(error)}` };
  }
}
