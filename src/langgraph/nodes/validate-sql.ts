import type { QueryState } from "../state.js";
import type { CatalogProvider } from "../core/collaborators/types.js";
import { SqlSafetyValidator } from "../core/guards/sql-safety.js";
import { errorMessage, type Logger } from "../../observability/logger.js";
import { PipelineNode } from "./pipeline-node.js";

export class ValidateSqlNode extends PipelineNode {
  readonly name = "validate_sql";

  constructor(private readonly catalog: CatalogProvider | null, logger?: Logger) {
    super(logger);
  }

  protected async run(state: QueryState, logger: Logger): Promise<Partial<QueryState>> {
    const sql = state.generated_sql;
    if (!sql) return { validated_sql: "", validation_error: "No SQL to validate" };

    const validator = new SqlSafetyValidator(this.catalog, logger);
    const verdict = await validator.validate(sql);
    if (verdict.ok) return { validated_sql: sql, validation_error: null };

    logger.warn("sql rejected", { reason: verdict.reason });
    return { validated_sql: "", validation_error: verdict.reason };
  }

  protected recover(_state: QueryState, error: unknown): Partial<QueryState> {
    return { validated_sql: "", validation_error: errorMessage(error) };
  }
}
