import type { QueryState } from "../state.js";
import type { SummarizationCollaborator } from "../core/collaborators/types.js";
import { settle } from "../core/helpers/state.js";
import { describeSqlClauses } from "../core/helpers/sql-text.js";
import { errorFields, type Logger } from "../../observability/logger.js";
import { PipelineNode } from "./pipeline-node.js";

export class SummarizeNode extends PipelineNode {
  readonly name = "summarize";

  constructor(private readonly summarizer: SummarizationCollaborator, logger?: Logger) {
    super(logger);
  }

  protected async run(state: QueryState, logger: Logger): Promise<Partial<QueryState>> {
    const sql = state.validated_sql ?? "";
    const outcome = await settle(() =>
      this.summarizer.summarize({ question: state.question, sql, result: state.execution_result })
    );
    if (!outcome.ok) logger.warn("summarization failed, using clause breakdown", errorFields(outcome.error));

    const text = outcome.ok ? outcome.value.trim() : "";
    const summary = text || describeSqlClauses(sql, state.execution_result !== null);
    return {
      summary,
      history: [...state.history, { role: "assistant", content: summary, sql }],
    };
  }

  protected recover(state: QueryState): Partial<QueryState> {
    return { summary: describeSqlClauses(state.validated_sql ?? "", state.execution_result !== null) };
  }
}
