import type { QueryState } from "../state.js";
import type { InterpretationCollaborator, PiiRedactor } from "../core/collaborators/types.js";
import { passthroughRedactor } from "../core/collaborators/types.js";
import { settle } from "../core/helpers/state.js";
import { hasRows } from "../core/helpers/tabular.js";
import { errorFields, errorMessage, type Logger } from "../../observability/logger.js";
import { PipelineNode } from "./pipeline-node.js";

export const NO_RESULTS_INTERPRETATION = "No results available to interpret.";

export class InterpretResultsNode extends PipelineNode {
  readonly name = "interpret_results";

  constructor(
    private readonly interpreter: InterpretationCollaborator,
    private readonly redactor: PiiRedactor = passthroughRedactor,
    logger?: Logger
  ) {
    super(logger);
  }

  protected async run(state: QueryState, logger: Logger): Promise<Partial<QueryState>> {
    if (!hasRows(state.execution_result)) return { business_interpretation: NO_RESULTS_INTERPRETATION };

    const outcome = await settle(() =>
      this.interpreter.interpret({
        question: state.question,
        sql: state.validated_sql ?? "",
        result: state.execution_result,
      })
    );
    if (!outcome.ok) {
      logger.warn("interpretation failed", errorFields(outcome.error));
      return { business_interpretation: `Error generating business interpretation: ${errorMessage(outcome.error)}` };
    }

    const redacted = this.redactor.redact(outcome.value);
    if (redacted.findings.length > 0) logger.info("interpretation redacted", { findings: redacted.findings.length });
    return { business_interpretation: redacted.value };
  }

  protected recover(_state: QueryState, error: unknown): Partial<QueryState> {
    return { business_interpretation: `Error generating business interpretation: ${errorMessage(error)}` };
  }
}
