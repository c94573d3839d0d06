import type { QueryState } from "../state.js";
import type { IntentCollaborator } from "../core/collaborators/types.js";
import { settle } from "../core/helpers/state.js";
import { errorFields, type Logger } from "../../observability/logger.js";
import { PipelineNode } from "./pipeline-node.js";

export const DEFAULT_OPERATION_FEEDBACK =
  "This request would modify data. Only read-only questions about the data can be answered.";

const CLEAR: Partial<QueryState> = {
  operation_not_permitted: false,
  operation_feedback: null,
  clarification_needed: false,
  clarification_question: null,
};

export class IntentNode extends PipelineNode {
  readonly name = "intent";

  constructor(private readonly intent: IntentCollaborator, logger?: Logger) {
    super(logger);
  }

  protected async run(state: QueryState, logger: Logger): Promise<Partial<QueryState>> {
    const outcome = await settle(() => this.intent.classify(state.question, state.history));
    if (!outcome.ok) {
      // Fail open: an unreachable classifier never blocks or pauses the question.
      logger.warn("intent classification failed, proceeding", errorFields(outcome.error));
      return CLEAR;
    }

    const verdict = outcome.value;
    if (verdict.blocked) {
      logger.info("operation not permitted", { reason: verdict.reason });
      return {
        ...CLEAR,
        operation_not_permitted: true,
        operation_feedback: verdict.reason || DEFAULT_OPERATION_FEEDBACK,
      };
    }
    if (verdict.ambiguous) {
      return { ...CLEAR, clarification_needed: true, clarification_question: verdict.clarifyingQuestion };
    }
    return CLEAR;
  }

  protected recover(): Partial<QueryState> {
    return CLEAR;
  }
}
