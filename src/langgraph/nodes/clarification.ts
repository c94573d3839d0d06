import type { QueryState } from "../state.js";
import type { Logger } from "../../observability/logger.js";
import { PipelineNode } from "./pipeline-node.js";

export const GENERIC_CLARIFICATION_QUESTION =
  "I need some clarification to better understand your request. Could you provide more specific details about what you're looking for?";

export class ClarificationNode extends PipelineNode {
  readonly name = "clarification";

  protected async run(state: QueryState, logger: Logger): Promise<Partial<QueryState>> {
    const response = state.user_clarification_response;
    if (response) {
      const question = `${state.question} ${response}`.trim();
      logger.info("clarification received", { question });
      return {
        question,
        clarification_needed: false,
        clarification_question: null,
        history: [...state.history, { role: "user", content: response }],
      };
    }

    const asked = state.clarification_question || GENERIC_CLARIFICATION_QUESTION;
    return {
      clarification_needed: true,
      clarification_question: asked,
      history: [...state.history, { role: "assistant", content: asked }],
    };
  }
}
