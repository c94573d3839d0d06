import type { QueryState } from "../state.js";
import type { SchemaCollaborator } from "../core/collaborators/types.js";
import { settle } from "../core/helpers/state.js";
import { errorFields, errorMessage, type Logger } from "../../observability/logger.js";
import { PipelineNode } from "./pipeline-node.js";

export class LookupSchemaNode extends PipelineNode {
  readonly name = "lookup_schema";

  constructor(private readonly schema: SchemaCollaborator, logger?: Logger) {
    super(logger);
  }

  protected async run(_state: QueryState, logger: Logger): Promise<Partial<QueryState>> {
    const outcome = await settle(() => this.schema.describeSchema());
    if (!outcome.ok) {
      logger.warn("schema lookup failed", errorFields(outcome.error));
      return { schema: `Error retrieving schema: ${errorMessage(outcome.error)}` };
    }
    return { schema: outcome.value };
  }

  protected recover(_state: QueryState, error: unknown): Partial<QueryState> {
    return { schema: `Error retrieving schema: ${errorMessage(error)}` };
  }
}
