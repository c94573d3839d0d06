import type { NodeName } from "../state.js";
import type { QueryCollaborators } from "../core/collaborators/types.js";
import { passthroughRedactor } from "../core/collaborators/types.js";
import { noopLogger, type Logger } from "../../observability/logger.js";
import type { PipelineNode } from "./pipeline-node.js";
import { IntentNode } from "./intent.js";
import { ClarificationNode } from "./clarification.js";
import { LookupSchemaNode } from "./lookup-schema.js";
import { GenerateSqlNode } from "./generate-sql.js";
import { ValidateSqlNode } from "./validate-sql.js";
import { ExecuteSqlNode } from "./execute-sql.js";
import { FixSqlErrorNode } from "./fix-sql-error.js";
import { SummarizeNode } from "./summarize.js";
import { InterpretResultsNode } from "./interpret-results.js";

export { PipelineNode } from "./pipeline-node.js";
export { IntentNode, DEFAULT_OPERATION_FEEDBACK } from "./intent.js";
export { ClarificationNode, GENERIC_CLARIFICATION_QUESTION } from "./clarification.js";
export { LookupSchemaNode } from "./lookup-schema.js";
export { GenerateSqlNode } from "./generate-sql.js";
export { ValidateSqlNode } from "./validate-sql.js";
export { ExecuteSqlNode } from "./execute-sql.js";
export { FixSqlErrorNode } from "./fix-sql-error.js";
export { SummarizeNode } from "./summarize.js";
export { InterpretResultsNode, NO_RESULTS_INTERPRETATION } from "./interpret-results.js";

export type QueryNodes = Record<NodeName, PipelineNode>;

export function createQueryNodes(collaborators: QueryCollaborators, logger: Logger = noopLogger): QueryNodes {
  const redactor = collaborators.redactor ?? passthroughRedactor;
  return {
    intent: new IntentNode(collaborators.intent, logger),
    clarification: new ClarificationNode(logger),
    lookup_schema: new LookupSchemaNode(collaborators.schema, logger),
    generate_sql: new GenerateSqlNode(collaborators.generator, logger),
    validate_sql: new ValidateSqlNode(collaborators.catalog ?? null, logger),
    execute_sql: new ExecuteSqlNode(collaborators.executor, redactor, logger),
    fix_sql_error: new FixSqlErrorNode(collaborators.errorFixer, logger),
    summarize: new SummarizeNode(collaborators.summarizer, logger),
    interpret_results: new InterpretResultsNode(collaborators.interpreter, redactor, logger),
  };
}
