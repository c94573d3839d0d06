import * as z from "zod";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { HistoryEntry } from "../../../state.js";
import type {
  ErrorFixCollaborator,
  IntentCollaborator,
  IntentVerdict,
  InterpretationCollaborator,
  SqlGenerationCollaborator,
  SqlGenerationResult,
  SummarizationCollaborator,
} from "../../collaborators/types.js";
import type { ModelAlias } from "../../config/model-factory.js";
import type { PromptCatalog } from "../../config/prompts.js";
import { interpolate } from "../../helpers/template.js";
import { extractJsonObject, stripSqlFences } from "../../helpers/sql-text.js";
import { formatResultPreview } from "../../helpers/tabular.js";
import { noopLogger, type Logger } from "../../../../observability/logger.js";
import { aiCallWithGuardrail } from "./guardrail.js";
import { invokeChatModelWithFallback } from "./invoke.js";

export type ChatModelCollaborators = {
  intent: IntentCollaborator;
  generator: SqlGenerationCollaborator;
  errorFixer: ErrorFixCollaborator;
  summarizer: SummarizationCollaborator;
  interpreter: InterpretationCollaborator;
};

export type ChatModelCollaboratorOptions = {
  model: BaseChatModel | ((alias: ModelAlias) => BaseChatModel);
  prompts: PromptCatalog;
  logger?: Logger;
  historyWindow?: number;
};

// Requests to change data never reach the model.
const WRITE_INTENT_PATTERNS: RegExp[] = [
  /^\s*(?:please\s+)?(?:delete|drop|update|insert|alter|truncate|remove|modify)\b/i,
  /\b(?:drop|truncate|alter|create)\s+(?:table|database|schema|column|index|view)\b/i,
  /\bdelete\s+(?:all|from|every|each|the)\b/i,
  /\binsert\s+into\b/i,
  /\bupdate\s+\w+\s+set\b/i,
];

export const WRITE_REQUEST_FEEDBACK =
  "This request asks to change data. Only read-only questions can be answered; try asking to show or count the records instead.";

export function detectWriteIntent(question: string): boolean {
  return WRITE_INTENT_PATTERNS.some((pattern) => pattern.test(question));
}

const IntentReplySchema = z.object({
  status: z.enum(["clear", "ambiguous", "blocked"]),
  reason: z.string().optional(),
  question: z.string().optional(),
});

const SqlReplySchema = z.object({
  sql: z.string().default(""),
  explanation: z.string().default(""),
});

const CLEAR_VERDICT: IntentVerdict = { blocked: false, reason: null, ambiguous: false, clarifyingQuestion: null };

export function parseIntentReply(raw: string): IntentVerdict | null {
  const reply = IntentReplySchema.safeParse(extractJsonObject(raw));
  if (!reply.success) return null;
  const { status, reason, question } = reply.data;
  if (status === "blocked") {
    return { ...CLEAR_VERDICT, blocked: true, reason: reason ?? WRITE_REQUEST_FEEDBACK };
  }
  if (status === "ambiguous") {
    return {
      ...CLEAR_VERDICT,
      ambiguous: true,
      reason: reason ?? null,
      clarifyingQuestion: question ?? "Could you provide more details?",
    };
  }
  return CLEAR_VERDICT;
}

/**
 * JSON `{sql, explanation}` first; a bare SELECT/WITH statement (fenced or not) is accepted as well.
 */
export function parseSqlReply(raw: string): SqlGenerationResult | null {
  const reply = SqlReplySchema.safeParse(extractJsonObject(raw));
  if (reply.success) {
    return { sql: stripSqlFences(reply.data.sql), explanation: reply.data.explanation };
  }
  const bare = stripSqlFences(raw);
  if (/^(?:select|with)\b/i.test(bare)) return { sql: bare, explanation: "" };
  return null;
}

function formatHistory(history: HistoryEntry[], window: number): string {
  if (history.length <= 1) return "";
  const lines = history.slice(-window).map((entry) => `${entry.role === "user" ? "User" : "Assistant"}: ${entry.content}`);
  return `Conversation history:\n${lines.join("\n")}\n\n`;
}

export function createChatModelCollaborators(options: ChatModelCollaboratorOptions): ChatModelCollaborators {
  const { prompts } = options;
  const logger = options.logger ?? noopLogger;
  const historyWindow = options.historyWindow ?? 5;
  const resolve = (alias: ModelAlias): BaseChatModel =>
    typeof options.model === "function" ? options.model(alias) : options.model;

  const intent: IntentCollaborator = {
    async classify(question, history) {
      if (detectWriteIntent(question)) {
        return { ...CLEAR_VERDICT, blocked: true, reason: WRITE_REQUEST_FEEDBACK };
      }
      const { value, source } = await aiCallWithGuardrail({
        model: resolve("intent"),
        system: prompts.intent.system,
        user: interpolate(prompts.intent.user, { question, history: formatHistory(history, 3) }),
        runName: "intent",
        fallback: CLEAR_VERDICT,
        parse: parseIntentReply,
        propagateErrors: true,
      });
      if (source !== "ai") logger.warn("intent reply unusable, treating question as clear", { source });
      return value;
    },
  };

  const generator: SqlGenerationCollaborator = {
    async generate(request) {
      const { value, source } = await aiCallWithGuardrail({
        model: resolve("sqlGeneration"),
        system: prompts.sqlGeneration.system,
        user: interpolate(prompts.sqlGeneration.user, {
          schema: request.schema,
          question: request.question,
          history: formatHistory(request.history, historyWindow),
          lastSql: request.lastSql ? `Previous SQL query:\n${request.lastSql}\n\n` : "",
        }),
        runName: "generate_sql",
        fallback: { sql: "", explanation: "The model reply did not contain a usable SQL query" },
        parse: parseSqlReply,
        propagateErrors: true,
      });
      if (source !== "ai") logger.warn("sql generation reply unusable", { source });
      return value;
    },
  };

  const errorFixer: ErrorFixCollaborator = {
    async fix(request) {
      const { value } = await aiCallWithGuardrail<SqlGenerationResult | null>({
        model: resolve("errorFix"),
        system: prompts.errorFix.system,
        user: interpolate(prompts.errorFix.user, request),
        runName: "fix_sql_error",
        fallback: null,
        parse: parseSqlReply,
        propagateErrors: true,
      });
      return value && value.sql ? { fixedSql: value.sql } : null;
    },
  };

  const summarizer: SummarizationCollaborator = {
    async summarize(request) {
      // An empty reply lets the node fall back to its clause breakdown.
      return invokeChatModelWithFallback(
        resolve("summary"),
        prompts.summary.system,
        interpolate(prompts.summary.user, {
          question: request.question,
          sql: request.sql,
          status: request.result ? "Successfully executed" : "Failed to execute",
        }),
        { runName: "summarize", fallback: "" }
      );
    },
  };

  const interpreter: InterpretationCollaborator = {
    async interpret(request) {
      const shape = request.result ? `${request.result.shape[0]} rows x ${request.result.shape[1]} columns` : "no result";
      return invokeChatModelWithFallback(
        resolve("interpretation"),
        prompts.interpretation.system,
        interpolate(prompts.interpretation.user, {
          question: request.question,
          sql: request.sql,
          shape,
          preview: formatResultPreview(request.result, 20),
        }),
        { runName: "interpret_results", fallback: "No interpretation could be generated.", rethrow: true }
      );
    },
  };

  return { intent, generator, errorFixer, summarizer, interpreter };
}
