import * as z from "zod";
import { HistoryEntrySchema } from "../langgraph/state.js";
import type { HistoryEntry } from "../langgraph/state.js";
import type { QueryResult } from "../langgraph/result-view.js";
import type { EngineErrorCode } from "../langgraph/errors.js";
import type { ResumeOptions, StartOptions } from "../langgraph/engine.js";
import { errorFields, errorMessage, noopLogger, type Logger } from "../observability/logger.js";

// The part of QueryEngine the HTTP layer calls.
export interface QueryService {
  start(question: string, history?: HistoryEntry[], options?: StartOptions): Promise<QueryResult>;
  resume(answer: string, threadId: string, options?: ResumeOptions): Promise<QueryResult>;
  getState(threadId: string): Promise<QueryResult | null>;
}

export type HttpReply = {
  status: number;
  body: unknown;
};

const StartBodySchema = z.object({
  question: z.string({ required_error: "question is required" }).trim().min(1, "question is required"),
  history: z.array(HistoryEntrySchema).optional(),
  threadId: z.string().trim().min(1).optional(),
  maxRetries: z.number().int().min(1).optional(),
});

const ClarifyBodySchema = z.object({
  answer: z.string({ required_error: "answer is required" }).trim().min(1, "answer is required"),
});

const STATUS_BY_CODE: Record<EngineErrorCode, number> = {
  CONVERSATION_NOT_FOUND: 404,
  INVALID_RESUME: 409,
  INVALID_INPUT: 400,
  CHECKPOINT_CORRUPT: 500,
  STEP_LIMIT_EXCEEDED: 500,
  ENGINE_FAILURE: 500,
};

function badRequest(error: z.ZodError): HttpReply {
  return {
    status: 400,
    body: { error: error.issues.map((issue) => issue.message).join("; ") },
  };
}

function replyFor(result: QueryResult): HttpReply {
  return { status: result.errorCode ? STATUS_BY_CODE[result.errorCode] : 200, body: result };
}

export async function handleStartQuery(service: QueryService, body: unknown): Promise<HttpReply> {
  const parsed = StartBodySchema.safeParse(body ?? {});
  if (!parsed.success) return badRequest(parsed.error);
  const { question, history, threadId, maxRetries } = parsed.data;
  return replyFor(await service.start(question, history, { threadId, maxRetries }));
}

export async function handleClarify(service: QueryService, threadId: string, body: unknown): Promise<HttpReply> {
  const parsed = ClarifyBodySchema.safeParse(body ?? {});
  if (!parsed.success) return badRequest(parsed.error);
  return replyFor(await service.resume(parsed.data.answer, threadId));
}

export async function handleGetState(
  service: QueryService,
  threadId: string,
  logger: Logger = noopLogger
): Promise<HttpReply> {
  try {
    const result = await service.getState(threadId);
    if (!result) return { status: 404, body: { error: `No conversation found for thread '${threadId}'` } };
    return { status: 200, body: result };
  } catch (error) {
    logger.error("state lookup failed", { threadId, ...errorFields(error) });
    return { status: 500, body: { error: errorMessage(error) } };
  }
}
