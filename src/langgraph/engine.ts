import crypto from "node:crypto";
import { GraphRecursionError } from "@langchain/langgraph";
import { DEFAULT_MAX_RETRIES, DEFAULT_RECURSION_LIMIT, QueryStateSchema } from "./state.js";
import type { HistoryEntry, QueryState } from "./state.js";
import type { QueryCollaborators } from "./core/collaborators/types.js";
import { InMemoryCheckpointStore, type CheckpointStore } from "./core/checkpoint/checkpoint-store.js";
import { createInitialState } from "./core/helpers/state.js";
import { createQueryNodes } from "./nodes/index.js";
import { buildQueryGraph, type QueryGraph } from "./graph.js";
import { buildFailureResult, buildQueryResult, isSuspended, type QueryResult } from "./result-view.js";
import {
  ConversationNotFoundError,
  EngineError,
  InvalidResumeError,
  StepLimitExceededError,
} from "./errors.js";
import { errorFields, errorMessage, noopLogger, type Logger } from "../observability/logger.js";

export type QueryEngineDefaults = {
  maxRetries?: number;
  recursionLimit?: number;
};

export type QueryEngineOptions = {
  collaborators: QueryCollaborators;
  checkpointStore?: CheckpointStore;
  logger?: Logger;
  defaults?: QueryEngineDefaults;
};

export type StartOptions = {
  maxRetries?: number;
  threadId?: string;
  recursionLimit?: number;
};

export type ResumeOptions = {
  recursionLimit?: number;
};

type DriveOutcome = { state: QueryState; error: EngineError | null };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requirePositiveInt(value: number, label: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new EngineError("INVALID_INPUT", `${label} must be a positive integer`);
  }
  return value;
}

/**
 * Drives one conversation turn through the compiled query graph.
 *
 * The graph is compiled once per engine. Each step's state is written to the
 * checkpoint store under the thread id before the next step runs, so a turn
 * that suspends for clarification can be picked up by `resume` later, from
 * this or another engine sharing the store. `start` and `resume` never throw:
 * engine failures come back in `QueryResult.error`.
 */
export class QueryEngine {
  private readonly graph: QueryGraph;
  private readonly store: CheckpointStore;
  private readonly logger: Logger;
  private readonly maxRetries: number;
  private readonly recursionLimit: number;

  constructor(options: QueryEngineOptions) {
    this.logger = options.logger ?? noopLogger;
    this.store = options.checkpointStore ?? new InMemoryCheckpointStore();
    this.maxRetries = options.defaults?.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.recursionLimit = options.defaults?.recursionLimit ?? DEFAULT_RECURSION_LIMIT;
    this.graph = buildQueryGraph(createQueryNodes(options.collaborators, this.logger));
  }

  async start(question: string, history?: HistoryEntry[], options: StartOptions = {}): Promise<QueryResult> {
    const threadId = options.threadId ?? crypto.randomUUID();
    const log = this.logger.child({ threadId });

    try {
      if (!question.trim()) throw new EngineError("INVALID_INPUT", "Question must not be empty");
      const maxRetries = requirePositiveInt(options.maxRetries ?? this.maxRetries, "maxRetries");
      const recursionLimit = requirePositiveInt(options.recursionLimit ?? this.recursionLimit, "recursionLimit");

      // Without an explicit history, a known thread continues its own transcript.
      const prior = history ?? (await this.store.load(threadId))?.state.history ?? [];
      const initial = createInitialState({
        question,
        history: [...prior, { role: "user", content: question }],
        maxRetries,
      });

      log.info("turn started", { maxRetries, historyLength: prior.length });
      await this.store.save(threadId, initial);
      return this.finish(threadId, await this.drive(threadId, initial, recursionLimit, log), log);
    } catch (error) {
      return this.fail(threadId, error, history ?? [], log);
    }
  }

  async resume(answer: string, threadId: string, options: ResumeOptions = {}): Promise<QueryResult> {
    const log = this.logger.child({ threadId });

    try {
      const record = await this.store.load(threadId);
      if (!record) throw new ConversationNotFoundError(threadId);
      if (!isSuspended(record.state)) throw new InvalidResumeError(threadId);
      if (!answer.trim()) throw new EngineError("INVALID_INPUT", "Clarification answer must not be empty");
      const recursionLimit = requirePositiveInt(options.recursionLimit ?? this.recursionLimit, "recursionLimit");

      const resumed = QueryStateSchema.parse({
        ...record.state,
        user_clarification_response: answer,
        clarification_needed: false,
      });

      log.info("turn resumed");
      await this.store.save(threadId, resumed);
      return this.finish(threadId, await this.drive(threadId, resumed, recursionLimit, log), log);
    } catch (error) {
      return this.fail(threadId, error, [], log);
    }
  }

  /**
   * Result view of the last persisted state for a thread, or null when there is none.
   * Unlike `start` and `resume`, a corrupt checkpoint is thrown.
   */
  async getState(threadId: string): Promise<QueryResult | null> {
    const record = await this.store.load(threadId);
    return record ? buildQueryResult(threadId, record.state) : null;
  }

  private async drive(threadId: string, input: QueryState, recursionLimit: number, log: Logger): Promise<DriveOutcome> {
    let current = input;
    try {
      const stream = await this.graph.stream(input, {
        streamMode: "updates",
        recursionLimit,
        configurable: { thread_id: threadId, logger: log },
      });
      for await (const chunk of stream) {
        const updates: unknown = chunk;
        if (!isPlainObject(updates)) continue;
        for (const update of Object.values(updates)) {
          if (!isPlainObject(update)) continue;
          current = QueryStateSchema.parse({ ...current, ...update });
          await this.store.save(threadId, current);
          log.debug("step persisted", { node: current.current_node, retryCount: current.retry_count });
        }
      }
      return { state: current, error: null };
    } catch (error) {
      if (error instanceof GraphRecursionError) {
        return { state: current, error: new StepLimitExceededError(recursionLimit, error) };
      }
      throw error;
    }
  }

  private finish(threadId: string, outcome: DriveOutcome, log: Logger): QueryResult {
    const result = buildQueryResult(threadId, outcome.state, outcome.error);
    if (outcome.error) {
      log.error("turn aborted", { code: outcome.error.code, message: outcome.error.message });
    } else {
      log.info("turn finished", { status: result.status, retryCount: result.retryCount, nodes: result.completedNodes });
    }
    return result;
  }

  private fail(threadId: string, error: unknown, history: HistoryEntry[], log: Logger): QueryResult {
    if (error instanceof EngineError) {
      log.warn("turn rejected", { code: error.code, message: error.message });
      return buildFailureResult(threadId, error, history);
    }
    log.error("turn failed", errorFields(error));
    return buildFailureResult(threadId, { code: "ENGINE_FAILURE", message: errorMessage(error) }, history);
  }
}
