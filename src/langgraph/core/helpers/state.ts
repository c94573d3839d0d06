import { QueryStateSchema, DEFAULT_MAX_RETRIES } from "../../state.js";
import type { HistoryEntry, QueryState } from "../../state.js";

export function nowMs(): number {
  return Date.now();
}

export function createInitialState(params: {
  question: string;
  history?: HistoryEntry[];
  maxRetries?: number;
}): QueryState {
  return QueryStateSchema.parse({
    question: params.question,
    history: params.history ?? [],
    max_retries: params.maxRetries ?? DEFAULT_MAX_RETRIES,
  });
}

export function mergeStatePatch(base: QueryState, ...patches: Partial<QueryState>[]): QueryState {
  let result: QueryState = base;
  for (const patch of patches) {
    result = { ...result, ...patch };
  }
  return result;
}

// Most recent query the assistant answered with, used as context for follow-ups.
export function lastAssistantSql(history: HistoryEntry[]): string | null {
  for (let i = history.length - 1; i >= 0; i--) {
    const entry = history[i];
    if (entry.role === "assistant" && entry.sql) return entry.sql;
  }
  return null;
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Await a collaborator call and tag the outcome instead of letting it throw.
 */
export async function settle<T>(work: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await work() };
  } catch (error) {
    return { ok: false, error };
  }
}
