import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { invokeChatModelWithFallback } from "./invoke.js";

export type AiCallSource = "ai" | "fallback" | "parse_fail";

export type AiCallGuardrailParams<T> = {
  model: BaseChatModel | null;
  system: string;
  user: string;
  runName: string;
  fallback: T;
  parse: (raw: string) => T | null;
  propagateErrors?: boolean;
};

export type AiCallGuardrailResult<T> = {
  value: T;
  source: AiCallSource;
};

/**
 * Invoke a model and parse its reply, falling back when there is no model,
 * no reply, or a reply the parser rejects. Model errors fall back too unless
 * `propagateErrors` is set.
 */
export async function aiCallWithGuardrail<T>(params: AiCallGuardrailParams<T>): Promise<AiCallGuardrailResult<T>> {
  const { model, system, user, runName, fallback, parse, propagateErrors } = params;

  if (!model) return { value: fallback, source: "fallback" };

  const raw = await invokeChatModelWithFallback(model, system, user, {
    runName,
    fallback: "",
    rethrow: propagateErrors,
  });
  if (!raw.trim()) return { value: fallback, source: "fallback" };

  try {
    const parsed = parse(raw);
    if (parsed !== null) return { value: parsed, source: "ai" };
  } catch {
    return { value: fallback, source: "parse_fail" };
  }
  return { value: fallback, source: "parse_fail" };
}
