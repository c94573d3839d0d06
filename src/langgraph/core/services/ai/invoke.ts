import { HumanMessage, SystemMessage } from "@langchain/core/messages";
import type { MessageContent } from "@langchain/core/messages";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";

export function messageText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .map((part) => (part.type === "text" && "text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}

/**
 * Single system + user exchange. Model failures and empty replies resolve to `fallback`
 * unless `rethrow` is set, in which case the model error propagates to the caller.
 */
export async function invokeChatModelWithFallback(
  model: BaseChatModel,
  system: string,
  user: string,
  options: { runName: string; fallback?: string; rethrow?: boolean }
): Promise<string> {
  try {
    const resp = await model.invoke([new SystemMessage(system), new HumanMessage(user)], { runName: options.runName });
    const text = messageText(resp.content).trim();
    return text || (options.fallback ?? "");
  } catch (error) {
    if (options.rethrow) throw error;
    return options.fallback ?? "";
  }
}
