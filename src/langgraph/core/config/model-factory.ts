import { ChatOpenAI } from "@langchain/openai";
import type { ResolvedAppConfig } from "../../../config/appConfig.js";

export type ModelConfig = {
  model: string;
  temperature: number;
  maxRetries: number;
};

export const MODEL_ALIASES = ["intent", "sqlGeneration", "errorFix", "summary", "interpretation"] as const;

export type ModelAlias = (typeof MODEL_ALIASES)[number];

// Classification and SQL stay deterministic; prose gets a little latitude.
export const DEFAULT_MODEL_CONFIGS: Readonly<Record<ModelAlias, ModelConfig>> = {
  intent:         { model: "gpt-4o-mini", temperature: 0,   maxRetries: 1 },
  sqlGeneration:  { model: "gpt-4o",      temperature: 0,   maxRetries: 2 },
  errorFix:       { model: "gpt-4o",      temperature: 0,   maxRetries: 2 },
  summary:        { model: "gpt-4o-mini", temperature: 0.3, maxRetries: 1 },
  interpretation: { model: "gpt-4o-mini", temperature: 0.3, maxRetries: 1 },
};

export type ModelResolverSettings = Pick<ResolvedAppConfig, "openAiApiKey" | "openAiModel">;

export interface ModelResolver {
  configFor(alias: ModelAlias): ModelConfig;
  getModel(alias: ModelAlias): ChatOpenAI;
}

/**
 * Per-alias chat models for one engine runtime. `openAiModel` replaces the model
 * name of every alias while each keeps its own temperature and retries;
 * `overrides` replace whole alias configs. Instances are built lazily and reused.
 */
export function createModelResolver(
  settings: ModelResolverSettings,
  overrides: Partial<Record<ModelAlias, ModelConfig>> = {}
): ModelResolver {
  const { openAiApiKey: apiKey, openAiModel } = settings;
  if (!apiKey) throw new Error("OPENAI_API_KEY is required to create chat models.");

  const configFor = (alias: ModelAlias): ModelConfig => {
    const override = overrides[alias];
    if (override) return { ...override };
    const base = DEFAULT_MODEL_CONFIGS[alias];
    return openAiModel ? { ...base, model: openAiModel } : { ...base };
  };

  const cache = new Map<ModelAlias, ChatOpenAI>();

  return {
    configFor,
    getModel(alias) {
      const cached = cache.get(alias);
      if (cached) return cached;
      const { model, temperature, maxRetries } = configFor(alias);
      const created = new ChatOpenAI({ apiKey, model, temperature, maxRetries });
      cache.set(alias, created);
      return created;
    },
  };
}
