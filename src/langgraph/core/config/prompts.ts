import { readFileSync } from "node:fs";
import path from "node:path";
import * as z from "zod";
import { parse as parseYaml } from "yaml";

export const PromptPairSchema = z.object({
  system: z.string().min(1),
  user: z.string().min(1),
});

export type PromptPair = z.infer<typeof PromptPairSchema>;

export const PromptCatalogSchema = z.object({
  intent: PromptPairSchema,
  sqlGeneration: PromptPairSchema,
  errorFix: PromptPairSchema,
  summary: PromptPairSchema,
  interpretation: PromptPairSchema,
});

export type PromptCatalog = z.infer<typeof PromptCatalogSchema>;

export const DEFAULT_PROMPTS_PATH = path.resolve(__dirname, "../../../../config/prompts.yaml");

/**
 * Parses and validates a YAML prompt catalog file.
 */
export function loadPrompts(filePath: string = DEFAULT_PROMPTS_PATH): PromptCatalog {
  const raw = readFileSync(filePath, "utf-8");
  return parsePromptsFromText(raw);
}

/**
 * Parses raw YAML text (not a file path) into a validated PromptCatalog.
 * Useful for testing without filesystem access.
 */
export function parsePromptsFromText(yamlText: string): PromptCatalog {
  const parsed: unknown = parseYaml(yamlText);
  return PromptCatalogSchema.parse(parsed);
}
