import type { AppConfig } from "../config.js";
import { ConfigurationMissing } from "../errors.js";
import { createGeminiClient } from "./gemini.js";
import type { LlmClient } from "./types.js";

export type { LlmClient, LlmProvider } from "./types.js";

/** Fails before any network call when no API key is configured. */
export function createLlmClient(config: Pick<AppConfig, "apiKey" | "model" | "timeoutMs">): LlmClient {
  if (!config.apiKey) {
    throw new ConfigurationMissing("No Gemini API key configured (GEMINI_API_KEY or --api-key).");
  }
  return createGeminiClient({ apiKey: config.apiKey, model: config.model, timeoutMs: config.timeoutMs });
}
