import { ApiError, GoogleGenAI } from "@google/genai";
import { ConfigurationMissing, ExtractionFailed } from "../errors.js";
import type { LlmClient } from "./types.js";

function isKeyRejection(err: ApiError): boolean {
  if (err.status === 401 || err.status === 403) return true;
  return err.status === 400 && /api[ _]?key/i.test(err.message);
}

/**
 * Gemini adapter (Google Gen AI SDK). One request per call; the SDK enforces
 * `timeoutMs` on the HTTP request.
 */
export function createGeminiClient(args: { apiKey: string; model: string; timeoutMs: number }): LlmClient {
  const ai = new GoogleGenAI({ apiKey: args.apiKey, httpOptions: { timeout: args.timeoutMs } });

  return {
    provider: "gemini",
    model: args.model,
    async generateJson({ system, prompt }) {
      try {
        const response = await ai.models.generateContent({
          model: args.model,
          contents: prompt,
          config: {
            systemInstruction: system,
            responseMimeType: "application/json",
            temperature: 0
          }
        });
        return response.text ?? "";
      } catch (err) {
        if (err instanceof ApiError && isKeyRejection(err)) {
          throw new ConfigurationMissing(`Gemini rejected the API key (HTTP ${err.status})`, { cause: err });
        }
        const detail = err instanceof Error ? err.message : String(err);
        throw new ExtractionFailed(`Gemini request failed: ${detail}`, { cause: err });
      }
    }
  };
}
