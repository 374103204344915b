import type { LlmClient } from "../src/llm/types.js";
import { createLogger, type Logger } from "../src/logger.js";

export type FakeLlm = LlmClient & { calls: Array<{ system: string; prompt: string }> };

/** In-process model stand-in: replies with the given strings in order. */
export function fakeLlm(...replies: string[]): FakeLlm {
  const calls: Array<{ system: string; prompt: string }> = [];
  return {
    provider: "gemini",
    model: "fake-model",
    calls,
    async generateJson(args) {
      calls.push(args);
      const reply = replies[calls.length - 1];
      if (reply === undefined) throw new Error(`unexpected model call #${calls.length}`);
      return reply;
    }
  };
}

export function quietLogger(lines: string[] = []): Logger {
  return createLogger({ level: "debug", write: (line) => lines.push(line) });
}
