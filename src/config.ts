import { z } from "zod";
import { ConfigurationInvalid } from "./errors.js";
import { DEFAULT_MAX_CHARS } from "./prompt.js";

export const DEFAULT_MODEL = "gemini-2.5-flash";
export const DEFAULT_TIMEOUT_MS = 60_000;

const ConfigSchema = z.object({
  apiKey: z.string().optional(),
  model: z.string().min(1),
  timeoutMs: z.coerce.number().int().positive(),
  maxChars: z.coerce.number().int().positive(),
  logLevel: z.enum(["debug", "info", "warn", "error"])
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/** Values given on the command line; they win over the environment. */
export type ConfigOverrides = {
  apiKey?: string;
  model?: string;
  timeoutMs?: string | number;
  maxChars?: string | number;
  logLevel?: string;
};

const SOURCES: Record<keyof AppConfig, string> = {
  apiKey: "--api-key / GEMINI_API_KEY",
  model: "--model / STATEMENT_LENS_MODEL",
  timeoutMs: "--timeout / STATEMENT_LENS_TIMEOUT_MS",
  maxChars: "--max-chars / STATEMENT_LENS_MAX_CHARS",
  logLevel: "--verbose / STATEMENT_LENS_LOG_LEVEL"
};

function firstString(...values: Array<string | undefined>): string | undefined {
  for (const v of values) {
    if (v !== undefined && v.trim() !== "") return v.trim();
  }
  return undefined;
}

function firstSet(...values: Array<string | number | undefined>): string | number | undefined {
  for (const v of values) {
    if (typeof v === "number") return v;
    if (v !== undefined && v.trim() !== "") return v.trim();
  }
  return undefined;
}

function isConfigKey(key: unknown): key is keyof AppConfig {
  return typeof key === "string" && Object.hasOwn(SOURCES, key);
}

/**
 * Resolve configuration once at startup. The API key may be absent here;
 * `createLlmClient` rejects that before any request is made.
 */
export function loadConfig(env: NodeJS.ProcessEnv, overrides: ConfigOverrides = {}): AppConfig {
  const input = {
    apiKey: firstString(overrides.apiKey, env.GEMINI_API_KEY, env.GOOGLE_API_KEY),
    model: firstString(overrides.model, env.STATEMENT_LENS_MODEL) ?? DEFAULT_MODEL,
    timeoutMs: firstSet(overrides.timeoutMs, env.STATEMENT_LENS_TIMEOUT_MS) ?? DEFAULT_TIMEOUT_MS,
    maxChars: firstSet(overrides.maxChars, env.STATEMENT_LENS_MAX_CHARS) ?? DEFAULT_MAX_CHARS,
    logLevel: firstString(overrides.logLevel, env.STATEMENT_LENS_LOG_LEVEL) ?? "info"
  };

  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue.path[0];
    const source = isConfigKey(key) ? SOURCES[key] : String(key);
    throw new ConfigurationInvalid(`${source}: ${issue.message}`);
  }
  return parsed.data;
}
