export type LlmProvider = "gemini";

export type LlmClient = {
  provider: LlmProvider;
  model: string;
  /** Returns the model's raw reply (not parsed), to allow strict post-parse validation. */
  generateJson(args: { system: string; prompt: string }): Promise<string>;
};
