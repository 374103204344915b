import { decodeResponse } from "../decode.js";
import { ExtractionFailed } from "../errors.js";
import type { LlmClient } from "../llm/types.js";
import { createLogger, type Logger } from "../logger.js";
import { buildExtractionPrompt, type PromptMeta } from "../prompt.js";
import type { DerivedSummary, StatementRecord } from "../schema.js";
import { computeSummary } from "../summary.js";
import { validateStatement, warningsOf, type ValidationReport } from "../validate.js";

export type ExtractionResult = {
  record: StatementRecord;
  summary: DerivedSummary;
  report: ValidationReport;
  meta: PromptMeta;
  /** Model calls made: 1, or 2 when the first reply was not decodable. */
  attempts: number;
};

/**
 * Statement pages → validated record, via the model.
 *
 * A reply that cannot be decoded gets exactly one retry with a stricter
 * prompt; a second failure raises ExtractionFailed.
 */
export async function parseStatementWithLlm(args: {
  pages: string[];
  llm: LlmClient;
  maxChars?: number;
  logger?: Logger;
}): Promise<ExtractionResult> {
  const log = args.logger ?? createLogger();

  const first = buildExtractionPrompt(args.pages, { maxChars: args.maxChars });
  const { meta } = first;
  if (meta.truncated) {
    log.warn("Statement text exceeds the prompt limit and was truncated; results may be incomplete", {
      originalChars: meta.originalChars,
      includedChars: meta.includedChars
    });
  }

  log.debug("Requesting extraction", { provider: args.llm.provider, model: args.llm.model, chars: meta.includedChars });
  let decoded = decodeResponse(await args.llm.generateJson({ system: first.system, prompt: first.prompt }));
  let attempts = 1;

  if (decoded.kind === "decode-error") {
    log.warn("Model reply was not usable JSON; retrying with a stricter prompt", { reason: decoded.reason });
    const strict = buildExtractionPrompt(args.pages, { maxChars: args.maxChars, strict: true });
    decoded = decodeResponse(await args.llm.generateJson({ system: strict.system, prompt: strict.prompt }));
    attempts = 2;
  }

  if (decoded.kind === "decode-error") {
    throw new ExtractionFailed(`No structured data in the model reply after ${attempts} attempts: ${decoded.reason}`);
  }

  const { record, report } = validateStatement(decoded.value);
  const summary = computeSummary(record.transactions);
  log.debug("Validated model reply", {
    transactions: record.transactions.length,
    warnings: warningsOf(report).length
  });

  return { record, summary, report, meta, attempts };
}
