import path from "node:path";
import { readPdfDocument, type PdfText } from "./io.js";
import type { LlmClient } from "./llm/types.js";
import { createLogger, type Logger } from "./logger.js";
import { parseStatementWithLlm, type ExtractionResult } from "./parsers/pdf-llm.js";

export type DocumentInfo = {
  fileName: string;
  byteLength: number;
  pageCount: number;
};

export type StatementParseResult = ExtractionResult & {
  document: DocumentInfo;
};

export type PipelineDeps = {
  llm: LlmClient;
  maxChars?: number;
  logger?: Logger;
  /** PDF text extractor; defaults to pdf-parse. */
  readDocument?: (filePath: string) => Promise<PdfText>;
};

/**
 * One document end to end: extract text → prompt → model → validate.
 * Unreadable documents fail here, before the model is called.
 */
export async function parseStatementFile(filePath: string, deps: PipelineDeps): Promise<StatementParseResult> {
  const log = deps.logger ?? createLogger();
  const readDocument = deps.readDocument ?? readPdfDocument;
  const fileName = path.basename(filePath);

  log.info(`Extracting text from ${fileName}`);
  const { pages, byteLength } = await readDocument(filePath);
  log.debug("Extracted text", { pages: pages.length, bytes: byteLength, chars: pages.reduce((n, p) => n + p.length, 0) });

  log.info(`Analyzing with ${deps.llm.model}`);
  const result = await parseStatementWithLlm({ pages, llm: deps.llm, maxChars: deps.maxChars, logger: log });
  log.info(`Found ${result.record.transactions.length} transaction(s)`);

  return { ...result, document: { fileName, byteLength, pageCount: pages.length } };
}
