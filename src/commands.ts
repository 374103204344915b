import chalk, { type ChalkInstance } from "chalk";

import { loadConfig, type AppConfig } from "./config.js";
import { describeError } from "./errors.js";
import {
  summaryCsvPath,
  toStatementJson,
  writeStatementJson,
  writeSummaryCsv,
  writeTransactionsCsv
} from "./export.js";
import type { PdfText } from "./io.js";
import { createLlmClient } from "./llm/index.js";
import type { LlmClient } from "./llm/types.js";
import { readTransactionsFile } from "./load.js";
import { createLogger } from "./logger.js";
import { parseStatementFile } from "./pipeline.js";
import { renderStatement, renderSummary } from "./render.js";
import { warningsOf } from "./validate.js";

export type ParseCommandOptions = {
  json?: string;
  csv?: string;
  summaryCsv?: string;
  apiKey?: string;
  model?: string;
  timeout?: string;
  maxChars?: string;
  quiet?: boolean;
  verbose?: boolean;
};

export type CommandDeps = {
  env?: NodeJS.ProcessEnv;
  /** Report and result lines (stdout). */
  print?: (text: string) => void;
  /** Log lines (stderr). */
  log?: (line: string) => void;
  createLlm?: (config: AppConfig) => LlmClient;
  readDocument?: (filePath: string) => Promise<PdfText>;
  chalk?: ChalkInstance;
};

export async function runParse(input: string, opts: ParseCommandOptions, deps: CommandDeps = {}): Promise<void> {
  const print = deps.print ?? ((text: string) => console.log(text));
  const c = deps.chalk ?? chalk;

  const config = loadConfig(deps.env ?? process.env, {
    apiKey: opts.apiKey,
    model: opts.model,
    timeoutMs: opts.timeout,
    maxChars: opts.maxChars,
    logLevel: opts.verbose ? "debug" : undefined
  });
  const logger = createLogger({ level: config.logLevel, write: deps.log });
  const llm = (deps.createLlm ?? createLlmClient)(config);

  const result = await parseStatementFile(input, {
    llm,
    maxChars: config.maxChars,
    logger,
    readDocument: deps.readDocument
  });

  if (!opts.quiet) print(renderStatement(result, { chalk: c }).join("\n"));

  if (opts.json) {
    await writeStatementJson(opts.json, result.record);
    print(c.green(`OK: wrote statement JSON -> ${opts.json}`));
  }
  if (opts.csv) {
    await writeTransactionsCsv(opts.csv, result.record.transactions);
    const summaryPath = opts.summaryCsv ?? summaryCsvPath(opts.csv);
    await writeSummaryCsv(summaryPath, result.summary);
    print(c.green(`OK: wrote ${result.record.transactions.length} rows -> ${opts.csv} (summary -> ${summaryPath})`));
  } else if (opts.summaryCsv) {
    await writeSummaryCsv(opts.summaryCsv, result.summary);
    print(c.green(`OK: wrote summary -> ${opts.summaryCsv}`));
  }

  if (opts.quiet && !opts.json && !opts.csv) {
    print(JSON.stringify(toStatementJson(result.record), null, 2));
  }
}

export async function runSummarize(input: string, deps: Pick<CommandDeps, "print" | "chalk"> = {}): Promise<void> {
  const print = deps.print ?? ((text: string) => console.log(text));
  const c = deps.chalk ?? chalk;

  const loaded = await readTransactionsFile(input);
  print(renderSummary(loaded.summary, { chalk: c }).join("\n"));
  for (const w of warningsOf(loaded.report)) print(c.yellow(`  - ${w.message}`));
}

/** Print the failure banner; returns the process exit code. */
export function reportFailure(
  err: unknown,
  deps: { printError?: (text: string) => void; chalk?: ChalkInstance } = {}
): number {
  const printError = deps.printError ?? ((text: string) => console.error(text));
  const c = deps.chalk ?? chalk;

  const { banner, detail, hint } = describeError(err);
  printError(c.red.bold(banner));
  printError(c.red(detail));
  if (hint) printError(c.gray(hint));
  return 1;
}
