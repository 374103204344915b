#!/usr/bin/env node
import { Command } from "commander";

import { reportFailure, runParse, runSummarize, type ParseCommandOptions } from "./commands.js";

const program = new Command();

program
  .name("statement-lens")
  .description("Extract card info, billing details and transactions from a credit card statement PDF.")
  .version("0.1.0");

program
  .command("parse")
  .description("Parse a statement PDF with the model and print the results.")
  .argument("<input>", "Statement PDF path")
  .option("--json <path>", "Write the statement as JSON")
  .option("--csv <path>", "Write transactions as CSV")
  .option("--summary-csv <path>", "Write the summary CSV (default: <csv>.summary.csv next to --csv)")
  .option("--api-key <key>", "Gemini API key (default: GEMINI_API_KEY)")
  .option("--model <id>", "Model identifier")
  .option("--timeout <ms>", "Model request timeout in milliseconds")
  .option("--max-chars <n>", "Maximum statement characters sent to the model")
  .option("-q, --quiet", "Do not print the report")
  .option("-v, --verbose", "Debug logging")
  .action((input: string, opts: ParseCommandOptions) => runParse(input, opts));

program
  .command("summarize")
  .description("Recompute the summary of an exported statement (.json) or transactions CSV (.csv).")
  .argument("<input>", "Exported JSON or transactions CSV")
  .action((input: string) => runSummarize(input));

program
  .command("schema")
  .description("Print the shape of the JSON export.")
  .action(() => {
    console.log(
      [
        "Statement JSON is an object with four keys; every field is always present (null when unknown):",
        "{",
        "  card: { issuer, type, last4 },",
        "  billing: { cycle_start, cycle_end, due_date, total_balance, minimum_payment,",
        "             previous_balance, new_charges, credit_limit, available_credit },",
        "  transactions: [{ date, description, amount }],",
        "  summary: { total_spent, total_credits, average, count }",
        "}",
        "- dates: YYYY-MM-DD",
        "- amounts: numbers (charges +, credits -)",
        "- last4: exactly 4 digits",
        "- summary is derived from transactions"
      ].join("\n")
    );
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  process.exitCode = reportFailure(err);
});
