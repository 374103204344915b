import fs from "node:fs/promises";
import path from "node:path";
import { ZodError } from "zod";
import { InputInvalid } from "./errors.js";
import { fromStatementJson } from "./export.js";
import { readRowsFromCsv } from "./io.js";
import type { DerivedSummary, TransactionRecord } from "./schema.js";
import { computeSummary } from "./summary.js";
import { validateTransactions, type ValidationReport } from "./validate.js";

export type LoadedTransactions = {
  transactions: TransactionRecord[];
  summary: DerivedSummary;
  report: ValidationReport;
};

function explain(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
  }
  return err instanceof Error ? err.message : String(err);
}

async function readInput(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new InputInvalid(`Cannot read ${filePath}: ${explain(err)}`, { cause: err });
  }
}

export async function readStatementJsonFile(filePath: string): Promise<LoadedTransactions> {
  const raw = await readInput(filePath);
  let transactions: TransactionRecord[];
  try {
    const data: unknown = JSON.parse(raw);
    ({ transactions } = fromStatementJson(data));
  } catch (err) {
    throw new InputInvalid(`${path.basename(filePath)} is not a statement export: ${explain(err)}`, { cause: err });
  }
  return { transactions, summary: computeSummary(transactions), report: [] };
}

/**
 * Read a `date,description,amount` CSV (such as an exported, hand-edited
 * one) through the same coercion rules as model output.
 */
export async function readTransactionsCsvFile(filePath: string): Promise<LoadedTransactions> {
  let rows: Record<string, string>[];
  try {
    rows = await readRowsFromCsv(filePath);
  } catch (err) {
    throw new InputInvalid(`${path.basename(filePath)} is not a readable CSV: ${explain(err)}`, { cause: err });
  }
  const report: ValidationReport = [];
  const transactions = validateTransactions(rows, report);
  return { transactions, summary: computeSummary(transactions), report };
}

export async function readTransactionsFile(filePath: string): Promise<LoadedTransactions> {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".json") return readStatementJsonFile(filePath);
  if (ext === ".csv") return readTransactionsCsvFile(filePath);
  throw new InputInvalid(`Unsupported file type '${ext || filePath}': expected .json or .csv`);
}
