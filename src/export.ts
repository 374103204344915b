import { writeJson, writeText } from "./io.js";
import {
  StatementJsonSchema,
  type DerivedSummary,
  type StatementJson,
  type StatementRecord,
  type TransactionRecord
} from "./schema.js";
import { computeSummary } from "./summary.js";

const TRANSACTIONS_CSV_HEADER = ["date", "description", "amount"];

export function toStatementJson(record: StatementRecord): StatementJson {
  const { card, billing } = record;
  const summary = computeSummary(record.transactions);

  return {
    card: { issuer: card.issuer, type: card.type, last4: card.last4 },
    billing: {
      cycle_start: billing.cycleStart,
      cycle_end: billing.cycleEnd,
      due_date: billing.dueDate,
      total_balance: billing.totalBalance,
      minimum_payment: billing.minimumPayment,
      previous_balance: billing.previousBalance,
      new_charges: billing.newCharges,
      credit_limit: billing.creditLimit,
      available_credit: billing.availableCredit
    },
    transactions: record.transactions.map((t) => ({ date: t.date, description: t.description, amount: t.amount })),
    summary: {
      total_spent: summary.totalSpent,
      total_credits: summary.totalCredits,
      average: summary.average,
      count: summary.count
    }
  };
}

/**
 * Load a previously exported statement. The stored summary is checked for
 * shape only; callers recompute it from the transactions.
 */
export function fromStatementJson(data: unknown): StatementRecord {
  const { card, billing, transactions } = StatementJsonSchema.parse(data);
  return {
    card: { issuer: card.issuer, type: card.type, last4: card.last4 },
    billing: {
      cycleStart: billing.cycle_start,
      cycleEnd: billing.cycle_end,
      dueDate: billing.due_date,
      totalBalance: billing.total_balance,
      minimumPayment: billing.minimum_payment,
      previousBalance: billing.previous_balance,
      newCharges: billing.new_charges,
      creditLimit: billing.credit_limit,
      availableCredit: billing.available_credit
    },
    transactions: transactions.map((t) => ({ date: t.date, description: t.description, amount: t.amount }))
  };
}

function csvEscape(v: string): string {
  const needsQuote = /[\n\r,"]/.test(v);
  const s = v.replace(/"/g, '""');
  return needsQuote ? `"${s}"` : s;
}

function csvLines(rows: string[][]): string {
  return rows.map((r) => r.map(csvEscape).join(",")).join("\n") + "\n";
}

export function toTransactionsCsv(transactions: TransactionRecord[]): string {
  const rows = transactions.map((t) => [t.date ?? "", t.description, String(t.amount)]);
  return csvLines([TRANSACTIONS_CSV_HEADER, ...rows]);
}

export function toSummaryCsv(summary: DerivedSummary): string {
  return csvLines([
    ["metric", "value"],
    ["total_spent", String(summary.totalSpent)],
    ["total_credits", String(summary.totalCredits)],
    ["average", String(summary.average)],
    ["count", String(summary.count)]
  ]);
}

/** `out/statement.csv` → `out/statement.summary.csv` */
export function summaryCsvPath(transactionsCsvPath: string): string {
  return transactionsCsvPath.replace(/\.csv$/i, "") + ".summary.csv";
}

export async function writeStatementJson(filePath: string, record: StatementRecord): Promise<void> {
  await writeJson(filePath, toStatementJson(record));
}

export async function writeTransactionsCsv(filePath: string, transactions: TransactionRecord[]): Promise<void> {
  await writeText(filePath, toTransactionsCsv(transactions));
}

export async function writeSummaryCsv(filePath: string, summary: DerivedSummary): Promise<void> {
  await writeText(filePath, toSummaryCsv(summary));
}
