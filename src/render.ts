import chalk, { type ChalkInstance } from "chalk";
import type { DocumentInfo } from "./pipeline.js";
import type { PromptMeta } from "./prompt.js";
import type { DerivedSummary, StatementRecord, TransactionRecord } from "./schema.js";
import { creditUtilization } from "./summary.js";
import { warningsOf, type ValidationReport } from "./validate.js";

const NA = "N/A";
const LABEL_WIDTH = 20;
const DESCRIPTION_WIDTH = 40;

const usd = new Intl.NumberFormat("en-US", { style: "currency", currency: "USD" });

export function formatMoney(amount: number | null): string {
  return amount === null ? NA : usd.format(amount);
}

export function formatKilobytes(bytes: number): string {
  return `${(bytes / 1024).toFixed(1)} KB`;
}

export function maskCard(last4: string | null): string {
  return last4 === null ? NA : `**** ${last4}`;
}

function row(label: string, value: string): string {
  return `  ${(label + ":").padEnd(LABEL_WIDTH)}${value}`;
}

function fit(text: string, width: number): string {
  return text.length > width ? text.slice(0, width - 1) + "…" : text.padEnd(width);
}

function transactionTable(transactions: TransactionRecord[], c: ChalkInstance): string[] {
  const amounts = transactions.map((t) => formatMoney(t.amount));
  const amountWidth = Math.max(6, ...amounts.map((a) => a.length));

  const lines = [c.gray(`  ${"Date".padEnd(10)}  ${"Description".padEnd(DESCRIPTION_WIDTH)}  ${"Amount".padStart(amountWidth)}`)];
  transactions.forEach((t, i) => {
    const amount = amounts[i].padStart(amountWidth);
    lines.push(
      `  ${(t.date ?? "??").padEnd(10)}  ${fit(t.description, DESCRIPTION_WIDTH)}  ${t.amount < 0 ? c.green(amount) : amount}`
    );
  });
  return lines;
}

export type RenderInput = {
  record: StatementRecord;
  summary: DerivedSummary;
  report: ValidationReport;
  meta?: PromptMeta;
  document?: DocumentInfo;
};

/** Human-readable terminal report, one string per line. */
export function renderStatement(input: RenderInput, opts: { chalk?: ChalkInstance } = {}): string[] {
  const c = opts.chalk ?? chalk;
  const { card, billing, transactions } = input.record;
  const heading = (title: string) => ["", c.bold.underline(title)];

  const lines: string[] = [c.green("Statement parsed successfully")];

  if (input.meta?.truncated) {
    lines.push(
      c.yellow(
        `Note: only the first ${input.meta.includedChars} of ${input.meta.originalChars} characters were analyzed; results may be incomplete.`
      )
    );
  }

  if (input.document) {
    const { fileName, byteLength, pageCount } = input.document;
    lines.push(
      ...heading("Document"),
      row("File name", fileName),
      row("File size", formatKilobytes(byteLength)),
      row("Pages", String(pageCount))
    );
  }

  lines.push(
    ...heading("Card Information"),
    row("Card issuer", card.issuer ?? "Unknown"),
    row("Card type", card.type ?? "Unknown"),
    row("Card number", maskCard(card.last4))
  );

  lines.push(
    ...heading("Billing Summary"),
    row("Total balance", formatMoney(billing.totalBalance)),
    row("Minimum payment", formatMoney(billing.minimumPayment)),
    row("Payment due", billing.dueDate ?? NA),
    row("New charges", formatMoney(billing.newCharges)),
    row("Previous balance", formatMoney(billing.previousBalance))
  );

  const utilization = creditUtilization(billing);
  if (billing.creditLimit !== null || billing.availableCredit !== null) {
    lines.push(
      ...heading("Credit"),
      row("Credit limit", formatMoney(billing.creditLimit)),
      row("Available credit", formatMoney(billing.availableCredit))
    );
    if (utilization !== null) lines.push(row("Credit utilization", `${utilization.toFixed(1)}%`));
  }

  lines.push(
    ...heading("Billing Period"),
    row("Start date", billing.cycleStart ?? NA),
    row("End date", billing.cycleEnd ?? NA)
  );

  if (transactions.length === 0) {
    lines.push("", c.yellow("No transactions found in the statement"));
  } else {
    lines.push(...heading(`Transactions (${transactions.length} found)`), ...transactionTable(transactions, c));
    const { summary } = input;
    lines.push(
      "",
      row("Total spent", formatMoney(summary.totalSpent)),
      row("Total credits", formatMoney(summary.totalCredits)),
      row("Avg transaction", summary.average === 0 ? NA : formatMoney(summary.average))
    );
  }

  const warnings = warningsOf(input.report);
  if (warnings.length > 0) {
    lines.push(...heading(`Warnings (${warnings.length})`));
    for (const w of warnings) lines.push(c.yellow(`  - ${w.message}`));
  }

  return lines;
}

/** Summary block for files loaded back from an export. */
export function renderSummary(summary: DerivedSummary, opts: { chalk?: ChalkInstance } = {}): string[] {
  const c = opts.chalk ?? chalk;
  return [
    c.bold.underline("Summary"),
    row("Transactions", String(summary.count)),
    row("Total spent", formatMoney(summary.totalSpent)),
    row("Total credits", formatMoney(summary.totalCredits)),
    row("Avg transaction", formatMoney(summary.average))
  ];
}
