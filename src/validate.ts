import { coerceAmount, coerceDate, coerceLast4, coerceText, type Coerced } from "./clean.js";
import {
  RawTransactionSchema,
  type BillingInfo,
  type CardInfo,
  type RawStatement,
  type StatementRecord,
  type TransactionRecord
} from "./schema.js";

export type ValidationIssueKind = "coerced" | "defaulted" | "invalid" | "dropped" | "missing";

/** One field-level finding. Never fatal; shown to the user alongside the results. */
export type ValidationIssue = {
  field: string;
  kind: ValidationIssueKind;
  message: string;
  /** Raw value as returned by the model, when there was one. */
  value?: unknown;
};

export type ValidationReport = ValidationIssue[];

export type ValidatedStatement = {
  record: StatementRecord;
  report: ValidationReport;
};

/** Issues worth showing to a user (coercions are routine). */
export function warningsOf(report: ValidationReport): ValidationIssue[] {
  return report.filter((i) => i.kind !== "coerced");
}

type FieldRule<T> = {
  field: string;
  label: string;
  coerce: (v: unknown) => Coerced<T>;
  /** Message used when the field is absent. */
  missing?: string;
  check?: (value: T) => string | null;
};

function take<T>(report: ValidationReport, raw: unknown, rule: FieldRule<T>): T | null {
  const result = rule.coerce(raw);

  if (result.status === "missing") {
    report.push({ field: rule.field, kind: "defaulted", message: rule.missing ?? `${rule.label} not found` });
    return null;
  }
  if (result.status === "invalid") {
    report.push({ field: rule.field, kind: "invalid", message: `${rule.label}: ${result.reason}`, value: raw });
    return null;
  }

  const problem = rule.check?.(result.value) ?? null;
  if (problem) {
    report.push({ field: rule.field, kind: "invalid", message: `${rule.label}: ${problem}`, value: raw });
    return null;
  }
  if (result.coerced) {
    report.push({ field: rule.field, kind: "coerced", message: `${rule.label} normalized`, value: raw });
  }
  return result.value;
}

const nonNegative = (n: number) => (n < 0 ? "must not be negative" : null);

function validateCard(raw: RawStatement, report: ValidationReport): CardInfo {
  return {
    issuer: take(report, raw.card_issuer, {
      field: "card_issuer",
      label: "Card issuer",
      coerce: coerceText,
      missing: "Could not identify card issuer"
    }),
    type: take(report, raw.card_variant, { field: "card_variant", label: "Card type", coerce: coerceText }),
    last4: take(report, raw.card_last_4, { field: "card_last_4", label: "Card last 4 digits", coerce: coerceLast4 })
  };
}

function validateBilling(raw: RawStatement, report: ValidationReport): BillingInfo {
  const date = (field: string, label: string): FieldRule<string> => ({ field, label, coerce: coerceDate });
  const money = (field: string, label: string, opts?: Pick<FieldRule<number>, "missing" | "check">): FieldRule<number> => ({
    field,
    label,
    coerce: coerceAmount,
    ...opts
  });

  return {
    cycleStart: take(report, raw.billing_cycle_start, date("billing_cycle_start", "Billing cycle start")),
    cycleEnd: take(report, raw.billing_cycle_end, date("billing_cycle_end", "Billing cycle end")),
    dueDate: take(report, raw.payment_due_date, date("payment_due_date", "Payment due date")),
    totalBalance: take(
      report,
      raw.total_balance,
      money("total_balance", "Total balance", { missing: "Could not find total balance" })
    ),
    minimumPayment: take(
      report,
      raw.minimum_payment,
      money("minimum_payment", "Minimum payment", { check: nonNegative })
    ),
    previousBalance: take(report, raw.previous_balance, money("previous_balance", "Previous balance")),
    newCharges: take(report, raw.new_charges, money("new_charges", "New charges", { check: nonNegative })),
    creditLimit: take(report, raw.credit_limit, money("credit_limit", "Credit limit", { check: nonNegative })),
    availableCredit: take(
      report,
      raw.available_credit,
      money("available_credit", "Available credit", { check: nonNegative })
    )
  };
}

/**
 * Coerce a list of loosely-typed transaction rows.
 *
 * Rows without a description or a usable amount are dropped; a date that
 * cannot be coerced is kept as null and flagged.
 */
export function validateTransactions(items: unknown, report: ValidationReport): TransactionRecord[] {
  if (items === undefined || items === null) {
    report.push({ field: "transactions", kind: "missing", message: "No transactions list in the response" });
    return [];
  }
  if (!Array.isArray(items)) {
    report.push({
      field: "transactions",
      kind: "missing",
      message: "Transactions were not returned as a list",
      value: items
    });
    return [];
  }

  const out: TransactionRecord[] = [];

  items.forEach((item: unknown, i) => {
    const at = `transactions[${i}]`;
    const parsed = RawTransactionSchema.safeParse(item);
    if (!parsed.success) {
      report.push({ field: at, kind: "dropped", message: `${at}: not an object`, value: item });
      return;
    }
    const row = parsed.data;

    const description = coerceText(row.description);
    if (description.status !== "ok") {
      report.push({ field: at, kind: "dropped", message: `${at}: missing description`, value: item });
      return;
    }

    const amount = coerceAmount(row.amount);
    if (amount.status !== "ok") {
      const why = amount.status === "missing" ? "missing amount" : amount.reason;
      report.push({ field: at, kind: "dropped", message: `${at}: ${why}`, value: item });
      return;
    }
    if (amount.coerced) {
      report.push({ field: `${at}.amount`, kind: "coerced", message: `${at} amount normalized`, value: row.amount });
    }

    const date = coerceDate(row.date);
    let isoDate: string | null = null;
    if (date.status === "ok") {
      isoDate = date.value;
      if (date.coerced) {
        report.push({ field: `${at}.date`, kind: "coerced", message: `${at} date normalized`, value: row.date });
      }
    } else {
      const why = date.status === "missing" ? "date missing" : date.reason;
      report.push({ field: `${at}.date`, kind: "invalid", message: `${at}: ${why}`, value: row.date });
    }

    out.push({ date: isoDate, description: description.value, amount: amount.value });
  });

  return out;
}

/**
 * Turn a decoded model response into a typed statement record plus a report
 * of every field that was normalized, defaulted, rejected or dropped.
 * Pure: the same input always yields the same record and report.
 */
export function validateStatement(raw: RawStatement): ValidatedStatement {
  const report: ValidationReport = [];
  const card = validateCard(raw, report);
  const billing = validateBilling(raw, report);
  const transactions = validateTransactions(raw.transactions, report);
  return { record: { card, billing, transactions }, report };
}
