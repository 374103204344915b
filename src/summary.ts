import type { BillingInfo, DerivedSummary, TransactionRecord } from "./schema.js";

function toCents(amount: number): number {
  return Math.round(amount * 100);
}

/**
 * Aggregates over the transaction list. Sums are taken in whole cents so
 * repeated runs give identical results regardless of float noise.
 */
export function computeSummary(transactions: TransactionRecord[]): DerivedSummary {
  let spentCents = 0;
  let creditCents = 0;
  let charges = 0;

  for (const tx of transactions) {
    if (tx.amount > 0) {
      spentCents += toCents(tx.amount);
      charges++;
    } else if (tx.amount < 0) {
      creditCents -= toCents(tx.amount);
    }
  }

  return {
    totalSpent: spentCents / 100,
    totalCredits: creditCents / 100,
    average: charges === 0 ? 0 : Math.round(spentCents / charges) / 100,
    count: transactions.length
  };
}

/** Percentage of the credit limit in use, or null when either figure is unknown. */
export function creditUtilization(billing: BillingInfo): number | null {
  const { creditLimit, availableCredit } = billing;
  if (creditLimit === null || availableCredit === null || creditLimit <= 0) return null;
  return ((creditLimit - availableCredit) / creditLimit) * 100;
}
