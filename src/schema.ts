import { z } from "zod";

/** ISO calendar date (YYYY-MM-DD). */
const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
const Money = z.number().finite();

/**
 * Shape the model is asked to return. Every field is untrusted: values are
 * kept as `unknown` here and coerced one by one in validate.ts.
 * Keys not listed are stripped, so extra fields from the model are ignored.
 */
export const RawStatementSchema = z.object({
  card_issuer: z.unknown(),
  card_variant: z.unknown(),
  card_last_4: z.unknown(),
  billing_cycle_start: z.unknown(),
  billing_cycle_end: z.unknown(),
  payment_due_date: z.unknown(),
  total_balance: z.unknown(),
  minimum_payment: z.unknown(),
  previous_balance: z.unknown(),
  new_charges: z.unknown(),
  credit_limit: z.unknown(),
  available_credit: z.unknown(),
  transactions: z.unknown()
});

export const RawTransactionSchema = z.object({
  date: z.unknown(),
  description: z.unknown(),
  amount: z.unknown()
});

export type RawStatement = z.infer<typeof RawStatementSchema>;
export type RawTransaction = z.infer<typeof RawTransactionSchema>;

export type CardInfo = {
  issuer: string | null;
  /** Card variant / product (Platinum, Rewards, ...). */
  type: string | null;
  /** Exactly four digits, or null. */
  last4: string | null;
};

export type BillingInfo = {
  cycleStart: string | null;
  cycleEnd: string | null;
  dueDate: string | null;
  /** May be negative for a credit balance. */
  totalBalance: number | null;
  minimumPayment: number | null;
  previousBalance: number | null;
  newCharges: number | null;
  creditLimit: number | null;
  availableCredit: number | null;
};

export type TransactionRecord = {
  /** Null when the model's date could not be coerced (reported as invalid). */
  date: string | null;
  description: string;
  /** Positive = charge, negative = credit. */
  amount: number;
};

export type StatementRecord = {
  card: CardInfo;
  billing: BillingInfo;
  transactions: TransactionRecord[];
};

export type DerivedSummary = {
  totalSpent: number;
  totalCredits: number;
  average: number;
  count: number;
};

/**
 * JSON export format. All keys are always present (null when absent) so the
 * shape is the same for every statement.
 */
export const StatementJsonSchema = z.object({
  card: z.object({
    issuer: z.string().nullable(),
    type: z.string().nullable(),
    last4: z.string().regex(/^\d{4}$/).nullable()
  }),
  billing: z.object({
    cycle_start: IsoDate.nullable(),
    cycle_end: IsoDate.nullable(),
    due_date: IsoDate.nullable(),
    total_balance: Money.nullable(),
    minimum_payment: Money.nonnegative().nullable(),
    previous_balance: Money.nullable(),
    new_charges: Money.nonnegative().nullable(),
    credit_limit: Money.nonnegative().nullable(),
    available_credit: Money.nonnegative().nullable()
  }),
  transactions: z.array(
    z.object({
      date: IsoDate.nullable(),
      description: z.string().min(1),
      amount: Money
    })
  ),
  summary: z.object({
    total_spent: Money.nonnegative(),
    total_credits: Money.nonnegative(),
    average: Money.nonnegative(),
    count: z.number().int().nonnegative()
  })
});

export type StatementJson = z.infer<typeof StatementJsonSchema>;
