import { ConfigurationInvalid, DocumentUnreadable } from "./errors.js";

export const DEFAULT_MAX_CHARS = 100_000;

const SYSTEM = `You are a careful credit card statement extraction tool.
Return ONLY one valid JSON object (no markdown, no commentary) with exactly the requested fields.
Use null for any field that is not present in the statement.
Amounts: plain numbers without currency symbols or thousands separators. Charges are positive; payments, refunds and other credits are negative.
Dates: MM/DD/YYYY.
Do not invent transactions that are not in the text.`;

const FIELDS = `{
  "card_issuer": "Bank or issuer name (Chase, Amex, Citi, ...)",
  "card_variant": "Card type (Platinum, Gold, Rewards, ...)",
  "card_last_4": "Last 4 digits of the card number",
  "billing_cycle_start": "MM/DD/YYYY",
  "billing_cycle_end": "MM/DD/YYYY",
  "payment_due_date": "MM/DD/YYYY",
  "total_balance": "Total amount due (number)",
  "minimum_payment": "Minimum payment due (number)",
  "previous_balance": "Previous balance (number)",
  "new_charges": "New charges this cycle (number)",
  "credit_limit": "Credit limit (number)",
  "available_credit": "Available credit (number)",
  "transactions": [
    { "date": "MM/DD/YYYY", "description": "Merchant or transaction description", "amount": "number, negative for credits" }
  ]
}`;

const STRICT_RETRY = `IMPORTANT: your previous reply could not be parsed as JSON.
Reply with the JSON object only. The first character must be { and the last character must be }.
No code fences and no text before or after the object.`;

export type PromptMeta = {
  pageCount: number;
  /** Length of the labelled statement text before truncation. */
  originalChars: number;
  includedChars: number;
  truncated: boolean;
};

export type ExtractionPrompt = {
  system: string;
  prompt: string;
  meta: PromptMeta;
};

export function labelPages(pages: string[]): string {
  return pages.map((text, i) => `--- Page ${i + 1} ---\n${text.trim()}`).join("\n\n");
}

/**
 * Build the extraction request for one statement.
 *
 * Statement text longer than `maxChars` keeps its first `maxChars`
 * characters; `meta.truncated` tells callers the result may be incomplete.
 */
export function buildExtractionPrompt(
  pages: string[],
  opts: { maxChars?: number; strict?: boolean } = {}
): ExtractionPrompt {
  const maxChars = opts.maxChars ?? DEFAULT_MAX_CHARS;
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new ConfigurationInvalid(`maxChars must be a positive integer, got ${maxChars}`);
  }
  if (pages.every((p) => p.trim() === "")) {
    throw new DocumentUnreadable("No text to extract from");
  }

  const full = labelPages(pages);
  const truncated = full.length > maxChars;
  const text = truncated ? full.slice(0, maxChars) : full;

  const parts = [
    "Extract the card details, billing details and every transaction from the credit card statement below.",
    "",
    "Return a JSON object with these fields (null when not found):",
    FIELDS,
    ""
  ];
  if (truncated) {
    parts.push("The statement text was cut off at a size limit; extract what is present.", "");
  }
  if (opts.strict) parts.push(STRICT_RETRY, "");
  parts.push("STATEMENT_TEXT_START", text, "STATEMENT_TEXT_END");

  return {
    system: SYSTEM,
    prompt: parts.join("\n"),
    meta: { pageCount: pages.length, originalChars: full.length, includedChars: text.length, truncated }
  };
}
