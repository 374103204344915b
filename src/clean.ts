/**
 * Field coercion for values returned by the model.
 *
 * Every coercer takes an untrusted value and returns one of three outcomes:
 * a typed value (flagged `coerced` when its form changed), `missing`, or
 * `invalid` with a reason. None of them throw.
 */

export type Coerced<T> =
  | { status: "ok"; value: T; coerced: boolean }
  | { status: "missing" }
  | { status: "invalid"; reason: string };

const MISSING_TOKENS = new Set(["", "null", "none", "n/a", "na", "undefined"]);

function isMissing(v: unknown): boolean {
  if (v === null || v === undefined) return true;
  return typeof v === "string" && MISSING_TOKENS.has(v.trim().toLowerCase());
}

function describe(v: unknown): string {
  return typeof v === "string" ? JSON.stringify(v) : typeof v;
}

/** Free-text field (issuer, card variant, description). */
export function coerceText(v: unknown): Coerced<string> {
  if (isMissing(v)) return { status: "missing" };
  if (typeof v === "number" && Number.isFinite(v)) return { status: "ok", value: String(v), coerced: true };
  if (typeof v !== "string") return { status: "invalid", reason: `expected text, got ${describe(v)}` };

  const value = v.replace(/\s+/g, " ").trim();
  return { status: "ok", value, coerced: value !== v };
}

/**
 * Currency amount. Commas are thousands separators (US format).
 * Negative markers: `(12.00)`, `-12.00`, `12.00-`, `12.00 CR`.
 */
export function coerceAmount(v: unknown): Coerced<number> {
  if (isMissing(v)) return { status: "missing" };
  if (typeof v === "number") {
    return Number.isFinite(v)
      ? { status: "ok", value: v === 0 ? 0 : v, coerced: false }
      : { status: "invalid", reason: "amount is not a finite number" };
  }
  if (typeof v !== "string") return { status: "invalid", reason: `expected an amount, got ${describe(v)}` };

  let s = v.trim();
  let negative = false;

  const paren = s.match(/^\((.*)\)$/);
  if (paren) {
    negative = true;
    s = paren[1];
  }
  if (/\s*CR$/i.test(s)) {
    negative = true;
    s = s.replace(/\s*CR$/i, "");
  }

  s = s
    .replace(/\b(?:USD|EUR|GBP|INR|CAD|AUD|JPY|CHF)\b/gi, "")
    .replace(/(?:US\$|C\$|A\$|Rs\.?)/g, "")
    .replace(/[$€£¥₹,\s]/g, "");

  if (s.startsWith("-")) {
    negative = true;
    s = s.slice(1);
  } else if (s.endsWith("-")) {
    negative = true;
    s = s.slice(0, -1);
  } else if (s.startsWith("+")) {
    s = s.slice(1);
  }

  if (!/^(?:\d+(?:\.\d+)?|\.\d+)$/.test(s)) {
    return { status: "invalid", reason: `non-numeric amount ${describe(v)}` };
  }

  const n = Number(s);
  // Avoid -0 for "-0.00".
  const value = negative && n !== 0 ? -n : n;
  return { status: "ok", value, coerced: true };
}

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december"
];

function monthFromName(name: string): number | null {
  const lower = name.toLowerCase();
  if (lower.length < 3) return null;
  const idx = MONTHS.findIndex((m) => m.startsWith(lower));
  return idx === -1 ? null : idx + 1;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

/**
 * Calendar date → YYYY-MM-DD.
 *
 * Numeric day/month forms are read as MM/DD/YYYY (the format the prompt asks
 * for) and as DD/MM/YYYY only when the first part cannot be a month.
 */
export function coerceDate(v: unknown): Coerced<string> {
  if (isMissing(v)) return { status: "missing" };
  if (typeof v !== "string") return { status: "invalid", reason: `expected a date, got ${describe(v)}` };

  const s = v.trim();
  let iso: string | null = null;

  let m = s.match(/^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})$/);
  if (m) {
    iso = toIsoDate(Number(m[1]), Number(m[2]), Number(m[3]));
  } else if ((m = s.match(/^(\d{1,2})[/-](\d{1,2})[/-](\d{4})$/))) {
    const a = Number(m[1]);
    const b = Number(m[2]);
    const year = Number(m[3]);
    iso = a <= 12 ? toIsoDate(year, a, b) : toIsoDate(year, b, a);
  } else if ((m = s.match(/^([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})$/))) {
    const month = monthFromName(m[1]);
    iso = month === null ? null : toIsoDate(Number(m[3]), month, Number(m[2]));
  } else if ((m = s.match(/^(\d{1,2})[\s-]+([A-Za-z]+)\.?,?[\s-]+(\d{4})$/))) {
    const month = monthFromName(m[2]);
    iso = month === null ? null : toIsoDate(Number(m[3]), month, Number(m[1]));
  }

  if (iso === null) return { status: "invalid", reason: `unrecognized date ${describe(v)}` };
  return { status: "ok", value: iso, coerced: iso !== v };
}

/**
 * Last four card digits. Masked forms such as `**** 1234` or `XXXX-1234`
 * are accepted; anything else that is not exactly four digits is rejected.
 */
export function coerceLast4(v: unknown): Coerced<string> {
  if (isMissing(v)) return { status: "missing" };

  const s = typeof v === "number" && Number.isInteger(v) ? String(v) : v;
  if (typeof s !== "string") return { status: "invalid", reason: `expected exactly 4 digits, got ${describe(v)}` };

  const trimmed = s.trim();
  if (/^\d{4}$/.test(trimmed)) return { status: "ok", value: trimmed, coerced: trimmed !== v };

  const masked = trimmed.match(/^[\s*xX•#.-]+(\d{4})$/);
  if (masked) return { status: "ok", value: masked[1], coerced: true };

  return { status: "invalid", reason: `expected exactly 4 digits, got ${describe(v)}` };
}
