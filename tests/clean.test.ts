import { describe, expect, it } from "vitest";
import { coerceAmount, coerceDate, coerceLast4, coerceText } from "../src/clean.js";

describe("coerceAmount", () => {
  it("passes finite numbers through unchanged", () => {
    expect(coerceAmount(4.75)).toEqual({ status: "ok", value: 4.75, coerced: false });
    expect(coerceAmount(-20)).toEqual({ status: "ok", value: -20, coerced: false });
  });

  it("normalizes negative zero", () => {
    const result = coerceAmount(-0);
    expect(result).toEqual({ status: "ok", value: 0, coerced: false });
    expect(result.status === "ok" && Object.is(result.value, -0)).toBe(false);
  });

  it("strips currency symbols and thousands separators", () => {
    expect(coerceAmount("$1,234.50")).toEqual({ status: "ok", value: 1234.5, coerced: true });
    expect(coerceAmount(" USD 89.99 ")).toEqual({ status: "ok", value: 89.99, coerced: true });
    expect(coerceAmount("€12")).toEqual({ status: "ok", value: 12, coerced: true });
  });

  it("reads negative markers", () => {
    expect(coerceAmount("($25.00)")).toEqual({ status: "ok", value: -25, coerced: true });
    expect(coerceAmount("-$4.00")).toEqual({ status: "ok", value: -4, coerced: true });
    expect(coerceAmount("30.10-")).toEqual({ status: "ok", value: -30.1, coerced: true });
    expect(coerceAmount("15.00 CR")).toEqual({ status: "ok", value: -15, coerced: true });
  });

  it("treats null-ish values as missing", () => {
    expect(coerceAmount(null)).toEqual({ status: "missing" });
    expect(coerceAmount(undefined)).toEqual({ status: "missing" });
    expect(coerceAmount("N/A")).toEqual({ status: "missing" });
    expect(coerceAmount("  ")).toEqual({ status: "missing" });
  });

  it("rejects non-numeric residue", () => {
    expect(coerceAmount("12.3.4")).toEqual({ status: "invalid", reason: 'non-numeric amount "12.3.4"' });
    expect(coerceAmount("about 5")).toEqual({ status: "invalid", reason: 'non-numeric amount "about 5"' });
    expect(coerceAmount(Number.NaN)).toEqual({ status: "invalid", reason: "amount is not a finite number" });
    expect(coerceAmount(true)).toEqual({ status: "invalid", reason: "expected an amount, got boolean" });
  });
});

describe("coerceDate", () => {
  it("keeps ISO dates as they are", () => {
    expect(coerceDate("2024-03-14")).toEqual({ status: "ok", value: "2024-03-14", coerced: false });
  });

  it("reads US month/day/year", () => {
    expect(coerceDate("03/14/2024")).toEqual({ status: "ok", value: "2024-03-14", coerced: true });
    expect(coerceDate("4/5/2024")).toEqual({ status: "ok", value: "2024-04-05", coerced: true });
    expect(coerceDate("12-01-2023")).toEqual({ status: "ok", value: "2023-12-01", coerced: true });
  });

  it("falls back to day/month/year when the first part cannot be a month", () => {
    expect(coerceDate("25/12/2023")).toEqual({ status: "ok", value: "2023-12-25", coerced: true });
  });

  it("reads month names", () => {
    expect(coerceDate("March 14, 2024")).toEqual({ status: "ok", value: "2024-03-14", coerced: true });
    expect(coerceDate("Sep 3, 2024")).toEqual({ status: "ok", value: "2024-09-03", coerced: true });
    expect(coerceDate("Sept. 3 2024")).toEqual({ status: "ok", value: "2024-09-03", coerced: true });
    expect(coerceDate("14-Mar-2024")).toEqual({ status: "ok", value: "2024-03-14", coerced: true });
    expect(coerceDate("7 January 2025")).toEqual({ status: "ok", value: "2025-01-07", coerced: true });
    expect(coerceDate("2024/02/29")).toEqual({ status: "ok", value: "2024-02-29", coerced: true });
  });

  it("rejects impossible or unrecognized dates", () => {
    expect(coerceDate("02/30/2024")).toEqual({ status: "invalid", reason: 'unrecognized date "02/30/2024"' });
    expect(coerceDate("2023-02-29")).toEqual({ status: "invalid", reason: 'unrecognized date "2023-02-29"' });
    expect(coerceDate("13/13/2024")).toEqual({ status: "invalid", reason: 'unrecognized date "13/13/2024"' });
    expect(coerceDate("Ma 3, 2024")).toEqual({ status: "invalid", reason: 'unrecognized date "Ma 3, 2024"' });
    expect(coerceDate("last Tuesday")).toEqual({ status: "invalid", reason: 'unrecognized date "last Tuesday"' });
    expect(coerceDate(20240314)).toEqual({ status: "invalid", reason: "expected a date, got number" });
  });

  it("treats null as missing", () => {
    expect(coerceDate(null)).toEqual({ status: "missing" });
  });
});

describe("coerceLast4", () => {
  it("accepts exactly four digits", () => {
    expect(coerceLast4("1234")).toEqual({ status: "ok", value: "1234", coerced: false });
    expect(coerceLast4(4821)).toEqual({ status: "ok", value: "4821", coerced: true });
  });

  it("unmasks masked card numbers", () => {
    expect(coerceLast4("**** 5678")).toEqual({ status: "ok", value: "5678", coerced: true });
    expect(coerceLast4("XXXX-XXXX-XXXX-9012")).toEqual({ status: "ok", value: "9012", coerced: true });
  });

  it("rejects anything else", () => {
    expect(coerceLast4("12a3")).toEqual({
      status: "invalid",
      reason: 'expected exactly 4 digits, got "12a3"'
    });
    expect(coerceLast4("12345").status).toBe("invalid");
    expect(coerceLast4("123").status).toBe("invalid");
    expect(coerceLast4(123)).toEqual({
      status: "invalid",
      reason: "expected exactly 4 digits, got number"
    });
    expect(coerceLast4({ digits: "1234" })).toEqual({ status: "invalid", reason: "expected exactly 4 digits, got object" });
  });
});

describe("coerceText", () => {
  it("collapses whitespace", () => {
    expect(coerceText("  COFFEE   SHOP ")).toEqual({ status: "ok", value: "COFFEE SHOP", coerced: true });
    expect(coerceText("Chase")).toEqual({ status: "ok", value: "Chase", coerced: false });
  });

  it("treats the literal string null as missing", () => {
    expect(coerceText("null")).toEqual({ status: "missing" });
  });
});
