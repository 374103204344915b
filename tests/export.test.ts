import { describe, expect, it } from "vitest";
import {
  fromStatementJson,
  summaryCsvPath,
  toStatementJson,
  toSummaryCsv,
  toTransactionsCsv
} from "../src/export.js";
import type { StatementRecord } from "../src/schema.js";
import { validateStatement } from "../src/validate.js";

const record: StatementRecord = {
  card: { issuer: "Chase", type: null, last4: "4821" },
  billing: {
    cycleStart: "2024-02-15",
    cycleEnd: "2024-03-14",
    dueDate: null,
    totalBalance: 1234.56,
    minimumPayment: 35,
    previousBalance: null,
    newCharges: 254.46,
    creditLimit: 5000,
    availableCredit: null
  },
  transactions: [
    { date: "2024-03-14", description: "COFFEE SHOP", amount: 4.75 },
    { date: null, description: 'BOOKS "USED", ETC', amount: 12 },
    { date: "2024-03-02", description: "PAYMENT - THANK YOU", amount: -980.1 }
  ]
};

describe("toStatementJson", () => {
  it("always emits every key, keeping nulls", () => {
    expect(toStatementJson(record)).toEqual({
      card: { issuer: "Chase", type: null, last4: "4821" },
      billing: {
        cycle_start: "2024-02-15",
        cycle_end: "2024-03-14",
        due_date: null,
        total_balance: 1234.56,
        minimum_payment: 35,
        previous_balance: null,
        new_charges: 254.46,
        credit_limit: 5000,
        available_credit: null
      },
      transactions: [
        { date: "2024-03-14", description: "COFFEE SHOP", amount: 4.75 },
        { date: null, description: 'BOOKS "USED", ETC', amount: 12 },
        { date: "2024-03-02", description: "PAYMENT - THANK YOU", amount: -980.1 }
      ],
      summary: { total_spent: 16.75, total_credits: 980.1, average: 8.38, count: 3 }
    });
  });

  it("survives a JSON round trip", () => {
    const text = JSON.stringify(toStatementJson(record));
    expect(fromStatementJson(JSON.parse(text))).toEqual(record);
  });

  it("round-trips a reply with negative zero amounts", () => {
    const { record: parsed } = validateStatement({
      total_balance: -0,
      transactions: [{ date: "03/14/2024", description: "ADJUSTMENT", amount: -0.0 }]
    });
    const text = JSON.stringify(toStatementJson(parsed));
    expect(fromStatementJson(JSON.parse(text))).toEqual(parsed);
    expect(Object.is(parsed.billing.totalBalance, 0)).toBe(true);
    expect(Object.is(parsed.transactions[0].amount, 0)).toBe(true);
  });

  it("rejects a file with a malformed last-4 value", () => {
    const json = toStatementJson(record);
    expect(() => fromStatementJson({ ...json, card: { ...json.card, last4: "12a3" } })).toThrow();
  });
});

describe("CSV export", () => {
  it("writes one row per transaction with quoting and empty cells for nulls", () => {
    expect(toTransactionsCsv(record.transactions)).toBe(
      [
        "date,description,amount",
        "2024-03-14,COFFEE SHOP,4.75",
        ',"BOOKS ""USED"", ETC",12',
        "2024-03-02,PAYMENT - THANK YOU,-980.1",
        ""
      ].join("\n")
    );
  });

  it("writes only the header for no transactions", () => {
    expect(toTransactionsCsv([])).toBe("date,description,amount\n");
  });

  it("writes the summary as metric/value rows", () => {
    expect(toSummaryCsv({ totalSpent: 16.75, totalCredits: 980.1, average: 8.38, count: 3 })).toBe(
      "metric,value\ntotal_spent,16.75\ntotal_credits,980.1\naverage,8.38\ncount,3\n"
    );
  });

  it("places the summary file next to the transactions file", () => {
    expect(summaryCsvPath("out/march.csv")).toBe("out/march.summary.csv");
    expect(summaryCsvPath("out/march")).toBe("out/march.summary.csv");
  });
});
