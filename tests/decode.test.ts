import { describe, expect, it } from "vitest";
import { decodeResponse } from "../src/decode.js";

describe("decodeResponse", () => {
  it("decodes a bare JSON object", () => {
    const result = decodeResponse('{"card_issuer":"Chase","transactions":[]}');
    expect(result).toEqual({ kind: "decoded", value: { card_issuer: "Chase", transactions: [] } });
  });

  it("unwraps a markdown code fence", () => {
    const text = 'Here you go:\n```json\n{"card_last_4": "1234"}\n```\nLet me know!';
    expect(decodeResponse(text)).toEqual({ kind: "decoded", value: { card_last_4: "1234" } });
  });

  it("keeps backticks inside string values of a bare object", () => {
    const text = '{"card_issuer":"Chase","transactions":[{"date":"03/14/2024","description":"CODE ```X``` SHOP","amount":1}]}';
    expect(decodeResponse(text)).toEqual({
      kind: "decoded",
      value: {
        card_issuer: "Chase",
        transactions: [{ date: "03/14/2024", description: "CODE ```X``` SHOP", amount: 1 }]
      }
    });
  });

  it("falls back to the outermost braces when prose surrounds the object", () => {
    const text = 'Sure! {"total_balance": 12.5} Hope this helps.';
    expect(decodeResponse(text)).toEqual({ kind: "decoded", value: { total_balance: 12.5 } });
  });

  it("drops keys it does not know", () => {
    const result = decodeResponse('{"card_issuer":"Citi","rewards_points":1200}');
    expect(result).toEqual({ kind: "decoded", value: { card_issuer: "Citi" } });
  });

  it("reports an empty reply", () => {
    expect(decodeResponse("  \n")).toEqual({ kind: "decode-error", reason: "empty response" });
  });

  it("reports a top-level array", () => {
    expect(decodeResponse('[{"date":"01/02/2024"}]')).toEqual({
      kind: "decode-error",
      reason: "expected a JSON object, got an array"
    });
  });

  it("reports a non-object value", () => {
    expect(decodeResponse("null")).toEqual({ kind: "decode-error", reason: "expected a JSON object, got null" });
    expect(decodeResponse('"done"')).toEqual({ kind: "decode-error", reason: "expected a JSON object, got string" });
  });

  it("reports text that is not JSON", () => {
    const result = decodeResponse("I could not find a statement in this text.");
    expect(result.kind).toBe("decode-error");
    if (result.kind === "decode-error") expect(result.reason).toMatch(/^response is not valid JSON \(/);
  });
});
