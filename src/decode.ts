import { type RawStatement, RawStatementSchema } from "./schema.js";

export type DecodeResult =
  | { kind: "decoded"; value: RawStatement }
  | { kind: "decode-error"; reason: string };

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Decode the model's reply into the raw statement shape.
 *
 * Accepts a bare JSON object, one wrapped in a markdown code fence, or one
 * surrounded by stray prose (the outermost `{...}` span is tried).
 */
export function decodeResponse(text: string): DecodeResult {
  let body = text.trim();
  if (!body) return { kind: "decode-error", reason: "empty response" };

  let parsed = tryParse(body);
  if (!parsed.ok) {
    const fenced = body.match(/```(?:json)?\s*([\s\S]*?)```/i);
    if (fenced) {
      body = fenced[1].trim();
      parsed = tryParse(body);
    }
  }
  if (!parsed.ok) {
    const start = body.indexOf("{");
    const end = body.lastIndexOf("}");
    if (start !== -1 && end > start) {
      const span = tryParse(body.slice(start, end + 1));
      if (span.ok) parsed = span;
    }
  }
  if (!parsed.ok) return { kind: "decode-error", reason: `response is not valid JSON (${parsed.error})` };

  const data = parsed.value;
  if (Array.isArray(data)) return { kind: "decode-error", reason: "expected a JSON object, got an array" };

  const result = RawStatementSchema.safeParse(data);
  if (!result.success) {
    return { kind: "decode-error", reason: `expected a JSON object, got ${data === null ? "null" : typeof data}` };
  }
  return { kind: "decoded", value: result.data };
}
