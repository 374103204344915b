import { describe, expect, it } from "vitest";
import { createLogger } from "../src/logger.js";

const strip = (s: string) => s.replace(/\u001b\[[0-9;]*m/g, "");

describe("createLogger", () => {
  it("drops messages below the configured level", () => {
    const lines: string[] = [];
    const log = createLogger({ level: "warn", write: (l) => lines.push(strip(l)) });

    log.debug("hidden");
    log.info("hidden too");
    log.warn("shown");

    expect(lines).toEqual(["warn  shown"]);
  });

  it("appends context as key=value pairs", () => {
    const lines: string[] = [];
    const log = createLogger({ level: "debug", write: (l) => lines.push(strip(l)) });

    log.debug("Extracted text", { pages: 2, file: "march statement.pdf", skipped: undefined });
    log.error("Request failed", new Error("timeout"), { attempt: 1 });

    expect(lines).toEqual([
      'debug Extracted text pages=2 file="march statement.pdf"',
      'error Request failed attempt=1 error="timeout"'
    ]);
  });
});
