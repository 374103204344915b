export type StatementLensErrorKind =
  | "document-unreadable"
  | "configuration-missing"
  | "configuration-invalid"
  | "extraction-failed"
  | "input-invalid";

/**
 * Document-level failure. Aborts the pipeline for the current document and is
 * shown to the user as a banner (see `describeError`).
 */
export class StatementLensError extends Error {
  readonly kind: StatementLensErrorKind;
  /** Short suggestion for the user, printed under the banner. */
  readonly hint?: string;

  constructor(kind: StatementLensErrorKind, message: string, opts?: { hint?: string; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = new.target.name;
    this.kind = kind;
    this.hint = opts?.hint;
  }
}

/** Encrypted, corrupt, or text-less PDF. Never retried. */
export class DocumentUnreadable extends StatementLensError {
  constructor(message: string, opts?: { cause?: unknown }) {
    super("document-unreadable", message, {
      hint: "Check that the file is a text-based PDF that is not password-protected.",
      cause: opts?.cause
    });
  }
}

/** API key absent, or rejected by the model API. */
export class ConfigurationMissing extends StatementLensError {
  constructor(message: string, opts?: { cause?: unknown }) {
    super("configuration-missing", message, {
      hint: "Set GEMINI_API_KEY (or pass --api-key) to a valid Gemini API key.",
      cause: opts?.cause
    });
  }
}

export class ConfigurationInvalid extends StatementLensError {
  constructor(message: string) {
    super("configuration-invalid", message);
  }
}

/** The model returned nothing decodable after the strict retry, or the request failed. */
export class ExtractionFailed extends StatementLensError {
  constructor(message: string, opts?: { cause?: unknown }) {
    super("extraction-failed", message, {
      hint: "Try again, or try a different statement file.",
      cause: opts?.cause
    });
  }
}

/** An exported JSON or CSV file given to `summarize` that cannot be read back. */
export class InputInvalid extends StatementLensError {
  constructor(message: string, opts?: { cause?: unknown }) {
    super("input-invalid", message, {
      hint: "Pass a file written by `statement-lens parse --json` or `--csv`.",
      cause: opts?.cause
    });
  }
}

const BANNERS: Record<StatementLensErrorKind, string> = {
  "document-unreadable": "Document unreadable",
  "configuration-missing": "API key missing or invalid",
  "configuration-invalid": "Invalid configuration",
  "extraction-failed": "Extraction failed: no structured data returned",
  "input-invalid": "Input file not usable"
};

export function describeError(err: unknown): { banner: string; detail: string; hint?: string } {
  if (err instanceof StatementLensError) {
    return { banner: BANNERS[err.kind], detail: err.message, hint: err.hint };
  }
  if (err instanceof Error) return { banner: "Unexpected error", detail: err.stack ?? err.message };
  return { banner: "Unexpected error", detail: String(err) };
}
