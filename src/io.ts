import fs from "node:fs/promises";
import path from "node:path";
import pdf, { type PdfPageData } from "pdf-parse/lib/pdf-parse.js";
import { parse as parseCsv } from "csv-parse/sync";
import { DocumentUnreadable } from "./errors.js";

/**
 * Read a file and hand its bytes to `fn`. The buffer is zero-filled once
 * `fn` settles, whether it resolved or threw.
 */
export async function withDocumentBytes<T>(filePath: string, fn: (bytes: Buffer) => Promise<T>): Promise<T> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new DocumentUnreadable(`Cannot read ${filePath}: ${detail}`, { cause: err });
  }

  try {
    return await fn(bytes);
  } finally {
    bytes.fill(0);
  }
}

async function renderPage(page: PdfPageData, sink: string[]): Promise<string> {
  const content = await page.getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false });

  let text = "";
  let lastY: number | undefined;
  for (const item of content.items) {
    const y = item.transform[5];
    if (lastY === undefined) text = item.str;
    else if (y === lastY) text += text.endsWith(" ") || item.str.startsWith(" ") ? item.str : " " + item.str;
    else text += "\n" + item.str;
    lastY = y;
  }

  sink[page.pageIndex] = text;
  return text;
}

function isPasswordError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "name" in err && err.name === "PasswordException";
}

/** Per-page text of a PDF, in page order. */
export async function extractPdfPages(bytes: Buffer): Promise<string[]> {
  if (!bytes.subarray(0, 1024).includes("%PDF-")) {
    throw new DocumentUnreadable("File is not a PDF document");
  }

  const pages: string[] = [];
  const result = await pdf(bytes, { pagerender: (page) => renderPage(page, pages) }).catch((err: unknown) => {
    if (isPasswordError(err)) {
      throw new DocumentUnreadable("PDF is password-protected", { cause: err });
    }
    const detail = err instanceof Error ? err.message : String(err);
    throw new DocumentUnreadable(`PDF could not be parsed: ${detail}`, { cause: err });
  });

  const out = Array.from({ length: result.numpages }, (_, i) => pages[i] ?? "");
  if (out.every((p) => p.trim() === "")) {
    throw new DocumentUnreadable("PDF contains no extractable text (scanned image?); OCR is not supported");
  }
  return out;
}

export type PdfText = {
  pages: string[];
  byteLength: number;
};

export async function readPdfDocument(filePath: string): Promise<PdfText> {
  return withDocumentBytes(filePath, async (bytes) => ({
    pages: await extractPdfPages(bytes),
    byteLength: bytes.length
  }));
}

export async function readRowsFromCsv(filePath: string): Promise<Record<string, string>[]> {
  const raw = await fs.readFile(filePath, "utf8");
  const rows: Record<string, string>[] = parseCsv(raw, {
    columns: true,
    skip_empty_lines: true,
    bom: true,
    relax_column_count: true,
    trim: true
  });
  return rows;
}

export async function ensureDirForFile(filePath: string) {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
}

export async function writeText(filePath: string, text: string) {
  await ensureDirForFile(filePath);
  await fs.writeFile(filePath, text, "utf8");
}

export async function writeJson(filePath: string, data: unknown) {
  await writeText(filePath, JSON.stringify(data, null, 2) + "\n");
}
