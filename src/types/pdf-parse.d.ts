// pdf-parse's package entry runs a debug self-test when loaded from ESM, so
// io.ts imports the library file directly. No published types cover that path.
declare module "pdf-parse/lib/pdf-parse.js" {
  export interface PdfTextItem {
    str: string;
    transform: number[];
  }

  export interface PdfPageData {
    pageIndex: number;
    getTextContent(options?: {
      normalizeWhitespace?: boolean;
      disableCombineTextItems?: boolean;
    }): Promise<{ items: PdfTextItem[] }>;
  }

  export interface PdfParseOptions {
    pagerender?: (pageData: PdfPageData) => Promise<string>;
    max?: number;
  }

  export interface PdfParseResult {
    numpages: number;
    numrender: number;
    text: string;
  }

  export default function pdf(data: Buffer | Uint8Array, options?: PdfParseOptions): Promise<PdfParseResult>;
}
