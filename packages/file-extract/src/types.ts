import type { DiagnosticsSink } from "@pdftools/utils";

export type ExtractionResult =
  | { kind: "text"; text: string; pageCount: number; pagesRead: number }
  | { kind: "failed"; reason: string };

export interface PdfDocumentHandle {
  readonly pageCount: number;
  /** Plain text of a 1-based page; empty for pages without a text layer. */
  getPageText(pageNumber: number): Promise<string>;
  close(): Promise<void>;
}

export interface PdfTextSource {
  open(path: string): Promise<PdfDocumentHandle>;
}

export interface ExtractOptions {
  source?: PdfTextSource;
  diagnostics?: DiagnosticsSink;
}
