import path from "node:path";
import { noopSink } from "@pdftools/utils";
import { PdfjsTextSource } from "./extractors/pdf.js";
import type { ExtractOptions, ExtractionResult, PdfDocumentHandle } from "./types.js";

let defaultSource: PdfjsTextSource | null = null;

function getDefaultSource(): PdfjsTextSource {
  if (!defaultSource) {
    defaultSource = new PdfjsTextSource();
  }
  return defaultSource;
}

function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Extracts the text of the first `maxPages` pages of a PDF.
 *
 * Never rejects. Any failure comes back as `{ kind: "failed" }` and is reported
 * to the diagnostics sink; pages without text are skipped when joining.
 */
export async function extractText(
  document: string,
  maxPages: number,
  options?: ExtractOptions,
): Promise<ExtractionResult> {
  const source = options?.source ?? getDefaultSource();
  const diagnostics = options?.diagnostics ?? noopSink;
  const name = path.basename(document);

  const fail = (reason: string): ExtractionResult => {
    diagnostics({
      level: "error",
      code: "extract-failed",
      file: name,
      message: `Failed to extract from ${name}: ${reason}`,
    });
    return { kind: "failed", reason };
  };

  if (!Number.isInteger(maxPages) || maxPages < 1) {
    return fail(`max pages must be a positive integer, got ${maxPages}`);
  }

  let handle: PdfDocumentHandle | null = null;
  try {
    handle = await source.open(document);
    const pagesRead = Math.min(handle.pageCount, maxPages);
    const parts: string[] = [];
    for (let page = 1; page <= pagesRead; page++) {
      const pageText = await handle.getPageText(page);
      if (pageText) parts.push(pageText);
    }

    diagnostics({
      level: "info",
      code: "extracted",
      file: name,
      message: `Extracted ${pagesRead} page(s) from ${name}`,
      data: { pageCount: handle.pageCount, pagesRead },
    });
    return { kind: "text", text: parts.join("\n"), pageCount: handle.pageCount, pagesRead };
  } catch (err) {
    return fail(describeError(err));
  } finally {
    if (handle) {
      await handle.close().catch((err: unknown) => {
        diagnostics({
          level: "debug",
          code: "extract-failed",
          file: name,
          message: `Failed to release ${name}: ${describeError(err)}`,
        });
      });
    }
  }
}

/** The text of a result, or "" when extraction failed. */
export function extractedText(result: ExtractionResult): string {
  return result.kind === "text" ? result.text : "";
}
