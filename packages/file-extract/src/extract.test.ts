import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { collectingSink } from "@pdftools/utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { extractedText, extractText } from "./extract.js";
import { PdfjsTextSource } from "./extractors/pdf.js";
import type { PdfTextSource } from "./types.js";

function pagesSource(pages: string[], failOnPage?: number) {
  const requested: number[] = [];
  const calls = { opened: 0, closed: 0, pages: requested };
  const source: PdfTextSource = {
    async open() {
      calls.opened++;
      return {
        pageCount: pages.length,
        async getPageText(page) {
          calls.pages.push(page);
          if (page === failOnPage) throw new Error(`page ${page} is damaged`);
          return pages[page - 1] ?? "";
        },
        async close() {
          calls.closed++;
        },
      };
    },
  };
  return { source, calls };
}

describe("extractText", () => {
  it("joins the non-empty leading pages with newlines", async () => {
    const { source, calls } = pagesSource(["Alpha", "", "Gamma", "Delta"]);
    const sink = collectingSink();

    const result = await extractText("/docs/report.pdf", 3, { source, diagnostics: sink });

    expect(result).toEqual({ kind: "text", text: "Alpha\nGamma", pageCount: 4, pagesRead: 3 });
    expect(calls.pages).toEqual([1, 2, 3]);
    expect(calls.closed).toBe(1);
    expect(sink.events).toEqual([
      {
        level: "info",
        code: "extracted",
        file: "report.pdf",
        message: "Extracted 3 page(s) from report.pdf",
        data: { pageCount: 4, pagesRead: 3 },
      },
    ]);
  });

  it("reads every page when the document is shorter than the limit", async () => {
    const { source } = pagesSource(["Only page"]);

    const result = await extractText("/docs/short.pdf", 5, { source });

    expect(result).toEqual({ kind: "text", text: "Only page", pageCount: 1, pagesRead: 1 });
  });

  it("returns empty text when no page has any", async () => {
    const { source } = pagesSource(["", ""]);

    const result = await extractText("/docs/scan.pdf", 2, { source });

    expect(result).toEqual({ kind: "text", text: "", pageCount: 2, pagesRead: 2 });
    expect(extractedText(result)).toBe("");
  });

  it("turns an open failure into a failed result", async () => {
    const source: PdfTextSource = {
      open: async () => {
        throw new Error("Invalid PDF structure.");
      },
    };
    const sink = collectingSink();

    const result = await extractText("/docs/broken.pdf", 1, { source, diagnostics: sink });

    expect(result).toEqual({ kind: "failed", reason: "Invalid PDF structure." });
    expect(extractedText(result)).toBe("");
    expect(sink.events).toEqual([
      {
        level: "error",
        code: "extract-failed",
        file: "broken.pdf",
        message: "Failed to extract from broken.pdf: Invalid PDF structure.",
      },
    ]);
  });

  it("closes the document when a page fails", async () => {
    const { source, calls } = pagesSource(["One", "Two"], 2);

    const result = await extractText("/docs/damaged.pdf", 2, { source });

    expect(result).toEqual({ kind: "failed", reason: "page 2 is damaged" });
    expect(calls.closed).toBe(1);
  });

  it("fails without opening the document for a page limit below 1", async () => {
    const { source, calls } = pagesSource(["One"]);

    const result = await extractText("/docs/a.pdf", 0, { source });

    expect(result).toEqual({ kind: "failed", reason: "max pages must be a positive integer, got 0" });
    expect(calls.opened).toBe(0);
  });
});

describe("PdfjsTextSource", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pdftools-extract-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reports a file that is not a PDF as a failed extraction", async () => {
    const file = path.join(tmpDir, "corrupt.pdf");
    fs.writeFileSync(file, "this is not a pdf document");

    const result = await extractText(file, 1, { source: new PdfjsTextSource() });

    expect(result.kind).toBe("failed");
  });

  it("reports a missing file as a failed extraction", async () => {
    const result = await extractText(path.join(tmpDir, "missing.pdf"), 1, {
      source: new PdfjsTextSource(),
    });

    expect(result).toMatchObject({ kind: "failed", reason: expect.stringContaining("ENOENT") });
  });
});
