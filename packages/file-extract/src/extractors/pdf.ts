import { readFile } from "node:fs/promises";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { PdfDocumentHandle, PdfTextSource } from "../types.js";

/** pdf.js text source. Uses the legacy build, which is the one that runs under Node. */
export class PdfjsTextSource implements PdfTextSource {
  async open(path: string): Promise<PdfDocumentHandle> {
    const data = new Uint8Array(await readFile(path));
    const task = getDocument({
      data,
      useSystemFonts: true,
      isEvalSupported: false,
      verbosity: 0,
    });

    let doc: Awaited<typeof task.promise>;
    try {
      doc = await task.promise;
    } catch (err) {
      await task.destroy();
      throw err;
    }

    return {
      pageCount: doc.numPages,
      async getPageText(pageNumber: number): Promise<string> {
        const page = await doc.getPage(pageNumber);
        const content = await page.getTextContent();
        let text = "";
        for (const item of content.items) {
          // Marked-content items carry no text.
          if (!("str" in item)) continue;
          text += item.str;
          if (item.hasEOL) text += "\n";
        }
        page.cleanup();
        return text.trimEnd();
      },
      close: () => doc.destroy(),
    };
  }
}
