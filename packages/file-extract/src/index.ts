export { extractText, extractedText } from "./extract.js";
export { PdfjsTextSource } from "./extractors/pdf.js";
export type {
  ExtractOptions,
  ExtractionResult,
  PdfDocumentHandle,
  PdfTextSource,
} from "./types.js";
