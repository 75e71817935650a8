import fs from "node:fs/promises";
import type { PdfTextSource } from "@pdftools/file-extract";
import {
  type DiagnosticsSink,
  type LogLevel,
  NotFoundError,
  SEPARATOR_WIDTH,
} from "@pdftools/utils";

export interface CliDeps {
  /** Writes one line of command output to stdout. */
  out(line: string): void;
  createSink(level: LogLevel): DiagnosticsSink;
  env: Record<string, string | undefined>;
  source?: PdfTextSource;
}

export interface CommandContext {
  out(line: string): void;
  diagnostics: DiagnosticsSink;
  source?: PdfTextSource;
}

export function separator(char: string): string {
  return char.repeat(SEPARATOR_WIDTH);
}

export async function requireEntry(target: string, kind: "file" | "folder"): Promise<void> {
  const label = kind === "file" ? "File" : "Folder";
  try {
    const stats = await fs.stat(target);
    if (kind === "folder" && !stats.isDirectory()) {
      throw new NotFoundError(`${label} not found: ${target}`);
    }
  } catch (err) {
    if (err instanceof NotFoundError) throw err;
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new NotFoundError(`${label} not found: ${target}`);
    }
    throw err;
  }
}
