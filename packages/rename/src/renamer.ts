import path from "node:path";
import { extractedText, extractText, type PdfTextSource } from "@pdftools/file-extract";
import {
  DEFAULT_MAX_PAGES,
  type DiagnosticsSink,
  NotFoundError,
  noopSink,
  PDF_SUFFIX,
  PatternError,
  TemplateLookupError,
  ValidationError,
} from "@pdftools/utils";
import { nodeFileSystem, type RenameFileSystem } from "./file-system.js";
import { compilePattern } from "./pattern.js";
import {
  capturesFromMatch,
  type ParsedTemplate,
  parseTemplate,
  renderTemplate,
} from "./template.js";

export interface RenameBatchOptions {
  folder: string;
  pattern: string;
  template: string;
  maxPages?: number;
  /** Perform the renames. Without it the batch only reports what it would do. */
  apply?: boolean;
  diagnostics?: DiagnosticsSink;
  source?: PdfTextSource;
  fs?: RenameFileSystem;
}

interface BatchContext {
  folder: string;
  rx: RegExp;
  template: ParsedTemplate;
  maxPages: number;
  apply: boolean;
  diagnostics: DiagnosticsSink;
  source?: PdfTextSource;
  fs: RenameFileSystem;
  /** Destinations taken by earlier files in this batch. */
  claimed: Set<string>;
  /** Sources moved away by earlier files in this batch. */
  vacated: Set<string>;
}

/** Appends ".pdf" unless the name already ends with it (case-sensitive). */
export function withPdfSuffix(name: string): string {
  return name.endsWith(PDF_SUFFIX) ? name : name + PDF_SUFFIX;
}

function isPlainFileName(name: string): boolean {
  return !/[/\\\0]/.test(name) && name !== "." && name !== "..";
}

async function listCandidates(fs: RenameFileSystem, folder: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(folder);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new NotFoundError(`Folder not found: ${folder}`);
    }
    throw err;
  }
  return entries.filter((name) => name.endsWith(PDF_SUFFIX)).sort();
}

async function isTaken(ctx: BatchContext, source: string, target: string): Promise<boolean> {
  if (source === target) return false;
  if (ctx.claimed.has(target)) return true;
  if (ctx.vacated.has(target)) return false;

  const targetId = await ctx.fs.identify(target);
  if (!targetId) return false;

  // Case-insensitive filesystems report the source itself under a differently cased name.
  const sourceId = await ctx.fs.identify(source);
  return !(sourceId && sourceId.dev === targetId.dev && sourceId.ino === targetId.ino);
}

async function processFile(ctx: BatchContext, name: string): Promise<boolean> {
  const { diagnostics } = ctx;
  const source = path.resolve(ctx.folder, name);

  const result = await extractText(source, ctx.maxPages, {
    source: ctx.source,
    diagnostics,
  });
  const text = extractedText(result);
  if (!text) {
    diagnostics({
      level: "warn",
      code: "no-text",
      file: name,
      message: `${name}: No text extracted`,
      data: result.kind === "failed" ? { reason: result.reason } : undefined,
    });
    return false;
  }

  const match = ctx.rx.exec(text);
  if (!match) {
    diagnostics({
      level: "warn",
      code: "pattern-not-found",
      file: name,
      message: `${name}: Pattern not found`,
    });
    return false;
  }

  const captures = capturesFromMatch(match);
  let rendered: string;
  try {
    const output = renderTemplate(ctx.template, captures);
    rendered = output.text;
    for (const placeholder of output.absent) {
      diagnostics({
        level: "warn",
        code: "absent-group",
        file: name,
        message: `${name}: ${placeholder} did not take part in the match, substituted as empty`,
      });
    }
  } catch (err) {
    if (!(err instanceof TemplateLookupError)) throw err;
    diagnostics({
      level: "error",
      code: "template-error",
      file: name,
      message: `${name}: Template error - ${err.message}`,
      data: { placeholder: err.placeholder },
    });
    const groups = JSON.stringify(captures.positional);
    const named = JSON.stringify(captures.named);
    diagnostics({
      level: "info",
      code: "template-error",
      file: name,
      message: `    Regex captured: ${groups} / ${named}`,
      data: { positional: captures.positional, named: captures.named },
    });
    return false;
  }

  const newName = withPdfSuffix(rendered);
  if (!isPlainFileName(newName)) {
    diagnostics({
      level: "error",
      code: "invalid-target",
      file: name,
      message: `${name}: Target '${newName}' is not a plain file name, skipping`,
    });
    return false;
  }

  const target = path.resolve(ctx.folder, newName);
  let taken: boolean;
  try {
    taken = await isTaken(ctx, source, target);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    diagnostics({
      level: "error",
      code: "invalid-target",
      file: name,
      message: `${name}: Target '${newName}' cannot be checked - ${reason}, skipping`,
    });
    return false;
  }
  if (taken) {
    diagnostics({
      level: "error",
      code: "collision",
      file: name,
      message: `${name}: Target '${newName}' already exists, skipping`,
    });
    return false;
  }

  if (ctx.apply) {
    if (source !== target) {
      try {
        await ctx.fs.rename(source, target);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        diagnostics({
          level: "error",
          code: "rename-failed",
          file: name,
          message: `${name}: Rename to '${newName}' failed - ${reason}`,
        });
        return false;
      }
    }
    diagnostics({
      level: "info",
      code: "renamed",
      file: name,
      message: `${name} → ${newName}`,
      data: { newName },
    });
  } else {
    diagnostics({
      level: "info",
      code: "planned",
      file: name,
      message: `[DRY] ${name} → ${newName}`,
      data: { newName },
    });
  }

  if (source !== target) {
    ctx.claimed.add(target);
    ctx.claimed.delete(source);
    ctx.vacated.add(source);
    ctx.vacated.delete(target);
  }
  return true;
}

/**
 * Renames the PDFs directly inside `folder` after the first match of `pattern`
 * in their leading pages, rendered through `template`.
 *
 * Resolves to the number of files renamed, or that would be renamed in preview
 * mode. An invalid pattern or an empty folder resolves to 0 before any file is
 * read; a malformed template or page count rejects with a ValidationError.
 */
export async function renameBatch(options: RenameBatchOptions): Promise<number> {
  const diagnostics = options.diagnostics ?? noopSink;
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const apply = options.apply ?? false;
  const fs = options.fs ?? nodeFileSystem;

  if (!Number.isInteger(maxPages) || maxPages < 1) {
    throw new ValidationError("Max pages must be a positive integer", {
      maxPages: [`expected an integer >= 1, got ${maxPages}`],
    });
  }

  let rx: RegExp;
  try {
    rx = compilePattern(options.pattern);
  } catch (err) {
    if (!(err instanceof PatternError)) throw err;
    diagnostics({
      level: "error",
      code: "invalid-pattern",
      message: err.message,
      data: { pattern: err.pattern },
    });
    return 0;
  }

  const template = parseTemplate(options.template);

  const candidates = await listCandidates(fs, options.folder);
  if (candidates.length === 0) {
    diagnostics({
      level: "warn",
      code: "no-candidates",
      message: `No PDF files found in ${options.folder}`,
    });
    return 0;
  }

  const start = (message: string) => diagnostics({ level: "info", code: "batch-start", message });
  start(`Processing ${candidates.length} PDF(s) in ${options.folder}`);
  start(`Pattern: ${options.pattern}`);
  start(`Template: ${options.template}`);
  start(`Mode: ${apply ? "APPLY CHANGES" : "DRY RUN"}`);

  const ctx: BatchContext = {
    folder: options.folder,
    rx,
    template,
    maxPages,
    apply,
    diagnostics,
    source: options.source,
    fs,
    claimed: new Set(),
    vacated: new Set(),
  };

  let matched = 0;
  for (const name of candidates) {
    if (await processFile(ctx, name)) matched++;
  }

  const verb = apply ? "renamed" : "would be renamed";
  diagnostics({
    level: "info",
    code: "summary",
    message: `Summary: ${matched}/${candidates.length} files ${verb}`,
    data: { matched, total: candidates.length, apply },
  });
  if (!apply) {
    diagnostics({
      level: "info",
      code: "apply-hint",
      message: "Run with --apply to execute changes",
    });
  }

  return matched;
}
