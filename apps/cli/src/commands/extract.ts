import { parseArgs } from "node:util";
import { extractedText, extractText } from "@pdftools/file-extract";
import { extractArgsSchema } from "@pdftools/utils";
import { type CommandContext, requireEntry, separator } from "../context.js";
import { EXTRACT_USAGE } from "../usage.js";
import { validateInput } from "../validate.js";

export async function runExtract(args: string[], ctx: CommandContext): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      pdf: { type: "string" },
      pages: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
    strict: true,
  });

  if (values.help) {
    ctx.out(EXTRACT_USAGE);
    return 0;
  }

  const input = validateInput(
    extractArgsSchema,
    { pdf: values.pdf, pages: values.pages },
    "Invalid extract arguments",
  );
  await requireEntry(input.pdf, "file");

  const result = await extractText(input.pdf, input.pages, {
    source: ctx.source,
    diagnostics: ctx.diagnostics,
  });
  const text = extractedText(result);
  if (!text) {
    ctx.diagnostics({ level: "warn", code: "no-text", message: "No text extracted" });
    return 1;
  }

  ctx.out(`\n${separator("=")}`);
  ctx.out(text);
  ctx.out(separator("="));
  return 0;
}
