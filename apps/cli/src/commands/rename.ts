import { parseArgs } from "node:util";
import { renameBatch } from "@pdftools/rename";
import { type DiagnosticsSink, renameArgsSchema } from "@pdftools/utils";
import { type CommandContext, requireEntry, separator } from "../context.js";
import { RENAME_USAGE } from "../usage.js";
import { validateInput } from "../validate.js";

export async function runRename(args: string[], ctx: CommandContext): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      folder: { type: "string" },
      pattern: { type: "string" },
      template: { type: "string" },
      pages: { type: "string" },
      apply: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
    strict: true,
  });

  if (values.help) {
    ctx.out(RENAME_USAGE);
    return 0;
  }

  const input = validateInput(
    renameArgsSchema,
    {
      folder: values.folder,
      pattern: values.pattern,
      template: values.template,
      pages: values.pages,
      apply: values.apply,
    },
    "Invalid rename arguments",
  );
  await requireEntry(input.folder, "folder");

  // A separator precedes the first per-file line and the summary.
  let framed = false;
  const diagnostics: DiagnosticsSink = (event) => {
    if (event.code === "summary" || (event.file !== undefined && !framed)) {
      framed = true;
      ctx.out(separator("-"));
    }
    ctx.diagnostics(event);
  };

  const matched = await renameBatch({
    folder: input.folder,
    pattern: input.pattern,
    template: input.template,
    maxPages: input.pages,
    apply: input.apply,
    diagnostics,
    source: ctx.source,
  });

  return matched > 0 ? 0 : 1;
}
