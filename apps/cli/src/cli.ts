import {
  AppError,
  DEFAULT_LOG_LEVEL,
  type DiagnosticsSink,
  LOG_LEVEL_ENV,
  logLevelSchema,
  NotFoundError,
  ValidationError,
} from "@pdftools/utils";
import { runExtract } from "./commands/extract.js";
import { runRename } from "./commands/rename.js";
import type { CliDeps, CommandContext } from "./context.js";
import { createConsoleSink } from "./logger.js";
import { USAGE } from "./usage.js";
import { validateInput } from "./validate.js";

export const defaultDeps: CliDeps = {
  out: (line) => console.log(line),
  createSink: (level) => createConsoleSink(level),
  env: process.env,
};

function isParseArgsError(err: unknown): err is Error & { code: string } {
  return (
    err instanceof TypeError &&
    "code" in err &&
    typeof err.code === "string" &&
    err.code.startsWith("ERR_PARSE_ARGS")
  );
}

function reportError(err: unknown, diagnostics: DiagnosticsSink): number {
  if (isParseArgsError(err)) {
    diagnostics({
      level: "error",
      code: "validation-error",
      message: `Validation error: ${err.message}`,
    });
    return 2;
  }
  if (err instanceof ValidationError) {
    diagnostics({
      level: "error",
      code: "validation-error",
      message: `Validation error: ${err.message}`,
      data: err.details,
    });
    for (const [field, messages] of Object.entries(err.details ?? {})) {
      diagnostics({
        level: "error",
        code: "validation-error",
        message: `    ${field}: ${messages.join("; ")}`,
      });
    }
    return err.exitCode;
  }
  if (err instanceof NotFoundError) {
    diagnostics({ level: "error", code: "not-found", message: err.message });
    return err.exitCode;
  }
  if (err instanceof AppError) {
    diagnostics({
      level: "error",
      code: "execution-failed",
      message: `Execution failed: ${err.message}`,
    });
    return err.exitCode;
  }

  const message = err instanceof Error ? err.message : String(err);
  diagnostics({
    level: "error",
    code: "execution-failed",
    message: `Execution failed: ${message}`,
  });
  return 1;
}

/** Runs one command line and resolves to the process exit code. */
export async function run(argv: string[], deps: CliDeps = defaultDeps): Promise<number> {
  let diagnostics = deps.createSink(DEFAULT_LOG_LEVEL);

  try {
    const level = validateInput(
      logLevelSchema,
      deps.env[LOG_LEVEL_ENV],
      `Invalid ${LOG_LEVEL_ENV}`,
    );
    diagnostics = deps.createSink(level);

    const ctx: CommandContext = { out: deps.out, diagnostics, source: deps.source };
    const command: string | undefined = argv[0];
    const rest = argv.slice(1);

    switch (command) {
      case "extract":
        return await runExtract(rest, ctx);
      case "rename":
        return await runRename(rest, ctx);
      case "-h":
      case "--help":
        deps.out(USAGE);
        return 0;
      case undefined:
        deps.out(USAGE);
        return 2;
      default:
        throw new ValidationError(`Unknown command: ${command}`, {
          command: ["expected one of: extract, rename"],
        });
    }
  } catch (err) {
    return reportError(err, diagnostics);
  }
}
