export const DEFAULT_MAX_PAGES = 1;

export const PDF_SUFFIX = ".pdf";

/** Width of the separator lines the CLI prints around output blocks. */
export const SEPARATOR_WIDTH = 60;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export const DEFAULT_LOG_LEVEL = "info";

export const LOG_LEVEL_ENV = "PDF_TOOLS_LOG_LEVEL";
