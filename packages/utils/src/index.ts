export * from "./constants.js";
export * from "./diagnostics.js";
export * from "./errors.js";
export * from "./types/cli.js";
export type * from "./types/diagnostics.js";
