#!/usr/bin/env tsx
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { run } from "./cli.js";

// Pick up PDF_TOOLS_LOG_LEVEL from a local .env unless the shell already set it
const envPath = resolve(process.cwd(), ".env");
if (existsSync(envPath)) {
  process.loadEnvFile(envPath);
}

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err) => {
    console.error("Execution failed:", err);
    process.exitCode = 1;
  },
);
