import type { DiagnosticEvent, DiagnosticsSink, LogLevel } from "./types/diagnostics.js";
import { LOG_LEVELS } from "./constants.js";

export const noopSink: DiagnosticsSink = () => {};

export interface CollectingSink extends DiagnosticsSink {
  events: DiagnosticEvent[];
}

export function collectingSink(): CollectingSink {
  const events: DiagnosticEvent[] = [];
  const sink = (event: DiagnosticEvent) => {
    events.push(event);
  };
  return Object.assign(sink, { events });
}

export function isLevelEnabled(level: LogLevel, minimum: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minimum);
}
