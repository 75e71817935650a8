import type { LOG_LEVELS } from "../constants.js";

export type LogLevel = (typeof LOG_LEVELS)[number];

export type DiagnosticCode =
  | "extracted"
  | "extract-failed"
  | "invalid-pattern"
  | "no-candidates"
  | "batch-start"
  | "no-text"
  | "pattern-not-found"
  | "template-error"
  | "absent-group"
  | "invalid-target"
  | "collision"
  | "planned"
  | "renamed"
  | "rename-failed"
  | "summary"
  | "apply-hint"
  | "not-found"
  | "validation-error"
  | "execution-failed";

export interface DiagnosticEvent {
  level: LogLevel;
  code: DiagnosticCode;
  message: string;
  /** Base name of the document the event is about, when there is one. */
  file?: string;
  data?: Record<string, unknown>;
}

export type DiagnosticsSink = (event: DiagnosticEvent) => void;
