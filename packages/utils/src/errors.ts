export class AppError extends Error {
  constructor(
    public exitCode: number,
    public code: string,
    message: string,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super(2, "NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends AppError {
  constructor(
    message = "Validation failed",
    public details?: Record<string, string[]>,
  ) {
    super(2, "VALIDATION_ERROR", message);
    this.name = "ValidationError";
  }
}

export class PatternError extends ValidationError {
  constructor(
    public pattern: string,
    message: string,
  ) {
    super(`Invalid regex pattern: ${message}`, { pattern: [message] });
    this.code = "INVALID_PATTERN";
    this.name = "PatternError";
  }
}

export class TemplateSyntaxError extends ValidationError {
  constructor(
    public template: string,
    public position: number,
    message: string,
  ) {
    super(`Invalid template at position ${position}: ${message}`, { template: [message] });
    this.code = "INVALID_TEMPLATE";
    this.name = "TemplateSyntaxError";
  }
}

/** A placeholder names a group the match does not have. Recoverable per file. */
export class TemplateLookupError extends AppError {
  constructor(public placeholder: string) {
    super(1, "TEMPLATE_LOOKUP", `Template references missing group {${placeholder}}`);
    this.name = "TemplateLookupError";
  }
}
