import { ValidationError } from "@pdftools/utils";
import type { ZodType, ZodTypeDef } from "zod";

export function validateInput<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  message: string,
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details: Record<string, string[]> = {};
    for (const issue of result.error.issues) {
      const path = issue.path.join(".") || "value";
      if (!details[path]) details[path] = [];
      details[path].push(issue.message);
    }
    throw new ValidationError(message, details);
  }
  return result.data;
}
