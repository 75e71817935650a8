import { z } from "zod";
import { DEFAULT_LOG_LEVEL, DEFAULT_MAX_PAGES, LOG_LEVELS } from "../constants.js";

export const maxPagesSchema = z.coerce.number().int().min(1).default(DEFAULT_MAX_PAGES);

export const extractArgsSchema = z.object({
  pdf: z.string().min(1),
  pages: maxPagesSchema,
});
export type ExtractArgs = z.infer<typeof extractArgsSchema>;

export const renameArgsSchema = z.object({
  folder: z.string().min(1),
  // The empty pattern is a valid regex that matches at the start of the text.
  pattern: z.string(),
  template: z.string().min(1),
  pages: maxPagesSchema,
  apply: z.boolean().default(false),
});
export type RenameArgs = z.infer<typeof renameArgsSchema>;

export const logLevelSchema = z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL);
