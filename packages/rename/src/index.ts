export { nodeFileSystem } from "./file-system.js";
export type { FileIdentity, RenameFileSystem } from "./file-system.js";
export { compilePattern, PATTERN_FLAGS, translatePattern } from "./pattern.js";
export { type RenameBatchOptions, renameBatch, withPdfSuffix } from "./renamer.js";
export {
  type Captures,
  capturesFromMatch,
  FIRST_GROUP_INDEX,
  type ParsedTemplate,
  parseTemplate,
  type RenderResult,
  renderTemplate,
  type TemplateSegment,
} from "./template.js";
