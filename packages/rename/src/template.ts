import { TemplateLookupError, TemplateSyntaxError } from "@pdftools/utils";

/**
 * Templates address capture groups from 1, like backreferences do. `{0}` is
 * reserved and never resolves; the whole match is not addressable.
 */
export const FIRST_GROUP_INDEX = 1;

export type TemplateSegment =
  | { kind: "literal"; text: string }
  | { kind: "positional"; index: number; raw: string }
  | { kind: "named"; name: string; raw: string };

export interface ParsedTemplate {
  source: string;
  segments: TemplateSegment[];
}

export interface Captures {
  /**
   * Capture groups in pattern order, so `positional[0]` is group 1.
   * Groups that did not participate are undefined.
   */
  positional: ReadonlyArray<string | undefined>;
  named: Readonly<Record<string, string | undefined>>;
}

export interface RenderResult {
  text: string;
  /** Placeholders whose group exists but did not take part in the match. */
  absent: string[];
}

/** Group names follow the identifier rules RegExp applies to `(?<name>)`. */
const NAME_RE = /^[\p{ID_Start}_$][\p{ID_Continue}$\u200C\u200D]*$/u;
const INDEX_RE = /^\d+$/;

function placeholderSegment(template: string, raw: string, position: number): TemplateSegment {
  if (raw.length === 0) {
    throw new TemplateSyntaxError(template, position, "empty placeholder '{}'");
  }
  if (INDEX_RE.test(raw)) {
    return { kind: "positional", index: Number.parseInt(raw, 10), raw };
  }
  if (NAME_RE.test(raw)) {
    return { kind: "named", name: raw, raw };
  }
  throw new TemplateSyntaxError(template, position, `unsupported placeholder '{${raw}}'`);
}

/**
 * Splits a template into literal text and `{1}` / `{name}` placeholders.
 * `{{` and `}}` stand for literal braces.
 */
export function parseTemplate(template: string): ParsedTemplate {
  const segments: TemplateSegment[] = [];
  let literal = "";
  let i = 0;

  const flush = () => {
    if (literal) {
      segments.push({ kind: "literal", text: literal });
      literal = "";
    }
  };

  while (i < template.length) {
    const ch = template[i];

    if (ch === "{") {
      if (template[i + 1] === "{") {
        literal += "{";
        i += 2;
        continue;
      }
      const close = template.indexOf("}", i + 1);
      if (close === -1) {
        throw new TemplateSyntaxError(template, i, "unmatched '{'");
      }
      const raw = template.slice(i + 1, close);
      if (raw.includes("{")) {
        throw new TemplateSyntaxError(template, i, "nested '{' in placeholder");
      }
      flush();
      segments.push(placeholderSegment(template, raw, i));
      i = close + 1;
      continue;
    }

    if (ch === "}") {
      if (template[i + 1] === "}") {
        literal += "}";
        i += 2;
        continue;
      }
      throw new TemplateSyntaxError(template, i, "single '}' encountered");
    }

    literal += ch;
    i++;
  }

  flush();
  return { source: template, segments };
}

export function capturesFromMatch(match: RegExpExecArray): Captures {
  return {
    positional: Array.from(match).slice(FIRST_GROUP_INDEX),
    named: { ...match.groups },
  };
}

function lookup(
  segment: Exclude<TemplateSegment, { kind: "literal" }>,
  captures: Captures,
): string | undefined {
  if (segment.kind === "positional") {
    const slot = segment.index - FIRST_GROUP_INDEX;
    if (slot < 0 || slot >= captures.positional.length) {
      throw new TemplateLookupError(segment.raw);
    }
    return captures.positional[slot];
  }
  if (!Object.hasOwn(captures.named, segment.name)) {
    throw new TemplateLookupError(segment.raw);
  }
  return captures.named[segment.name];
}

/**
 * Substitutes captures into a parsed template. Throws TemplateLookupError when
 * a placeholder names a group the pattern does not define.
 */
export function renderTemplate(template: ParsedTemplate, captures: Captures): RenderResult {
  let text = "";
  const absent: string[] = [];

  for (const segment of template.segments) {
    if (segment.kind === "literal") {
      text += segment.text;
      continue;
    }
    const value = lookup(segment, captures);
    if (value === undefined) {
      absent.push(`{${segment.raw}}`);
      continue;
    }
    text += value;
  }

  return { text, absent };
}
