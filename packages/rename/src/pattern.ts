import { PatternError } from "@pdftools/utils";

/** Matching is always case-insensitive, with `^`/`$` anchoring at line breaks. */
export const PATTERN_FLAGS = "im";

/**
 * Rewrites the `(?P...)` group syntax and `\A`/`\Z` anchors users paste from
 * other tools into their JavaScript equivalents:
 *
 *   (?P<name>...)  → (?<name>...)
 *   (?P=name)      → \k<name>
 *   \A             → start of input
 *   \Z             → end of input
 *
 * Escaped characters and character classes are copied through untouched.
 */
export function translatePattern(source: string): string {
  let out = "";
  let inClass = false;
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (ch === "\\") {
      const next = source[i + 1] ?? "";
      if (!inClass && next === "A") {
        out += "(?<![\\s\\S])";
      } else if (!inClass && next === "Z") {
        out += "(?![\\s\\S])";
      } else {
        out += ch + next;
      }
      i += 2;
      continue;
    }

    if (inClass) {
      if (ch === "]") inClass = false;
      out += ch;
      i++;
      continue;
    }

    if (ch === "[") {
      inClass = true;
      out += ch;
      // A leading "]" (or "^]") is a literal member, not the end of the class.
      if (source[i + 1] === "^") {
        out += "^";
        i++;
      }
      if (source[i + 1] === "]") {
        out += "]";
        i++;
      }
      i++;
      continue;
    }

    if (source.startsWith("(?P<", i)) {
      out += "(?<";
      i += 4;
      continue;
    }

    if (source.startsWith("(?P=", i)) {
      const close = source.indexOf(")", i);
      if (close !== -1) {
        out += `\\k<${source.slice(i + 4, close)}>`;
        i = close + 1;
        continue;
      }
    }

    out += ch;
    i++;
  }

  return out;
}

/** Compiles a user pattern. Throws PatternError when it is not a valid expression. */
export function compilePattern(source: string): RegExp {
  try {
    return new RegExp(translatePattern(source), PATTERN_FLAGS);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PatternError(source, message);
  }
}
