import { PatternError } from "@pdftools/utils";
import { describe, expect, it } from "vitest";
import { compilePattern, translatePattern } from "./pattern.js";

describe("translatePattern", () => {
  it("rewrites (?P<name>) groups and (?P=name) backreferences", () => {
    expect(translatePattern("Order ID: (?P<order>\\w+)")).toBe("Order ID: (?<order>\\w+)");
    expect(translatePattern("(?P<word>\\w+) (?P=word)")).toBe("(?<word>\\w+) \\k<word>");
  });

  it("rewrites input anchors", () => {
    expect(translatePattern("\\AHeader")).toBe("(?<![\\s\\S])Header");
    expect(translatePattern("end\\Z")).toBe("end(?![\\s\\S])");
  });

  it("leaves escaped parentheses and character classes alone", () => {
    expect(translatePattern("\\(?P<x>")).toBe("\\(?P<x>");
    expect(translatePattern("[(?P<]")).toBe("[(?P<]");
    expect(translatePattern("[\\A]")).toBe("[\\A]");
  });

  it("passes native syntax through unchanged", () => {
    expect(translatePattern("(?<id>\\d+)")).toBe("(?<id>\\d+)");
  });
});

describe("compilePattern", () => {
  it("matches case-insensitively", () => {
    expect(compilePattern("Invoice #(\\d+)").exec("INVOICE #12")?.[1]).toBe("12");
  });

  it("anchors ^ and $ at line breaks", () => {
    const rx = compilePattern("^Total: (\\d+)$");
    expect(rx.exec("Header\nTotal: 40\nFooter")?.[1]).toBe("40");
  });

  it("finds the first match scanning from the top", () => {
    const rx = compilePattern("ID: (\\w+)");
    expect(rx.exec("ID: first\nID: second")?.[1]).toBe("first");
  });

  it("exposes translated named groups", () => {
    const rx = compilePattern("Order ID: (?P<order>\\w+)");
    expect(rx.exec("Order ID: AB99")?.groups).toEqual({ order: "AB99" });
  });

  it("throws a PatternError for a malformed expression", () => {
    try {
      compilePattern("Invoice #(\\d+");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PatternError);
      expect(err).toMatchObject({
        code: "INVALID_PATTERN",
        pattern: "Invoice #(\\d+",
        message: expect.stringMatching(/^Invalid regex pattern: /),
      });
    }
  });
});
