import { describe, expect, it } from "vitest";
import { collectingSink, isLevelEnabled } from "./diagnostics.js";

describe("collectingSink", () => {
  it("records events in order", () => {
    const sink = collectingSink();
    sink({ level: "info", code: "planned", message: "first" });
    sink({ level: "warn", code: "no-text", message: "second" });
    expect(sink.events.map((e) => e.message)).toEqual(["first", "second"]);
  });
});

describe("isLevelEnabled", () => {
  it("orders levels from debug to error", () => {
    expect(isLevelEnabled("error", "warn")).toBe(true);
    expect(isLevelEnabled("warn", "warn")).toBe(true);
    expect(isLevelEnabled("info", "warn")).toBe(false);
    expect(isLevelEnabled("debug", "info")).toBe(false);
  });
});
