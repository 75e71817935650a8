import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleSink, formatEvent, formatTimestamp } from "./logger.js";

const at = new Date(2024, 0, 5, 9, 3, 7);

afterEach(() => {
  vi.restoreAllMocks();
});

describe("formatTimestamp", () => {
  it("renders local time with zero padding", () => {
    expect(formatTimestamp(at)).toBe("2024-01-05 09:03:07");
  });
});

describe("formatEvent", () => {
  it("prefixes the message with timestamp and level", () => {
    const line = formatEvent({ level: "warn", code: "no-text", message: "a.pdf: No text extracted" }, at);
    expect(line).toBe("2024-01-05 09:03:07 [WARN] a.pdf: No text extracted");
  });
});

describe("createConsoleSink", () => {
  it("routes events by level and drops those below the minimum", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const sink = createConsoleSink("warn", () => at);

    sink({ level: "info", code: "summary", message: "Summary: 1/1 files renamed" });
    sink({ level: "warn", code: "pattern-not-found", message: "b.pdf: Pattern not found" });
    sink({ level: "error", code: "collision", message: "c.pdf: Target 'x.pdf' already exists, skipping" });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("2024-01-05 09:03:07 [WARN] b.pdf: Pattern not found");
    expect(error).toHaveBeenCalledWith(
      "2024-01-05 09:03:07 [ERROR] c.pdf: Target 'x.pdf' already exists, skipping",
    );
  });

  it("writes debug and info through console.log", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const sink = createConsoleSink("debug", () => at);

    sink({ level: "debug", code: "extract-failed", message: "Failed to release a.pdf: gone" });
    sink({ level: "info", code: "extracted", message: "Extracted 1 page(s) from a.pdf" });

    expect(log.mock.calls).toEqual([
      ["2024-01-05 09:03:07 [DEBUG] Failed to release a.pdf: gone"],
      ["2024-01-05 09:03:07 [INFO] Extracted 1 page(s) from a.pdf"],
    ]);
  });
});
