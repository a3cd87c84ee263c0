import { describe, it, expect } from "vitest";
import { extractJsonObject, formatReportStamp, safeJsonParse, truncate } from "../src/utils.js";

describe("utils", () => {
  it("formats the report stamp in the configured zone", () => {
    const now = new Date("2026-10-18T14:05:00Z");
    expect(formatReportStamp(now, "UTC")).toBe("2026-10-18 14:05 UTC");
    expect(formatReportStamp(new Date("2026-10-18T23:30:00Z"), "UTC")).toBe("2026-10-18 23:30 UTC");
  });

  it("finds JSON in fenced or chatty model output", () => {
    expect(extractJsonObject('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(extractJsonObject('Sure! {"a":{"b":2}} Hope that helps.')).toBe('{"a":{"b":2}}');
    expect(extractJsonObject("nothing here")).toBeNull();
  });

  it("parses JSON safely", () => {
    expect(safeJsonParse('{"ok":true}')).toEqual({ ok: true });
    expect(safeJsonParse("{oops")).toBeUndefined();
  });

  it("truncates with an ellipsis", () => {
    expect(truncate("abcdef", 10)).toBe("abcdef");
    expect(truncate("abcdef", 4)).toBe("abc…");
  });
});
