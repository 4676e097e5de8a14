import { describe, expect, it } from "vitest";
import { fileStamp, formatError } from "./utils";

describe("fileStamp", () => {
  it("renders a sortable local date-time", () => {
    expect(fileStamp(new Date(2025, 0, 2, 3, 4, 5))).toBe("20250102_030405");
    expect(fileStamp(new Date(2025, 11, 31, 23, 59, 58))).toBe("20251231_235958");
  });
});

describe("formatError", () => {
  it("uses the message of an Error and stringifies anything else", () => {
    expect(formatError(new Error("boom"))).toBe("boom");
    expect(formatError("plain")).toBe("plain");
    expect(formatError(42)).toBe("42");
  });

  it("falls back to the code or name when the message is empty", () => {
    expect(formatError(Object.assign(new Error(""), { code: "ECONNREFUSED" }))).toBe("ECONNREFUSED");
    expect(formatError(new AggregateError([], ""))).toBe("AggregateError");
  });
});
