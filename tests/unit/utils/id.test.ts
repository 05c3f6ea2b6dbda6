import { describe, it, expect } from "vitest";
import { formatReportStamp, generateRunId } from "../../../src/utils/id.js";

describe("generateRunId", () => {
  it("returns a string in the expected format (base36-hex)", () => {
    expect(generateRunId()).toMatch(/^[a-z0-9]+-[a-f0-9]{8}$/);
  });

  it("generates unique IDs", () => {
    const ids = new Set<string>();
    for (let i = 0; i < 1000; i++) {
      ids.add(generateRunId());
    }
    expect(ids.size).toBe(1000);
  });
});

describe("formatReportStamp", () => {
  it("formats in UTC with zero padding", () => {
    expect(formatReportStamp(new Date("2025-01-02T03:04:05.678Z"))).toBe("20250102_030405");
  });
});
