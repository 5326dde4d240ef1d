import { describe, expect, it } from "vitest";
import { createServiceVersionInfo, isVersionCompatible } from "../src/versioning";

describe("versioning", () => {
  it("should stamp service info with the given time", () => {
    const now = new Date("2026-03-01T00:00:00.000Z");

    expect(createServiceVersionInfo("insights", "2.1.0", now)).toEqual({
      service: "insights",
      version: "2.1.0",
      timestamp: "2026-03-01T00:00:00.000Z",
    });
  });

  it("should treat same-major versions as compatible", () => {
    expect(isVersionCompatible("1.0.0", "1.4.2")).toBe(true);
    expect(isVersionCompatible("2.0.0", "1.9.9")).toBe(false);
  });
});
