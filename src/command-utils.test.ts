import { describe, expect, it } from "vitest";
import { parseCommonValues } from "./command-utils.js";
import { ConfigError } from "./errors.js";

describe("parseCommonValues", () => {
  it("normalises filters and fills defaults", () => {
    expect(parseCommonValues({ since: "20250101", until: "20250131", timezone: "UTC" })).toEqual({
      since: "2025-01-01",
      until: "2025-01-31",
      order: "desc",
      json: false,
      breakdown: false,
      timezone: "UTC",
      claudeDir: undefined,
      recent: undefined,
    });
  });

  it("rejects a range that ends before it starts", () => {
    expect(() => parseCommonValues({ since: "20250201", until: "20250101" })).toThrow(
      "--since (20250201) is after --until (20250101)",
    );
  });

  it("rejects bad dates, zones and counts", () => {
    expect(() => parseCommonValues({ since: "2025-01-01" })).toThrow(ConfigError);
    expect(() => parseCommonValues({ timezone: "Not/AZone" })).toThrow(ConfigError);
    expect(() => parseCommonValues({ recent: 0 })).toThrow("--recent must be a positive integer, got: 0");
    expect(() => parseCommonValues({ recent: 1.5 })).toThrow(ConfigError);
  });
});
