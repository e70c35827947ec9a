import { describe, it, expect } from "vitest";
import { createProcessingConfig } from "@/lib/analysis/processing";
import { constructYAxisTitle, daysSinceTitle, ordinal } from "@/lib/plotting";

describe("constructYAxisTitle", () => {
  it("should describe every applied transformation", () => {
    expect(constructYAxisTitle("infections", createProcessingConfig())).toBe(
      "Daily infections per million people (as a 7 day rolling average)"
    );
  });

  it("should describe raw totals", () => {
    const config = createProcessingConfig({ dailyChange: false, rollingAverage: false, normaliseByPopulation: false });
    expect(constructYAxisTitle("deaths", config)).toBe("Total deaths");
  });
});

describe("ordinal", () => {
  it("should pick the English suffix", () => {
    expect([1, 2, 3, 4, 11, 12, 13, 21, 22, 23, 101, 111].map(ordinal)).toEqual([
      "1st", "2nd", "3rd", "4th", "11th", "12th", "13th", "21st", "22nd", "23rd", "101st", "111th",
    ]);
  });
});

describe("daysSinceTitle", () => {
  it("should use the singular data type", () => {
    expect(daysSinceTitle(10, "deaths")).toBe("Days since 10th death");
    expect(daysSinceTitle(1, "active cases")).toBe("Days since 1st active case");
  });
});
