import { describe, it, expect } from "vitest";
import {
  applyThreshold,
  calculateDailyChanges,
  calculateRollingAverage,
  createProcessingConfig,
  DEFAULT_PROCESSING_CONFIG,
  filterCountries,
  normaliseByPopulation,
  processCovidData,
  sortByLatest,
} from "@/lib/analysis/processing";
import { table } from "./fixtures";

const base = table("2020-03-01", {
  A: [1, 3, 6, 10],
  B: [2, 2, null, 5],
});

const values = (t: ReturnType<typeof table>) => Object.fromEntries(t.rows.map((r) => [r.country, r.values]));

describe("calculateDailyChanges", () => {
  it("should difference consecutive values and leave the first day empty", () => {
    expect(values(calculateDailyChanges(base))).toEqual({
      A: [null, 2, 3, 4],
      B: [null, 0, null, null],
    });
  });
});

describe("calculateRollingAverage", () => {
  it("should only emit a mean once a full window is present", () => {
    expect(values(calculateRollingAverage(base, 2))).toEqual({
      A: [null, 2, 4.5, 8],
      B: [null, 2, null, null],
    });
  });

  it("should leave values unchanged with a window of one", () => {
    expect(values(calculateRollingAverage(base, 1))).toEqual(values(base));
  });

  it("should reject a window below one", () => {
    expect(() => calculateRollingAverage(base, 0)).toThrow(RangeError);
  });
});

describe("applyThreshold", () => {
  it("should blank values below the threshold", () => {
    expect(values(applyThreshold(base, 3))).toEqual({
      A: [null, 3, 6, 10],
      B: [null, null, null, 5],
    });
  });
});

describe("sortByLatest", () => {
  it("should order by the latest value with missing values last", () => {
    const t = table("2020-03-01", { C: [1, null], B: [1, 5], A: [1, 10] });
    expect(sortByLatest(t).rows.map((r) => r.country)).toEqual(["A", "B", "C"]);
  });
});

describe("normaliseByPopulation", () => {
  it("should divide by population in millions and blank unknown countries", () => {
    const result = normaliseByPopulation(base, new Map([["A", 2]]));
    expect(values(result)).toEqual({
      A: [0.5, 1.5, 3, 5],
      B: [null, null, null, null],
    });
  });
});

describe("filterCountries", () => {
  it("should keep only the requested countries", () => {
    expect(filterCountries(base, ["B"]).rows.map((r) => r.country)).toEqual(["B"]);
  });
});

describe("processCovidData", () => {
  const population = new Map([
    ["A", 2],
    ["B", 1],
  ]);

  it("should chain daily changes, rolling average and normalisation", () => {
    const config = createProcessingConfig({ rollingWindow: 2 });
    const result = processCovidData(base, config, population);
    expect(result.rows.map((r) => r.country)).toEqual(["A", "B"]);
    expect(values(result)).toEqual({
      A: [null, null, 1.25, 1.75],
      B: [null, null, null, null],
    });
  });

  it("should keep only the leading countries when presorting", () => {
    const config = createProcessingConfig({
      dailyChange: false,
      rollingAverage: false,
      normaliseByPopulation: false,
      presortCountries: 1,
    });
    expect(processCovidData(base, config, population).rows.map((r) => r.country)).toEqual(["A"]);
  });

  it("should restrict the output to the country set", () => {
    const config = createProcessingConfig({ dailyChange: false, rollingAverage: false, countrySet: ["B"] });
    expect(values(processCovidData(base, config, population))).toEqual({ B: [2, 2, null, 5] });
  });

  it("should default to smoothed daily figures per million", () => {
    expect(DEFAULT_PROCESSING_CONFIG).toEqual({
      dataType: "infections",
      dailyChange: true,
      rollingAverage: true,
      normaliseByPopulation: true,
      rollingWindow: 7,
      presortCountries: null,
      threshold: null,
      countrySet: null,
    });
  });
});
