import { describe, it, expect } from "vitest";
import { DEFAULT_PROCESSING_CONFIG } from "@/lib/analysis/processing";
import { DEFAULT_PEAK_COUNTRIES } from "@/lib/constants";
import { SelectionError } from "@/lib/errors";
import {
  analysisPath,
  decodeCountryParam,
  parseComparisonSelection,
  parseCountryViewSelection,
  parseHomeSelection,
  parsePeakSelection,
  parseWeekendSelection,
  toRawParams,
} from "@/lib/selection";

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof SelectionError) return err.issues;
    throw err;
  }
  return [];
}

describe("toRawParams", () => {
  it("should collect repeated list parameters and keep the first scalar", () => {
    const params = new URLSearchParams("countries=Belgium&countries=US&daily=no&daily=yes");
    expect(toRawParams(params)).toEqual({ countries: ["Belgium", "US"], daily: "no" });
  });

  it("should accept page search params", () => {
    expect(toRawParams({ countries: "Belgium", window: ["3", "5"], rolling: undefined })).toEqual({
      countries: ["Belgium"],
      window: "3",
    });
  });
});

describe("parseCountryViewSelection", () => {
  it("should fall back to the defaults", () => {
    expect(parseCountryViewSelection({})).toEqual(DEFAULT_PROCESSING_CONFIG);
  });

  it("should read yes/no flags case-insensitively", () => {
    const config = parseCountryViewSelection({ daily: "No", rolling: "YES", normalise: "no", window: "14" });
    expect(config.dailyChange).toBe(false);
    expect(config.rollingAverage).toBe(true);
    expect(config.normaliseByPopulation).toBe(false);
    expect(config.rollingWindow).toBe(14);
  });

  it("should report every invalid field", () => {
    expect(issuesOf(() => parseCountryViewSelection({ daily: "maybe", window: "0" }))).toEqual([
      "daily: expected yes or no",
      "window: Number must be greater than or equal to 1",
    ]);
  });
});

describe("parsePeakSelection", () => {
  it("should default the countries and component count", () => {
    const { config, components } = parsePeakSelection(undefined);
    expect(config.countrySet).toEqual(DEFAULT_PEAK_COUNTRIES);
    expect(components).toBe(2);
  });

  it("should de-duplicate the chosen countries", () => {
    const { config, components } = parsePeakSelection(
      new URLSearchParams("countries=US&countries=US&countries=Belgium&components=3")
    );
    expect(config.countrySet).toEqual(["US", "Belgium"]);
    expect(components).toBe(3);
  });

  it("should reject too many components", () => {
    expect(() => parsePeakSelection({ components: "7" })).toThrow(SelectionError);
  });
});

describe("parseComparisonSelection", () => {
  it("should only set a threshold when adjusting", () => {
    expect(parseComparisonSelection({}).threshold).toBeNull();
    const config = parseComparisonSelection({ adjust: "yes", type: "deaths" }, 25);
    expect(config.threshold).toBe(25);
    expect(config.dataType).toBe("deaths");
    expect(config.presortCountries).toBe(50);
  });

  it("should default to infections", () => {
    expect(parseComparisonSelection({}).dataType).toBe("infections");
  });
});

describe("parseWeekendSelection", () => {
  it("should default to deaths", () => {
    expect(parseWeekendSelection({})).toBe("deaths");
    expect(parseWeekendSelection({ type: "active cases" })).toBe("active cases");
  });

  it("should reject unknown data types", () => {
    expect(() => parseWeekendSelection({ type: "hospitalisations" })).toThrow(SelectionError);
  });
});

describe("parseHomeSelection", () => {
  it("should default the analysis to cases", () => {
    expect(parseHomeSelection({ country: " United Kingdom " })).toEqual({ country: "United Kingdom", analysis: "cases" });
  });

  it("should require a country", () => {
    expect(() => parseHomeSelection({ analysis: "mobility" })).toThrow(SelectionError);
  });
});

describe("decodeCountryParam", () => {
  it("should decode percent-encoded names", () => {
    expect(decodeCountryParam("United%20Kingdom")).toBe("United Kingdom");
    expect(decodeCountryParam("US")).toBe("US");
  });

  it("should reject malformed segments", () => {
    expect(() => decodeCountryParam("%E0%A4%A")).toThrow(SelectionError);
    expect(() => decodeCountryParam(undefined)).toThrow(SelectionError);
  });
});

describe("analysisPath", () => {
  it("should route each analysis to its view", () => {
    expect(analysisPath("United Kingdom", "cases")).toBe("/countries/United%20Kingdom");
    expect(analysisPath("United Kingdom", "mobility")).toBe("/mobility_and_government_data/United%20Kingdom");
    expect(analysisPath("Korea, South", "weekends")).toBe("/weekend_effect_data/Korea%2C%20South");
  });
});
