import { describe, it, expect } from "vitest";
import { addGapsForNonConsecutiveDates, predictPeaks } from "@/lib/analysis/peaks";
import { table } from "./fixtures";

describe("addGapsForNonConsecutiveDates", () => {
  it("should insert a null pair where days are skipped", () => {
    expect(addGapsForNonConsecutiveDates(["2020-03-01", "2020-03-02", "2020-03-05"], [1, 2, 3])).toEqual({
      dates: ["2020-03-01", "2020-03-02", null, "2020-03-05"],
      values: [1, 2, null, 3],
    });
  });

  it("should leave consecutive days alone", () => {
    expect(addGapsForNonConsecutiveDates(["2020-02-28", "2020-02-29", "2020-03-01"], [1, 2, 3])).toEqual({
      dates: ["2020-02-28", "2020-02-29", "2020-03-01"],
      values: [1, 2, 3],
    });
  });

  it("should handle an empty series", () => {
    expect(addGapsForNonConsecutiveDates([], [])).toEqual({ dates: [], values: [] });
  });
});

describe("predictPeaks", () => {
  const data = table("2020-03-01", {
    A: [0, 20, 21, 22, 20, 21, 100, 101, 102, 99, 100, 101],
    B: [0, 1, 2, 3, 4, 5, 5, 5, 5, 5, 5, 5],
    C: [0, 0, 0, 0, 0, 0, 0, 0, 0, 50, 60, 70],
  });

  it("should split a country into an off-peak and a peak component", () => {
    const [a] = predictPeaks(data, { threshold: 10 });
    expect(a.country).toBe("A");
    expect(a.dates[0]).toBe("2020-03-02");
    expect(a.values).toHaveLength(11);
    expect(a.peakDates).toEqual(["2020-03-07", "2020-03-08", "2020-03-09", "2020-03-10", "2020-03-11", "2020-03-12"]);
    expect(a.peakValues).toEqual([100, 101, 102, 99, 100, 101]);
    expect(a.peakName).toBe("A - Peak");
    expect(a.offPeakName).toBe("A - Off-peak");
  });

  it("should summarise every component", () => {
    const [a] = predictPeaks(data, { threshold: 10 });
    const [offPeak, peak] = a.components;
    expect(offPeak).toMatchObject({
      isPeak: false,
      days: 5,
      firstDate: "2020-03-02",
      lastDate: "2020-03-06",
      peakDate: "2020-03-04",
      peakValue: 22,
    });
    expect(peak).toMatchObject({
      isPeak: true,
      days: 6,
      firstDate: "2020-03-07",
      lastDate: "2020-03-12",
      peakDate: "2020-03-09",
      peakValue: 102,
    });
    expect(peak.mean).toBeCloseTo(100.5, 6);
  });

  it("should skip countries below the threshold or with too few points", () => {
    expect(predictPeaks(data, { threshold: 10 }).map((p) => p.country)).toEqual(["A"]);
  });

  it("should leave the mean of an unused component empty", () => {
    const flat = table("2020-03-01", { A: Array.from({ length: 10 }, () => 20) });
    const [a] = predictPeaks(flat, { threshold: 10, components: 6 });
    expect(a.components).toHaveLength(6);
    const peak = a.components[5];
    expect(peak.isPeak).toBe(true);
    expect(peak.days).toBe(10);
    expect(peak.mean).toBeCloseTo(20, 6);
    const unused = a.components.slice(0, 5);
    expect(unused.map((c) => c.days)).toEqual([0, 0, 0, 0, 0]);
    expect(unused.map((c) => c.mean)).toEqual([null, null, null, null, null]);
  });

  it("should honour the country set", () => {
    expect(predictPeaks(data, { threshold: 10, countrySet: ["B"] })).toEqual([]);
  });
});
