import { describe, it, expect } from "vitest";
import {
  comparisonFigure,
  countryFigure,
  mobilityAndGovernmentFigure,
  peaksFigure,
  weekendEffectFigure,
} from "@/lib/figures";
import type { PeakPrediction } from "@/types/core";

function prediction(country: string, firstDate: string): PeakPrediction {
  return {
    country,
    dates: [firstDate],
    values: [1],
    components: [],
    peakDates: [firstDate],
    peakValues: [1],
    peakName: `${country} - Peak`,
    offPeakName: `${country} - Off-peak`,
  };
}

describe("countryFigure", () => {
  it("should draw one line per series", () => {
    const figure = countryFigure({
      country: "Belgium",
      yAxisTitle: "Total deaths, infections and recoveries",
      series: [
        { label: "Deaths", dates: ["2020-03-01"], values: [1] },
        { label: "Cases", dates: ["2020-03-01"], values: [10] },
      ],
    });
    expect(figure.data.map((t) => t.name)).toEqual(["Deaths", "Cases"]);
    expect(figure.data[1].y).toEqual([10]);
    expect(figure.layout.title).toEqual({ text: "Total deaths, infections and recoveries" });
  });
});

describe("comparisonFigure", () => {
  it("should label the x axis only when aligned on a threshold", () => {
    const aligned = comparisonFigure({
      dataType: "deaths",
      yAxisTitle: "Total deaths",
      xAxisTitle: "Days since 10th death",
      series: [{ country: "Belgium", x: [0, 1], y: [11, 16] }],
    });
    expect(aligned.layout.xaxis).toEqual({ title: { text: "Days since 10th death" } });

    const byDate = comparisonFigure({ dataType: "deaths", yAxisTitle: "Total deaths", xAxisTitle: null, series: [] });
    expect(byDate.layout.xaxis).toBeUndefined();
  });
});

describe("peaksFigure", () => {
  it("should order countries by their first date and draw the peak over the full series", () => {
    const figure = peaksFigure({
      yAxisTitle: "Total infections",
      components: 2,
      threshold: 10,
      predictions: [prediction("B", "2020-03-05"), prediction("A", "2020-03-01")],
    });
    expect(figure.data.map((t) => t.name)).toEqual(["A - Off-peak", "A - Peak", "B - Off-peak", "B - Peak"]);
    expect(figure.data.every((t) => t.connectgaps === false)).toBe(true);
    expect(figure.layout.title).toEqual({ text: "Predictions of the peaks in various countries<br>Total infections" });
  });
});

describe("mobilityAndGovernmentFigure", () => {
  it("should put the stringency index on a secondary axis", () => {
    const figure = mobilityAndGovernmentFigure({
      country: "Belgium",
      mobility: [{ variable: "retail_and_recreation", dates: ["2020-02-15"], values: [5] }],
      government: [
        { variable: "StringencyIndex", dates: ["2020-02-15"], values: [11.11] },
        { variable: "GovernmentResponseIndex", dates: ["2020-02-15"], values: [12] },
      ],
    });
    expect(figure.data.map((t) => t.name)).toEqual(["Retail and recreation", "Stringency Index"]);
    expect(figure.data[0].yaxis).toBeUndefined();
    expect(figure.data[1].yaxis).toBe("y2");
    expect(figure.layout.yaxis2?.range).toEqual([0, 100]);
  });

  it("should omit the secondary axis without a stringency index", () => {
    const figure = mobilityAndGovernmentFigure({
      country: "Belgium",
      mobility: [{ variable: "parks", dates: ["2020-02-15"], values: [10] }],
      government: [],
    });
    expect(figure.data).toHaveLength(1);
    expect(figure.layout.yaxis2).toBeUndefined();
  });
});

describe("weekendEffectFigure", () => {
  it("should draw a bar per weekday starting on Sunday", () => {
    const figure = weekendEffectFigure({
      country: "Belgium",
      dataType: "deaths",
      effects: { Sunday: 1, Monday: 2, Tuesday: 3, Wednesday: null, Thursday: 5, Friday: 6, Saturday: 7 },
    });
    expect(figure.data[0].type).toBe("bar");
    expect(figure.data[0].x).toEqual(["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"]);
    expect(figure.data[0].y).toEqual([1, 2, 3, null, 5, 6, 7]);
  });
});
