import type { Layout, PlotData } from "plotly.js";

import type {
  AuxiliarySeries,
  ComparisonResult,
  CountrySeriesResult,
  MobilityAndGovernmentResult,
  PeakPredictionResult,
  WeekendEffectResult,
} from "@/types/core";
import { STRINGENCY_VARIABLE, WEEKDAYS } from "@/lib/constants";

export type Trace = Partial<PlotData>;

export type Figure = {
  data: Trace[];
  layout: Partial<Layout>;
};

function humanise(variable: string): string {
  const spaced = variable.replace(/_/g, " ").replace(/([a-z])([A-Z])/g, "$1 $2");
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}

export function countryFigure(result: CountrySeriesResult): Figure {
  return {
    data: result.series.map((s): Trace => ({ type: "scatter", mode: "lines", x: s.dates, y: s.values, name: s.label })),
    layout: { title: { text: result.yAxisTitle } },
  };
}

export function comparisonFigure(result: ComparisonResult): Figure {
  const layout: Partial<Layout> = { title: { text: result.yAxisTitle } };
  if (result.xAxisTitle) layout.xaxis = { title: { text: result.xAxisTitle } };
  return {
    data: result.series.map((s): Trace => ({ type: "scatter", mode: "lines", x: s.x, y: s.y, name: s.country })),
    layout,
  };
}

/**
 * Each country is drawn twice: the full series, then the peak component over
 * it. Countries are ordered by their first date so the overlays stack properly.
 */
export function peaksFigure(result: PeakPredictionResult): Figure {
  const ordered = [...result.predictions].sort((a, b) => (a.dates[0] ?? "").localeCompare(b.dates[0] ?? ""));
  const data: Trace[] = ordered.flatMap((p): Trace[] => [
    { type: "scatter", mode: "lines", connectgaps: false, x: p.dates, y: p.values, name: p.offPeakName },
    { type: "scatter", mode: "lines", connectgaps: false, x: p.peakDates, y: p.peakValues, name: p.peakName },
  ]);
  return {
    data,
    layout: { title: { text: `Predictions of the peaks in various countries<br>${result.yAxisTitle}` } },
  };
}

function auxiliaryTrace(series: AuxiliarySeries, yaxis?: "y2"): Trace {
  const trace: Trace = {
    type: "scatter",
    mode: "lines",
    x: series.dates,
    y: series.values,
    name: humanise(series.variable),
  };
  if (yaxis) trace.yaxis = yaxis;
  return trace;
}

export function mobilityAndGovernmentFigure(result: MobilityAndGovernmentResult): Figure {
  const stringency = result.government.find((s) => s.variable === STRINGENCY_VARIABLE);
  const data: Trace[] = result.mobility.map((s) => auxiliaryTrace(s));
  if (stringency) data.push(auxiliaryTrace(stringency, "y2"));

  const layout: Partial<Layout> = {
    title: { text: `Mobility and government response for ${result.country}` },
    yaxis: { title: { text: "Change in mobility from baseline (%)" } },
    legend: { orientation: "h", y: -0.2 },
  };
  if (stringency) {
    layout.yaxis2 = { overlaying: "y", side: "right", range: [0, 100], title: { text: "Government stringency index" } };
  }
  return { data, layout };
}

export function weekendEffectFigure(result: WeekendEffectResult): Figure {
  return {
    data: [
      {
        type: "bar",
        x: WEEKDAYS,
        y: WEEKDAYS.map((day) => result.effects[day]),
        name: `Weekday share of ${result.dataType}`,
      },
    ],
    layout: {
      title: {
        text: `Differences between actual and expected percentage of ${result.dataType} (under a uniform distribution) for ${result.country}`,
      },
      yaxis: { title: { text: "Percentage points" } },
    },
  };
}
