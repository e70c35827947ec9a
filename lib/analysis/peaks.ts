import type {
  CovidDatasets,
  CovidTable,
  PeakComponentEstimate,
  PeakPrediction,
  PeakPredictionResult,
  ProcessingConfig,
} from "@/types/core";
import { SELECTION_LIMITS } from "@/lib/constants";
import { daysBetween } from "@/lib/dates";
import { fitGaussianMixture } from "@/lib/analysis/gmm";
import { processCovidData } from "@/lib/analysis/processing";
import { dropMissing, requireRow } from "@/lib/analysis/table";
import { constructYAxisTitle } from "@/lib/plotting";

export interface PeakOptions {
  threshold?: number;
  countrySet?: readonly string[] | null;
  components?: number;
}

/**
 * Inserts a null date/value pair between dates that are not consecutive days,
 * so a line trace with connectgaps disabled breaks there.
 */
export function addGapsForNonConsecutiveDates(
  dates: string[],
  values: number[]
): { dates: Array<string | null>; values: Array<number | null> } {
  if (!dates.length) return { dates: [], values: [] };
  const outDates: Array<string | null> = [dates[0]];
  const outValues: Array<number | null> = [values[0]];
  for (let i = 1; i < dates.length; i++) {
    if (daysBetween(dates[i - 1], dates[i]) !== 1) {
      outDates.push(null);
      outValues.push(null);
    }
    outDates.push(dates[i]);
    outValues.push(values[i]);
  }
  return { dates: outDates, values: outValues };
}

function estimateComponents(
  dates: string[],
  values: number[],
  labels: number[],
  fitted: Array<{ mean: number; variance: number; weight: number }>
): PeakComponentEstimate[] {
  const peakIdx = fitted.length - 1;
  return fitted.map((component, j) => {
    let days = 0;
    let firstDate: string | null = null;
    let lastDate: string | null = null;
    let peakDate: string | null = null;
    let peakValue: number | null = null;
    labels.forEach((label, i) => {
      if (label !== j) return;
      days++;
      firstDate ??= dates[i];
      lastDate = dates[i];
      if (peakValue === null || values[i] > peakValue) {
        peakValue = values[i];
        peakDate = dates[i];
      }
    });
    return {
      ...component,
      mean: days > 0 ? component.mean : null,
      isPeak: j === peakIdx,
      days,
      firstDate,
      lastDate,
      peakDate,
      peakValue,
    };
  });
}

/**
 * Splits each country's series into mixture components; the component with the
 * highest mean is the peak. Series that never reach the threshold, or are too
 * short to fit, are skipped.
 */
export function predictPeaks(table: CovidTable, options: PeakOptions = {}): PeakPrediction[] {
  const { threshold = 10, countrySet = null, components = 2 } = options;
  const minPoints = Math.max(SELECTION_LIMITS.MIN_PEAK_POINTS, components);
  const predictions: PeakPrediction[] = [];

  for (const row of table.rows) {
    if (countrySet && !countrySet.includes(row.country)) continue;
    const present = dropMissing(table.dates, row.values);
    const start = present.values.findIndex((v) => v >= threshold);
    if (start < 0) continue;
    const dates = present.dates.slice(start);
    const values = present.values.slice(start);
    if (values.length < minPoints) continue;

    const fit = fitGaussianMixture(values, { components });
    const peakIdx = fit.components.length - 1;
    const peakDays = fit.labels.flatMap((label, i) => (label === peakIdx ? [i] : []));
    const gapped = addGapsForNonConsecutiveDates(
      peakDays.map((i) => dates[i]),
      peakDays.map((i) => values[i])
    );

    predictions.push({
      country: row.country,
      dates,
      values,
      components: estimateComponents(dates, values, fit.labels, fit.components),
      peakDates: gapped.dates,
      peakValues: gapped.values,
      peakName: `${row.country} - Peak`,
      offPeakName: `${row.country} - Off-peak`,
    });
  }
  return predictions;
}

export function getPeakPredictions(
  datasets: CovidDatasets,
  config: ProcessingConfig,
  options: { threshold: number; components: number }
): PeakPredictionResult {
  const { cases } = datasets.covid;
  const countrySet = config.countrySet ?? [];
  for (const country of countrySet) requireRow(cases, country, "cases");

  const processed = processCovidData(cases, config, datasets.population);
  return {
    yAxisTitle: constructYAxisTitle("infections", config),
    components: options.components,
    threshold: options.threshold,
    predictions: predictPeaks(processed, {
      threshold: options.threshold,
      countrySet: config.countrySet,
      components: options.components,
    }),
  };
}
