import type {
  ComparisonResult,
  ComparisonSeries,
  CountrySeriesResult,
  CovidDatasets,
  CovidTable,
  LabelledSeries,
  ProcessingConfig,
} from "@/types/core";
import { SELECTION_LIMITS } from "@/lib/constants";
import { processCovidData } from "@/lib/analysis/processing";
import { dropMissing, findRow, requireRow, tableFor } from "@/lib/analysis/table";
import { constructYAxisTitle, daysSinceTitle } from "@/lib/plotting";

const COUNTRY_VIEW_TABLES: Array<{ label: string; pick: (d: CovidDatasets) => CovidTable }> = [
  { label: "Deaths", pick: (d) => d.covid.deaths },
  { label: "Cases", pick: (d) => d.covid.cases },
  { label: "Recoveries", pick: (d) => d.covid.recovered },
];

export function getCountrySeries(
  datasets: CovidDatasets,
  country: string,
  config: ProcessingConfig
): CountrySeriesResult {
  requireRow(datasets.covid.cases, country, "cases");
  const scoped: ProcessingConfig = { ...config, countrySet: [country] };

  const series: LabelledSeries[] = COUNTRY_VIEW_TABLES.map(({ label, pick }) => {
    const processed = processCovidData(pick(datasets), scoped, datasets.population);
    const row = findRow(processed, country);
    if (!row) return { label, dates: [], values: [] };
    return { label, ...dropMissing(processed.dates, row.values) };
  });

  return {
    country,
    yAxisTitle: constructYAxisTitle("deaths, infections and recoveries", config),
    series,
  };
}

/**
 * Leading countries for one data type. With a threshold the x axis becomes the
 * number of days since each country first reached it.
 */
export function getComparisonSeries(
  datasets: CovidDatasets,
  config: ProcessingConfig,
  limit: number
): ComparisonResult {
  const presorted: ProcessingConfig = {
    ...config,
    presortCountries: config.presortCountries ?? SELECTION_LIMITS.PRESORT_COUNTRIES,
  };
  const processed = processCovidData(tableFor(datasets.covid, config.dataType), presorted, datasets.population);

  const series: ComparisonSeries[] = [];
  for (const row of processed.rows.slice(0, limit)) {
    const present = dropMissing(processed.dates, row.values);
    if (!present.values.length) continue;
    series.push({
      country: row.country,
      x: config.threshold !== null ? present.values.map((_, i) => i) : present.dates,
      y: present.values,
    });
  }

  return {
    dataType: config.dataType,
    yAxisTitle: constructYAxisTitle(config.dataType, config),
    xAxisTitle: config.threshold !== null ? daysSinceTitle(config.threshold, config.dataType) : null,
    series,
  };
}
