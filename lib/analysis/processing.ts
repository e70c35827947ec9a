import type { CovidTable, PopulationTable, ProcessingConfig } from "@/types/core";
import { lastValue, mapRows } from "@/lib/analysis/table";

export const DEFAULT_PROCESSING_CONFIG: ProcessingConfig = {
  dataType: "infections",
  dailyChange: true,
  rollingAverage: true,
  normaliseByPopulation: true,
  rollingWindow: 7,
  presortCountries: null,
  threshold: null,
  countrySet: null,
};

export function createProcessingConfig(overrides: Partial<ProcessingConfig> = {}): ProcessingConfig {
  return { ...DEFAULT_PROCESSING_CONFIG, ...overrides };
}

export function applyThreshold(table: CovidTable, threshold: number): CovidTable {
  return mapRows(table, (values) => values.map((v) => (v !== null && v >= threshold ? v : null)));
}

export function calculateDailyChanges(table: CovidTable): CovidTable {
  return mapRows(table, (values) =>
    values.map((v, i) => {
      const prev = i > 0 ? values[i - 1] : null;
      return v === null || prev === null ? null : v - prev;
    })
  );
}

/** Trailing mean over `window` values; null until a full window of present values is available. */
export function calculateRollingAverage(table: CovidTable, window: number): CovidTable {
  if (!Number.isInteger(window) || window < 1) {
    throw new RangeError(`Rolling window must be a positive integer, got ${window}`);
  }
  return mapRows(table, (values) =>
    values.map((_, i) => {
      if (i + 1 < window) return null;
      let sum = 0;
      for (let j = i - window + 1; j <= i; j++) {
        const v = values[j];
        if (v === null) return null;
        sum += v;
      }
      return sum / window;
    })
  );
}

/** Highest latest value first; rows whose latest value is missing go last. */
export function sortByLatest(table: CovidTable): CovidTable {
  const rows = [...table.rows].sort((a, b) => {
    const va = lastValue(a.values);
    const vb = lastValue(b.values);
    if (va === null && vb === null) return 0;
    if (va === null) return 1;
    if (vb === null) return -1;
    return vb - va;
  });
  return { dates: table.dates, rows };
}

/** Per million people; countries without a population figure become empty. */
export function normaliseByPopulation(table: CovidTable, population: PopulationTable): CovidTable {
  return mapRows(table, (values, country) => {
    const millions = population.get(country);
    if (millions === undefined || millions <= 0) return values.map(() => null);
    return values.map((v) => (v === null ? null : v / millions));
  });
}

export function filterCountries(table: CovidTable, countries: readonly string[]): CovidTable {
  return { dates: table.dates, rows: table.rows.filter((row) => countries.includes(row.country)) };
}

export function processCovidData(
  table: CovidTable,
  config: ProcessingConfig,
  population: PopulationTable
): CovidTable {
  let data = table;
  if (config.threshold !== null) data = applyThreshold(data, config.threshold);
  if (config.dailyChange) data = calculateDailyChanges(data);
  if (config.rollingAverage) data = calculateRollingAverage(data, config.rollingWindow);
  if (config.presortCountries !== null) {
    const sorted = sortByLatest(data);
    data = { dates: sorted.dates, rows: sorted.rows.slice(0, config.presortCountries) };
  }
  if (config.normaliseByPopulation) data = normaliseByPopulation(data, population);
  if (config.countrySet) data = filterCountries(data, config.countrySet);
  return sortByLatest(data);
}
