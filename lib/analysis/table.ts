import type { CountryRow, CovidTable, DataType, LatestCovidData } from "@/types/core";
import { CountryNotFoundError } from "@/lib/errors";

export function emptyTable(): CovidTable {
  return { dates: [], rows: [] };
}

export function listCountries(table: CovidTable): string[] {
  return table.rows.map((row) => row.country);
}

export function findRow(table: CovidTable, country: string): CountryRow | undefined {
  return table.rows.find((row) => row.country === country);
}

export function requireRow(table: CovidTable, country: string, dataset: string): CountryRow {
  const row = findRow(table, country);
  if (!row) throw new CountryNotFoundError(country, dataset);
  return row;
}

export function mapRows(
  table: CovidTable,
  fn: (values: Array<number | null>, country: string) => Array<number | null>
): CovidTable {
  return {
    dates: table.dates,
    rows: table.rows.map((row) => ({ country: row.country, values: fn(row.values, row.country) })),
  };
}

/** Dates and values of a row with the missing points removed. */
export function dropMissing(dates: string[], values: Array<number | null>): { dates: string[]; values: number[] } {
  const keptDates: string[] = [];
  const keptValues: number[] = [];
  values.forEach((value, i) => {
    if (value === null || Number.isNaN(value)) return;
    keptDates.push(dates[i]);
    keptValues.push(value);
  });
  return { dates: keptDates, values: keptValues };
}

export function lastValue(values: Array<number | null>): number | null {
  return values.length ? values[values.length - 1] : null;
}

export function tableFor(covid: LatestCovidData, dataType: DataType): CovidTable {
  switch (dataType) {
    case "infections":
      return covid.cases;
    case "deaths":
      return covid.deaths;
    case "recoveries":
      return covid.recovered;
    case "active cases":
      return covid.active;
    case "tests":
      return covid.tests;
  }
}
