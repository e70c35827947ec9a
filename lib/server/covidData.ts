import path from "node:path";
import fs from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";

import type {
  AuxiliaryData,
  AuxiliarySeries,
  AuxiliaryTable,
  CountryRow,
  CovidDatasets,
  CovidTable,
  LatestCovidData,
  PopulationTable,
} from "@/types/core";
import { getConfig, type AppConfig } from "@/lib/config";
import {
  COUNTRY_NAME_MAP,
  DATA_FILES,
  MOBILITY_SUFFIX,
  NON_COUNTRY_ENTRIES,
  TESTING_VARIABLE,
} from "@/lib/constants";
import { compactDateToIso, compareIso, isIsoDate, jhuDateToIso } from "@/lib/dates";
import { emptyTable, listCountries } from "@/lib/analysis/table";

type CsvRecord = Record<string, string>;

const CsvRowsSchema = z.array(z.array(z.string()));

const datasetCache = new Map<string, CovidDatasets>();

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readTextIfPresent(absPath: string): Promise<string | null> {
  try {
    return await fs.readFile(absPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      console.warn(`[covidData] ${path.basename(absPath)} not found in ${path.dirname(absPath)}; using an empty table`);
      return null;
    }
    throw err;
  }
}

export function parseCsv(raw: string): string[][] {
  const rows: unknown = parse(raw, { skip_empty_lines: true, relax_column_count: true, bom: true });
  return CsvRowsSchema.parse(rows);
}

function toRecords(rows: string[][]): CsvRecord[] {
  const [header, ...body] = rows;
  if (!header) return [];
  return body.map((cells) => {
    const record: CsvRecord = {};
    header.forEach((column, i) => {
      record[column] = cells[i] ?? "";
    });
    return record;
  });
}

export function parseNumber(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  if (!trimmed) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function canonicalCountryName(name: string): string {
  return COUNTRY_NAME_MAP[name] ?? name;
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * JHU CSSE wide layout: one row per province, one column per day. Provinces are
 * summed into their country and cruise ships / non-country entries are dropped.
 */
export function parseJhuTimeSeries(rows: string[][]): CovidTable {
  const [header, ...body] = rows;
  if (!header) return emptyTable();

  const countryIdx = header.indexOf("Country/Region");
  if (countryIdx < 0) throw new Error("JHU time series is missing the Country/Region column");

  const dateColumns: Array<{ idx: number; iso: string }> = [];
  header.forEach((column, idx) => {
    const iso = jhuDateToIso(column);
    if (iso) dateColumns.push({ idx, iso });
  });

  const grouped = new Map<string, Array<number | null>>();
  for (const cells of body) {
    const country = (cells[countryIdx] ?? "").trim();
    if (!country || NON_COUNTRY_ENTRIES.includes(country)) continue;
    const totals: Array<number | null> = grouped.get(country) ?? dateColumns.map(() => null);
    dateColumns.forEach(({ idx }, i) => {
      const value = parseNumber(cells[idx]);
      if (value === null) return;
      totals[i] = (totals[i] ?? 0) + value;
    });
    grouped.set(country, totals);
  }

  return {
    dates: dateColumns.map((c) => c.iso),
    rows: Array.from(grouped.keys())
      .sort(byName)
      .map((country) => ({ country, values: grouped.get(country) ?? [] })),
  };
}

/** cases − (deaths + recovered); null wherever a figure is missing. */
export function deriveActiveCases(cases: CovidTable, deaths: CovidTable, recovered: CovidTable): CovidTable {
  const lookup = (table: CovidTable) => {
    const dateIdx = new Map(table.dates.map((d, i) => [d, i]));
    const rows = new Map(table.rows.map((row) => [row.country, row.values]));
    return (country: string, date: string): number | null => {
      const values = rows.get(country);
      const i = dateIdx.get(date);
      if (!values || i === undefined) return null;
      return values[i] ?? null;
    };
  };
  const deathsAt = lookup(deaths);
  const recoveredAt = lookup(recovered);

  return {
    dates: cases.dates,
    rows: cases.rows.map((row) => ({
      country: row.country,
      values: row.values.map((value, i) => {
        const date = cases.dates[i];
        const d = deathsAt(row.country, date);
        const r = recoveredAt(row.country, date);
        if (value === null || d === null || r === null) return null;
        return value - (d + r);
      }),
    })),
  };
}

/** OWID long layout; missing days carry the last reported total forward. */
export function parseTestingData(rows: string[][]): CovidTable {
  const perCountry = new Map<string, Map<string, number>>();
  const allDates = new Set<string>();

  for (const record of toRecords(rows)) {
    const date = (record.date ?? "").trim();
    if (!isIsoDate(date)) continue;
    allDates.add(date);
    const value = parseNumber(record[TESTING_VARIABLE]);
    if (value === null) continue;
    const country = canonicalCountryName((record.location ?? "").trim());
    if (!country) continue;
    const byDate = perCountry.get(country) ?? new Map<string, number>();
    byDate.set(date, value);
    perCountry.set(country, byDate);
  }

  const dates = Array.from(allDates).sort(compareIso);
  const tableRows: CountryRow[] = Array.from(perCountry.keys())
    .sort(byName)
    .map((country) => {
      const byDate = perCountry.get(country) ?? new Map<string, number>();
      let last: number | null = null;
      const values = dates.map((date) => {
        const value = byDate.get(date);
        if (value !== undefined) last = value;
        return last;
      });
      return { country, values };
    });

  return { dates, rows: tableRows };
}

export function cleanWorldBankName(raw: string): string {
  let name = raw.trim();
  const parts = name.split(",");
  if (parts.length > 1 && parts[1] === " The") name = parts[0];
  if (name.includes("St.")) name = name.replaceAll("St.", "Saint");
  return canonicalCountryName(name);
}

/** World Bank CSV export, which starts with a few lines of metadata before the header. */
export function parsePopulationData(raw: string, year: string): Map<string, number> {
  const lines = raw.replace(/^\uFEFF/, "").split(/\r?\n/);
  const headerAt = lines.findIndex((line) => /^"?Country Name"?,/.test(line));
  const body = headerAt >= 0 ? lines.slice(headerAt).join("\n") : raw;

  const population = new Map<string, number>();
  for (const record of toRecords(parseCsv(body))) {
    const name = record["Country Name"];
    const value = parseNumber(record[year]);
    if (!name || value === null) continue;
    population.set(cleanWorldBankName(name), value / 1_000_000);
  }
  return population;
}

type AuxiliaryPoint = { country: string; date: string; variable: string; value: number | null };

export function buildAuxiliaryTable(points: AuxiliaryPoint[]): AuxiliaryTable {
  const byCountry = new Map<string, { dates: Set<string>; variables: Map<string, Map<string, number | null>> }>();

  for (const point of points) {
    const entry = byCountry.get(point.country) ?? {
      dates: new Set<string>(),
      variables: new Map<string, Map<string, number | null>>(),
    };
    entry.dates.add(point.date);
    const series = entry.variables.get(point.variable) ?? new Map<string, number | null>();
    series.set(point.date, point.value);
    entry.variables.set(point.variable, series);
    byCountry.set(point.country, entry);
  }

  const table = new Map<string, AuxiliarySeries[]>();
  for (const [country, entry] of byCountry) {
    const dates = Array.from(entry.dates).sort(compareIso);
    const series: AuxiliarySeries[] = [];
    for (const [variable, byDate] of entry.variables) {
      const values = dates.map((date) => byDate.get(date) ?? null);
      if (values.every((v) => v === null)) continue;
      series.push({ variable, dates, values });
    }
    if (series.length) table.set(country, series);
  }
  return table;
}

const MOBILITY_REGION_COLUMNS = ["sub_region_1", "sub_region_2", "metro_area"];

/** Google community mobility report; only national rows (no sub-region or metro area) are kept. */
export function parseMobilityData(rows: string[][]): AuxiliaryTable {
  const header = rows[0] ?? [];
  const percentColumns = header.filter((column) => column.includes("percent_change"));
  const points: AuxiliaryPoint[] = [];

  for (const record of toRecords(rows)) {
    if (MOBILITY_REGION_COLUMNS.some((column) => (record[column] ?? "").trim())) continue;
    const date = (record.date ?? "").trim();
    const country = canonicalCountryName((record.country_region ?? "").trim());
    if (!country || !isIsoDate(date)) continue;
    for (const column of percentColumns) {
      points.push({
        country,
        date,
        variable: column.replace(MOBILITY_SUFFIX, ""),
        value: parseNumber(record[column]),
      });
    }
  }
  return buildAuxiliaryTable(points);
}

const GOVERNMENT_ID_COLUMNS = ["CountryName", "CountryCode", "Date", "RegionName", "RegionCode", "Jurisdiction"];

/** OxCGRT policy tracker; sub-national rows (with a RegionName) are skipped. */
export function parseGovernmentData(rows: string[][]): AuxiliaryTable {
  const header = rows[0] ?? [];
  const indicatorColumns = header.filter((column) => !GOVERNMENT_ID_COLUMNS.includes(column));
  const points: AuxiliaryPoint[] = [];

  for (const record of toRecords(rows)) {
    if ((record.RegionName ?? "").trim()) continue;
    const date = compactDateToIso(record.Date ?? "");
    const country = canonicalCountryName((record.CountryName ?? "").trim());
    if (!country || !date) continue;
    for (const column of indicatorColumns) {
      points.push({ country, date, variable: column, value: parseNumber(record[column]) });
    }
  }
  return buildAuxiliaryTable(points);
}

async function loadCsv(dataDir: string, file: string): Promise<string[][] | null> {
  const raw = await readTextIfPresent(path.join(dataDir, file));
  return raw === null ? null : parseCsv(raw);
}

async function loadJhuTable(dataDir: string, file: string): Promise<CovidTable> {
  const rows = await loadCsv(dataDir, file);
  return rows ? parseJhuTimeSeries(rows) : emptyTable();
}

async function loadLatestCovidData(dataDir: string): Promise<LatestCovidData> {
  const [cases, deaths, recovered, testingRows] = await Promise.all([
    loadJhuTable(dataDir, DATA_FILES.cases),
    loadJhuTable(dataDir, DATA_FILES.deaths),
    loadJhuTable(dataDir, DATA_FILES.recovered),
    loadCsv(dataDir, DATA_FILES.testing),
  ]);
  return {
    cases,
    deaths,
    recovered,
    active: deriveActiveCases(cases, deaths, recovered),
    tests: testingRows ? parseTestingData(testingRows) : emptyTable(),
  };
}

async function loadPopulation(dataDir: string, year: string): Promise<PopulationTable> {
  const raw = await readTextIfPresent(path.join(dataDir, DATA_FILES.population));
  return raw === null ? new Map() : parsePopulationData(raw, year);
}

async function loadAuxiliaryData(dataDir: string): Promise<AuxiliaryData> {
  const [mobilityRows, governmentRows] = await Promise.all([
    loadCsv(dataDir, DATA_FILES.mobility),
    loadCsv(dataDir, DATA_FILES.government),
  ]);
  return {
    mobility: mobilityRows ? parseMobilityData(mobilityRows) : new Map(),
    government: governmentRows ? parseGovernmentData(governmentRows) : new Map(),
  };
}

export async function loadCovidDatasets(config: AppConfig = getConfig()): Promise<CovidDatasets> {
  const cacheKey = `${config.dataDir}::${config.populationYear}`;
  const cached = config.cacheDatasets ? datasetCache.get(cacheKey) : undefined;
  if (cached) return cached;

  const [covid, population, auxiliary] = await Promise.all([
    loadLatestCovidData(config.dataDir),
    loadPopulation(config.dataDir, config.populationYear),
    loadAuxiliaryData(config.dataDir),
  ]);

  const datasets: CovidDatasets = {
    dataDir: config.dataDir,
    loadedAt: new Date().toISOString(),
    covid,
    population,
    auxiliary,
  };

  console.info(
    `[covidData] loaded ${covid.cases.rows.length} countries over ${covid.cases.dates.length} days from ${config.dataDir}`
  );

  if (config.cacheDatasets) datasetCache.set(cacheKey, datasets);
  return datasets;
}

export async function listAvailableCountries(config: AppConfig = getConfig()): Promise<string[]> {
  const { covid } = await loadCovidDatasets(config);
  return listCountries(covid.cases);
}

export function clearDatasetCache(): void {
  datasetCache.clear();
}
