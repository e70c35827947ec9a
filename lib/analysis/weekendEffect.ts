import type { CovidDatasets, CovidTable, DataType, Weekday, WeekendEffectResult } from "@/types/core";
import { WEEKDAYS } from "@/lib/constants";
import { isoWeekday } from "@/lib/dates";
import { calculateDailyChanges } from "@/lib/analysis/processing";
import { requireRow, tableFor } from "@/lib/analysis/table";

function emptyEffects(): Record<Weekday, number | null> {
  return {
    Sunday: null,
    Monday: null,
    Tuesday: null,
    Wednesday: null,
    Thursday: null,
    Friday: null,
    Saturday: null,
  };
}

/**
 * Percentage points by which each weekday's share of the reported daily
 * figures differs from a uniform 1/7 spread.
 */
export function analyseWeekendEffect(table: CovidTable, country: string, dataset = "deaths"): Record<Weekday, number | null> {
  const row = requireRow(table, country, dataset);
  const daily = calculateDailyChanges({ dates: table.dates, rows: [row] }).rows[0]?.values ?? [];

  const sums = WEEKDAYS.map(() => 0);
  daily.forEach((value, i) => {
    if (value === null) return;
    sums[isoWeekday(table.dates[i])] += value;
  });
  const total = sums.reduce((s, v) => s + v, 0);

  const effects = emptyEffects();
  if (total === 0) return effects;
  WEEKDAYS.forEach((day, i) => {
    effects[day] = (sums[i] / total - 1 / 7) * 100;
  });
  return effects;
}

export function getWeekendEffect(datasets: CovidDatasets, country: string, dataType: DataType): WeekendEffectResult {
  return {
    country,
    dataType,
    effects: analyseWeekendEffect(tableFor(datasets.covid, dataType), country, dataType),
  };
}
