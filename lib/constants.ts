import type { AnalysisType, DataType, Weekday } from "@/types/core";

export const DATA_FILES = {
  cases: "time_series_covid19_confirmed_global.csv",
  deaths: "time_series_covid19_deaths_global.csv",
  recovered: "time_series_covid19_recovered_global.csv",
  population: "API_SP.POP.TOTL.csv",
  mobility: "Global_Mobility_Report.csv",
  government: "OxCGRT_latest.csv",
  testing: "owid-covid-data.csv",
} as const;

// World Bank / Google / OxCGRT / OWID spelling -> JHU spelling
export const COUNTRY_NAME_MAP: Record<string, string> = {
  "United States": "US",
  "Russian Federation": "Russia",
  "Korea, Rep.": "Korea, South",
  "South Korea": "Korea, South",
  "Iran, Islamic Rep.": "Iran",
  "Czech Republic": "Czechia",
  "Egypt, Arab Rep.": "Egypt",
  "Brunei Darussalam": "Brunei",
  "Congo, Rep.": "Congo (Brazzaville)",
  "Congo, Dem. Rep.": "Congo (Kinshasa)",
  "Kyrgyz Republic": "Kyrgyzstan",
  "Venezuela, RB": "Venezuela",
  "Slovak Republic": "Slovakia",
  "Syrian Arab Republic": "Syria",
  "Lao PDR": "Laos",
  "Yemen, Rep.": "Yemen",
  Myanmar: "Burma",
};

export const NON_COUNTRY_ENTRIES = [
  "Diamond Princess",
  "Holy See",
  "Taiwan*",
  "MS Zaandam",
  "Western Sahara",
];

export const WEEKDAYS: Weekday[] = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
];

export const DATA_TYPES: DataType[] = ["infections", "deaths", "recoveries", "active cases", "tests"];

export const DATA_TYPE_LABELS: Record<DataType, string> = {
  infections: "Infections",
  deaths: "Deaths",
  recoveries: "Recoveries",
  "active cases": "Active cases",
  tests: "Tests",
};

export const SINGULAR_DATA_TYPES: Record<DataType, string> = {
  infections: "infection",
  deaths: "death",
  recoveries: "recovery",
  "active cases": "active case",
  tests: "test",
};

export const ANALYSIS_TYPES: Array<{ key: AnalysisType; label: string }> = [
  { key: "cases", label: "Deaths, infections and recoveries" },
  { key: "mobility", label: "Mobility and government response data" },
  { key: "weekends", label: "Weekend reporting effects" },
];

export const DEFAULT_PEAK_COUNTRIES = ["Belgium", "United Kingdom", "US"];

export const STRINGENCY_VARIABLE = "StringencyIndex";
export const MOBILITY_SUFFIX = "_percent_change_from_baseline";
export const TESTING_VARIABLE = "total_tests";

export const SELECTION_LIMITS = {
  MAX_WINDOW: 60,
  MAX_COMPONENTS: 6,
  MIN_PEAK_POINTS: 5,
  PRESORT_COUNTRIES: 50,
} as const;
