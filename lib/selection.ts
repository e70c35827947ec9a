import { z } from "zod";

import type { AnalysisType, DataType, ProcessingConfig } from "@/types/core";
import { DEFAULT_PEAK_COUNTRIES, SELECTION_LIMITS } from "@/lib/constants";
import { SelectionError } from "@/lib/errors";
import { createProcessingConfig, DEFAULT_PROCESSING_CONFIG } from "@/lib/analysis/processing";

export type PageSearchParams = Record<string, string | string[] | undefined>;
export type SearchParamsInput = URLSearchParams | PageSearchParams | undefined;

const ARRAY_PARAMS = new Set(["countries"]);

const YesNo = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(["yes", "no"], { errorMap: () => ({ message: "expected yes or no" }) }))
  .transform((v) => v === "yes");

const Country = z.string().trim().min(1, "country is required").max(100);

const DataTypeParam = z.enum(["infections", "deaths", "recoveries", "active cases", "tests"]);

const ProcessingParams = z.object({
  daily: YesNo.optional(),
  rolling: YesNo.optional(),
  normalise: YesNo.optional(),
  window: z.coerce.number().int().min(1).max(SELECTION_LIMITS.MAX_WINDOW).optional(),
});

const PeakParams = ProcessingParams.extend({
  countries: z.array(Country).max(20).optional(),
  components: z.coerce.number().int().min(1).max(SELECTION_LIMITS.MAX_COMPONENTS).optional(),
});

const ComparisonParams = ProcessingParams.extend({
  type: DataTypeParam.optional(),
  adjust: YesNo.optional(),
});

const WeekendParams = z.object({
  type: DataTypeParam.optional(),
});

const HomeParams = z.object({
  country: Country,
  analysis: z.enum(["cases", "mobility", "weekends"]).optional(),
});

/** Repeated keys become arrays for list parameters; otherwise the first value wins. */
export function toRawParams(input: SearchParamsInput): Record<string, string | string[]> {
  const raw: Record<string, string | string[]> = {};
  if (!input) return raw;

  const entries: Array<[string, string]> = [];
  if (input instanceof URLSearchParams) {
    input.forEach((value, key) => entries.push([key, value]));
  } else {
    for (const [key, value] of Object.entries(input)) {
      if (value === undefined) continue;
      for (const v of Array.isArray(value) ? value : [value]) entries.push([key, v]);
    }
  }

  for (const [key, value] of entries) {
    if (ARRAY_PARAMS.has(key)) {
      const list = raw[key];
      raw[key] = Array.isArray(list) ? [...list, value] : [value];
    } else if (!(key in raw)) {
      raw[key] = value;
    }
  }
  return raw;
}

function parseWith<O>(schema: z.ZodType<O, z.ZodTypeDef, unknown>, input: SearchParamsInput): O {
  const parsed = schema.safeParse(toRawParams(input));
  if (!parsed.success) {
    throw new SelectionError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "query"}: ${issue.message}`)
    );
  }
  return parsed.data;
}

function toProcessingConfig(params: z.infer<typeof ProcessingParams>, overrides: Partial<ProcessingConfig> = {}): ProcessingConfig {
  return createProcessingConfig({
    dailyChange: params.daily ?? DEFAULT_PROCESSING_CONFIG.dailyChange,
    rollingAverage: params.rolling ?? DEFAULT_PROCESSING_CONFIG.rollingAverage,
    normaliseByPopulation: params.normalise ?? DEFAULT_PROCESSING_CONFIG.normaliseByPopulation,
    rollingWindow: params.window ?? DEFAULT_PROCESSING_CONFIG.rollingWindow,
    ...overrides,
  });
}

export function parseCountryViewSelection(input: SearchParamsInput): ProcessingConfig {
  return toProcessingConfig(parseWith(ProcessingParams, input));
}

export function parsePeakSelection(input: SearchParamsInput): { config: ProcessingConfig; components: number } {
  const params = parseWith(PeakParams, input);
  const countries = params.countries?.length ? Array.from(new Set(params.countries)) : DEFAULT_PEAK_COUNTRIES;
  return {
    config: toProcessingConfig(params, { countrySet: countries }),
    components: params.components ?? 2,
  };
}

export function parseComparisonSelection(input: SearchParamsInput, adjustThreshold = 10): ProcessingConfig {
  const params = parseWith(ComparisonParams, input);
  return toProcessingConfig(params, {
    dataType: params.type ?? "infections",
    threshold: params.adjust ? adjustThreshold : null,
    presortCountries: SELECTION_LIMITS.PRESORT_COUNTRIES,
  });
}

export function parseWeekendSelection(input: SearchParamsInput): DataType {
  return parseWith(WeekendParams, input).type ?? "deaths";
}

export function parseHomeSelection(input: SearchParamsInput): { country: string; analysis: AnalysisType } {
  const params = parseWith(HomeParams, input);
  return { country: params.country, analysis: params.analysis ?? "cases" };
}

/** Path segments may arrive percent-encoded depending on the router. */
export function decodeCountryParam(raw: string | undefined): string {
  if (!raw) throw new SelectionError(["country: country is required"]);
  try {
    return decodeURIComponent(raw).trim();
  } catch {
    throw new SelectionError([`country: malformed path segment "${raw}"`]);
  }
}

export function analysisPath(country: string, analysis: AnalysisType): string {
  const slug = encodeURIComponent(country);
  switch (analysis) {
    case "mobility":
      return `/mobility_and_government_data/${slug}`;
    case "weekends":
      return `/weekend_effect_data/${slug}`;
    case "cases":
      return `/countries/${slug}`;
  }
}
