import path from "node:path";
import { z } from "zod";

import { ConfigError } from "@/lib/errors";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  COVID_DATA_DIR: z.string().min(1).optional(),
  POPULATION_YEAR: z.string().regex(/^\d{4}$/, "expected a four digit year").default("2018"),
  PEAK_THRESHOLD: z.coerce.number().positive().default(10),
  COMPARISON_COUNTRIES: z.coerce.number().int().min(1).max(50).default(10),
});

export type AppConfig = {
  dataDir: string;
  populationYear: string;
  peakThreshold: number;
  comparisonCountries: number;
  cacheDatasets: boolean;
};

// Read on every call so tests (and `next dev`) pick up env changes.
export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join("; ")}`);
  }
  const e = parsed.data;
  return {
    dataDir: e.COVID_DATA_DIR ?? path.join(process.cwd(), "public", "data"),
    populationYear: e.POPULATION_YEAR,
    peakThreshold: e.PEAK_THRESHOLD,
    comparisonCountries: e.COMPARISON_COUNTRIES,
    cacheDatasets: e.NODE_ENV === "production",
  };
}
