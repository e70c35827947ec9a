import type { CovidDatasets, MobilityAndGovernmentResult } from "@/types/core";
import { CountryNotFoundError } from "@/lib/errors";

export function getMobilityAndGovernmentSeries(datasets: CovidDatasets, country: string): MobilityAndGovernmentResult {
  const { mobility, government } = datasets.auxiliary;
  const mobilitySeries = mobility.get(country) ?? [];
  const governmentSeries = government.get(country) ?? [];
  if (!mobilitySeries.length && !governmentSeries.length) {
    throw new CountryNotFoundError(country, "mobility and government response");
  }
  return { country, mobility: mobilitySeries, government: governmentSeries };
}
