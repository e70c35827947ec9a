import type { DataType, ProcessingConfig } from "@/types/core";
import { SINGULAR_DATA_TYPES } from "@/lib/constants";

type TitleConfig = Pick<ProcessingConfig, "dailyChange" | "normaliseByPopulation" | "rollingAverage" | "rollingWindow">;

/** e.g. "Daily infections per million people (as a 7 day rolling average)" */
export function constructYAxisTitle(label: string, config: TitleConfig): string {
  const parts = [config.dailyChange ? "Daily " : "Total ", label];
  if (config.normaliseByPopulation) parts.push(" per million people");
  if (config.rollingAverage) parts.push(` (as a ${config.rollingWindow} day rolling average)`);
  return parts.join("");
}

export function ordinal(n: number): string {
  const mod100 = n % 100;
  if (mod100 >= 11 && mod100 <= 13) return `${n}th`;
  switch (n % 10) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
}

export function daysSinceTitle(threshold: number, dataType: DataType): string {
  return `Days since ${ordinal(threshold)} ${SINGULAR_DATA_TYPES[dataType]}`;
}
