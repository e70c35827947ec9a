import path from "node:path";
import { fileURLToPath } from "node:url";

import type { CovidTable } from "@/types/core";

export const FIXTURES_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), "fixtures", "data");

/** Consecutive ISO days starting at `start`. */
export function isoDays(start: string, count: number): string[] {
  const first = Date.parse(`${start}T00:00:00Z`);
  return Array.from({ length: count }, (_, i) => new Date(first + i * 86_400_000).toISOString().slice(0, 10));
}

export function table(start: string, rows: Record<string, Array<number | null>>): CovidTable {
  const length = Math.max(0, ...Object.values(rows).map((v) => v.length));
  return {
    dates: isoDays(start, length),
    rows: Object.entries(rows).map(([country, values]) => ({ country, values })),
  };
}
