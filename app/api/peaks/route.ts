export const runtime = "nodejs";
import { NextResponse } from "next/server";

import { getConfig } from "@/lib/config";
import { getPeakPredictions } from "@/lib/analysis/peaks";
import { loadCovidDatasets } from "@/lib/server/covidData";
import { errorResponse } from "@/lib/server/respond";
import { parsePeakSelection } from "@/lib/selection";

export async function GET(req: Request) {
  try {
    const appConfig = getConfig();
    const { config, components } = parsePeakSelection(new URL(req.url).searchParams);
    const datasets = await loadCovidDatasets(appConfig);
    const result = getPeakPredictions(datasets, config, { threshold: appConfig.peakThreshold, components });
    return NextResponse.json(result);
  } catch (err) {
    return errorResponse(err, "api/peaks");
  }
}
