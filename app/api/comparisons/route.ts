export const runtime = "nodejs";
import { NextResponse } from "next/server";

import { getConfig } from "@/lib/config";
import { getComparisonSeries } from "@/lib/analysis/countrySeries";
import { loadCovidDatasets } from "@/lib/server/covidData";
import { errorResponse } from "@/lib/server/respond";
import { parseComparisonSelection } from "@/lib/selection";

export async function GET(req: Request) {
  try {
    const appConfig = getConfig();
    const config = parseComparisonSelection(new URL(req.url).searchParams, appConfig.peakThreshold);
    const datasets = await loadCovidDatasets(appConfig);
    return NextResponse.json(getComparisonSeries(datasets, config, appConfig.comparisonCountries));
  } catch (err) {
    return errorResponse(err, "api/comparisons");
  }
}
