import ErrorCard from "@/components/ErrorCard";
import FigurePanel from "@/components/FigurePanel";
import SelectionForm, { processingFields, type FormField } from "@/components/SelectionForm";
import SeriesTable, { type TableRow } from "@/components/SeriesTable";
import { getPeakPredictions } from "@/lib/analysis/peaks";
import { listCountries } from "@/lib/analysis/table";
import { getConfig } from "@/lib/config";
import { SELECTION_LIMITS } from "@/lib/constants";
import { peaksFigure } from "@/lib/figures";
import { loadCovidDatasets } from "@/lib/server/covidData";
import { parsePeakSelection, type PageSearchParams } from "@/lib/selection";
import type { PeakPredictionResult } from "@/types/core";

function componentRows(result: PeakPredictionResult): TableRow[] {
  return result.predictions.flatMap((p) =>
    p.components.map((c, idx) => ({
      country: p.country,
      component: idx + 1,
      peak: c.isPeak ? "yes" : "no",
      days: c.days,
      from: c.firstDate,
      to: c.lastDate,
      peak_date: c.peakDate,
      peak_value: c.peakValue,
      mean: c.mean,
      weight: c.weight,
    }))
  );
}

export default async function PeakPredictionsPage({ searchParams }: { searchParams: PageSearchParams }) {
  try {
    const appConfig = getConfig();
    const { config, components } = parsePeakSelection(searchParams);
    const datasets = await loadCovidDatasets(appConfig);
    const result = getPeakPredictions(datasets, config, { threshold: appConfig.peakThreshold, components });

    const fields: FormField[] = [
      {
        kind: "select",
        name: "countries",
        label: "Countries",
        multiple: true,
        options: listCountries(datasets.covid.cases).map((c) => ({ value: c, label: c })),
        values: config.countrySet ?? [],
      },
      {
        kind: "number",
        name: "components",
        label: "Mixture components",
        value: components,
        min: 1,
        max: SELECTION_LIMITS.MAX_COMPONENTS,
      },
      ...processingFields(config),
    ];

    return (
      <div className="space-y-4">
        <h2 className="text-lg font-semibold">Peak predictions</h2>
        <SelectionForm action="/peak_predictions" fields={fields} />
        <FigurePanel
          figure={peaksFigure(result)}
          title="Predicted peaks"
          subtitle={`Days above ${result.threshold} split into ${result.components} Gaussian mixture components`}
          emptyMessage="None of the selected countries has enough data above the threshold."
        />
        <SeriesTable rows={componentRows(result)} title="Mixture components" note="The peak is the component with the highest mean value." />
      </div>
    );
  } catch (err) {
    console.error("[PeakPredictionsPage] prediction failed", err);
    return <ErrorCard error={err} fallback="Unable to compute peak predictions." />;
  }
}
