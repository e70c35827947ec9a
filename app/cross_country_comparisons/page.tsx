import ErrorCard from "@/components/ErrorCard";
import FigurePanel from "@/components/FigurePanel";
import SelectionForm, { processingFields, yesNoField, type FormField } from "@/components/SelectionForm";
import { getComparisonSeries } from "@/lib/analysis/countrySeries";
import { getConfig } from "@/lib/config";
import { DATA_TYPE_LABELS, DATA_TYPES } from "@/lib/constants";
import { comparisonFigure } from "@/lib/figures";
import { loadCovidDatasets } from "@/lib/server/covidData";
import { parseComparisonSelection, type PageSearchParams } from "@/lib/selection";

export default async function CrossCountryComparisonsPage({ searchParams }: { searchParams: PageSearchParams }) {
  try {
    const appConfig = getConfig();
    const config = parseComparisonSelection(searchParams, appConfig.peakThreshold);
    const datasets = await loadCovidDatasets(appConfig);
    const result = getComparisonSeries(datasets, config, appConfig.comparisonCountries);

    const fields: FormField[] = [
      {
        kind: "radio",
        name: "type",
        label: "Data type",
        options: DATA_TYPES.map((t) => ({ value: t, label: DATA_TYPE_LABELS[t] })),
        value: config.dataType,
      },
      yesNoField("adjust", `Align countries on the day they reached ${appConfig.peakThreshold}`, config.threshold !== null),
      ...processingFields(config),
    ];

    return (
      <div className="space-y-4">
        <h2 className="text-lg font-semibold">Cross-country comparisons</h2>
        <SelectionForm action="/cross_country_comparisons" fields={fields} />
        <FigurePanel
          figure={comparisonFigure(result)}
          title={`${DATA_TYPE_LABELS[result.dataType]}: leading ${appConfig.comparisonCountries} countries`}
        />
      </div>
    );
  } catch (err) {
    console.error("[CrossCountryComparisonsPage] comparison failed", err);
    return <ErrorCard error={err} fallback="Unable to compare countries." />;
  }
}
