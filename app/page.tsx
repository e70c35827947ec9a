// app/page.tsx
import SelectionForm, { type FormField } from "@/components/SelectionForm";
import ErrorCard from "@/components/ErrorCard";
import { ANALYSIS_TYPES } from "@/lib/constants";
import { listAvailableCountries } from "@/lib/server/covidData";

export default async function Home() {
  let countries: string[];
  try {
    countries = await listAvailableCountries();
  } catch (err) {
    console.error("[Home] country list failed", err);
    return <ErrorCard error={err} fallback="Unable to load the list of countries." />;
  }

  const fields: FormField[] = [
    {
      kind: "select",
      name: "country",
      label: "Country",
      options: countries.map((c) => ({ value: c, label: c })),
      values: countries.slice(0, 1),
    },
    {
      kind: "radio",
      name: "analysis",
      label: "Analysis",
      options: ANALYSIS_TYPES.map((a) => ({ value: a.key, label: a.label })),
      value: "cases",
    },
  ];

  return (
    <div className="space-y-4">
      <h2 className="text-lg font-semibold">Choose a country</h2>
      <p className="text-sm text-neutral-600">
        Daily cases, deaths and recoveries, mobility against government response, or the weekday reporting pattern
        for a single country. Use the links above for peak predictions and cross-country comparisons.
      </p>
      {countries.length ? (
        <SelectionForm action="/select" fields={fields} submitLabel="Show analysis" />
      ) : (
        <div className="card">
          <div className="card-c text-sm text-neutral-500">No case data has been loaded yet.</div>
        </div>
      )}
    </div>
  );
}
