import type { ProcessingConfig } from "@/types/core";
import { SELECTION_LIMITS } from "@/lib/constants";

type Option = { value: string; label: string };

export type FormField =
  | { kind: "radio"; name: string; label: string; options: Option[]; value: string }
  | { kind: "select"; name: string; label: string; options: Option[]; values: string[]; multiple?: boolean }
  | { kind: "number"; name: string; label: string; value: number; min: number; max: number };

const YES_NO: Option[] = [
  { value: "yes", label: "Yes" },
  { value: "no", label: "No" },
];

export function yesNoField(name: string, label: string, value: boolean): FormField {
  return { kind: "radio", name, label, options: YES_NO, value: value ? "yes" : "no" };
}

export function processingFields(config: ProcessingConfig): FormField[] {
  return [
    yesNoField("daily", "Daily changes", config.dailyChange),
    yesNoField("rolling", "Rolling average", config.rollingAverage),
    {
      kind: "number",
      name: "window",
      label: "Rolling average window (days)",
      value: config.rollingWindow,
      min: 1,
      max: SELECTION_LIMITS.MAX_WINDOW,
    },
    yesNoField("normalise", "Normalise by population", config.normaliseByPopulation),
  ];
}

function Field({ field }: { field: FormField }) {
  switch (field.kind) {
    case "radio":
      return (
        <fieldset className="space-y-1">
          <legend className="text-sm font-medium">{field.label}</legend>
          <div className="flex flex-wrap gap-3 text-sm">
            {field.options.map((o) => (
              <label key={o.value} className="inline-flex items-center gap-1">
                <input type="radio" name={field.name} value={o.value} defaultChecked={o.value === field.value} />
                {o.label}
              </label>
            ))}
          </div>
        </fieldset>
      );
    case "select":
      return (
        <label className="block space-y-1 text-sm">
          <span className="font-medium">{field.label}</span>
          <select
            name={field.name}
            multiple={field.multiple}
            defaultValue={field.multiple ? field.values : field.values[0]}
            size={field.multiple ? 8 : undefined}
            className="block w-full rounded-md border border-neutral-300 bg-white px-2 py-1 text-black"
          >
            {field.options.map((o) => (
              <option key={o.value} value={o.value}>{o.label}</option>
            ))}
          </select>
        </label>
      );
    case "number":
      return (
        <label className="block space-y-1 text-sm">
          <span className="font-medium">{field.label}</span>
          <input
            type="number"
            name={field.name}
            defaultValue={field.value}
            min={field.min}
            max={field.max}
            className="block w-24 rounded-md border border-neutral-300 bg-white px-2 py-1 text-black"
          />
        </label>
      );
  }
}

/** Plain GET form, so every selection is a shareable URL. */
export default function SelectionForm({
  action,
  fields,
  submitLabel = "Submit selection!",
}: {
  action: string;
  fields: FormField[];
  submitLabel?: string;
}) {
  return (
    <form method="get" action={action} className="card">
      <div className="card-c grid gap-4 md:grid-cols-2">
        {fields.map((field) => (
          <Field key={field.name} field={field} />
        ))}
      </div>
      <div className="card-c pt-0">
        <button
          type="submit"
          className="rounded-lg bg-white text-black px-3 py-1.5 hover:bg-neutral-200 transition"
        >
          {submitLabel}
        </button>
      </div>
    </form>
  );
}
