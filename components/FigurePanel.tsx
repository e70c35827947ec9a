"use client";
import dynamic from 'next/dynamic';
import { useMemo, useState } from 'react';
import type { Figure } from '@/lib/figures';

const Plot = dynamic(() => import('react-plotly.js'), { ssr: false });

type Props = {
  figure: Figure;
  title?: string;
  subtitle?: string;
  emptyMessage?: string;
};

function latestNumber(values: unknown): number | null {
  if (!Array.isArray(values)) return null;
  for (let i = values.length - 1; i >= 0; i--) {
    const v: unknown = values[i];
    if (typeof v === 'number' && Number.isFinite(v)) return v;
  }
  return null;
}

export default function FigurePanel({ figure, title, subtitle, emptyMessage }: Props) {
  const [showPlot, setShowPlot] = useState(true);

  const summaryRows = useMemo(
    () =>
      figure.data.map((trace, idx) => ({
        id: `${trace.name ?? 'trace'}-${idx}`,
        label: trace.name ?? `Series ${idx + 1}`,
        value: latestNumber(trace.y),
      })),
    [figure.data]
  );

  const hasChart = figure.data.length > 0;

  if (!hasChart) {
    return (
      <div className="card">
        <div className="card-h"><h3 className="font-medium">{title ?? 'Chart'}</h3></div>
        <div className="card-c text-sm text-neutral-500">
          {emptyMessage ?? 'No data points are available for this selection.'}
        </div>
      </div>
    );
  }

  return (
    <div className="card">
      <div className="card-h">
        <h3 className="font-medium">{title ?? 'Chart'}</h3>
        {subtitle ? <p className="text-xs text-neutral-500 mt-1">{subtitle}</p> : null}
      </div>
      <div className="card-c space-y-4">
        <div className="space-y-2">
          <button
            type="button"
            className="text-xs font-medium text-sky-600 hover:text-sky-700 transition"
            onClick={() => setShowPlot((prev) => !prev)}
          >
            {showPlot ? 'Hide chart' : 'Show chart'}
          </button>
          {showPlot ? (
            <div className="pt-2">
              <Plot
                data={figure.data}
                layout={{ height: 480, margin: { l: 56, r: 56, t: 64, b: 48 }, ...figure.layout }}
                config={{ displayModeBar: false, responsive: true }}
                style={{ width: '100%', height: '100%' }}
                useResizeHandler
              />
            </div>
          ) : null}
        </div>

        <div className="overflow-x-auto">
          <table className="w-full text-sm">
            <thead>
              <tr className="text-left text-neutral-500">
                <th className="py-1 pr-4">Series</th>
                <th className="py-1 pr-2 text-right">Latest</th>
              </tr>
            </thead>
            <tbody>
              {summaryRows.map((row) => (
                <tr key={row.id} className="border-t border-neutral-200">
                  <td className="py-1 pr-4 text-neutral-700">{row.label}</td>
                  <td className="py-1 pr-2 text-right tabular-nums">
                    {row.value === null ? '—' : row.value.toFixed(2)}
                  </td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      </div>
    </div>
  );
}
