'use client';
import { useMemo, useState } from "react";

export type TableRow = Record<string, string | number | null>;

function display(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return "—";
  if (typeof value === "number") return Number.isInteger(value) ? String(value) : value.toFixed(2);
  return value;
}

export default function SeriesTable({
  rows,
  title,
  note,
}: {
  rows: TableRow[];
  title: string;
  note?: string;
}) {
  const [q, setQ] = useState("");
  const [sortKey, setSortKey] = useState<string | null>(null);
  const [sortDir, setSortDir] = useState<"asc" | "desc">("asc");

  const cols = useMemo(() => Object.keys(rows[0] ?? {}), [rows]);

  const filtered = useMemo(() => {
    const term = q.trim().toLowerCase();
    if (!term) return rows;
    return rows.filter(r =>
      Object.values(r).some(v => String(v ?? "").toLowerCase().includes(term))
    );
  }, [rows, q]);

  const sorted = useMemo(() => {
    if (!sortKey) return filtered;
    const arr = [...filtered];
    arr.sort((a, b) => {
      const va = a[sortKey], vb = b[sortKey];
      if (va == null && vb != null) return 1;
      if (va != null && vb == null) return -1;
      if (typeof va === "number" && typeof vb === "number") {
        return sortDir === "asc" ? va - vb : vb - va;
      }
      const sa = String(va ?? ""), sb = String(vb ?? "");
      return sortDir === "asc" ? sa.localeCompare(sb) : sb.localeCompare(sa);
    });
    return arr;
  }, [filtered, sortKey, sortDir]);

  if (!rows.length) return null;

  return (
    <div className="card">
      <div className="card-h flex items-center gap-2">
        <h3 className="font-medium">{title}</h3>
        <input
          placeholder="Filter…"
          value={q}
          onChange={(e) => setQ(e.target.value)}
          className="ml-auto rounded-md border border-neutral-300 bg-white px-2 py-1 text-sm text-black"
        />
      </div>
      <div className="card-c overflow-auto">
        <table className="min-w-full text-sm">
          <thead>
            <tr>
              {cols.map(c => (
                <th
                  key={c}
                  className="sticky top-0 text-left font-semibold px-2 py-1 border-b cursor-pointer"
                  onClick={() => {
                    if (sortKey === c) setSortDir(d => (d === "asc" ? "desc" : "asc"));
                    setSortKey(c);
                  }}
                >
                  {c}{sortKey === c ? (sortDir === "asc" ? " ▲" : " ▼") : ""}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {sorted.map((r, i) => (
              <tr key={i} className="border-b last:border-0">
                {cols.map(c => (
                  <td key={c} className="px-2 py-1 whitespace-nowrap tabular-nums">{display(r[c])}</td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      </div>
      {note ? <div className="text-xs text-neutral-500 px-4 py-2">{note}</div> : null}
    </div>
  );
}
