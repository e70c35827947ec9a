// components/CountrySwitcher.tsx
'use client';

import { useEffect, useState } from "react";
import { useRouter, usePathname } from "next/navigation";

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

export default function CountrySwitcher() {
  const [countries, setCountries] = useState<string[]>([]);
  const [value, setValue] = useState<string>("");
  const router = useRouter();
  const pathname = usePathname();

  useEffect(() => {
    let active = true;
    (async () => {
      try {
        const res = await fetch("/api/countries", { cache: "no-store" });
        const data: unknown = await res.json();
        if (!active) return;
        const list = typeof data === "object" && data !== null && "countries" in data ? data.countries : null;
        setCountries(isStringList(list) ? list : []);
      } catch (err) {
        if (active) {
          console.error("[CountrySwitcher] failed to load countries", err);
          setCountries([]);
        }
      }
    })();
    return () => {
      active = false;
    };
  }, []);

  useEffect(() => {
    if (!countries.length) return;
    const match = pathname?.match(/^\/countries\/([^/?#]+)/);
    const current = match ? decodeURIComponent(match[1]) : "";
    if (current && countries.includes(current)) {
      setValue(current);
    }
  }, [pathname, countries]);

  return (
    <select
      aria-label="Country"
      value={value}
      onChange={(e) => {
        const next = e.target.value;
        setValue(next);
        if (next) router.push(`/countries/${encodeURIComponent(next)}`);
      }}
      className="rounded-md border border-neutral-300 bg-white px-2 py-1 text-sm text-black"
    >
      <option value="" disabled>Select country…</option>
      {countries.map((c) => (
        <option key={c} value={c}>
          {c}
        </option>
      ))}
    </select>
  );
}
