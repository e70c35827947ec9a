// components/Header.tsx
'use client';
import Link from "next/link";
import { usePathname } from "next/navigation";
import CountrySwitcher from "@/components/CountrySwitcher";

const NAV: Array<{ href: string; label: string }> = [
  { href: "/peak_predictions", label: "Peak predictions" },
  { href: "/cross_country_comparisons", label: "Cross-country comparisons" },
];

export default function Header() {
  const pathname = usePathname();

  return (
    <header className="flex items-center justify-between pb-4 border-b">
      <Link href="/" className="text-xl font-semibold">
        COVID Explorer
      </Link>
      <nav className="flex items-center gap-4 text-sm text-gray-600">
        {NAV.map((item) => (
          <Link
            key={item.href}
            className={pathname?.startsWith(item.href) ? "underline" : ""}
            href={item.href}
          >
            {item.label}
          </Link>
        ))}
        <CountrySwitcher />
      </nav>
    </header>
  );
}
