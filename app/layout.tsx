// app/layout.tsx
import type { Metadata } from "next";
import type { ReactNode } from "react";
import "./globals.css";
import Header from "@/components/Header";

export const metadata: Metadata = {
  title: "COVID Explorer",
  description: "Country-level COVID-19 time series, peak predictions and comparisons",
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en" className="h-full">
      <body className="min-h-svh bg-neutral-50 text-neutral-900 antialiased">
        <div className="container mx-auto px-4 py-6">
          <Header />
          <main className="py-6">{children}</main>
        </div>
      </body>
    </html>
  );
}
