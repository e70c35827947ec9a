export const runtime = "nodejs";
import { NextResponse } from "next/server";

import { SelectionError } from "@/lib/errors";
import { analysisPath, parseHomeSelection } from "@/lib/selection";

// Target of the home page form: forwards to the view for the chosen analysis.
export function GET(req: Request) {
  const url = new URL(req.url);
  try {
    const { country, analysis } = parseHomeSelection(url.searchParams);
    return NextResponse.redirect(new URL(analysisPath(country, analysis), url));
  } catch (err) {
    if (err instanceof SelectionError) {
      return NextResponse.redirect(new URL("/", url));
    }
    throw err;
  }
}
