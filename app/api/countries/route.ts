export const runtime = "nodejs";
import { NextResponse } from "next/server";

import { listAvailableCountries } from "@/lib/server/covidData";
import { errorResponse } from "@/lib/server/respond";

export async function GET() {
  try {
    const countries = await listAvailableCountries();
    return NextResponse.json({ countries });
  } catch (err) {
    return errorResponse(err, "api/countries");
  }
}
