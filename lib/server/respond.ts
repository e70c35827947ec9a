import { NextResponse } from "next/server";

import { isAppError, SelectionError } from "@/lib/errors";

export function errorResponse(err: unknown, tag: string): NextResponse {
  if (err instanceof SelectionError) {
    return NextResponse.json({ error: err.message, issues: err.issues }, { status: err.status });
  }
  if (isAppError(err) && err.status < 500) {
    return NextResponse.json({ error: err.message }, { status: err.status });
  }
  console.error(`[${tag}] failed`, err);
  return NextResponse.json({ error: "Internal error" }, { status: 500 });
}
