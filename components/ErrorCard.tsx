import Link from "next/link";
import { isAppError, SelectionError } from "@/lib/errors";

export default function ErrorCard({ error, fallback }: { error: unknown; fallback: string }) {
  const issues = error instanceof SelectionError ? error.issues : [];
  const message = issues.length ? "Invalid selection" : isAppError(error) ? error.message : fallback;
  return (
    <div className="card">
      <div className="card-h"><h3 className="font-medium text-red-500">Unable to show this view</h3></div>
      <div className="card-c space-y-2 text-sm">
        <p>{message}</p>
        {issues.length ? (
          <ul className="list-disc ml-6 text-neutral-500">
            {issues.map((issue) => <li key={issue}>{issue}</li>)}
          </ul>
        ) : null}
        <p>
          <Link className="underline" href="/">Back to country selection</Link>
        </p>
      </div>
    </div>
  );
}
