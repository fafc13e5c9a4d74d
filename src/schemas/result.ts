import { z } from "zod";

export const LEDGER_COLUMNS = ["timestamp", "name", "duration"] as const;

const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}$/;

export const QueryResultSchema = z.object({
  timestamp: z.string().regex(TIMESTAMP_PATTERN, "Expected a UTC timestamp with milliseconds"),
  name: z.string().min(1),
  duration: z.number().finite().nonnegative(),
});

// CSV cells arrive as strings; blank durations must not coerce to 0.
export const LedgerRowSchema = z
  .tuple([
    z.string(),
    z.string(),
    z.string().trim().min(1, "Duration is empty").pipe(z.coerce.number()),
  ])
  .transform(([timestamp, name, duration]) => ({ timestamp, name, duration }))
  .pipe(QueryResultSchema);

export type QueryResult = z.infer<typeof QueryResultSchema>;

/** UTC, ISO-8601, millisecond precision, no zone suffix. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 23);
}
