const UNITS = [
  { name: "day", ms: 86_400_000 },
  { name: "hour", ms: 3_600_000 },
  { name: "minute", ms: 60_000 },
  { name: "second", ms: 1_000 },
] as const;

/** Observed overhead per request on top of the rate limit delay. */
export const REQUEST_OVERHEAD_MS = 1_600;

/** "2 hours and 5 minutes", "1 day, 3 hours and 20 seconds". */
export function formatDuration(ms: number): string {
  let remaining = Math.max(0, Math.floor(ms / 1000) * 1000);
  const parts: string[] = [];
  for (const unit of UNITS) {
    const count = Math.floor(remaining / unit.ms);
    remaining -= count * unit.ms;
    if (count > 0) parts.push(`${count} ${unit.name}${count === 1 ? "" : "s"}`);
  }
  if (parts.length === 0) return "0 seconds";
  if (parts.length === 1) return parts[0] ?? "";
  const last = parts.pop();
  return `${parts.join(", ")} and ${last}`;
}

export function estimateRemaining(requests: number, rateLimitMs: number): string {
  return formatDuration(Math.max(1, requests) * (rateLimitMs + REQUEST_OVERHEAD_MS));
}
