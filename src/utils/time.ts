export type Timestamp = number | string | Date;

export function nowMs(): number {
  return Date.now();
}

/**
 * Epoch milliseconds for a timestamp given as epoch ms, a numeric string,
 * an ISO string or a Date. Null when missing or unparsable.
 */
export function toEpochMs(ts: Timestamp | null | undefined): number | null {
  if (ts === null || ts === undefined) return null;
  let ms: number;
  if (ts instanceof Date) ms = ts.getTime();
  else if (typeof ts === "number") ms = ts;
  else if (ts.trim() !== "" && Number.isFinite(Number(ts))) ms = Number(ts);
  else ms = Date.parse(ts);
  return Number.isFinite(ms) ? ms : null;
}

/** Seconds between `ts` and `atMs`, null when `ts` cannot be read. */
export function ageSeconds(ts: Timestamp | null | undefined, atMs: number = nowMs()): number | null {
  const ms = toEpochMs(ts);
  if (ms === null) return null;
  return (atMs - ms) / 1000;
}
