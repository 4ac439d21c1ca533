export type Timestamp = number; // epoch ms

export type Clock = () => Timestamp;

export function now(): Timestamp {
  return Date.now();
}

function pad2(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(ts: Timestamp): string {
  const d = new Date(ts);
  return (
    `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} ` +
    `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`
  );
}

const TIMESTAMP_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Inverse of {@link formatTimestamp}. Returns null for empty or malformed
 * input.
 */
export function parseTimestamp(text: string): Timestamp | null {
  const m = TIMESTAMP_RE.exec(text.trim());
  if (!m) return null;
  const [, y, mo, d, h, mi, s] = m.map(Number);
  if (
    y === undefined || mo === undefined || d === undefined ||
    h === undefined || mi === undefined || s === undefined
  ) {
    return null;
  }
  const ts = new Date(y, mo - 1, d, h, mi, s).getTime();
  return Number.isNaN(ts) ? null : ts;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
