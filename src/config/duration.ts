/**
 * Parse a duration string like "5m", "30s", "48h", "1h30m" into milliseconds.
 * Supported units: h (hours), m (minutes), s (seconds), ms (milliseconds).
 * At least one unit must be specified.
 */
export function parseDuration(input: string): number {
  const trimmed = input.trim();
  if (trimmed === "") {
    throw new Error(`Invalid duration string: "${input}"`);
  }

  const tokenRe = /(\d+)(ms|s|m|h)/g;
  let totalMs = 0;
  let matchedLen = 0;

  for (const match of trimmed.matchAll(tokenRe)) {
    const value = parseInt(match[1] ?? "0", 10);
    matchedLen += match[0].length;

    switch (match[2]) {
      case "h":
        totalMs += value * 3600_000;
        break;
      case "m":
        totalMs += value * 60_000;
        break;
      case "s":
        totalMs += value * 1000;
        break;
      case "ms":
        totalMs += value;
        break;
    }
  }

  if (matchedLen !== trimmed.length || totalMs <= 0) {
    throw new Error(`Invalid duration string: "${input}"`);
  }

  return totalMs;
}

/** Renders milliseconds back in the largest exact units, e.g. 5400000 -> "1h30m". */
export function formatDuration(ms: number): string {
  if (ms <= 0) return "0s";
  const parts: string[] = [];
  let rest = ms;
  const h = Math.floor(rest / 3600_000);
  rest -= h * 3600_000;
  const m = Math.floor(rest / 60_000);
  rest -= m * 60_000;
  const s = Math.floor(rest / 1000);
  rest -= s * 1000;
  if (h) parts.push(`${h}h`);
  if (m) parts.push(`${m}m`);
  if (s) parts.push(`${s}s`);
  if (rest) parts.push(`${rest}ms`);
  return parts.join("");
}
