/** Window units accepted in a rate string, mapped to their length in seconds. */
export const PERIOD_SECONDS = {
  second: 1,
  minute: 60,
  hour: 3600,
  day: 86400,
} as const;

export type RatePeriod = keyof typeof PERIOD_SECONDS;

export interface RateLimit {
  /** Requests allowed per window. */
  limit: number;
  period: RatePeriod;
}

/** Route key → rate. The `default` entry applies to route keys with no entry of their own. */
export type RateLimitTable = Record<string, RateLimit>;

export const DEFAULT_RATE_LIMIT_KEY = "default";

/** Built-in limits, overridable per key through RATE_LIMITS. */
export const DEFAULT_RATE_LIMITS: Readonly<Record<string, string>> = {
  login: "15/minute",
  register: "10/minute",
  "token-refresh": "30/minute",
  "password-change": "10/minute",
  [DEFAULT_RATE_LIMIT_KEY]: "100/day",
};

// Accepts both "30/minute" and "5 per minute".
const RATE_PATTERN = /^(\d+)\s*(?:\/|\s+per\s+)\s*([a-z]+?)s?$/i;

function isRatePeriod(value: string): value is RatePeriod {
  return Object.hasOwn(PERIOD_SECONDS, value);
}

/** Length of a window unit in seconds. Throws on an unknown unit. */
export function periodToSeconds(period: string): number {
  if (!isRatePeriod(period)) {
    throw new Error(`Invalid rate limit period: ${period}`);
  }
  return PERIOD_SECONDS[period];
}

/**
 * Parse a rate string such as `"15/minute"` or `"5 per minute"`.
 * Throws when the count is not a positive integer or the period is unknown.
 */
export function parseRate(raw: string): RateLimit {
  const match = RATE_PATTERN.exec(raw.trim());
  if (!match) {
    throw new Error(`Invalid rate limit "${raw}": expected "<count>/<period>"`);
  }
  const limit = Number.parseInt(match[1] ?? "", 10);
  const period = (match[2] ?? "").toLowerCase();
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`Invalid rate limit "${raw}": count must be a positive integer`);
  }
  if (!isRatePeriod(period)) {
    throw new Error(`Invalid rate limit period: ${period}`);
  }
  return { limit, period };
}

/**
 * Build the rate-limit table from the built-in defaults plus a
 * comma-separated list of `routeKey=rate` overrides.
 * Example: "login=5/minute,transcriptions=10 per minute"
 */
export function parseRateLimitTable(raw: string | undefined): RateLimitTable {
  const entries: Record<string, string> = { ...DEFAULT_RATE_LIMITS };

  if (raw) {
    for (const pair of raw
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean)) {
      const eq = pair.indexOf("=");
      const key = eq > 0 ? pair.slice(0, eq).trim() : "";
      if (!key) {
        throw new Error(`Invalid RATE_LIMITS entry "${pair}": missing route key`);
      }
      entries[key] = pair.slice(eq + 1).trim();
    }
  }

  const table: RateLimitTable = {};
  for (const [key, rate] of Object.entries(entries)) {
    table[key] = parseRate(rate);
  }
  return table;
}
