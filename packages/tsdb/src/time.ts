/**
 * Nanosecond timestamps.
 *
 * Times are `bigint` nanoseconds since the Unix epoch so values such as
 * `1.000000002s` survive storage and formatting without rounding.
 */

export const NANOS_PER_MILLI = 1_000_000n;
export const NANOS_PER_SECOND = 1_000_000_000n;

/** Smallest and largest representable timestamps */
export const MIN_TIME = -(2n ** 63n) + 2n;
export const MAX_TIME = 2n ** 63n - 1n;

/** Timestamp precision accepted by the line protocol parser */
export type Precision = 'ns' | 'u' | 'ms' | 's' | 'm' | 'h';

const PRECISION_NANOS: Record<Precision, bigint> = {
  ns: 1n,
  u: 1_000n,
  ms: NANOS_PER_MILLI,
  s: NANOS_PER_SECOND,
  m: 60n * NANOS_PER_SECOND,
  h: 3600n * NANOS_PER_SECOND,
};

export function precisionMultiplier(precision: Precision): bigint {
  return PRECISION_NANOS[precision];
}

export function dateToNanos(date: Date): bigint {
  return BigInt(date.getTime()) * NANOS_PER_MILLI;
}

export function nowNanos(): bigint {
  return dateToNanos(new Date());
}

/**
 * Format as RFC3339 in UTC with up to nine fractional digits and trailing
 * zeros removed, e.g. `1970-01-01T00:00:01.000000002Z` or `1970-01-01T00:00:01Z`.
 */
export function formatRFC3339Nano(ns: bigint): string {
  const seconds = floorDiv(ns, NANOS_PER_SECOND);
  const fraction = ns - seconds * NANOS_PER_SECOND;
  const base = new Date(Number(seconds) * 1000).toISOString().slice(0, 19);
  if (fraction === 0n) return `${base}Z`;
  const digits = fraction.toString().padStart(9, '0').replace(/0+$/, '');
  return `${base}.${digits}Z`;
}

/**
 * Parse an RFC3339 timestamp with up to nine fractional digits
 */
export function parseRFC3339Nano(text: string): bigint | null {
  const match = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})$/.exec(text);
  if (!match?.[1] || !match[3]) return null;
  const millis = Date.parse(`${match[1]}${match[3]}`);
  if (Number.isNaN(millis)) return null;
  const fraction = BigInt((match[2] ?? '').padEnd(9, '0'));
  return BigInt(millis) * NANOS_PER_MILLI + fraction;
}

function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b;
  return a % b !== 0n && a < 0n !== b < 0n ? q - 1n : q;
}
