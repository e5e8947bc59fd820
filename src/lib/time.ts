// src/lib/time.ts
import { DateTime } from 'luxon';

export const MS_PER_DAY = 86_400_000;

/** Valid luxon instant, re-expressed in UTC. Everything downstream works in UTC. */
export function toUtcInstant(instant: DateTime): DateTime | null {
  if (!DateTime.isDateTime(instant) || !instant.isValid) return null;
  return instant.toUTC();
}

export function shiftDays(instant: DateTime, days: number): DateTime {
  // plain milliseconds: calendar arithmetic would drift across DST in zoned instants
  return DateTime.fromMillis(Math.round(instant.toMillis() + days * MS_PER_DAY), { zone: 'utc' });
}

export function midpoint(a: DateTime, b: DateTime): DateTime {
  return DateTime.fromMillis(Math.floor((a.toMillis() + b.toMillis()) / 2), { zone: 'utc' });
}

/** Julian Day (UT) from a UTC instant: JD = 2440587.5 + ms/86400000. */
export function julianDay(instant: DateTime): number {
  return 2440587.5 + instant.toMillis() / MS_PER_DAY;
}

export function isoString(instant: DateTime): string {
  const iso = instant.toISO();
  if (iso === null) throw new RangeError(`Invalid instant: ${instant.invalidReason ?? 'unknown'}`);
  return iso;
}
