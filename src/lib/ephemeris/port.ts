// src/lib/ephemeris/port.ts
import type { DateTime } from 'luxon';

/** Every body of a bodygraph, in chart order. */
export const BODY_NAMES = [
  'Sun', 'Earth', 'Moon', 'NorthNode', 'SouthNode',
  'Mercury', 'Venus', 'Mars', 'Jupiter', 'Saturn',
  'Uranus', 'Neptune', 'Pluto',
] as const;

export type Body = typeof BODY_NAMES[number];

export const ALL_BODIES: readonly Body[] = Object.freeze([...BODY_NAMES]);

const BODY_SET = new Set<string>(ALL_BODIES);

export function isBody(x: unknown): x is Body {
  return typeof x === 'string' && BODY_SET.has(x);
}

/**
 * Geocentric tropical ecliptic longitude provider.
 * Implementations return degrees in [0, 360) and reject with EphemerisError
 * for bodies or instants they cannot handle. Instants carry an explicit offset;
 * implementations must not reinterpret them in a local zone.
 */
export type EphemerisPort = {
  longitudeOf: (body: Body, instant: DateTime) => Promise<number>;
};
