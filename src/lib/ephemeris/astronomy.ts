// src/lib/ephemeris/astronomy.ts
// EphemerisPort backed by astronomy-engine: geocentric, true ecliptic of date.
import { Body as AstroBody, GeoVector, Ecliptic } from 'astronomy-engine';
import type { DateTime } from 'luxon';
import { EphemerisError } from '@/lib/errors';
import { julianDay, toUtcInstant } from '@/lib/time';
import { isBody, type Body, type EphemerisPort } from '@/lib/ephemeris/port';

export const SUPPORTED_YEARS = { min: 1000, max: 3000 } as const;

type PlanetBody = Exclude<Body, 'Earth' | 'NorthNode' | 'SouthNode'>;

const BODY_MAP: Record<PlanetBody, AstroBody> = {
  Sun:     AstroBody.Sun,
  Moon:    AstroBody.Moon,
  Mercury: AstroBody.Mercury,
  Venus:   AstroBody.Venus,
  Mars:    AstroBody.Mars,
  Jupiter: AstroBody.Jupiter,
  Saturn:  AstroBody.Saturn,
  Uranus:  AstroBody.Uranus,
  Neptune: AstroBody.Neptune,
  Pluto:   AstroBody.Pluto,
};

export function normDeg(x: number): number {
  const d = ((x % 360) + 360) % 360;
  return d === 360 ? 0 : d;
}

function rad(d: number): number { return (d * Math.PI) / 180; }

function planetLongitude(body: PlanetBody, when: Date): number {
  const vec = GeoVector(BODY_MAP[body], when, /*aberration*/ true);
  return normDeg(Ecliptic(vec).elon);
}

/**
 * True ascending lunar node (Meeus, Astronomical Algorithms ch. 47):
 * mean node plus the five largest periodic terms.
 */
export function trueNodeLongitude(jd: number): number {
  const T = (jd - 2451545.0) / 36525;
  const T2 = T * T;
  const T3 = T2 * T;
  const T4 = T3 * T;

  const D = 297.8501921 + 445267.1114034 * T - 0.0018819 * T2 + T3 / 545868 - T4 / 113065000;
  const M = 357.5291092 + 35999.0502909 * T - 0.0001536 * T2 + T3 / 24490000;
  const Mp = 134.9633964 + 477198.8675055 * T + 0.0087414 * T2 + T3 / 69699 - T4 / 14712000;
  const F = 93.2720950 + 483202.0175233 * T - 0.0036539 * T2 - T3 / 3526000 + T4 / 863310000;
  const meanNode = 125.0445479 - 1934.1362891 * T + 0.0020754 * T2 + T3 / 467441 - T4 / 60616000;

  const trueNode = meanNode
    - 1.4979 * Math.sin(rad(2 * (D - F)))
    - 0.1500 * Math.sin(rad(M))
    - 0.1226 * Math.sin(rad(2 * D))
    + 0.1176 * Math.sin(rad(2 * F))
    - 0.0801 * Math.sin(rad(2 * (Mp - F)));

  return normDeg(trueNode);
}

function rawLongitude(body: Body, utc: DateTime): number {
  const when = utc.toJSDate();
  switch (body) {
    case 'Earth':     return normDeg(planetLongitude('Sun', when) + 180);
    case 'NorthNode': return trueNodeLongitude(julianDay(utc));
    case 'SouthNode': return normDeg(trueNodeLongitude(julianDay(utc)) + 180);
    default:          return planetLongitude(body, when);
  }
}

export function createAstronomyEphemeris(): EphemerisPort {
  return {
    async longitudeOf(body, instant) {
      const utc = toUtcInstant(instant);
      if (!utc) throw new EphemerisError(body, instant, 'instant is not a valid luxon DateTime');
      if (!isBody(body)) {
        throw new EphemerisError(body, instant, 'unsupported body');
      }
      if (utc.year < SUPPORTED_YEARS.min || utc.year > SUPPORTED_YEARS.max) {
        throw new EphemerisError(
          body, instant, `year ${utc.year} outside supported range ${SUPPORTED_YEARS.min}..${SUPPORTED_YEARS.max}`
        );
      }
      try {
        return rawLongitude(body, utc);
      } catch (e) {
        throw new EphemerisError(body, instant, e instanceof Error ? e.message : 'astronomy-engine failure', { cause: e });
      }
    },
  };
}
