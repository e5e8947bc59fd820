// src/lib/gates/zodiac.ts
export const SIGN_NAMES = [
  'Aries', 'Taurus', 'Gemini', 'Cancer', 'Leo', 'Virgo',
  'Libra', 'Scorpio', 'Sagittarius', 'Capricorn', 'Aquarius', 'Pisces',
] as const;

export type SignName = typeof SIGN_NAMES[number];

/** A point given relative to a sign, e.g. 28°15'00" Pisces. */
export type ZodiacCoordinate = {
  sign: SignName;
  degree: number;
  minute: number;
  second: number;
};

export function signStartDeg(sign: SignName): number {
  return SIGN_NAMES.indexOf(sign) * 30;
}

/**
 * Absolute tropical longitude. Summed in arc-seconds first so that
 * values such as 3°52'30" come out as the exact double 3.875.
 */
export function toDecimalDegrees(c: ZodiacCoordinate): number {
  const arcsec = (signStartDeg(c.sign) + c.degree) * 3600 + c.minute * 60 + c.second;
  return arcsec / 3600;
}
