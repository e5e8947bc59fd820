// src/lib/time/birth.ts
// Local birth data → instant with an explicit UTC offset.
// The zone comes from the caller or, failing that, from the coordinates (tz-lookup);
// luxon applies the tzdb offset valid at that local moment (DST included).
import { DateTime, IANAZone } from 'luxon';
import tzlookup from 'tz-lookup';
import { z } from 'zod';
import { BirthInputError } from '@/lib/errors';

export const BirthInputSchema = z
  .object({
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Use YYYY-MM-DD'),
    time: z.string().regex(/^\d{2}:\d{2}(:\d{2})?$/, 'Use HH:MM or HH:MM:SS'),
    tz: z.string().trim().min(1).optional(),
    lat: z.number().min(-90).max(90).optional(),
    lon: z.number().min(-180).max(180).optional(),
  })
  .refine((v) => v.tz !== undefined || (v.lat !== undefined && v.lon !== undefined), {
    message: 'Provide tz, or both lat and lon',
    path: ['tz'],
  });

export type BirthInput = z.infer<typeof BirthInputSchema>;

export type ResolvedTz = {
  tz_name: string;         // e.g. "Europe/Rome"
  offset_minutes: number;  // minutes from UTC at that local moment
};

export function resolveTimezoneForLocalMoment(
  lat: number,
  lon: number,
  dateISO: string,  // "YYYY-MM-DD"
  timeHHMM: string  // "HH:MM" (local)
): ResolvedTz {
  let tz_name: string;
  try {
    tz_name = tzlookup(lat, lon);
  } catch (e) {
    throw new BirthInputError('lat/lon', e instanceof Error ? e.message : 'no timezone for coordinates');
  }
  const dtLocal = DateTime.fromISO(`${dateISO}T${timeHHMM}`, { zone: tz_name });
  if (!dtLocal.isValid) throw new BirthInputError('date/time', dtLocal.invalidExplanation ?? 'invalid local time');
  return { tz_name, offset_minutes: dtLocal.offset };
}

export function resolveBirthInstant(raw: unknown): DateTime {
  const parsed = BirthInputSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new BirthInputError(issue.path.join('.') || 'input', issue.message);
  }
  const { date, time, tz, lat, lon } = parsed.data;

  let zone: string;
  if (tz !== undefined) {
    if (!IANAZone.isValidZone(tz)) throw new BirthInputError('tz', `unknown zone "${tz}"`);
    zone = tz;
  } else if (lat !== undefined && lon !== undefined) {
    zone = resolveTimezoneForLocalMoment(lat, lon, date, time).tz_name;
  } else {
    throw new BirthInputError('tz', 'Provide tz, or both lat and lon');
  }

  const local = DateTime.fromISO(`${date}T${time}`, { zone });
  if (!local.isValid) {
    throw new BirthInputError('date/time', local.invalidExplanation ?? 'invalid local time');
  }
  return local;
}
