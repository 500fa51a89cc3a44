// src/lib/time.ts
import { DateTime } from 'luxon';
import { InvalidInputError } from './errors';
import { resolveTimezone } from './time/resolveTz';

export const DAYS_PER_YEAR = 365.25;
const MS_PER_DAY = 86_400_000;
const MS_PER_YEAR = DAYS_PER_YEAR * MS_PER_DAY;

export type BirthMoment = {
  date: string;            // YYYY-MM-DD
  time: string;            // HH:MM o HH:MM:SS, ora locale
  timezone?: string | null;
  latitude: number;
  longitude: number;
};

/**
 * Istante di nascita nella zona locale (zona esplicita, altrimenti da coordinate).
 * `defaultTz` vale solo se le coordinate danno una zona sconosciuta a luxon.
 */
export function resolveBirthInstant(birth: BirthMoment, defaultTz: string): DateTime {
  const zone = birth.timezone ?? resolveTimezone(birth.latitude, birth.longitude, defaultTz);
  const dt = DateTime.fromISO(`${birth.date}T${birth.time}`, { zone });
  if (!dt.isValid) {
    const field = dt.invalidReason === 'unsupported zone' ? 'timezone' : 'date';
    throw new InvalidInputError(dt.invalidExplanation ?? dt.invalidReason ?? 'invalid instant', field);
  }
  // luxon sposta in avanti le ore saltate dal DST: le rifiutiamo
  const wall = dt.toFormat(birth.time.length > 5 ? 'HH:mm:ss' : 'HH:mm');
  if (wall !== birth.time) {
    throw new InvalidInputError(`local time ${birth.time} does not exist in ${zone}`, 'time');
  }
  return dt;
}

export function jdFromUTC(dateUTC: Date): number {
  // JD = 2440587.5 + msUTC/86400000
  return 2440587.5 + dateUTC.getTime() / MS_PER_DAY;
}

export function dateFromJd(jd: number): Date {
  return new Date((jd - 2440587.5) * MS_PER_DAY);
}

/** Ora locale decimale, 0..24. */
export function localHour(dt: DateTime): number {
  return dt.hour + dt.minute / 60 + dt.second / 3600;
}

/** Anni (da 365.25 giorni) trascorsi da `from` a `to`; negativi se `to` precede. */
export function yearsBetween(from: DateTime, to: DateTime): number {
  return (to.toMillis() - from.toMillis()) / MS_PER_YEAR;
}

export function plusYears(dt: DateTime, years: number): DateTime {
  return dt.plus({ milliseconds: Math.round(years * MS_PER_YEAR) });
}

export function plusDays(dt: DateTime, days: number): DateTime {
  return dt.plus({ milliseconds: Math.round(days * MS_PER_DAY) });
}

export function isoDay(dt: DateTime): string {
  const s = dt.toISODate();
  if (s === null) throw new InvalidInputError('invalid date', 'date');
  return s;
}
