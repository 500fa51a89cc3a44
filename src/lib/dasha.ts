// src/lib/dasha.ts
// Vimshottari: ciclo di 120 anni diviso tra 9 corpi, a partire dal nakshatra della Luna.

import type { DateTime } from 'luxon';
import type { Planet, PlanetPosition } from './astro';
import { MissingDependencyError } from './errors';
import { nakshatraOf, type NakshatraPosition } from './nakshatra';
import { DAYS_PER_YEAR, isoDay, plusYears, yearsBetween } from './time';
import dashaText from './data/dasha.json';

export const DASHA_ORDER: readonly Planet[] = [
  'Ketu', 'Venus', 'Sun', 'Moon', 'Mars', 'Rahu', 'Jupiter', 'Saturn', 'Mercury',
];

export const DASHA_YEARS: Readonly<Record<Planet, number>> = {
  Ketu: 7,
  Venus: 20,
  Sun: 6,
  Moon: 10,
  Mars: 7,
  Rahu: 18,
  Jupiter: 16,
  Saturn: 19,
  Mercury: 17,
};

export const DASHA_CYCLE_YEARS = 120;

/**
 * Signore del periodo per ciascuno dei 27 nakshatra.
 * I segmenti sono raggruppati a terne sull'ordine del ciclo: Rohini (3) → Venus.
 */
export const NAKSHATRA_LORDS: readonly Planet[] = [
  'Ketu', 'Ketu', 'Ketu',
  'Venus', 'Venus', 'Venus',
  'Sun', 'Sun', 'Sun',
  'Moon', 'Moon', 'Moon',
  'Mars', 'Mars', 'Mars',
  'Rahu', 'Rahu', 'Rahu',
  'Jupiter', 'Jupiter', 'Jupiter',
  'Saturn', 'Saturn', 'Saturn',
  'Mercury', 'Mercury', 'Mercury',
];

export type DashaCharacteristics = {
  duration: string;
  signification: string;
  positiveEffects: string;
  negativeEffects: string;
  bestFor: string;
  challenges: string;
};

const CHARACTERISTICS: Readonly<Record<Planet, DashaCharacteristics>> = dashaText;

export function dashaCharacteristics(planet: Planet): DashaCharacteristics {
  return CHARACTERISTICS[planet];
}

export type DashaBalance = {
  lord: Planet;
  durationYears: number;
  fraction: number;        // posizione della Luna nel nakshatra, 0..1
  elapsedYears: number;    // già trascorsi alla nascita
  remainingYears: number;  // ancora da vivere alla nascita
  remainingMonths: number;
};

export type DashaPeriod = {
  planet: Planet;
  durationYears: number;
  startYears: number;      // offset dalla nascita; il primo è negativo
  endYears: number;
  startDate: string;       // YYYY-MM-DD
  endDate: string;
  isCurrent: boolean;
  remainingFraction: number | null; // solo per il periodo in corso alla nascita
};

export type AntarDashaPeriod = DashaPeriod & {
  mahaDasha: Planet;
  months: number;
  days: number;
};

export type DashaReport = {
  moonNakshatra: NakshatraPosition;
  balance: DashaBalance;
  timeline: DashaPeriod[];
  current: DashaPeriod;
  next: DashaPeriod | null;
  antar: AntarDashaPeriod[];
  currentAntar: AntarDashaPeriod;
  characteristics: DashaCharacteristics;
};

/** Ordine del ciclo ruotato in modo da partire da `lord`. */
export function rotationFrom(lord: Planet): Planet[] {
  const i = DASHA_ORDER.indexOf(lord);
  return [...DASHA_ORDER.slice(i), ...DASHA_ORDER.slice(0, i)];
}

export function dashaBalance(moonLongitude: number): DashaBalance {
  const nak = nakshatraOf(moonLongitude);
  const lord = NAKSHATRA_LORDS[nak.index];
  const durationYears = DASHA_YEARS[lord];
  const fraction = Math.min(1, Math.max(0, nak.fraction));
  const remainingYears = durationYears * (1 - fraction);
  return {
    lord,
    durationYears,
    fraction,
    elapsedYears: durationYears - remainingYears,
    remainingYears,
    remainingMonths: remainingYears * 12,
  };
}

function containsAge(startYears: number, endYears: number, age: number): boolean {
  return age >= startYears && age < endYears;
}

/** Indice del periodo che contiene `age`; fuori dalla finestra si usa il primo o l'ultimo. */
function currentIndex(periods: readonly { startYears: number; endYears: number }[], age: number): number {
  const i = periods.findIndex((p) => containsAge(p.startYears, p.endYears, age));
  if (i >= 0) return i;
  return age < periods[0].startYears ? 0 : periods.length - 1;
}

export function mahaDashaTimeline(
  balance: DashaBalance,
  birth: DateTime,
  ageYears = 0,
): DashaPeriod[] {
  let cursor = -balance.elapsedYears;
  const periods = rotationFrom(balance.lord).map((planet): DashaPeriod => {
    const durationYears = DASHA_YEARS[planet];
    const startYears = cursor;
    const endYears = startYears + durationYears;
    cursor = endYears;
    return {
      planet,
      durationYears,
      startYears,
      endYears,
      startDate: isoDay(plusYears(birth, startYears)),
      endDate: isoDay(plusYears(birth, endYears)),
      isCurrent: false,
      remainingFraction: null,
    };
  });
  periods[0].remainingFraction = balance.remainingYears / balance.durationYears;
  periods[currentIndex(periods, ageYears)].isCurrent = true;
  return periods;
}

/** Sotto-periodi di una MahaDasha: durata(sub) = D × anni(sub) / 120. */
export function antarDashas(
  maha: DashaPeriod,
  birth: DateTime,
  ageYears = 0,
): AntarDashaPeriod[] {
  let cursor = maha.startYears;
  const subs = rotationFrom(maha.planet).map((planet): AntarDashaPeriod => {
    const durationYears = (maha.durationYears * DASHA_YEARS[planet]) / DASHA_CYCLE_YEARS;
    const startYears = cursor;
    const endYears = startYears + durationYears;
    cursor = endYears;
    return {
      planet,
      mahaDasha: maha.planet,
      durationYears,
      startYears,
      endYears,
      startDate: isoDay(plusYears(birth, startYears)),
      endDate: isoDay(plusYears(birth, endYears)),
      isCurrent: false,
      remainingFraction: null,
      months: durationYears * 12,
      days: durationYears * DAYS_PER_YEAR,
    };
  });
  subs[currentIndex(subs, ageYears)].isCurrent = true;
  return subs;
}

export function computeDasha(
  moonLongitude: number,
  birth: DateTime,
  opts: { asOf?: DateTime } = {},
): DashaReport {
  const age = opts.asOf ? yearsBetween(birth, opts.asOf) : 0;
  const balance = dashaBalance(moonLongitude);
  const timeline = mahaDashaTimeline(balance, birth, age);
  const ci = timeline.findIndex((p) => p.isCurrent);
  const current = timeline[ci];
  const antar = antarDashas(current, birth, age);
  const currentAntar = antar.find((a) => a.isCurrent) ?? antar[0];
  return {
    moonNakshatra: nakshatraOf(moonLongitude),
    balance,
    timeline,
    current,
    next: timeline[ci + 1] ?? null,
    antar,
    currentAntar,
    characteristics: dashaCharacteristics(current.planet),
  };
}

/** La Dasha dipende dalla Luna: senza Luna l'intera derivazione fallisce. */
export function requireMoon(positions: readonly PlanetPosition[]): PlanetPosition {
  const moon = positions.find((p) => p.planet === 'Moon');
  if (!moon) throw new MissingDependencyError('ephemeris', 'Moon longitude is required for the dasha timeline', 'Moon');
  return moon;
}
