// src/lib/astro.ts
// Modello dati condiviso della carta: pianeti, segni, ascendente, posizioni.
// Ogni longitudine entra da qui e viene normalizzata una sola volta.

import { InvalidInputError } from './errors';
import { indexIn, normalizeAngle } from './houses/common';
import { houseFromSigns, type HouseNumber } from './houses/whole';
import { nakshatraOf, type NakshatraPosition } from './nakshatra';

export const PLANETS = [
  'Sun', 'Moon', 'Mars', 'Mercury', 'Jupiter', 'Venus', 'Saturn', 'Rahu', 'Ketu',
] as const;

export type Planet = typeof PLANETS[number];

/** Corpi forniti dall'effemeride; Ketu è sempre derivato da Rahu. */
export type EphemerisBody = Exclude<Planet, 'Ketu'>;

export const EPHEMERIS_BODIES: readonly EphemerisBody[] = [
  'Sun', 'Moon', 'Mars', 'Mercury', 'Jupiter', 'Venus', 'Saturn', 'Rahu',
];

export const SIGN_NAMES = [
  'Aries', 'Taurus', 'Gemini', 'Cancer', 'Leo', 'Virgo',
  'Libra', 'Scorpio', 'Sagittarius', 'Capricorn', 'Aquarius', 'Pisces',
] as const;

export type SignName = typeof SIGN_NAMES[number];

export function isPlanet(x: string): x is Planet {
  return PLANETS.some((p) => p === x);
}

export function normalizeDeg(x: number): number {
  if (!Number.isFinite(x)) throw new InvalidInputError(`non-finite angle ${x}`, 'longitude');
  return normalizeAngle(x);
}

/** Indice del segno 0..11 (Aries = 0). */
export function signIndexOf(lon: number): number {
  return indexIn(normalizeDeg(lon) / 30, 11);
}

export function signName(index: number): SignName {
  return SIGN_NAMES[((Math.floor(index) % 12) + 12) % 12];
}

export function signFromLongitude(lon: number): SignName {
  return SIGN_NAMES[signIndexOf(lon)];
}

/** Longitudine siderale = tropicale − ayanamsa. */
export function toSidereal(tropical: number, ayanamsa: number): number {
  return normalizeDeg(tropical - ayanamsa);
}

// ──────────────────────────── Ascendente e posizioni ────────────────────────────

export type Ascendant = Readonly<{
  longitude: number;      // siderale 0..360
  sign: number;           // 0..11
  signName: SignName;
  degreeInSign: number;   // 0..30
  nakshatra: NakshatraPosition;
}>;

export type PlanetPosition = Readonly<{
  planet: Planet;
  longitude: number;      // siderale 0..360
  sign: number;           // 0..11
  signName: SignName;
  degreeInSign: number;
  house: HouseNumber;     // whole sign dall'ascendente
  speed: number;          // gradi/giorno, con segno
  retrograde: boolean;    // speed < 0
  nakshatra: NakshatraPosition;
}>;

export function makeAscendant(siderealLongitude: number): Ascendant {
  const longitude = normalizeDeg(siderealLongitude);
  const sign = signIndexOf(longitude);
  return Object.freeze({
    longitude,
    sign,
    signName: SIGN_NAMES[sign],
    degreeInSign: longitude - sign * 30,
    nakshatra: nakshatraOf(longitude),
  });
}

export function makePlanetPosition(
  planet: Planet,
  siderealLongitude: number,
  speed: number,
  ascendant: Ascendant,
): PlanetPosition {
  if (!Number.isFinite(speed)) throw new InvalidInputError(`non-finite speed for ${planet}`, 'speed');
  const longitude = normalizeDeg(siderealLongitude);
  const sign = signIndexOf(longitude);
  return Object.freeze({
    planet,
    longitude,
    sign,
    signName: SIGN_NAMES[sign],
    degreeInSign: longitude - sign * 30,
    house: houseFromSigns(sign, ascendant.sign),
    speed,
    retrograde: speed < 0,
    nakshatra: nakshatraOf(longitude),
  });
}

/** Nodo discendente: opposto a Rahu, stessa velocità con segno invertito. */
export function deriveKetu(rahu: PlanetPosition, ascendant: Ascendant): PlanetPosition {
  const ketu = makePlanetPosition('Ketu', rahu.longitude + 180, -rahu.speed, ascendant);
  // speed 0: il flag va comunque invertito
  return ketu.retrograde === rahu.retrograde
    ? Object.freeze({ ...ketu, retrograde: !rahu.retrograde })
    : ketu;
}

export function positionOf(
  positions: readonly PlanetPosition[],
  planet: Planet,
): PlanetPosition | undefined {
  return positions.find((p) => p.planet === planet);
}

// ──────────────────────────────── Tabelle fisse ────────────────────────────────

export type Nature = 'benefic' | 'malefic';

export const NATURE: Readonly<Record<Planet, Nature>> = {
  Sun: 'benefic',
  Moon: 'benefic',
  Mars: 'malefic',
  Mercury: 'benefic',
  Jupiter: 'benefic',
  Venus: 'benefic',
  Saturn: 'malefic',
  Rahu: 'malefic',
  Ketu: 'malefic',
};

/** Segni propri (indici 0..11). */
export const OWN_SIGNS: Readonly<Record<Planet, readonly number[]>> = {
  Sun: [4],
  Moon: [3],
  Mars: [0, 7],
  Mercury: [2, 5],
  Jupiter: [8, 11],
  Venus: [1, 6],
  Saturn: [9, 10],
  Rahu: [10],
  Ketu: [7],
};

export const DEBILITATION_SIGN: Readonly<Record<Planet, number>> = {
  Sun: 6,
  Moon: 7,
  Mars: 3,
  Mercury: 11,
  Jupiter: 9,
  Venus: 5,
  Saturn: 0,
  Rahu: 8,
  Ketu: 2,
};

/** Esaltazione: segno e grado di massima esaltazione. */
export const EXALTATION: Readonly<Record<Planet, { sign: number; degree: number }>> = {
  Sun: { sign: 0, degree: 10 },
  Moon: { sign: 1, degree: 3 },
  Mars: { sign: 9, degree: 28 },
  Mercury: { sign: 5, degree: 15 },
  Jupiter: { sign: 3, degree: 5 },
  Venus: { sign: 11, degree: 27 },
  Saturn: { sign: 6, degree: 20 },
  Rahu: { sign: 2, degree: 20 },
  Ketu: { sign: 8, degree: 20 },
};

export type Dignity = 'Exalted' | 'Own' | 'Debilitated' | 'Neutral';

export function dignityOf(planet: Planet, sign: number): Dignity {
  if (EXALTATION[planet].sign === sign) return 'Exalted';
  if (DEBILITATION_SIGN[planet] === sign) return 'Debilitated';
  if (OWN_SIGNS[planet].includes(sign)) return 'Own';
  return 'Neutral';
}

/** Signore di ciascun segno, Aries..Pisces. */
export const SIGN_RULERS: readonly Planet[] = [
  'Mars', 'Venus', 'Mercury', 'Moon', 'Sun', 'Mercury',
  'Venus', 'Mars', 'Jupiter', 'Saturn', 'Saturn', 'Jupiter',
];

export function rulerOfSign(sign: number): Planet {
  return SIGN_RULERS[((Math.floor(sign) % 12) + 12) % 12];
}
