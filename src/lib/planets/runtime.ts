// src/lib/planets/runtime.ts
// Effemeride di default su astronomy-engine: longitudine eclittica geocentrica
// "of date" (tropicale) e moto giornaliero, più il nodo lunare medio.

import { Body, AstroTime, GeoVector, Ecliptic } from 'astronomy-engine';
import type { EphemerisBody } from '../astro';
import { normalizeAngle } from '../houses/common';
import { dateFromJd } from '../time';

export type MaybePromise<T> = T | Promise<T>;

export type BodyMotion = {
  longitude: number; // tropicale, gradi 0..360
  speed: number;     // gradi/giorno con segno
};

export type Site = { latitude: number; longitude: number };

/** Collaboratore esterno: posizioni tropicali per un Giorno Giuliano. */
export interface EphemerisProvider {
  bodies(jd: number, site?: Site): MaybePromise<Partial<Record<EphemerisBody, BodyMotion>>>;
}

const J2000 = 2451545.0;

function signedDeltaDeg(a: number, b: number): number {
  // ritorna a-b in (-180, +180]
  let d = a - b;
  if (d > 180) d -= 360;
  if (d <= -180) d += 360;
  return d;
}

function eclipticLongitude(body: Body, t: AstroTime): number {
  return normalizeAngle(Ecliptic(GeoVector(body, t, /*aberration*/ true)).elon);
}

/** Nodo ascendente medio della Luna (polinomio di Meeus, cap. 47). */
export function meanLunarNode(jd: number): number {
  const T = (jd - J2000) / 36525;
  return normalizeAngle(125.0445479 - 1934.1362891 * T + 0.0020754 * T * T + (T * T * T) / 467441);
}

/** Ayanamsa di Lahiri approssimato: 23°51'11" a J2000, precessione 50.2788"/anno. */
export function lahiriAyanamsa(jd: number): number {
  return 23.853056 + ((jd - J2000) / 365.25) * (50.2788 / 3600);
}

function motion(body: Body, tNow: AstroTime, tPrev: AstroTime): BodyMotion {
  const lonNow = eclipticLongitude(body, tNow);
  return { longitude: lonNow, speed: signedDeltaDeg(lonNow, eclipticLongitude(body, tPrev)) };
}

/** Calcola i corpi per un JD (UT); la velocità è la differenza su un giorno. */
export function computeBodies(jd: number): Record<EphemerisBody, BodyMotion> {
  const tNow = new AstroTime(dateFromJd(jd));
  const tPrev = new AstroTime(dateFromJd(jd - 1)); // -1 giorno
  const node = meanLunarNode(jd);
  return {
    Sun: motion(Body.Sun, tNow, tPrev),
    Moon: motion(Body.Moon, tNow, tPrev),
    Mars: motion(Body.Mars, tNow, tPrev),
    Mercury: motion(Body.Mercury, tNow, tPrev),
    Jupiter: motion(Body.Jupiter, tNow, tPrev),
    Venus: motion(Body.Venus, tNow, tPrev),
    Saturn: motion(Body.Saturn, tNow, tPrev),
    Rahu: { longitude: node, speed: signedDeltaDeg(node, meanLunarNode(jd - 1)) },
  };
}

/** Provider geocentrico: il sito è ignorato (nessuna parallasse topocentrica). */
export const astronomyEphemeris: EphemerisProvider = {
  bodies: (jd) => computeBodies(jd),
};
