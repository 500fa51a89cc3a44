// src/lib/houses/runtime.ts
import { SiderealTime } from 'astronomy-engine';
import { deg2rad, normalizeAngle, rad2deg } from './common';
import type { MaybePromise } from '../planets/runtime';
import { dateFromJd } from '../time';

/** Collaboratore esterno: longitudine tropicale dell'ascendente. */
export interface HouseProvider {
  ascendant(jd: number, latDeg: number, lonDeg: number): MaybePromise<number>;
}

const J2000 = 2451545.0;

/** Obliquità media dell'eclittica (gradi). */
export function meanObliquity(jd: number): number {
  const T = (jd - J2000) / 36525;
  return 23.4392911 - 0.0130042 * T - 1.64e-7 * T * T + 5.04e-7 * T * T * T;
}

/** Tempo siderale locale apparente, in gradi. */
export function localSiderealDeg(jd: number, lonDeg: number): number {
  const gstHours = SiderealTime(dateFromJd(jd)); // ore
  return normalizeAngle(gstHours * 15 + lonDeg);
}

/** Ascendente in forma chiusa: λ = atan2(cos θ, −(sin θ cos ε + tan φ sin ε)). */
export function ascendantLongitude(jd: number, latDeg: number, lonDeg: number): number {
  const theta = deg2rad(localSiderealDeg(jd, lonDeg));
  const eps = deg2rad(meanObliquity(jd));
  const phi = deg2rad(latDeg);
  const y = Math.cos(theta);
  const x = -(Math.sin(theta) * Math.cos(eps) + Math.tan(phi) * Math.sin(eps));
  return normalizeAngle(rad2deg(Math.atan2(y, x)));
}

export const astronomyHouses: HouseProvider = {
  ascendant: (jd, latDeg, lonDeg) => ascendantLongitude(jd, latDeg, lonDeg),
};
