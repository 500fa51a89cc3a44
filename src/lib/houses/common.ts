// src/lib/houses/common.ts
// Utility angolari comuni a case, pianeti e carte divisionali.

/** Converte gradi → radianti. */
export function deg2rad(d: number): number {
  return (d * Math.PI) / 180;
}

/** Converte radianti → gradi. */
export function rad2deg(r: number): number {
  return (r * 180) / Math.PI;
}

/** Normalizza un angolo in gradi nell'intervallo [0, 360). */
export function normalizeAngle(deg: number): number {
  let x = deg % 360;
  if (x < 0) x += 360;
  // -1e-15 % 360 + 360 arrotonda a 360
  if (x >= 360) x = 0;
  return x;
}

/** Clamp numerico semplice. */
export function clamp(x: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, x));
}

/** floor(x) limitato a [0, max]: indici di segno, nakshatra, parti. */
export function indexIn(x: number, max: number): number {
  return clamp(Math.floor(x), 0, max);
}

/** Distanza angolare minima tra due longitudini, 0..180. */
export function minAngle(a: number, b: number): number {
  let d = Math.abs(normalizeAngle(a - b));
  if (d > 180) d = 360 - d;
  return d;
}
