// src/lib/houses/whole.ts
// Case Whole Sign: la casa I è l'intero segno dell'ascendente, poi un segno per casa.

import type { Planet } from '../astro';

export type HouseNumber = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12;

export const HOUSE_NUMBERS: readonly HouseNumber[] = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12];

export type HouseAssignment = Readonly<Record<HouseNumber, readonly Planet[]>>;

export function toHouseNumber(n: number): HouseNumber {
  const h = ((Math.round(n) - 1) % 12 + 12) % 12;
  return HOUSE_NUMBERS[h];
}

/** house = ((segno pianeta − segno ascendente) mod 12) + 1 */
export function houseFromSigns(planetSign: number, ascendantSign: number): HouseNumber {
  return toHouseNumber(planetSign - ascendantSign + 1);
}

/** Casa raggiunta contando `offset` case in avanti da `house` (1-indexed, modulo 12). */
export function houseAtOffset(house: number, offset: number): HouseNumber {
  return toHouseNumber(house + offset);
}

export function emptyHouses<T>(): Record<HouseNumber, T[]> {
  return { 1: [], 2: [], 3: [], 4: [], 5: [], 6: [], 7: [], 8: [], 9: [], 10: [], 11: [], 12: [] };
}

/** Raggruppa i pianeti per casa; ogni pianeta compare esattamente una volta. */
export function assignHouses(
  positions: readonly { planet: Planet; house: HouseNumber }[],
): HouseAssignment {
  const houses = emptyHouses<Planet>();
  const seen = new Set<Planet>();
  for (const p of positions) {
    if (seen.has(p.planet)) continue;
    seen.add(p.planet);
    houses[p.house].push(p.planet);
  }
  return houses;
}
