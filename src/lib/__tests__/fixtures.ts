// src/lib/__tests__/fixtures.ts
import { makeAscendant, makePlanetPosition, type Planet, type PlanetPosition } from '@/lib/astro';
import type { EngineConfig } from '@/lib/config';

export const testConfig: EngineConfig = {
  defaultTz: 'UTC',
  ayanamsa: { mode: 'fixed', degrees: 24 },
  transitHorizonDays: 365,
  debug: false,
};

/** Posizioni siderali con ascendente a 0° (Aries): casa = segno + 1. */
export function positionsAt(
  rows: readonly [Planet, number, number][],
  ascendantLongitude = 0,
): PlanetPosition[] {
  const asc = makeAscendant(ascendantLongitude);
  return rows.map(([planet, lon, speed]) => makePlanetPosition(planet, lon, speed, asc));
}
