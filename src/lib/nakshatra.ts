// src/lib/nakshatra.ts
import { indexIn, normalizeAngle } from './houses/common';

export const NAKSHATRA_NAMES = [
  'Ashwini', 'Bharani', 'Krittika', 'Rohini', 'Mrigashira', 'Ardra',
  'Punarvasu', 'Pushya', 'Ashlesha', 'Magha', 'Purva Phalguni', 'Uttara Phalguni',
  'Hasta', 'Chitra', 'Swati', 'Vishakha', 'Anuradha', 'Jyeshtha',
  'Mula', 'Purva Ashadha', 'Uttara Ashadha', 'Shravana', 'Dhanishta', 'Shatabhisha',
  'Purva Bhadrapada', 'Uttara Bhadrapada', 'Revati',
] as const;

export type NakshatraName = typeof NAKSHATRA_NAMES[number];

export const NAKSHATRA_SPAN = 360 / 27; // 13°20'
export const PADA_SPAN = NAKSHATRA_SPAN / 4; // 3°20'

export type Pada = 1 | 2 | 3 | 4;

export type NakshatraPosition = {
  index: number;        // 0..26
  name: NakshatraName;
  pada: Pada;
  fraction: number;     // 0..1 dentro il segmento
};

const PADAS: readonly Pada[] = [1, 2, 3, 4];

/**
 * Segmento lunare (27) e quarto (pada) di una longitudine qualsiasi.
 * Le moltiplicazioni precedono le divisioni: 120° deve dare esattamente l'inizio di Magha.
 */
export function nakshatraOf(longitude: number): NakshatraPosition {
  const lon = normalizeAngle(longitude);
  const scaled = (lon * 27) / 360;
  const index = indexIn(scaled, 26);
  const quarter = indexIn((lon * 108) / 360, 107);
  return {
    index,
    name: NAKSHATRA_NAMES[index],
    pada: PADAS[quarter % 4],
    fraction: Math.min(1, Math.max(0, scaled - index)),
  };
}
