// src/lib/varga.ts
// Carte divisionali (varga): ogni segno diviso in N parti uguali.
// D2 Hora (ricchezza), D7 Saptamsha (figli), D9 Navamsha (matrimonio, natura interiore).

import {
  normalizeDeg,
  signIndexOf,
  signName,
  type Ascendant,
  type Planet,
  type PlanetPosition,
  type SignName,
} from './astro';
import { indexIn } from './houses/common';
import type { HouseNumber } from './houses/whole';
import type { Pada } from './nakshatra';
import vargaText from './data/varga.json';

export type Division = 2 | 7 | 9;
export type ChartKey = 'D1' | 'D2' | 'D7' | 'D9';

type ChartMeta = { name: string; description: string; significance: string };

type VargaText = {
  charts: Readonly<Record<ChartKey, ChartMeta>>;
  saptamsha: readonly string[];
  navamsha: readonly string[];
  alignment: Readonly<Record<'excellent' | 'good' | 'moderate' | 'weak', string>>;
};

const TEXT: VargaText = vargaText;

export type Placement = {
  longitude: number;
  sign: number;
  signName: SignName;
  divisionalSign: number;
  divisionalSignName: SignName;
  part: number;            // parte dentro il segno, 0..N-1
};

export type HoraPlacement = Placement & { lord: 'Sun' | 'Moon' };
export type SaptamshaPlacement = Placement & { interpretation: string };
export type NavamshaPlacement = Placement & {
  absolutePart: number;    // sign*9 + part, 0..107
  pada: Pada;
  significance: string;
};

export type VargaChart<P extends Placement> = ChartMeta & {
  division: Division;
  partSize: number;
  ascendant: { longitude: number; sign: number; signName: SignName };
  planets: Partial<Record<Planet, P>>;
};

export type RasiChart = ChartMeta & {
  ascendant: { longitude: number; sign: number; signName: SignName };
  planets: Partial<Record<Planet, { sign: number; signName: SignName; house: HouseNumber; longitude: number }>>;
};

export type Alignment = {
  score: number;
  maxScore: number;
  percentage: number;
  details: string[];
  interpretation: string;
};

export type VargaReport = {
  d1: RasiChart;
  d2: VargaChart<HoraPlacement>;
  d7: VargaChart<SaptamshaPlacement>;
  d9: VargaChart<NavamshaPlacement>;
  alignment: Alignment;
};

function split(longitude: number, division: Division): { lon: number; sign: number; part: number } {
  const lon = normalizeDeg(longitude);
  const sign = signIndexOf(lon);
  const degInSign = lon - sign * 30;
  // moltiplicare prima di dividere: 10° in D9 è esattamente la parte 3
  return { lon, sign, part: indexIn((degInSign * division) / 30, division - 1) };
}

function placement(lon: number, sign: number, part: number, divisionalSign: number): Placement {
  return {
    longitude: lon,
    sign,
    signName: signName(sign),
    divisionalSign,
    divisionalSignName: signName(divisionalSign),
    part,
  };
}

const LEO = 4;
const CANCER = 3;

/** Segni di indice pari (Aries, Gemini, ...): prima metà Sole, seconda Luna; dispari al contrario. */
export function horaOf(longitude: number): HoraPlacement {
  const { lon, sign, part } = split(longitude, 2);
  const sunFirst = sign % 2 === 0;
  const lord = (part === 0) === sunFirst ? 'Sun' : 'Moon';
  return { ...placement(lon, sign, part, lord === 'Sun' ? LEO : CANCER), lord };
}

/** Segni pari contano dal segno stesso, dispari dal settimo segno. */
export function saptamshaOf(longitude: number): SaptamshaPlacement {
  const { lon, sign, part } = split(longitude, 7);
  const start = sign % 2 === 0 ? sign : sign + 6;
  return {
    ...placement(lon, sign, part, (start + part) % 12),
    interpretation: TEXT.saptamsha[part],
  };
}

export function navamshaOf(longitude: number): NavamshaPlacement {
  const { lon, sign, part } = split(longitude, 9);
  const absolutePart = sign * 9 + part;
  const pada: Pada = part < 3 ? 1 : part < 6 ? 2 : 3;
  return {
    ...placement(lon, sign, part, absolutePart % 12),
    absolutePart,
    pada,
    significance: TEXT.navamsha[part % 9],
  };
}

/** Ascendente divisionale: (asc × n) mod 360. */
export function vargaAscendant(ascendantLongitude: number, division: number): { longitude: number; sign: number; signName: SignName } {
  const longitude = normalizeDeg(ascendantLongitude * division);
  const sign = signIndexOf(longitude);
  return { longitude, sign, signName: signName(sign) };
}

function buildChart<P extends Placement>(
  key: Exclude<ChartKey, 'D1'>,
  division: Division,
  positions: readonly PlanetPosition[],
  ascendant: Ascendant,
  place: (longitude: number) => P,
): VargaChart<P> {
  const planets: Partial<Record<Planet, P>> = {};
  for (const p of positions) planets[p.planet] = place(p.longitude);
  return {
    ...TEXT.charts[key],
    division,
    partSize: 30 / division,
    ascendant: vargaAscendant(ascendant.longitude, division),
    planets,
  };
}

export function horaChart(positions: readonly PlanetPosition[], ascendant: Ascendant): VargaChart<HoraPlacement> {
  return buildChart('D2', 2, positions, ascendant, horaOf);
}

export function saptamshaChart(positions: readonly PlanetPosition[], ascendant: Ascendant): VargaChart<SaptamshaPlacement> {
  return buildChart('D7', 7, positions, ascendant, saptamshaOf);
}

export function navamshaChart(positions: readonly PlanetPosition[], ascendant: Ascendant): VargaChart<NavamshaPlacement> {
  return buildChart('D9', 9, positions, ascendant, navamshaOf);
}

export function rasiChart(positions: readonly PlanetPosition[], ascendant: Ascendant): RasiChart {
  const planets: RasiChart['planets'] = {};
  for (const p of positions) {
    planets[p.planet] = { sign: p.sign, signName: p.signName, house: p.house, longitude: p.longitude };
  }
  return {
    ...TEXT.charts.D1,
    ascendant: { longitude: ascendant.longitude, sign: ascendant.sign, signName: ascendant.signName },
    planets,
  };
}

export function interpretAlignment(percentage: number): string {
  if (percentage >= 60) return TEXT.alignment.excellent;
  if (percentage >= 40) return TEXT.alignment.good;
  if (percentage >= 20) return TEXT.alignment.moderate;
  return TEXT.alignment.weak;
}

/** +10 per ogni pianeta con lo stesso segno in D1 e D9 (vargottama). */
export function d1d9Alignment(positions: readonly PlanetPosition[]): Alignment {
  let score = 0;
  const details: string[] = [];
  for (const p of positions) {
    if (navamshaOf(p.longitude).divisionalSign === p.sign) {
      score += 10;
      details.push(`${p.planet} in same sign in D1 and D9 - Strong alignment`);
    } else {
      details.push(`${p.planet} in different signs - Check compatibility`);
    }
  }
  const maxScore = 10 * positions.length;
  const percentage = maxScore ? (score / maxScore) * 100 : 0;
  return { score, maxScore, percentage, details, interpretation: interpretAlignment(percentage) };
}

export function computeVargas(positions: readonly PlanetPosition[], ascendant: Ascendant): VargaReport {
  return {
    d1: rasiChart(positions, ascendant),
    d2: horaChart(positions, ascendant),
    d7: saptamshaChart(positions, ascendant),
    d9: navamshaChart(positions, ascendant),
    alignment: d1d9Alignment(positions),
  };
}
