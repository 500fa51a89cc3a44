// src/lib/aspects.ts
// Drishti: aspetti vedici per casa, non per grado.
// Ogni pianeta aspetta la 7ª casa da sé; Marte, Giove e Saturno hanno due aspetti speciali in più.

import { NATURE, PLANETS, type Nature, type Planet, type PlanetPosition } from './astro';
import { emptyHouses, houseAtOffset, type HouseNumber } from './houses/whole';

export type AspectKind = 'standard' | 'special';
export type AspectStrength = 'strong' | 'normal';
export type HouseRelation = 'conjunction' | 'opposition' | 'trine' | 'square' | 'sextile';

export const STANDARD_OFFSET = 6;

/** Offset aggiuntivi (in case) degli aspetti speciali: Marte 4ª/8ª, Giove 5ª/9ª, Saturno 3ª/10ª. */
export const SPECIAL_ASPECT_OFFSETS: Readonly<Record<Planet, readonly number[]>> = {
  Sun: [],
  Moon: [],
  Mars: [3, 7],
  Mercury: [],
  Jupiter: [4, 8],
  Venus: [],
  Saturn: [2, 9],
  Rahu: [],
  Ketu: [],
};

export type AspectRelationship = {
  source: Planet;
  sourceHouse: HouseNumber;
  targetHouse: HouseNumber;
  targetPlanets: Planet[];
  kind: AspectKind;
  houseOffset: number;
  angularDistance: number;   // houseOffset*30, case whole sign
  strength: AspectStrength;
};

export type AspectMatrixEntry = {
  planet: Planet;
  house: HouseNumber;
  standard: HouseNumber[];
  special: HouseNumber[];
  totalAspected: number;
  strength: AspectStrength;
};

export type HouseAspect = { planet: Planet; kind: AspectKind };

export type PlanetPairRelation = {
  p1: Planet;
  p2: Planet;
  houseDistance: number;
  relation: HouseRelation;
};

export type NatureAspects = {
  planet: Planet;
  nature: Nature;
  aspectedHouses: HouseNumber[];
  note: string;
};

export type StrongestAspect = {
  planet: Planet;
  specialCount: number;
  aspectedHouses: HouseNumber[];
  significance: 'very strong' | 'normal';
  description: string;
};

export type AspectReport = {
  relationships: AspectRelationship[];
  matrix: AspectMatrixEntry[];
  houseAspects: Record<HouseNumber, HouseAspect[]>;
  pairs: Record<HouseRelation, PlanetPairRelation[]>;
  benefic: NatureAspects[];
  malefic: NatureAspects[];
  strongest: StrongestAspect[];
};

/** Casa aspettata dall'aspetto standard: ((H−1+6) mod 12)+1. */
export function standardAspectHouse(house: number): HouseNumber {
  return houseAtOffset(house, STANDARD_OFFSET);
}

export function specialAspectHouses(planet: Planet, house: number): HouseNumber[] {
  return SPECIAL_ASPECT_OFFSETS[planet].map((off) => houseAtOffset(house, off));
}

export function aspectedHouses(planet: Planet, house: number): { standard: HouseNumber[]; special: HouseNumber[] } {
  return { standard: [standardAspectHouse(house)], special: specialAspectHouses(planet, house) };
}

/** Distanza minima tra due case nei due versi, 0..6. */
export function houseDistance(h1: number, h2: number): number {
  const d = Math.abs(h1 - h2) % 12;
  return d > 6 ? 12 - d : d;
}

export function classifyHouseDistance(distance: number): HouseRelation | null {
  switch (distance) {
    case 0: return 'conjunction';
    case 6: return 'opposition';
    case 3: case 9: return 'trine';
    case 4: case 8: return 'square';
    case 2: case 10: return 'sextile';
    default: return null;
  }
}

function ordinal(n: number): string {
  if (n === 1) return '1st';
  if (n === 2) return '2nd';
  if (n === 3) return '3rd';
  return `${n}th`;
}

function describe(planet: Planet): string {
  const counted = [...SPECIAL_ASPECT_OFFSETS[planet], STANDARD_OFFSET].map((off) => ordinal(off + 1));
  return SPECIAL_ASPECT_OFFSETS[planet].length
    ? `${planet} has special aspects to ${counted.slice(0, -1).join(', ')}, and ${counted[counted.length - 1]} houses`
    : `${planet} aspects the 7th house from itself`;
}

export function computeAspects(positions: readonly PlanetPosition[]): AspectReport {
  const occupants = new Map<HouseNumber, Planet[]>();
  for (const p of positions) occupants.set(p.house, [...(occupants.get(p.house) ?? []), p.planet]);

  const relationships: AspectRelationship[] = [];
  const houseAspects = emptyHouses<HouseAspect>();

  const matrix = positions.map((p): AspectMatrixEntry => {
    const { standard, special } = aspectedHouses(p.planet, p.house);
    const strength: AspectStrength = special.length ? 'strong' : 'normal';
    const offsets: [number, AspectKind][] = [
      [STANDARD_OFFSET, 'standard'],
      ...SPECIAL_ASPECT_OFFSETS[p.planet].map((off): [number, AspectKind] => [off, 'special']),
    ];
    for (const [off, kind] of offsets) {
      const targetHouse = houseAtOffset(p.house, off);
      relationships.push({
        source: p.planet,
        sourceHouse: p.house,
        targetHouse,
        targetPlanets: (occupants.get(targetHouse) ?? []).filter((q) => q !== p.planet),
        kind,
        houseOffset: off,
        angularDistance: off * 30,
        strength,
      });
      houseAspects[targetHouse].push({ planet: p.planet, kind });
    }
    return { planet: p.planet, house: p.house, standard, special, totalAspected: standard.length + special.length, strength };
  });

  const pairs: Record<HouseRelation, PlanetPairRelation[]> = {
    conjunction: [], opposition: [], trine: [], square: [], sextile: [],
  };
  for (let i = 0; i < positions.length; i++) {
    for (let j = i + 1; j < positions.length; j++) {
      const a = positions[i];
      const b = positions[j];
      const houseDist = houseDistance(a.house, b.house);
      const relation = classifyHouseDistance(houseDist);
      if (relation) pairs[relation].push({ p1: a.planet, p2: b.planet, houseDistance: houseDist, relation });
    }
  }

  const byNature = (nature: Nature): NatureAspects[] =>
    matrix
      .filter((m) => NATURE[m.planet] === nature)
      .map((m) => ({
        planet: m.planet,
        nature,
        aspectedHouses: [...m.standard, ...m.special],
        note: nature === 'benefic' ? `Positive influence from ${m.planet}` : `Challenging influence from ${m.planet}`,
      }));

  const strongest = matrix
    .map((m): StrongestAspect => ({
      planet: m.planet,
      specialCount: m.special.length,
      aspectedHouses: [...m.special, ...m.standard],
      significance: m.special.length ? 'very strong' : 'normal',
      description: describe(m.planet),
    }))
    .sort((A, B) => (B.specialCount - A.specialCount) || (PLANETS.indexOf(A.planet) - PLANETS.indexOf(B.planet)));

  return {
    relationships,
    matrix,
    houseAspects,
    pairs,
    benefic: byNature('benefic'),
    malefic: byNature('malefic'),
    strongest,
  };
}
