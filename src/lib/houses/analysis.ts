// src/lib/houses/analysis.ts
// Lettura casa per casa (Whole Sign): occupanti, signore e sua collocazione,
// qualità benefica/malefica e riepilogo della forza delle case.

import {
  EXALTATION,
  NATURE,
  OWN_SIGNS,
  positionOf,
  rulerOfSign,
  signName,
  type Planet,
  type PlanetPosition,
  type SignName,
} from '../astro';
import houseText from '../data/houses.json';
import { HOUSE_NUMBERS, assignHouses, type HouseNumber } from './whole';

export type HouseStrength = 'Very Strong' | 'Strong' | 'Moderate' | 'Weak (No planets)';
export type LordStrength = 'Very Strong' | 'Strong' | 'Moderate' | 'Unknown';
export type HouseQuality = 'Benefic (Favorable)' | 'Malefic (Challenging)' | 'Neutral (Balanced)';

export type LordPlacement = {
  sign: SignName;
  house: HouseNumber;
  ownSign: boolean;
  exalted: boolean;
};

export type HouseAnalysis = {
  house: HouseNumber;
  name: string;
  sign: SignName;
  areas: readonly string[];
  significators: readonly Planet[];
  planets: Planet[];
  strength: HouseStrength;
  lord: Planet;
  lordPlacement: LordPlacement | null;    // null se il signore manca dalla carta
  lordStrength: LordStrength;
  quality: HouseQuality;
  interpretation: string;
  remedies: string[];
};

export type HouseLordAnalysis = {
  house: HouseNumber;
  lord: Planet;
  signInHouse: SignName;
  lordPosition: string;       // "Leo in House 5", oppure "Unknown"
  strength: LordStrength;
  conjunctions: Planet[];     // altri pianeti nel segno del signore
};

export type HouseStrengthSummary = {
  strongHouses: HouseNumber[];
  weakHouses: HouseNumber[];
  totalHouses: number;
  summary: string;
  overallAssessment: string;
};

export type HouseReport = {
  houses: HouseAnalysis[];
  lords: HouseLordAnalysis[];
  summary: HouseStrengthSummary;
};

// ─────────────────────────────── Tabelle ───────────────────────────────

/** Karaka naturali di ciascuna casa. */
const SIGNIFICATORS: Readonly<Record<HouseNumber, readonly Planet[]>> = {
  1: ['Sun'],
  2: ['Jupiter', 'Venus'],
  3: ['Mercury', 'Mars'],
  4: ['Moon', 'Venus'],
  5: ['Jupiter', 'Sun'],
  6: ['Mars', 'Saturn'],
  7: ['Venus'],
  8: ['Saturn', 'Ketu'],
  9: ['Jupiter', 'Sun'],
  10: ['Saturn', 'Sun'],
  11: ['Jupiter', 'Mercury'],
  12: ['Saturn', 'Ketu'],
};

/** Case in cui il pianeta rende bene. */
const FAVOURED_HOUSES: Readonly<Record<Planet, readonly HouseNumber[]>> = {
  Sun: [1, 5, 9, 10],
  Moon: [1, 4, 7, 10],
  Mars: [1, 3, 6, 8, 10, 11],
  Mercury: [1, 2, 6, 8],
  Jupiter: [1, 2, 5, 9, 10, 11],
  Venus: [2, 4, 7, 12],
  Saturn: [1, 6, 8, 10, 11, 12],
  Rahu: [3, 6, 8, 9, 11, 12],
  Ketu: [3, 6, 8, 9, 11, 12],
};

type HouseMeta = { name: string; areas: readonly string[] };

type HouseText = {
  houses: Readonly<Record<HouseNumber, HouseMeta>>;
  remedies: Readonly<Record<HouseNumber, string>>;
  templates: Readonly<Record<'intro' | 'occupied' | 'empty' | 'emptyRemedy' | 'summary', string>>;
  assessment: Readonly<Record<'veryStrong' | 'strong' | 'moderate' | 'weak', string>>;
};

const TEXT: HouseText = houseText;

function fill(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (m, key: string) => vars[key] ?? m);
}

// ─────────────────────────────── Regole ───────────────────────────────

export function houseStrength(house: HouseNumber, planets: readonly Planet[]): HouseStrength {
  if (planets.length === 0) return 'Weak (No planets)';
  const favoured = planets.filter((p) => FAVOURED_HOUSES[p].includes(house)).length;
  if (favoured >= 2) return 'Very Strong';
  if (favoured === 1) return 'Strong';
  return 'Moderate';
}

export function houseQuality(planets: readonly Planet[]): HouseQuality {
  const benefic = planets.filter((p) => NATURE[p] === 'benefic').length;
  const malefic = planets.length - benefic;
  if (benefic > malefic) return 'Benefic (Favorable)';
  if (malefic > benefic) return 'Malefic (Challenging)';
  return 'Neutral (Balanced)';
}

export function lordPlacement(lord: Planet, positions: readonly PlanetPosition[]): LordPlacement | null {
  const p = positionOf(positions, lord);
  if (!p) return null;
  return {
    sign: p.signName,
    house: p.house,
    ownSign: OWN_SIGNS[lord].includes(p.sign),
    exalted: EXALTATION[lord].sign === p.sign,
  };
}

/** Segno proprio o esaltazione prima di tutto, poi la casa occupata. */
export function lordStrength(lord: Planet, placement: LordPlacement | null): LordStrength {
  if (!placement) return 'Unknown';
  if (placement.ownSign || placement.exalted) return 'Very Strong';
  if (FAVOURED_HOUSES[lord].includes(placement.house)) return 'Strong';
  return 'Moderate';
}

function houseInterpretation(house: HouseNumber, sign: SignName, planets: readonly Planet[]): string {
  const meta = TEXT.houses[house];
  const intro = fill(TEXT.templates.intro, {
    house: String(house),
    name: meta.name,
    sign,
    areas: meta.areas.join(', '),
  });
  return planets.length
    ? intro + fill(TEXT.templates.occupied, { planets: planets.join(', ') })
    : intro + TEXT.templates.empty;
}

function houseRemedies(house: HouseNumber, planets: readonly Planet[]): string[] {
  const out: string[] = [];
  if (!planets.length) out.push(fill(TEXT.templates.emptyRemedy, { name: TEXT.houses[house].name }));
  out.push(TEXT.remedies[house]);
  return out;
}

export function overallHouseAssessment(strongCount: number): string {
  if (strongCount > 8) return TEXT.assessment.veryStrong;
  if (strongCount > 6) return TEXT.assessment.strong;
  if (strongCount > 4) return TEXT.assessment.moderate;
  return TEXT.assessment.weak;
}

// ─────────────────────────────── Analisi ───────────────────────────────

export function analyzeHouses(ascendantSign: number, positions: readonly PlanetPosition[]): HouseReport {
  const occupants = assignHouses(positions);
  const houses: HouseAnalysis[] = [];
  const lords: HouseLordAnalysis[] = [];

  for (const house of HOUSE_NUMBERS) {
    const signIndex = ascendantSign + house - 1;
    const sign = signName(signIndex);
    const planets = [...occupants[house]];
    const lord = rulerOfSign(signIndex);
    const placement = lordPlacement(lord, positions);
    const lordStatus = lordStrength(lord, placement);
    const meta = TEXT.houses[house];

    houses.push({
      house,
      name: meta.name,
      sign,
      areas: meta.areas,
      significators: SIGNIFICATORS[house],
      planets,
      strength: houseStrength(house, planets),
      lord,
      lordPlacement: placement,
      lordStrength: lordStatus,
      quality: houseQuality(planets),
      interpretation: houseInterpretation(house, sign, planets),
      remedies: houseRemedies(house, planets),
    });

    lords.push({
      house,
      lord,
      signInHouse: sign,
      lordPosition: placement ? `${placement.sign} in House ${placement.house}` : 'Unknown',
      strength: lordStatus,
      conjunctions: placement
        ? positions.filter((p) => p.planet !== lord && p.signName === placement.sign).map((p) => p.planet)
        : [],
    });
  }

  // "Very Strong" conta tra le case forti
  const strongHouses = houses.filter((h) => h.strength === 'Strong' || h.strength === 'Very Strong').map((h) => h.house);
  const weakHouses = houses.filter((h) => h.strength === 'Weak (No planets)').map((h) => h.house);

  return {
    houses,
    lords,
    summary: {
      strongHouses,
      weakHouses,
      totalHouses: HOUSE_NUMBERS.length,
      summary: fill(TEXT.templates.summary, {
        strong: String(strongHouses.length),
        weak: String(weakHouses.length),
      }),
      overallAssessment: overallHouseAssessment(strongHouses.length),
    },
  };
}
