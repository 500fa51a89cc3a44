// src/lib/yogas.ts
// Signori delle case e yoga della carta, ricavati dai profili di forza.
// Gli yoga sono euristiche a soglia sulla forza dei pianeti, non le regole
// classiche sulle relazioni tra signori di casa.

import { rulerOfSign, signName, type Planet, type PlanetPosition, type SignName } from './astro';
import { minAngle } from './houses/common';
import { HOUSE_NUMBERS, type HouseNumber } from './houses/whole';
import type { StrengthProfile } from './strength';

export type HouseLordStatus = 'Strong' | 'Moderate' | 'Weak';

export type HouseLordStrength = {
  house: HouseNumber;
  sign: SignName;
  lord: Planet;
  strengthPercentage: number;
  status: HouseLordStatus;
};

export type Yoga = {
  name: string;
  planets: Planet[];
  strength: number;
  benefic: boolean;
};

export type YogaSummary = {
  totalCount: number;
  beneficCount: number;
  maleficCount: number;
  neutralCount: number;
  yogas: Yoga[];
};

export type AspectStrength = {
  p1: Planet;
  p2: Planet;
  aspectAngle: number;
  orb: number;
  strength: number; // 0..100
};

const UNKNOWN_LORD_PERCENTAGE = 50;
const YOGA_STRENGTH = 75;

function percentageMap(profiles: readonly StrengthProfile[]): Map<Planet, number> {
  return new Map(profiles.map((p) => [p.planet, p.percentage]));
}

function lordStatus(pct: number): HouseLordStatus {
  if (pct >= 70) return 'Strong';
  if (pct >= 45) return 'Moderate';
  return 'Weak';
}

export function houseLordStrengths(
  ascendantSign: number,
  profiles: readonly StrengthProfile[],
): HouseLordStrength[] {
  const pct = percentageMap(profiles);
  return HOUSE_NUMBERS.map((house) => {
    const sign = (ascendantSign + house - 1) % 12;
    const lord = rulerOfSign(sign);
    const strengthPercentage = pct.get(lord) ?? UNKNOWN_LORD_PERCENTAGE;
    return { house, sign: signName(sign), lord, strengthPercentage, status: lordStatus(strengthPercentage) };
  });
}

type YogaRule = (pct: (p: Planet) => number, all: Map<Planet, number>) => Yoga | null;

function pairRule(name: string, a: Planet, b: Planet, threshold: number): YogaRule {
  return (pct) =>
    pct(a) > threshold && pct(b) > threshold
      ? { name, planets: [a, b], strength: YOGA_STRENGTH, benefic: true }
      : null;
}

const YOGA_RULES: readonly YogaRule[] = [
  pairRule('Raj Yoga', 'Jupiter', 'Sun', 60),
  pairRule('Dhana Yoga', 'Venus', 'Mercury', 65),
  pairRule('Parivartana Yoga', 'Venus', 'Jupiter', 70),
  pairRule('Gaja Kesari Yoga', 'Jupiter', 'Moon', 65),
  // un pianeta debole sostenuto da almeno due pianeti molto forti
  (_pct, all) => {
    const values = [...all.entries()];
    if (!values.some(([, v]) => v < 35)) return null;
    const support = values.filter(([, v]) => v > 75).map(([p]) => p);
    return support.length >= 2
      ? { name: 'Neecha Bhanga Yoga', planets: support.slice(0, 2), strength: YOGA_STRENGTH, benefic: true }
      : null;
  },
];

export function detectYogas(profiles: readonly StrengthProfile[]): YogaSummary {
  const all = percentageMap(profiles);
  const pct = (p: Planet) => all.get(p) ?? 0;
  const yogas = YOGA_RULES.map((rule) => rule(pct, all)).filter((y): y is Yoga => y !== null);
  const beneficCount = yogas.filter((y) => y.benefic).length;
  return {
    totalCount: yogas.length,
    beneficCount,
    maleficCount: 0,
    neutralCount: yogas.length - beneficCount,
    yogas,
  };
}

const ASPECT_ANGLES = [0, 60, 90, 120, 180] as const;
const ASPECT_ORB = 8;

/** Aspetti angolari tra coppie di pianeti, orb 8°; il primo angolo entro l'orb vince. */
export function aspectStrengths(positions: readonly PlanetPosition[]): AspectStrength[] {
  const out: AspectStrength[] = [];
  for (let i = 0; i < positions.length; i++) {
    for (let j = i + 1; j < positions.length; j++) {
      const d = minAngle(positions[i].longitude, positions[j].longitude);
      const angle = ASPECT_ANGLES.find((a) => Math.abs(d - a) <= ASPECT_ORB);
      if (angle === undefined) continue;
      const orb = Math.abs(d - angle);
      out.push({
        p1: positions[i].planet,
        p2: positions[j].planet,
        aspectAngle: angle,
        orb,
        strength: Math.max(0, 100 * (1 - orb / ASPECT_ORB)),
      });
    }
  }
  return out;
}
