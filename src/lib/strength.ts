// src/lib/strength.ts
// Shad Bala semplificato: sei componenti 0..15 per pianeta, totale 0..60.

import { DEBILITATION_SIGN, NATURE, OWN_SIGNS, type Planet, type PlanetPosition, type SignName } from './astro';
import { clamp } from './houses/common';
import type { HouseNumber } from './houses/whole';
import strengthText from './data/strength.json';

export const MAX_COMPONENT = 15;
export const MAX_TOTAL = 60;
export const STRONG_PERCENTAGE = 70;

export type StrengthComponent =
  | 'positional' | 'directional' | 'temporal' | 'motional' | 'natural' | 'aspectual';

export type StrengthBreakdown = Record<StrengthComponent, number>;

export type StrengthStatus = 'Very Strong' | 'Strong' | 'Moderate' | 'Weak' | 'Very Weak';

export type StrengthProfile = {
  planet: Planet;
  breakdown: StrengthBreakdown;
  total: number;        // 0..60
  percentage: number;   // total/60*100
  status: StrengthStatus;
  isStrong: boolean;
  capacity: string;
};

export type ChartStrength = {
  totalStrength: number;
  averageStrength: number;    // punti su 60
  averagePercentage: number;
  strongCount: number;
  strongPlanets: Planet[];
  chartQuality: string;
  recommendations: string[];
};

export type StrengthReport = {
  profiles: StrengthProfile[];
  chart: ChartStrength;
};

// ─────────────────────────────── Tabelle ───────────────────────────────

/** Case del quadrante forte (Dig Bala). */
const STRONG_HOUSES: Readonly<Record<Planet, readonly HouseNumber[]>> = {
  Sun: [1, 10],
  Moon: [10, 11],
  Mars: [4, 5],
  Mercury: [1, 10],
  Jupiter: [1, 10],
  Venus: [4, 5],
  Saturn: [7, 8],
  Rahu: [7, 8],
  Ketu: [7, 8],
};

type TimeAffinity = 'diurnal' | 'nocturnal' | 'neutral';

const TIME_AFFINITY: Readonly<Record<Planet, TimeAffinity>> = {
  Sun: 'diurnal',
  Mars: 'diurnal',
  Jupiter: 'diurnal',
  Moon: 'nocturnal',
  Venus: 'nocturnal',
  Saturn: 'nocturnal',
  Mercury: 'neutral',
  Rahu: 'neutral',
  Ketu: 'neutral',
};

/** Forza naturale: scala a 60 punti, Sole il più forte. */
const NATURAL_RANK: Readonly<Record<Planet, number>> = {
  Sun: 60,
  Moon: 51,
  Venus: 42,
  Jupiter: 34,
  Mercury: 25,
  Mars: 17,
  Rahu: 15,
  Ketu: 12,
  Saturn: 10,
};

type StrengthText = {
  useCases: Readonly<Record<Planet, readonly string[]>>;
  challenges: Readonly<Record<Planet, readonly string[]>>;
  retrograde: Readonly<Record<'none' | 'one' | 'few' | 'many', string>>;
};

const TEXT: StrengthText = strengthText;

// ─────────────────────────────── Componenti ───────────────────────────────

export function positionalScore(planet: Planet, sign: number): number {
  if (OWN_SIGNS[planet].includes(sign)) return 15;
  if (DEBILITATION_SIGN[planet] === sign) return 3;
  return 9;
}

export function directionalScore(planet: Planet, house: HouseNumber): number {
  return STRONG_HOUSES[planet].includes(house) ? 15 : 8;
}

export function isDaytime(hour: number): boolean {
  return hour >= 6 && hour < 18;
}

export function temporalScore(planet: Planet, hour: number): number {
  switch (TIME_AFFINITY[planet]) {
    case 'diurnal': return isDaytime(hour) ? 12 : 8;
    case 'nocturnal': return isDaytime(hour) ? 8 : 12;
    case 'neutral': return 8;
  }
}

export function motionalScore(speed: number): number {
  let score = speed < 0 ? 4 : 10;
  const abs = Math.abs(speed);
  if (abs > 1) score += 3;
  else if (abs < 0.1) score -= 2;
  return clamp(score, 0, MAX_COMPONENT);
}

export function naturalScore(planet: Planet): number {
  return (NATURAL_RANK[planet] * MAX_COMPONENT) / 60;
}

/** Base 8, ±2 per ogni altro pianeta esattamente a 6 case di distanza. */
export function aspectualScore(position: PlanetPosition, all: readonly PlanetPosition[]): number {
  let score = 8;
  for (const other of all) {
    if (other.planet === position.planet) continue;
    if (Math.abs(other.house - position.house) !== 6) continue;
    score += NATURE[other.planet] === 'benefic' ? 2 : -2;
  }
  return clamp(score, 0, MAX_COMPONENT);
}

export function strengthStatus(percentage: number): StrengthStatus {
  if (percentage >= 80) return 'Very Strong';
  if (percentage >= 60) return 'Strong';
  if (percentage >= 40) return 'Moderate';
  if (percentage >= 20) return 'Weak';
  return 'Very Weak';
}

export function capacityOf(percentage: number): string {
  if (percentage >= 80) return 'Full capacity - Planet can give complete results';
  if (percentage >= 60) return 'Good capacity - Planet can give favorable results';
  if (percentage >= 40) return 'Moderate capacity - Planet gives mixed results';
  if (percentage >= 20) return 'Limited capacity - Planet gives minimal results';
  return 'Very limited capacity - Planet struggles to give results';
}

export function planetStrength(
  position: PlanetPosition,
  all: readonly PlanetPosition[],
  birthHour: number,
): StrengthProfile {
  const breakdown: StrengthBreakdown = {
    positional: clamp(positionalScore(position.planet, position.sign), 0, MAX_COMPONENT),
    directional: clamp(directionalScore(position.planet, position.house), 0, MAX_COMPONENT),
    temporal: clamp(temporalScore(position.planet, birthHour), 0, MAX_COMPONENT),
    motional: motionalScore(position.speed),
    natural: clamp(naturalScore(position.planet), 0, MAX_COMPONENT),
    aspectual: aspectualScore(position, all),
  };
  // sei componenti fino a 15 superano 60: il totale resta sulla scala a 60 punti
  const total = clamp(
    breakdown.positional + breakdown.directional + breakdown.temporal +
      breakdown.motional + breakdown.natural + breakdown.aspectual,
    0,
    MAX_TOTAL,
  );
  const percentage = (total / MAX_TOTAL) * 100;
  return {
    planet: position.planet,
    breakdown,
    total,
    percentage,
    status: strengthStatus(percentage),
    isStrong: percentage >= STRONG_PERCENTAGE,
    capacity: capacityOf(percentage),
  };
}

// ─────────────────────────────── Carta ───────────────────────────────

/** Qualità complessiva: numero di pianeti forti e media in punti (su 60). */
export function chartQuality(strongCount: number, averagePoints: number): string {
  if (strongCount >= 5 && averagePoints >= 35) return 'Excellent - Strong planetary support';
  if (strongCount >= 3 && averagePoints >= 30) return 'Good - Decent planetary support';
  if (strongCount >= 2 && averagePoints >= 25) return 'Average - Moderate planetary support';
  return 'Challenging - Limited planetary support';
}

function recommendations(profiles: readonly StrengthProfile[]): string[] {
  const weak = profiles.filter((p) => !p.isStrong).map((p) => p.planet);
  const strong = profiles.filter((p) => p.isStrong).map((p) => p.planet);
  const out: string[] = [];
  if (weak.length) {
    out.push(`Weak planets: ${weak.join(', ')}. Consider remedies (mantras, donations, gems) for these planets.`);
  }
  if (strong.length) {
    out.push(`Strong planets: ${strong.join(', ')}. These planets can give excellent results in their periods.`);
  }
  out.push('Focus on strengthening weak planets through appropriate practices.');
  return out;
}

export function chartStrength(profiles: readonly StrengthProfile[]): ChartStrength {
  const strongPlanets = profiles.filter((p) => p.isStrong).map((p) => p.planet);
  const totalStrength = profiles.reduce((acc, p) => acc + p.total, 0);
  const n = profiles.length;
  const averageStrength = n ? totalStrength / n : 0;
  return {
    totalStrength,
    averageStrength,
    averagePercentage: (averageStrength / MAX_TOTAL) * 100,
    strongCount: strongPlanets.length,
    strongPlanets,
    chartQuality: chartQuality(strongPlanets.length, averageStrength),
    recommendations: recommendations(profiles),
  };
}

export function computeStrengths(
  positions: readonly PlanetPosition[],
  birthHour: number,
): StrengthReport {
  const profiles = positions.map((p) => planetStrength(p, positions, birthHour));
  return { profiles, chart: chartStrength(profiles) };
}

export type StrengthInterpretation = {
  planet: Planet;
  status: StrengthStatus;
  capacity: string;
  breakdown: StrengthBreakdown;
  interpretation: string;
  bestFor: string[];
  challenges: string[];
};

export function strengthInterpretation(profile: StrengthProfile): StrengthInterpretation {
  const mark = profile.isStrong ? '✓' : '△';
  return {
    planet: profile.planet,
    status: profile.status,
    capacity: profile.capacity,
    breakdown: profile.breakdown,
    interpretation: `${profile.planet} is ${profile.status}. ${profile.capacity}`,
    bestFor: TEXT.useCases[profile.planet].map((use) => `${mark} ${use}`),
    challenges: profile.isStrong ? [] : [...TEXT.challenges[profile.planet]],
  };
}

// ─────────────────────────────── Retrogradi ───────────────────────────────

export type RetrogradePlanet = { planet: Planet; sign: SignName; house: HouseNumber };

export type RetrogradeSummary = {
  totalRetrograde: number;
  planets: RetrogradePlanet[];
  hasRetrograde: boolean;
  interpretation: string;
};

export function retrogradeInterpretation(count: number): string {
  if (count === 0) return TEXT.retrograde.none;
  if (count === 1) return TEXT.retrograde.one;
  if (count <= 3) return TEXT.retrograde.few;
  return TEXT.retrograde.many;
}

/** Pianeti retrogradi della carta; i nodi contano come gli altri. */
export function retrogradeSummary(positions: readonly PlanetPosition[]): RetrogradeSummary {
  const planets = positions
    .filter((p) => p.retrograde)
    .map((p): RetrogradePlanet => ({ planet: p.planet, sign: p.signName, house: p.house }));
  return {
    totalRetrograde: planets.length,
    planets,
    hasRetrograde: planets.length > 0,
    interpretation: retrogradeInterpretation(planets.length),
  };
}
