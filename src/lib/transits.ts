// src/lib/transits.ts
// Gochara: posizioni correnti confrontate con quelle natali.

import type { DateTime } from 'luxon';
import {
  NATURE,
  signName,
  type Planet,
  type PlanetPosition,
  type SignName,
} from './astro';
import { minAngle } from './houses/common';
import type { HouseNumber } from './houses/whole';
import type { MaybePromise } from './planets/runtime';
import { isoDay, plusDays } from './time';
import transitText from './data/transits.json';

export type AspectType = 'conjunction' | 'sextile' | 'square' | 'trine' | 'opposition';
export type TransitQuality = 'Benefic' | 'Malefic' | 'Neutral';

const ASPECT_DEGREES: Record<AspectType, number> = {
  conjunction: 0,
  sextile: 60,
  square: 90,
  trine: 120,
  opposition: 180,
};

export const TRANSIT_ORBS: Record<AspectType, number> = {
  conjunction: 6,
  sextile: 4,
  square: 6,
  trine: 6,
  opposition: 6,
};

const ASPECTS: AspectType[] = ['conjunction', 'sextile', 'square', 'trine', 'opposition'];

/** Permanenza media in un segno, in giorni. */
export const TRANSIT_DURATION_DAYS: Readonly<Record<Planet, number>> = {
  Sun: 30,
  Moon: 2.25,
  Mars: 45,
  Mercury: 14,
  Jupiter: 360,
  Venus: 28,
  Saturn: 900,
  Rahu: 540,
  Ketu: 540,
};

export const SLOW_MOVERS: readonly Planet[] = ['Saturn', 'Jupiter', 'Rahu', 'Ketu'];

type ImportantMeta = { type: string; duration: string; significance: string; impact: string };

type TransitText = {
  significance: Readonly<Record<Planet, string>>;
  interpretation: Readonly<Record<Planet, string>>;
  relation: Readonly<Record<'same' | 'opposition' | 'square' | 'trine', string>>;
  important: Readonly<Record<'Saturn' | 'Jupiter' | 'Rahu' | 'Ketu', ImportantMeta>>;
  predictions: Readonly<Record<'saturnMalefic' | 'saturnBenefic' | 'jupiter' | 'moon', string>>;
  dasha: Readonly<Record<'interacting' | 'strengthens' | 'combined', string>>;
};

const TEXT: TransitText = transitText;

export type TransitAspect = {
  natalPlanet: Planet;
  aspect: AspectType;
  exactAngle: number;
  angle: number;      // distanza angolare 0..180
  orb: number;        // scarto dall'esatto in °
  applying: boolean;
  strength: 'Strong' | 'Moderate';
};

export type PlanetTransit = {
  planet: Planet;
  currentLongitude: number;
  currentSign: SignName;
  house: HouseNumber;           // dalla carta natale
  retrograde: boolean;
  natalLongitude: number;
  natalSign: SignName;
  signChanged: boolean;
  signsFromNatal: number;
  quality: TransitQuality;
  significance: string;
  durationDays: number;
  interpretation: string;
  aspects: TransitAspect[];
};

export type TransitReport = {
  transits: PlanetTransit[];
};

export type ImportantTransit = ImportantMeta & { planet: Planet; current: SignName };

export type UpcomingTransit = {
  planet: Planet;
  date: string;       // YYYY-MM-DD
  daysAway: number;
  oldSign: SignName;
  newSign: SignName;
  significance: string;
};

function fill(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (m, key: string) => vars[key] ?? m);
}

/** Distanza in segni sul ciclo di 12, 0..6. */
export function housesApart(sign1: number, sign2: number): number {
  const d = Math.abs(sign1 - sign2) % 12;
  return Math.min(d, 12 - d);
}

export function transitQuality(planet: Planet): TransitQuality {
  switch (NATURE[planet]) {
    case 'benefic': return 'Benefic';
    case 'malefic': return 'Malefic';
  }
}

export function transitInterpretation(planet: Planet, currentSign: number, natalSign: number): string {
  const base = fill(TEXT.interpretation[planet], { sign: signName(currentSign) });
  if (currentSign === natalSign) return base + TEXT.relation.same;
  switch (housesApart(currentSign, natalSign)) {
    case 6: return base + TEXT.relation.opposition;
    case 3: return base + TEXT.relation.square;
    case 4: return base + TEXT.relation.trine;
    default: return base;
  }
}

/** Aspetti classici di un grado di transito verso tutti i pianeti natali. */
export function transitAspects(longitude: number, natal: readonly PlanetPosition[]): TransitAspect[] {
  const out: TransitAspect[] = [];
  for (const n of natal) {
    const angle = minAngle(longitude, n.longitude);
    for (const aspect of ASPECTS) {
      const exactAngle = ASPECT_DEGREES[aspect];
      const diff = Math.abs(angle - exactAngle);
      if (diff > TRANSIT_ORBS[aspect]) continue;
      out.push({
        natalPlanet: n.planet,
        aspect,
        exactAngle,
        angle,
        orb: Number(diff.toFixed(2)),
        applying: angle < exactAngle,
        strength: diff < 2 ? 'Strong' : 'Moderate',
      });
    }
  }
  return out;
}

export function compareTransits(
  natal: readonly PlanetPosition[],
  current: readonly PlanetPosition[],
): TransitReport {
  const transits: PlanetTransit[] = [];
  for (const c of current) {
    const n = natal.find((p) => p.planet === c.planet);
    if (!n) continue;
    transits.push({
      planet: c.planet,
      currentLongitude: c.longitude,
      currentSign: c.signName,
      house: c.house,
      retrograde: c.retrograde,
      natalLongitude: n.longitude,
      natalSign: n.signName,
      signChanged: c.sign !== n.sign,
      signsFromNatal: housesApart(c.sign, n.sign),
      quality: transitQuality(c.planet),
      significance: TEXT.significance[c.planet],
      durationDays: TRANSIT_DURATION_DAYS[c.planet],
      interpretation: transitInterpretation(c.planet, c.sign, n.sign),
      aspects: transitAspects(c.longitude, natal),
    });
  }
  return { transits };
}

function transitOf(report: TransitReport, planet: Planet): PlanetTransit | undefined {
  return report.transits.find((t) => t.planet === planet);
}

export function importantTransits(report: TransitReport): ImportantTransit[] {
  const out: ImportantTransit[] = [];
  for (const planet of ['Saturn', 'Jupiter', 'Rahu', 'Ketu'] as const) {
    const t = transitOf(report, planet);
    if (t) out.push({ planet, current: t.currentSign, ...TEXT.important[planet] });
  }
  return out;
}

export function transitPredictions(report: TransitReport): string[] {
  const out: string[] = [];
  const saturn = transitOf(report, 'Saturn');
  if (saturn) {
    const tpl = saturn.quality === 'Malefic' ? TEXT.predictions.saturnMalefic : TEXT.predictions.saturnBenefic;
    out.push(fill(tpl, { sign: saturn.currentSign }));
  }
  const jupiter = transitOf(report, 'Jupiter');
  if (jupiter) out.push(fill(TEXT.predictions.jupiter, { sign: jupiter.currentSign }));
  const moon = transitOf(report, 'Moon');
  if (moon) out.push(fill(TEXT.predictions.moon, { sign: moon.currentSign }));
  return out;
}

/** Il pianeta della Dasha in corso è anche in transito: gli effetti si sommano. */
export function transitDashaInteraction(report: TransitReport, dashaLord: Planet): string[] {
  const t = transitOf(report, dashaLord);
  if (!t) return [];
  const vars = { planet: dashaLord, sign: t.currentSign };
  return [
    fill(TEXT.dasha.interacting, vars),
    fill(TEXT.dasha.strengthens, vars),
    TEXT.dasha.combined,
  ];
}

export type SnapshotAt = (when: DateTime) => MaybePromise<readonly { planet: Planet; sign: number }[]>;

export const UPCOMING_STEP_DAYS = 30;

/**
 * Cambi di segno dei pianeti lenti nei prossimi `days` giorni, a passi di 30.
 * Ogni cambio è confrontato con il passo precedente.
 */
export async function upcomingTransits(
  from: DateTime,
  days: number,
  snapshotAt: SnapshotAt,
): Promise<UpcomingTransit[]> {
  const out: UpcomingTransit[] = [];
  const last = new Map<Planet, number>();
  // un campione alla volta: il provider può essere un servizio esterno
  for (let offset = 0; offset < days; offset += UPCOMING_STEP_DAYS) {
    const snap = await snapshotAt(plusDays(from, offset));
    for (const planet of SLOW_MOVERS) {
      const p = snap.find((s) => s.planet === planet);
      if (!p) continue;
      const prev = last.get(planet);
      if (prev !== undefined && prev !== p.sign) {
        out.push({
          planet,
          date: isoDay(plusDays(from, offset)),
          daysAway: offset,
          oldSign: signName(prev),
          newSign: signName(p.sign),
          significance: TEXT.significance[planet],
        });
      }
      last.set(planet, p.sign);
    }
  }
  return out.sort((A, B) => A.daysAway - B.daysAway);
}
