// src/lib/chart.ts
// Composizione della carta: provider esterni → posizioni siderali → calcolatori.
// Ogni sezione è isolata: se fallisce resta null e finisce in `diag`.

import { DateTime } from 'luxon';
import {
  EPHEMERIS_BODIES,
  deriveKetu,
  dignityOf,
  makeAscendant,
  makePlanetPosition,
  rulerOfSign,
  toSidereal,
  type Ascendant,
  type Dignity,
  type EphemerisBody,
  type Planet,
  type PlanetPosition,
} from './astro';
import { computeAspects, type AspectReport } from './aspects';
import { loadConfig, shouldLog, type EngineConfig } from './config';
import { computeDasha, requireMoon, type DashaReport } from './dasha';
import { InvalidInputError, MissingDependencyError, errorMessage } from './errors';
import { analyzeHouses, type HouseReport } from './houses/analysis';
import { assignHouses, type HouseAssignment } from './houses/whole';
import { astronomyHouses, type HouseProvider } from './houses/runtime';
import {
  astronomyEphemeris,
  lahiriAyanamsa,
  type BodyMotion,
  type EphemerisProvider,
  type Site,
} from './planets/runtime';
import { PositionInputSchema, parseBirthInput } from './schemas';
import {
  computeStrengths,
  retrogradeSummary,
  type RetrogradeSummary,
  type StrengthReport,
} from './strength';
import { jdFromUTC, localHour, resolveBirthInstant } from './time';
import {
  compareTransits,
  importantTransits,
  transitDashaInteraction,
  transitPredictions,
  upcomingTransits,
  type ImportantTransit,
  type TransitReport,
  type UpcomingTransit,
} from './transits';
import { computeVargas, type VargaReport } from './varga';
import {
  aspectStrengths,
  detectYogas,
  houseLordStrengths,
  type AspectStrength,
  type HouseLordStrength,
  type YogaSummary,
} from './yogas';

export type Diag = { stage: string; msg: string };

export type Providers = {
  ephemeris: EphemerisProvider;
  houses: HouseProvider;
};

export const defaultProviders: Providers = {
  ephemeris: astronomyEphemeris,
  houses: astronomyHouses,
};

export type ChartCore = {
  ascendant: Ascendant;
  positions: readonly PlanetPosition[];
  birth: DateTime;                                  // nella zona locale
  site?: Site;                                      // luogo di nascita, riusato per i transiti
  asOf?: DateTime;                                  // per Dasha corrente
  transitPositions?: readonly PlanetPosition[];     // snapshot per i transiti
};

export type StrengthSupplement = {
  houseLords: HouseLordStrength[];
  yogas: YogaSummary;
  aspectStrengths: AspectStrength[];
};

export type TransitSection = {
  report: TransitReport;
  important: ImportantTransit[];
  predictions: string[];
  dashaInteraction: string[];
};

export type ChartRecord = {
  birth: { local: string; utc: string; zone: string; julianDay: number; localHour: number; site: Site | null };
  ayanamsa: number | null;
  ascendant: Ascendant;
  positions: PlanetPosition[];
  houses: HouseAssignment;
  dignities: Partial<Record<Planet, Dignity>>;
  rulingPlanet: Planet;
  houseAnalysis: HouseReport | null;
  retrograde: RetrogradeSummary | null;
  dasha: DashaReport | null;
  strength: StrengthReport | null;
  yogas: StrengthSupplement | null;
  vargas: VargaReport | null;
  aspects: AspectReport | null;
  transits: TransitSection | null;
  diag: Diag[];
};

function section<T>(stage: string, diag: Diag[], log: boolean, fn: () => T): T | null {
  try {
    return fn();
  } catch (e) {
    const msg = errorMessage(e);
    diag.push({ stage, msg });
    if (log) console.error('[chart/derive] section failed:', msg, { stage });
    return null;
  }
}

/**
 * Derivazione pura e sincrona a partire da posizioni già siderali.
 * Senza Luna non c'è Dasha: l'intera derivazione fallisce.
 */
export function deriveChart(
  core: ChartCore,
  opts: { diag?: Diag[]; ayanamsa?: number | null; config?: EngineConfig } = {},
): ChartRecord {
  const diag = opts.diag ?? [];
  const log = shouldLog(opts.config ?? loadConfig());
  const { ascendant, positions, birth } = core;
  const moon = requireMoon(positions);
  const hour = localHour(birth);

  const houseAnalysis = section('houses', diag, log, () => analyzeHouses(ascendant.sign, positions));
  const retrograde = section('retrograde', diag, log, () => retrogradeSummary(positions));
  const dasha = section('dasha', diag, log, () => computeDasha(moon.longitude, birth, { asOf: core.asOf }));
  const strength = section('strength', diag, log, () => computeStrengths(positions, hour));
  const yogas = section('yogas', diag, log, (): StrengthSupplement => {
    if (!strength) throw new Error('strength profiles unavailable');
    return {
      houseLords: houseLordStrengths(ascendant.sign, strength.profiles),
      yogas: detectYogas(strength.profiles),
      aspectStrengths: aspectStrengths(positions),
    };
  });
  const vargas = section('vargas', diag, log, () => computeVargas(positions, ascendant));
  const aspects = section('aspects', diag, log, () => computeAspects(positions));

  const snapshot = core.transitPositions;
  const transits = snapshot
    ? section('transits', diag, log, (): TransitSection => {
        const report = compareTransits(positions, snapshot);
        return {
          report,
          important: importantTransits(report),
          predictions: transitPredictions(report),
          dashaInteraction: dasha ? transitDashaInteraction(report, dasha.current.planet) : [],
        };
      })
    : null;

  const dignities: Partial<Record<Planet, Dignity>> = {};
  for (const p of positions) dignities[p.planet] = dignityOf(p.planet, p.sign);

  const utc = birth.toUTC();
  return {
    birth: {
      local: birth.toFormat("yyyy-LL-dd'T'HH:mm:ss"),
      utc: utc.toFormat("yyyy-LL-dd'T'HH:mm:ss'Z'"),
      zone: birth.zoneName ?? 'UTC',
      julianDay: jdFromUTC(utc.toJSDate()),
      localHour: hour,
      site: core.site ?? null,
    },
    ayanamsa: opts.ayanamsa ?? null,
    ascendant,
    positions: [...positions],
    houses: assignHouses(positions),
    dignities,
    rulingPlanet: rulerOfSign(moon.sign),
    houseAnalysis,
    retrograde,
    dasha,
    strength,
    yogas,
    vargas,
    aspects,
    transits,
    diag,
  };
}

// ───────────────────────────── Provider → posizioni ─────────────────────────────

export function ayanamsaFor(jd: number, config: EngineConfig, override?: number): number {
  if (override !== undefined) return override;
  return config.ayanamsa.mode === 'lahiri' ? lahiriAyanamsa(jd) : config.ayanamsa.degrees;
}

/** Posizioni siderali dai dati tropicali; i corpi mancanti o non validi sono saltati. */
export function siderealPositions(
  bodies: Partial<Record<EphemerisBody, BodyMotion>>,
  ayanamsa: number,
  ascendant: Ascendant,
  diag: Diag[],
  stage = 'ephemeris',
): PlanetPosition[] {
  const out: PlanetPosition[] = [];
  for (const body of EPHEMERIS_BODIES) {
    const parsed = PositionInputSchema.safeParse(bodies[body]);
    if (!parsed.success) {
      diag.push({ stage, msg: `no usable data for ${body}` });
      continue;
    }
    out.push(makePlanetPosition(body, toSidereal(parsed.data.longitude, ayanamsa), parsed.data.speed, ascendant));
  }
  const rahu = out.find((p) => p.planet === 'Rahu');
  if (rahu) out.push(deriveKetu(rahu, ascendant));
  return out;
}

async function fetchBodies(
  providers: Providers,
  jd: number,
  site?: Site,
): Promise<Partial<Record<EphemerisBody, BodyMotion>>> {
  try {
    return await providers.ephemeris.bodies(jd, site);
  } catch (e) {
    throw new MissingDependencyError('ephemeris', errorMessage(e));
  }
}

async function fetchAscendant(providers: Providers, jd: number, lat: number, lon: number): Promise<number> {
  let tropical: number;
  try {
    tropical = await providers.houses.ascendant(jd, lat, lon);
  } catch (e) {
    throw new MissingDependencyError('houses', errorMessage(e));
  }
  if (!Number.isFinite(tropical)) throw new MissingDependencyError('houses', 'ascendant is not a finite number');
  return tropical;
}

function toDateTime(x: DateTime | Date | string, field: string): DateTime {
  const dt = DateTime.isDateTime(x) ? x : x instanceof Date ? DateTime.fromJSDate(x) : DateTime.fromISO(x, { setZone: true });
  if (!dt.isValid) throw new InvalidInputError(dt.invalidExplanation ?? 'invalid instant', field);
  return dt;
}

export type ComputeOptions = {
  asOf?: DateTime | Date | string;
  transitAt?: DateTime | Date | string;
  config?: EngineConfig;
};

/** Carta completa da un input di nascita non validato. */
export async function computeChart(
  raw: unknown,
  providers: Providers = defaultProviders,
  opts: ComputeOptions = {},
): Promise<ChartRecord> {
  const config = opts.config ?? loadConfig();
  const diag: Diag[] = [];
  let stage = 'validate';
  try {
    const input = parseBirthInput(raw);
    const site: Site = { latitude: input.latitude, longitude: input.longitude };

    stage = 'instant';
    const birth = resolveBirthInstant(input, config.defaultTz);
    const asOf = opts.asOf !== undefined ? toDateTime(opts.asOf, 'asOf') : undefined;
    const transitAt = opts.transitAt !== undefined ? toDateTime(opts.transitAt, 'transitAt') : undefined;
    const jd = jdFromUTC(birth.toUTC().toJSDate());
    const ayanamsa = ayanamsaFor(jd, config, input.ayanamsa);

    stage = 'ascendant';
    const ascendant = makeAscendant(toSidereal(await fetchAscendant(providers, jd, input.latitude, input.longitude), ayanamsa));

    stage = 'ephemeris';
    const positions = siderealPositions(await fetchBodies(providers, jd, site), ayanamsa, ascendant, diag);

    let transitPositions: PlanetPosition[] | undefined;
    if (transitAt) {
      stage = 'transit-snapshot';
      try {
        const tjd = jdFromUTC(transitAt.toUTC().toJSDate());
        const bodies = await fetchBodies(providers, tjd, site);
        transitPositions = siderealPositions(bodies, ayanamsaFor(tjd, config, input.ayanamsa), ascendant, diag, stage);
      } catch (e) {
        diag.push({ stage, msg: errorMessage(e) });
      }
    }

    stage = 'derive';
    return deriveChart({ ascendant, positions, birth, site, asOf, transitPositions }, { diag, ayanamsa, config });
  } catch (err) {
    if (shouldLog(config)) console.error('[chart/compute] ERROR:', errorMessage(err), { stage });
    throw err;
  }
}

export type BatchResult =
  | { ok: true; chart: ChartRecord }
  | { ok: false; error: Error };

/** Carte indipendenti calcolate in parallelo; un errore non blocca le altre. */
export async function computeCharts(
  inputs: readonly unknown[],
  providers: Providers = defaultProviders,
  opts: ComputeOptions = {},
): Promise<BatchResult[]> {
  return Promise.all(
    inputs.map((input) =>
      computeChart(input, providers, opts).then(
        (chart): BatchResult => ({ ok: true, chart }),
        (e: unknown): BatchResult => ({ ok: false, error: e instanceof Error ? e : new Error(String(e)) }),
      ),
    ),
  );
}

// ───────────────────────────── Transiti su richiesta ─────────────────────────────

/** Transiti della carta natale verso un istante arbitrario. */
export async function transitsAt(
  chart: ChartRecord,
  when: DateTime | Date | string,
  providers: Providers = defaultProviders,
  config: EngineConfig = loadConfig(),
): Promise<TransitReport> {
  const at = toDateTime(when, 'when');
  const jd = jdFromUTC(at.toUTC().toJSDate());
  const diag: Diag[] = [];
  const bodies = await fetchBodies(providers, jd, chart.birth.site ?? undefined);
  const current = siderealPositions(bodies, ayanamsaFor(jd, config), chart.ascendant, diag);
  if (diag.length && shouldLog(config)) console.warn('[transits] incomplete snapshot', diag);
  return compareTransits(chart.positions, current);
}

/** Cambi di segno dei pianeti lenti entro l'orizzonte (default TRANSIT_HORIZON_DAYS). */
export async function upcomingTransitsFor(
  chart: ChartRecord,
  from: DateTime | Date | string,
  days?: number,
  providers: Providers = defaultProviders,
  config: EngineConfig = loadConfig(),
): Promise<UpcomingTransit[]> {
  const start = toDateTime(from, 'from');
  return upcomingTransits(start, days ?? config.transitHorizonDays, async (when) => {
    const jd = jdFromUTC(when.toUTC().toJSDate());
    const bodies = await fetchBodies(providers, jd, chart.birth.site ?? undefined);
    return siderealPositions(bodies, ayanamsaFor(jd, config), chart.ascendant, []);
  });
}
