/// <reference types="vitest/globals" />
import { DateTime } from 'luxon';
import { makeAscendant, type EphemerisBody } from '@/lib/astro';
import {
  computeChart,
  computeCharts,
  deriveChart,
  siderealPositions,
  transitsAt,
  upcomingTransitsFor,
  type Diag,
  type Providers,
} from '@/lib/chart';
import { InvalidInputError, MissingDependencyError } from '@/lib/errors';
import type { BodyMotion } from '@/lib/planets/runtime';
import { testConfig } from './fixtures';

// longitudini tropicali; con ayanamsa fisso 24° Sun → 125, Moon → 45, ...
const TROPICAL: Record<EphemerisBody, BodyMotion> = {
  Sun: { longitude: 149, speed: 0.98 },
  Moon: { longitude: 69, speed: 13.2 },
  Mars: { longitude: 29, speed: 0.7 },
  Mercury: { longitude: 160, speed: 1.5 },
  Jupiter: { longitude: 209, speed: 0.1 },
  Venus: { longitude: 100, speed: 1.1 },
  Saturn: { longitude: 329, speed: -0.05 },
  Rahu: { longitude: 14, speed: -0.053 },
};

function fakeProviders(
  bodies: (jd: number) => Partial<Record<EphemerisBody, BodyMotion>> = () => TROPICAL,
  ascendant: () => number = () => 24.5,
): Providers {
  return {
    ephemeris: { bodies: async (jd) => bodies(jd) },
    houses: { ascendant: async () => ascendant() },
  };
}

const input = { date: '2000-01-01', time: '10:00', timezone: 'UTC', latitude: 28.6, longitude: 77.2 };

const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

beforeEach(() => {
  errorSpy.mockClear();
});

afterAll(() => {
  errorSpy.mockRestore();
});

test('carta completa da provider in-process', async () => {
  const chart = await computeChart(input, fakeProviders(), { config: testConfig });

  expect(chart.diag).toEqual([]);
  expect(chart.ayanamsa).toBe(24);
  expect(chart.ascendant.longitude).toBe(0.5);
  expect(chart.ascendant.signName).toBe('Aries');
  expect(chart.birth).toMatchObject({
    local: '2000-01-01T10:00:00',
    utc: '2000-01-01T10:00:00Z',
    zone: 'UTC',
    localHour: 10,
  });
  expect(chart.birth.julianDay).toBeCloseTo(2451544.9166667, 6);

  expect(chart.positions.map((p) => p.planet)).toEqual([
    'Sun', 'Moon', 'Mars', 'Mercury', 'Jupiter', 'Venus', 'Saturn', 'Rahu', 'Ketu',
  ]);
  const ketu = chart.positions[8];
  expect(ketu.longitude).toBe(170);
  expect(ketu.speed).toBe(0.053);
  expect(ketu.retrograde).toBe(false);

  expect(chart.houses).toEqual({
    1: ['Mars'],
    2: ['Moon'],
    3: ['Venus'],
    4: [],
    5: ['Sun', 'Mercury'],
    6: ['Ketu'],
    7: ['Jupiter'],
    8: [],
    9: [],
    10: [],
    11: ['Saturn'],
    12: ['Rahu'],
  });
  expect(chart.dignities).toMatchObject({ Sun: 'Own', Moon: 'Exalted', Mars: 'Own', Jupiter: 'Neutral', Saturn: 'Own' });
  expect(chart.rulingPlanet).toBe('Venus');

  expect(chart.dasha?.current.planet).toBe('Venus');
  expect(chart.dasha?.balance.remainingYears).toBe(12.5);
  expect(chart.dasha?.timeline[0].startDate).toBe('1992-07-02');
  expect(chart.strength?.profiles).toHaveLength(9);
  expect(chart.yogas?.houseLords).toHaveLength(12);
  expect(chart.vargas?.d9.planets.Moon?.divisionalSignName).toBe('Taurus');
  expect(chart.aspects?.strongest.slice(0, 3).map((s) => s.planet)).toEqual(['Mars', 'Jupiter', 'Saturn']);
  expect(chart.transits).toBeNull();

  expect(chart.houseAnalysis?.houses).toHaveLength(12);
  expect(chart.houseAnalysis?.houses[4]).toMatchObject({ sign: 'Leo', planets: ['Sun', 'Mercury'], lord: 'Sun' });
  expect(chart.retrograde).toEqual({
    totalRetrograde: 2,
    planets: [
      { planet: 'Saturn', sign: 'Aquarius', house: 11 },
      { planet: 'Rahu', sign: 'Pisces', house: 12 },
    ],
    hasRetrograde: true,
    interpretation: 'Multiple retrograde planets - Deep introspection and spiritual growth needed',
  });
});

test('asOf sceglie la Dasha corrente', async () => {
  const chart = await computeChart(input, fakeProviders(), { config: testConfig, asOf: '2015-01-01T00:00:00Z' });
  expect(chart.dasha?.current.planet).toBe('Sun');
});

test('corpo mancante o non valido: saltato e annotato in diag', async () => {
  const chart = await computeChart(
    input,
    fakeProviders(() => ({ ...TROPICAL, Venus: undefined, Mars: { longitude: Number.NaN, speed: 0.7 } })),
    { config: testConfig },
  );
  expect(chart.positions).toHaveLength(7);
  expect(chart.diag).toEqual([
    { stage: 'ephemeris', msg: 'no usable data for Mars' },
    { stage: 'ephemeris', msg: 'no usable data for Venus' },
  ]);
  expect(chart.dignities.Venus).toBeUndefined();
  expect(chart.strength?.profiles).toHaveLength(7);
});

test('senza Luna la derivazione fallisce', async () => {
  await expect(
    computeChart(input, fakeProviders(() => ({ ...TROPICAL, Moon: undefined })), { config: testConfig }),
  ).rejects.toBeInstanceOf(MissingDependencyError);
  expect(errorSpy).toHaveBeenCalledWith('[chart/compute] ERROR:', 'ephemeris/Moon: Moon longitude is required for the dasha timeline', { stage: 'derive' });
});

test('errori dei provider → MissingDependencyError', async () => {
  const offline = fakeProviders(() => {
    throw new Error('offline');
  });
  await expect(computeChart(input, offline, { config: testConfig })).rejects.toMatchObject({
    name: 'MissingDependencyError',
    dependency: 'ephemeris',
    message: 'ephemeris: offline',
  });

  const noHouses = fakeProviders(undefined, () => {
    throw new Error('no houses');
  });
  await expect(computeChart(input, noHouses, { config: testConfig })).rejects.toMatchObject({ dependency: 'houses' });

  const nanHouses = fakeProviders(undefined, () => Number.NaN);
  await expect(computeChart(input, nanHouses, { config: testConfig })).rejects.toMatchObject({
    dependency: 'houses',
    message: 'houses: ascendant is not a finite number',
  });
});

test('input non valido → InvalidInputError sul campo', async () => {
  await expect(computeChart({ ...input, latitude: 95 }, fakeProviders(), { config: testConfig }))
    .rejects.toMatchObject({ name: 'InvalidInputError', field: 'latitude' });
  await expect(computeChart({ ...input, time: '25:00' }, fakeProviders(), { config: testConfig }))
    .rejects.toMatchObject({ field: 'time' });
  await expect(computeChart(null, fakeProviders(), { config: testConfig }))
    .rejects.toBeInstanceOf(InvalidInputError);
});

test('transiti con snapshot allo stesso cielo: ogni pianeta congiunto a sé', async () => {
  const chart = await computeChart(input, fakeProviders(), { config: testConfig, transitAt: '2024-01-01T00:00:00Z' });
  const section = chart.transits;
  expect(section?.report.transits).toHaveLength(9);
  expect(section?.report.transits.every((t) => !t.signChanged)).toBe(true);
  expect(section?.report.transits[0].aspects[0]).toEqual({
    natalPlanet: 'Sun',
    aspect: 'conjunction',
    exactAngle: 0,
    angle: 0,
    orb: 0,
    applying: false,
    strength: 'Strong',
  });
  expect(section?.important.map((t) => t.planet)).toEqual(['Saturn', 'Jupiter', 'Rahu', 'Ketu']);
  expect(section?.dashaInteraction[0]).toBe('Current Venus Dasha is interacting with Venus Transit');
});

test('una sezione che fallisce resta null e finisce in diag', () => {
  const asc = makeAscendant(0.5);
  const diag: Diag[] = [];
  const positions = siderealPositions(TROPICAL, 24, asc, diag);
  const chart = deriveChart(
    { ascendant: asc, positions, birth: DateTime.invalid('fixture') },
    { config: testConfig },
  );
  expect(chart.dasha).toBeNull();
  expect(chart.strength).not.toBeNull();
  expect(chart.vargas).not.toBeNull();
  expect(chart.diag).toEqual([{ stage: 'dasha', msg: 'date: invalid date' }]);
  expect(errorSpy).toHaveBeenCalledWith('[chart/derive] section failed:', 'date: invalid date', { stage: 'dasha' });
});

test('batch: una carta non valida non blocca le altre', async () => {
  const results = await computeCharts([input, { ...input, latitude: 95 }], fakeProviders(), { config: testConfig });
  expect(results.map((r) => r.ok)).toEqual([true, false]);
  const failed = results[1];
  expect(failed.ok === false && failed.error).toBeInstanceOf(InvalidInputError);
});

test('transiti e cambi di segno su richiesta', async () => {
  // Saturno passa da Aquarius a Pisces tra il giorno 30 e il 60
  const moving = fakeProviders((jd) => ({
    ...TROPICAL,
    Saturn: { longitude: jd < 2460360 ? 329 : 359, speed: 0.1 },
  }));
  const chart = await computeChart(input, moving, { config: testConfig });

  const report = await transitsAt(chart, '2024-01-01T00:00:00Z', moving, testConfig);
  expect(report.transits.find((t) => t.planet === 'Saturn')?.currentSign).toBe('Aquarius');

  const upcoming = await upcomingTransitsFor(chart, '2024-01-01T00:00:00Z', 120, moving, testConfig);
  expect(upcoming).toEqual([
    {
      planet: 'Saturn',
      date: '2024-03-01',
      daysAway: 60,
      oldSign: 'Aquarius',
      newSign: 'Pisces',
      significance: 'Restrictions, lessons, responsibilities',
    },
  ]);
});

test('il luogo di nascita arriva al provider anche nei transiti su richiesta', async () => {
  const sites: unknown[] = [];
  const providers: Providers = {
    ephemeris: {
      bodies: async (_jd, site) => {
        sites.push(site);
        return TROPICAL;
      },
    },
    houses: { ascendant: async () => 24.5 },
  };
  const chart = await computeChart(input, providers, { config: testConfig });
  expect(chart.birth.site).toEqual({ latitude: 28.6, longitude: 77.2 });

  await transitsAt(chart, '2024-01-01T00:00:00Z', providers, testConfig);
  await upcomingTransitsFor(chart, '2024-01-01T00:00:00Z', 60, providers, testConfig);
  // nascita, transitsAt, due campioni (giorni 0 e 30)
  expect(sites).toEqual(Array.from({ length: 4 }, () => ({ latitude: 28.6, longitude: 77.2 })));
});
