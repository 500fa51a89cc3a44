/// <reference types="vitest/globals" />
import { computeChart, type Providers } from '@/lib/chart';
import { resolveBirthInstant } from '@/lib/time';
import { resolveTimezone } from '@/lib/time/resolveTz';
import { testConfig } from './fixtures';

// all'equatore, 30°W tz-lookup risponde con una zona che luxon non conosce
vi.mock('tz-lookup', () => ({
  default: (lat: number, lon: number) => (lat === 0 && lon === -30 ? 'Atlantic/Nowhere' : 'Etc/GMT+2'),
}));

const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

beforeEach(() => {
  warnSpy.mockClear();
});

afterAll(() => {
  warnSpy.mockRestore();
});

test('zona sconosciuta a luxon → DEFAULT_TZ', () => {
  expect(resolveTimezone(0, -30, 'Asia/Tokyo')).toBe('Asia/Tokyo');
  expect(warnSpy).toHaveBeenCalledWith('[time/resolveTz] unknown zone, using DEFAULT_TZ', {
    lat: 0,
    lon: -30,
    zone: 'Atlantic/Nowhere',
    fallback: 'Asia/Tokyo',
  });
});

test('zona valida: il fallback non entra in gioco', () => {
  expect(resolveTimezone(10, -30, 'Asia/Tokyo')).toBe('Etc/GMT+2');
  expect(warnSpy).not.toHaveBeenCalled();
});

test('istante di nascita nella zona di fallback', () => {
  const dt = resolveBirthInstant({ date: '2000-01-01', time: '10:00', latitude: 0, longitude: -30 }, 'Asia/Tokyo');
  expect(dt.zoneName).toBe('Asia/Tokyo');
  expect(dt.toUTC().hour).toBe(1);
});

test('computeChart usa defaultTz della config passata', async () => {
  const providers: Providers = {
    ephemeris: { bodies: async () => ({ Moon: { longitude: 69, speed: 13.2 } }) },
    houses: { ascendant: async () => 24.5 },
  };
  const chart = await computeChart(
    { date: '2000-01-01', time: '10:00', latitude: 0, longitude: -30 },
    providers,
    { config: { ...testConfig, defaultTz: 'Asia/Tokyo' } },
  );
  expect(chart.birth.zone).toBe('Asia/Tokyo');
  expect(chart.birth.utc).toBe('2000-01-01T01:00:00Z');
});
