/// <reference types="vitest/globals" />
import { loadConfig, shouldLog } from '@/lib/config';
import { InvalidInputError } from '@/lib/errors';

test('valori di default con env vuoto', () => {
  expect(loadConfig({})).toEqual({
    defaultTz: 'UTC',
    ayanamsa: { mode: 'lahiri' },
    transitHorizonDays: 365,
    debug: false,
  });
});

test('stringhe vuote valgono come assenti', () => {
  expect(loadConfig({ DEFAULT_TZ: '', AYANAMSA: '', TRANSIT_HORIZON_DAYS: '' })).toEqual(loadConfig({}));
});

test('override da env', () => {
  expect(loadConfig({
    DEFAULT_TZ: 'Asia/Kolkata',
    AYANAMSA: '23.5',
    TRANSIT_HORIZON_DAYS: '90',
    ASTRO_DEBUG: 'true',
  })).toEqual({
    defaultTz: 'Asia/Kolkata',
    ayanamsa: { mode: 'fixed', degrees: 23.5 },
    transitHorizonDays: 90,
    debug: true,
  });
  expect(loadConfig({ AYANAMSA: 'Lahiri', ASTRO_DEBUG: '1' })).toMatchObject({ ayanamsa: { mode: 'lahiri' }, debug: true });
});

test('valori non validi → InvalidInputError con il nome della variabile', () => {
  expect(() => loadConfig({ AYANAMSA: 'fagan' })).toThrow(InvalidInputError);
  try {
    loadConfig({ TRANSIT_HORIZON_DAYS: 'abc' });
    expect.unreachable();
  } catch (e) {
    expect(e).toBeInstanceOf(InvalidInputError);
    expect(e instanceof InvalidInputError && e.field).toBe('TRANSIT_HORIZON_DAYS');
  }
  expect(() => loadConfig({ TRANSIT_HORIZON_DAYS: '-5' })).toThrow(InvalidInputError);
  expect(() => loadConfig({ DEFAULT_TZ: 'Mars/Olympus' })).toThrow('DEFAULT_TZ: unknown IANA zone');
});

test('log: sempre fuori produzione, in produzione solo con ASTRO_DEBUG', () => {
  const quiet = loadConfig({});
  expect(shouldLog(quiet, { NODE_ENV: 'test' })).toBe(true);
  expect(shouldLog(quiet, { NODE_ENV: 'production' })).toBe(false);
  expect(shouldLog(loadConfig({ ASTRO_DEBUG: 'true' }), { NODE_ENV: 'production' })).toBe(true);
});
