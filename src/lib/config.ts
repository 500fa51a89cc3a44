// src/lib/config.ts
import { IANAZone } from 'luxon';
import { z } from 'zod';
import { InvalidInputError } from './errors';

export type AyanamsaSetting = { mode: 'lahiri' } | { mode: 'fixed'; degrees: number };

export type EngineConfig = {
  defaultTz: string;
  ayanamsa: AyanamsaSetting;
  transitHorizonDays: number;
  debug: boolean;
};

const EnvSchema = z.object({
  DEFAULT_TZ: z.string().trim().optional()
    .transform((v) => v || 'UTC')
    .refine((v) => IANAZone.isValidZone(v), 'unknown IANA zone'),
  AYANAMSA: z.string().trim().optional().transform((v) => v || 'lahiri'),
  TRANSIT_HORIZON_DAYS: z.preprocess(
    (v) => (v === '' ? undefined : v),
    z.coerce.number().int().positive().max(36525).default(365),
  ),
  ASTRO_DEBUG: z.string().optional(),
});

function parseAyanamsa(raw: string): AyanamsaSetting {
  if (raw.toLowerCase() === 'lahiri') return { mode: 'lahiri' };
  const degrees = Number(raw);
  // offset fisso in gradi; oltre ~30° non è più un ayanamsa sensato
  if (raw !== '' && Number.isFinite(degrees) && degrees >= 0 && degrees < 30) {
    return { mode: 'fixed', degrees };
  }
  throw new InvalidInputError(`expected "lahiri" or degrees in [0,30), got "${raw}"`, 'AYANAMSA');
}

/** Legge la configurazione da process.env (o da un env esplicito, utile nei test). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || null;
    throw new InvalidInputError(issue?.message ?? 'invalid environment', field);
  }
  const e = parsed.data;
  const debugFlag = (e.ASTRO_DEBUG ?? '').toLowerCase();
  return {
    defaultTz: e.DEFAULT_TZ,
    ayanamsa: parseAyanamsa(e.AYANAMSA),
    transitHorizonDays: e.TRANSIT_HORIZON_DAYS,
    debug: debugFlag === '1' || debugFlag === 'true',
  };
}

/** Log diagnostici: sempre fuori produzione, in produzione solo con ASTRO_DEBUG. */
export function shouldLog(config: EngineConfig, env: NodeJS.ProcessEnv = process.env): boolean {
  return config.debug || env.NODE_ENV !== 'production';
}
