// src/lib/time/resolveTz.ts
// Dato (lat, lon) risolve la timezone IANA. L'offset valido in quel momento
// (DST incluso) lo calcola poi luxon sull'istante locale.

import { IANAZone } from 'luxon';
import tzlookup from 'tz-lookup';
import { InvalidInputError } from '../errors';

/**
 * Timezone IANA dal punto geografico. Se la zona trovata da tz-lookup non è
 * nel database di luxon si usa `fallback` (DEFAULT_TZ della config).
 */
export function resolveTimezone(lat: number, lon: number, fallback: string): string {
  if (!Number.isFinite(lat) || lat < -90 || lat > 90) {
    throw new InvalidInputError(`latitude out of range: ${lat}`, 'latitude');
  }
  if (!Number.isFinite(lon) || lon < -180 || lon > 180) {
    throw new InvalidInputError(`longitude out of range: ${lon}`, 'longitude');
  }
  const zone = tzlookup(lat, lon);
  if (IANAZone.isValidZone(zone)) return zone;
  console.warn('[time/resolveTz] unknown zone, using DEFAULT_TZ', { lat, lon, zone, fallback });
  return fallback;
}
