// src/index.ts
export {
  computeChart,
  computeCharts,
  deriveChart,
  defaultProviders,
  transitsAt,
  upcomingTransitsFor,
} from './lib/chart';
export type { BatchResult, ChartCore, ChartRecord, ComputeOptions, Diag, Providers } from './lib/chart';
export { loadConfig } from './lib/config';
export type { EngineConfig } from './lib/config';
export { InvalidInputError, MissingDependencyError } from './lib/errors';
export { PLANETS, SIGN_NAMES, makeAscendant, makePlanetPosition, deriveKetu } from './lib/astro';
export type { Ascendant, Planet, PlanetPosition, SignName } from './lib/astro';
export { nakshatraOf } from './lib/nakshatra';
export { computeDasha } from './lib/dasha';
export { computeStrengths, retrogradeSummary } from './lib/strength';
export type { RetrogradeSummary } from './lib/strength';
export { analyzeHouses } from './lib/houses/analysis';
export type { HouseReport } from './lib/houses/analysis';
export { computeVargas } from './lib/varga';
export { computeAspects } from './lib/aspects';
export { compareTransits, upcomingTransits } from './lib/transits';
export type { EphemerisProvider } from './lib/planets/runtime';
export type { HouseProvider } from './lib/houses/runtime';
