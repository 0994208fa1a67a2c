/**
 * volscreen - Volatility Screener Library
 *
 * Ranks equities by 1-year IV rank and IV/HV ratio from cached daily
 * volatility history, and slices that history into chart timeframes.
 */

// Core types
export * from './types';

// Series construction
export {
  createTickerSeries,
  lastObservation,
  hasDefinedValue,
} from './series';

// Timeframe windows
export {
  parseTimeframe,
  resolveWindow,
} from './window';
export type {
  DurationUnit,
  WindowPolicy,
  ResolveWindowOptions,
} from './window';

// Screener metrics
export {
  computeScreenerMetrics,
} from './metrics';
export type {
  MetricsConfig,
  MetricsResult,
} from './metrics';

// Screener
export {
  evaluateTickers,
  buildScreener,
} from './screener';
export type {
  TickerOutcome,
  ScreenerOptions,
} from './screener';

// Chart data
export {
  STANDARD_TIMEFRAMES,
  buildPlotData,
  buildTickerPlotData,
} from './plot';
export type {
  NamedWindow,
  TickerPlotData,
  WindowLabel,
} from './plot';

// Series sources
export {
  InMemorySeriesSource,
  CsvDirectorySource,
  parseVolatilityCsv,
} from './source';
export type {
  TickerSeriesSource,
  CsvDirectorySourceOptions,
} from './source';

// Memoization
export { ScreenerCache } from './cache';
export type { ScreenerCacheOptions } from './cache';

// Configuration
export { loadConfig, loadEnvConfig } from './config';
export type { ScreenerConfig, ScreenerEnv } from './config';

// Utilities
export {
  parseDate,
  formatDate,
  getUTCYear,
} from './utils/dates';
export {
  isDefinedNumber,
  definedValues,
  definedExtrema,
} from './utils/statistics';
