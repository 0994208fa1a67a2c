/**
 * Core types for volatility screening
 */

/**
 * A single daily volatility observation
 */
export interface Observation {
  /** UTC midnight of the observation date, in milliseconds */
  timestamp: number;
  /** 30-day historical volatility (annualized, as decimal e.g., 0.20 for 20%) */
  hv30d?: number;
  /** 30-day implied volatility (annualized, as decimal) */
  iv30d?: number;
}

/**
 * Daily volatility history for one ticker.
 *
 * @remarks
 * Observations are in ascending timestamp order with no duplicate dates.
 * Build one with `createTickerSeries` to get that guarantee.
 */
export interface TickerSeries {
  /** Ticker symbol */
  ticker: string;
  /** Observations, oldest first */
  observations: readonly Observation[];
}

/**
 * One row of the screener table
 */
export interface ScreenerRow {
  /** Ticker symbol */
  ticker: string;
  /** Most recent 30-day IV (decimal) */
  currentIV: number;
  /** Position of current IV within its 1-year range, 0 to 1 */
  ivRank: number;
  /** Current IV divided by current HV */
  ivHvRatio: number;
}

/**
 * Full set of values computed for one ticker
 */
export interface VolatilityMetrics {
  /** IV of the last observation in the window */
  currentIV: number;
  /** HV of the last observation in the window */
  currentHV: number;
  /** Lowest IV in the window */
  ivLow: number;
  /** Highest IV in the window */
  ivHigh: number;
  /** (currentIV - ivLow) / (ivHigh - ivLow) */
  ivRank: number;
  /** currentIV / currentHV */
  ivHvRatio: number;
  /** Number of observations in the window */
  numObservations: number;
  /** Timestamp of the last observation in the window */
  asOf: number;
}

/**
 * Why a ticker was left out of the screener
 */
export type IneligibleReason =
  | 'not_found'
  | 'fetch_failed'
  | 'insufficient_history'
  | 'missing_column'
  | 'missing_current_value'
  | 'degenerate_metric'
  | 'compute_failed';

/**
 * Standard timeframe specifiers used for charting
 */
export type Timeframe = '5Y' | '1Y' | '6M' | 'YTD' | '1M';

/**
 * How "year to date" picks its year.
 * - `series`: the year of the series' last observation
 * - `calendar`: the current wall-clock year
 */
export type YtdPolicy = 'series' | 'calendar';

export const MILLISECONDS_PER_DAY = 86400000;
export const DAYS_PER_YEAR = 365.25;
export const DAYS_PER_MONTH = 30;
export const DAYS_PER_WEEK = 7;

/** Minimum observations in the trailing year for a ticker to be ranked */
export const DEFAULT_MIN_OBSERVATIONS = 20;
