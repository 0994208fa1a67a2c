import { TickerSeries, DEFAULT_MIN_OBSERVATIONS } from '../types';
import { resolveWindow } from '../window';
import { hasDefinedValue, lastObservation } from '../series';
import { definedExtrema, isDefinedNumber } from '../utils/statistics';
import { MetricsConfig, MetricsResult } from './types';

export type { MetricsConfig, MetricsResult } from './types';

/**
 * Compute the screener metrics for one ticker.
 *
 * Over the trailing window (1 year by default):
 *
 *   IV rank  = (IV_now - IV_low) / (IV_high - IV_low)
 *   IV/HV    = IV_now / HV_now
 *
 * where IV_low and IV_high are the extremes of the defined IV values and the
 * "now" values come from the last observation in the window.
 *
 * A ticker is ineligible when the window is empty or shorter than
 * `minObservations`, when HV or IV has no value in the window, when the last
 * observation lacks HV or IV, or when either ratio has a zero denominator
 * (flat IV history, zero HV). Nothing here throws.
 *
 * @param series - Ticker series
 * @param config - Optional configuration overrides
 * @returns Row and metrics, or the reason the ticker is excluded
 *
 * @example
 * ```typescript
 * const result = computeScreenerMetrics(series);
 * if (result.eligible) {
 *   console.log(`${result.row.ticker}: rank ${(result.row.ivRank * 100).toFixed(0)}%`);
 * }
 * ```
 */
export function computeScreenerMetrics(
  series: TickerSeries,
  config: MetricsConfig = {},
): MetricsResult {
  const {
    minObservations = DEFAULT_MIN_OBSERVATIONS,
    window = '1Y',
  } = config;

  const observations = resolveWindow(series, window);
  const numObservations = observations.length;

  if (numObservations === 0) {
    return { eligible: false, reason: 'insufficient_history', numObservations };
  }

  if (!hasDefinedValue(observations, 'hv30d') || !hasDefinedValue(observations, 'iv30d')) {
    return { eligible: false, reason: 'missing_column', numObservations };
  }

  if (numObservations < minObservations) {
    return { eligible: false, reason: 'insufficient_history', numObservations };
  }

  const last = lastObservation(observations);
  const currentIV = last?.iv30d;
  const currentHV = last?.hv30d;

  if (!last || !isDefinedNumber(currentIV) || !isDefinedNumber(currentHV)) {
    return { eligible: false, reason: 'missing_current_value', numObservations };
  }

  const extrema = definedExtrema(observations.map((obs) => obs.iv30d));
  if (!extrema || extrema.max <= extrema.min || currentHV === 0) {
    return { eligible: false, reason: 'degenerate_metric', numObservations };
  }

  const ivRank = (currentIV - extrema.min) / (extrema.max - extrema.min);
  const ivHvRatio = currentIV / currentHV;

  return {
    eligible: true,
    row: {
      ticker: series.ticker,
      currentIV,
      ivRank,
      ivHvRatio,
    },
    metrics: {
      currentIV,
      currentHV,
      ivLow: extrema.min,
      ivHigh: extrema.max,
      ivRank,
      ivHvRatio,
      numObservations,
      asOf: last.timestamp,
    },
  };
}
