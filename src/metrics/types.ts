import { IneligibleReason, ScreenerRow, VolatilityMetrics } from '../types';

/**
 * Configuration for the screener metrics.
 */
export interface MetricsConfig {
  /** Minimum observations in the window for a ticker to be ranked. Default: 20 */
  minObservations?: number;
  /** Timeframe over which IV rank is measured. Default: '1Y' */
  window?: string;
}

/**
 * Result of computing screener metrics for one ticker.
 *
 * Either a complete row with its underlying metrics, or the reason the ticker
 * cannot be ranked.
 */
export type MetricsResult =
  | {
      eligible: true;
      row: ScreenerRow;
      metrics: VolatilityMetrics;
    }
  | {
      eligible: false;
      reason: Exclude<IneligibleReason, 'not_found' | 'fetch_failed' | 'compute_failed'>;
      /** Observations in the window when the decision was made */
      numObservations: number;
    };
