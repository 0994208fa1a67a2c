import { IneligibleReason, ScreenerRow, VolatilityMetrics } from '../types';
import { MetricsConfig } from '../metrics/types';

/**
 * Per-ticker result of a screener pass.
 */
export type TickerOutcome =
  | {
      ticker: string;
      eligible: true;
      row: ScreenerRow;
      metrics: VolatilityMetrics;
    }
  | {
      ticker: string;
      eligible: false;
      reason: IneligibleReason;
      /** Error message for `fetch_failed` and `compute_failed` */
      detail?: string;
    };

/**
 * Options for a screener pass.
 */
export interface ScreenerOptions extends MetricsConfig {
  /** Stops processing the remaining tickers once aborted */
  signal?: AbortSignal;
  /** Whether to log verbose debug information */
  verbose?: boolean;
}
