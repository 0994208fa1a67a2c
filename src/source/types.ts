import { TickerSeries } from '../types';

/**
 * Read-only provider of per-ticker volatility series.
 *
 * @remarks
 * The engine only ever reads from a source. Implementations may throw from
 * `get` on a malformed or unreadable file; screener and plot operations turn
 * that into an excluded ticker or an unavailable chart.
 */
export interface TickerSeriesSource {
  /**
   * Returns the series for a ticker.
   * @param ticker - Ticker symbol
   * @returns The series, or undefined if the source has no data for the ticker
   */
  get(ticker: string): TickerSeries | undefined;

  /**
   * Returns every ticker the source can serve, sorted.
   */
  listTickers(): string[];

  /**
   * Identifier that changes whenever the underlying data changes.
   * Sources without one are never memoized.
   */
  snapshotId?(): string;
}
