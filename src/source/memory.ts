import { Observation, TickerSeries } from '../types';
import { createTickerSeries } from '../series';
import { TickerSeriesSource } from './types';

/**
 * TickerSeriesSource backed by a Map.
 *
 * @example
 * ```typescript
 * const source = new InMemorySeriesSource([
 *   createTickerSeries('AAPL', observations),
 * ]);
 * buildScreener(source.listTickers(), source);
 * ```
 */
export class InMemorySeriesSource implements TickerSeriesSource {
  private readonly series: Map<string, TickerSeries> = new Map();

  /** Bumped on every write so cached screens are invalidated */
  private version: number = 0;

  constructor(seriesList: Iterable<TickerSeries> = []) {
    for (const series of seriesList) {
      this.series.set(series.ticker, series);
    }
  }

  get(ticker: string): TickerSeries | undefined {
    return this.series.get(ticker);
  }

  listTickers(): string[] {
    return Array.from(this.series.keys()).sort();
  }

  snapshotId(): string {
    return `memory:${this.version}`;
  }

  /**
   * Adds or replaces the series for a ticker.
   * @param ticker - Ticker symbol
   * @param observations - Raw observations in any order
   */
  set(ticker: string, observations: Iterable<Observation>): void {
    this.series.set(ticker, createTickerSeries(ticker, observations));
    this.version++;
  }

  /**
   * Removes a ticker from the source.
   * @returns Whether the ticker was present
   */
  delete(ticker: string): boolean {
    const removed = this.series.delete(ticker);
    if (removed) this.version++;
    return removed;
  }
}
