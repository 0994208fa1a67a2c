import { ScreenerRow } from '../types';
import { buildScreener, ScreenerOptions } from '../screener';
import { TickerSeriesSource } from '../source/types';

/**
 * Options for the screener cache
 */
export interface ScreenerCacheOptions {
  /** Maximum number of cached screens (default: 16) */
  maxEntries?: number;
  /** Whether to log verbose debug information */
  verbose?: boolean;
}

interface CacheEntry {
  snapshotId: string;
  rows: ScreenerRow[];
}

/**
 * Memoizes screener results per source snapshot.
 *
 * @remarks
 * A screen is reused while the source reports the same
 * {@link TickerSeriesSource.snapshotId} for the same ticker list and metric
 * configuration. Sources that expose no snapshot identifier are recomputed on
 * every call. Screens cut short by an abort signal are not stored.
 *
 * @example
 * ```typescript
 * const cache = new ScreenerCache();
 * const source = new CsvDirectorySource({ dataDir: './data' });
 *
 * const rows = cache.get(undefined, source); // computed
 * const again = cache.get(undefined, source); // served from cache until a file changes
 * ```
 */
export class ScreenerCache {
  private readonly entries: Map<string, CacheEntry> = new Map();

  private readonly maxEntries: number;

  /** Whether to log verbose debug information */
  private readonly verbose: boolean;

  private hits: number = 0;

  private misses: number = 0;

  constructor(options: ScreenerCacheOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? 16);
    this.verbose = options.verbose ?? false;
  }

  /**
   * Returns the screener rows, computing them only when the source changed.
   * @param tickers - Universe to screen, or undefined for every ticker the source lists
   * @param source - Series provider
   * @param options - Screener options
   * @returns A copy of the ranked rows
   */
  get(
    tickers: readonly string[] | undefined,
    source: TickerSeriesSource,
    options: ScreenerOptions = {},
  ): ScreenerRow[] {
    const snapshotId = this.readSnapshotId(source);
    if (snapshotId === undefined) {
      this.misses++;
      return buildScreener(tickers, source, options);
    }

    const key = this.buildKey(tickers, options);
    const cached = this.entries.get(key);

    if (cached && cached.snapshotId === snapshotId) {
      this.hits++;
      // Move to the end so eviction drops the least recently used screen
      this.entries.delete(key);
      this.entries.set(key, cached);
      if (this.verbose) {
        console.log(`[ScreenerCache] Hit for snapshot ${snapshotId}`);
      }
      return cached.rows.map((row) => ({ ...row }));
    }

    this.misses++;
    if (this.verbose) {
      console.log(`[ScreenerCache] Miss for snapshot ${snapshotId}, recomputing`);
    }

    const rows = buildScreener(tickers, source, options);

    if (!options.signal?.aborted) {
      this.entries.delete(key);
      this.entries.set(key, { snapshotId, rows: rows.map((row) => ({ ...row })) });
      this.evict();
    }

    return rows;
  }

  /**
   * Drops every cached screen.
   */
  clear(): void {
    this.entries.clear();
  }

  /**
   * Returns cache hit and miss counts.
   */
  getStats(): { hits: number; misses: number; size: number } {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }

  private buildKey(tickers: readonly string[] | undefined, options: ScreenerOptions): string {
    const universe = tickers ? JSON.stringify(tickers) : '*';
    return `${universe}|${options.minObservations ?? ''}|${options.window ?? ''}`;
  }

  /**
   * A source whose snapshot identifier cannot be read is treated like one
   * without an identifier: the screen is recomputed and not stored.
   */
  private readSnapshotId(source: TickerSeriesSource): string | undefined {
    try {
      return source.snapshotId?.();
    } catch (error) {
      if (this.verbose) {
        console.error(
          '[ScreenerCache] Failed to read snapshot identifier, not caching:',
          error instanceof Error ? error.message : error,
        );
      }
      return undefined;
    }
  }

  private evict(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}
