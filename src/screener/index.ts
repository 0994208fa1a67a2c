import { ScreenerRow, TickerSeries } from '../types';
import { computeScreenerMetrics } from '../metrics';
import { TickerSeriesSource } from '../source/types';
import { TickerOutcome, ScreenerOptions } from './types';

export type { TickerOutcome, ScreenerOptions } from './types';

/**
 * Evaluate every ticker against the screener rules.
 *
 * Each ticker is fetched and scored on its own: a missing series, a source
 * that throws, or a failing computation only affects that ticker's outcome.
 * Outcomes are returned in input order. If `options.signal` is aborted, the
 * remaining tickers are not processed and the outcomes gathered so far are
 * returned.
 *
 * @param tickers - Universe to evaluate, or undefined for every ticker the source lists
 * @param source - Series provider
 * @param options - Metric configuration, abort signal and logging
 * @returns One outcome per processed ticker
 */
export function evaluateTickers(
  tickers: readonly string[] | undefined,
  source: TickerSeriesSource,
  options: ScreenerOptions = {},
): TickerOutcome[] {
  const { signal, verbose = false, ...metricsConfig } = options;
  const universe = tickers ?? listUniverse(source, verbose);
  const outcomes: TickerOutcome[] = [];

  for (const ticker of universe) {
    if (signal?.aborted) {
      if (verbose) {
        console.log(`[Screener] Aborted after ${outcomes.length} of ${universe.length} tickers`);
      }
      break;
    }

    let series: TickerSeries | undefined;
    try {
      series = source.get(ticker);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      if (verbose) {
        console.error(`[Screener] Failed to load ${ticker}:`, detail);
      }
      outcomes.push({ ticker, eligible: false, reason: 'fetch_failed', detail });
      continue;
    }

    if (!series) {
      if (verbose) {
        console.log(`[Screener] ${ticker} excluded: not_found`);
      }
      outcomes.push({ ticker, eligible: false, reason: 'not_found' });
      continue;
    }

    try {
      const result = computeScreenerMetrics(series, metricsConfig);
      if (result.eligible) {
        outcomes.push({ ticker, eligible: true, row: result.row, metrics: result.metrics });
      } else {
        if (verbose) {
          console.log(
            `[Screener] ${ticker} excluded: ${result.reason} (${result.numObservations} observations)`,
          );
        }
        outcomes.push({ ticker, eligible: false, reason: result.reason });
      }
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      if (verbose) {
        console.error(`[Screener] Failed to compute metrics for ${ticker}:`, detail);
      }
      outcomes.push({ ticker, eligible: false, reason: 'compute_failed', detail });
    }
  }

  return outcomes;
}

function listUniverse(source: TickerSeriesSource, verbose: boolean): readonly string[] {
  try {
    return source.listTickers();
  } catch (error) {
    if (verbose) {
      console.error('[Screener] Failed to list tickers:', error instanceof Error ? error.message : String(error));
    }
    return [];
  }
}

/**
 * Build the screener table.
 *
 * Keeps the eligible tickers and ranks them by IV rank, highest first. Equal
 * ranks keep their input order. An empty result means no ticker had usable
 * data.
 *
 * @param tickers - Universe to screen, or undefined for every ticker the source lists
 * @param source - Series provider
 * @param options - Metric configuration, abort signal and logging
 * @returns Ranked screener rows
 *
 * @example
 * ```typescript
 * const source = new CsvDirectorySource({ dataDir: './data' });
 * const rows = buildScreener(['AAPL', 'MSFT', 'NVDA'], source);
 * for (const row of rows) {
 *   console.log(`${row.ticker}: IV ${(row.currentIV * 100).toFixed(1)}%, rank ${row.ivRank.toFixed(2)}`);
 * }
 * ```
 */
export function buildScreener(
  tickers: readonly string[] | undefined,
  source: TickerSeriesSource,
  options: ScreenerOptions = {},
): ScreenerRow[] {
  const rows: ScreenerRow[] = [];

  for (const outcome of evaluateTickers(tickers, source, options)) {
    if (outcome.eligible) {
      rows.push(outcome.row);
    }
  }

  // Stable sort: ties keep input order
  rows.sort((a, b) => b.ivRank - a.ivRank);

  if (options.verbose) {
    console.log(`[Screener] ${rows.length} eligible tickers`);
  }

  return rows;
}
