/**
 * Example: Screening a CSV cache for rich implied volatility
 *
 * Reads one `<TICKER>.csv` per ticker from VOLSCREEN_DATA_DIR, prints the
 * tickers ranked by 1-year IV rank, then summarizes the chart panels of the
 * top-ranked ticker.
 */

import {
  loadEnvConfig,
  CsvDirectorySource,
  ScreenerCache,
  evaluateTickers,
  buildTickerPlotData,
  formatDate,
} from '../src';

function screenUniverse() {
  const config = loadEnvConfig();
  const source = new CsvDirectorySource({ dataDir: config.dataDir, verbose: config.verbose });
  const cache = new ScreenerCache({ verbose: config.verbose });

  // Step 1: Rank the universe
  const rows = cache.get(config.tickers, source, {
    minObservations: config.minObservations,
    verbose: config.verbose,
  });

  if (rows.length === 0) {
    console.log('No tickers with enough volatility history to rank.');
    return;
  }

  console.log('=== IV SCREENER ===');
  for (const row of rows) {
    console.log(
      `${row.ticker.padEnd(8)} IV ${(row.currentIV * 100).toFixed(1)}%  ` +
      `rank ${(row.ivRank * 100).toFixed(0)}%  IV/HV ${row.ivHvRatio.toFixed(2)}`,
    );
  }

  // Step 2: Explain the exclusions
  for (const outcome of evaluateTickers(config.tickers, source, { minObservations: config.minObservations })) {
    if (!outcome.eligible) {
      console.log(`excluded ${outcome.ticker}: ${outcome.reason}`);
    }
  }

  // Step 3: Chart panels for the top ticker
  const top = rows[0].ticker;
  const plot = buildTickerPlotData(top, source, { ytdPolicy: config.ytdPolicy });

  if (plot.status === 'unavailable') {
    console.log(`Data file not found for ${top}.`);
    return;
  }

  console.log(`\n=== ${plot.title} ===`);
  for (const window of plot.windows) {
    if (window.status === 'no_data') {
      console.log(`${window.label}: No Data Available for this Timeframe`);
      continue;
    }
    const first = window.observations[0];
    const last = window.observations[window.observations.length - 1];
    console.log(
      `${window.label}: ${window.observations.length} days ` +
      `(${formatDate(first.timestamp)} to ${formatDate(last.timestamp)})` +
      (window.hasIV ? '' : ', HV only'),
    );
  }
}

screenUniverse();
