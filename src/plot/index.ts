import { TickerSeries, Timeframe } from '../types';
import { resolveWindow, ResolveWindowOptions } from '../window';
import { hasDefinedValue } from '../series';
import { TickerSeriesSource } from '../source/types';
import { NamedWindow, TickerPlotData, WindowLabel } from './types';

export type { NamedWindow, TickerPlotData, WindowLabel } from './types';

/**
 * Chart panels in display order
 */
export const STANDARD_TIMEFRAMES: ReadonlyArray<{ label: WindowLabel; timeframe: Timeframe }> = [
  { label: '5 Years', timeframe: '5Y' },
  { label: '1 Year', timeframe: '1Y' },
  { label: '6 Months', timeframe: '6M' },
  { label: 'YTD', timeframe: 'YTD' },
  { label: '1 Month', timeframe: '1M' },
];

/**
 * Build the five chart panels for a ticker's series.
 *
 * Panels are resolved independently: a panel whose window is empty, or whose
 * resolution fails, becomes `no_data` without affecting the others.
 *
 * @param series - Ticker series
 * @param options - YTD policy and clock
 * @returns Five panels: 5 Years, 1 Year, 6 Months, YTD, 1 Month
 */
export function buildPlotData(
  series: TickerSeries,
  options: ResolveWindowOptions = {},
): NamedWindow[] {
  return STANDARD_TIMEFRAMES.map(({ label, timeframe }): NamedWindow => {
    try {
      const observations = resolveWindow(series, timeframe, options);
      if (observations.length === 0) {
        return { label, timeframe, status: 'no_data' };
      }
      return {
        label,
        timeframe,
        status: 'ok',
        observations,
        hasIV: hasDefinedValue(observations, 'iv30d'),
      };
    } catch {
      return { label, timeframe, status: 'no_data' };
    }
  });
}

/**
 * Load a ticker from a source and build its chart panels.
 *
 * @param ticker - Ticker symbol
 * @param source - Series provider
 * @param options - YTD policy and clock
 * @returns Chart data, or `unavailable` if the source has no readable series
 */
export function buildTickerPlotData(
  ticker: string,
  source: TickerSeriesSource,
  options: ResolveWindowOptions = {},
): TickerPlotData {
  let series: TickerSeries | undefined;
  try {
    series = source.get(ticker);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return { status: 'unavailable', ticker, reason: 'fetch_failed', detail };
  }

  if (!series) {
    return { status: 'unavailable', ticker, reason: 'not_found' };
  }

  return {
    status: 'ok',
    ticker,
    title: `Historical vs. Implied Volatility for ${ticker}`,
    windows: buildPlotData(series, options),
  };
}
