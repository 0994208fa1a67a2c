import { Observation, Timeframe } from '../types';

/**
 * Display label of a chart panel
 */
export type WindowLabel = '5 Years' | '1 Year' | '6 Months' | 'YTD' | '1 Month';

/**
 * One chart panel for a ticker.
 *
 * `no_data` is its own state rather than an empty observation list, so a
 * renderer can show "No Data Available for this Timeframe".
 */
export type NamedWindow =
  | {
      label: WindowLabel;
      timeframe: Timeframe;
      status: 'no_data';
    }
  | {
      label: WindowLabel;
      timeframe: Timeframe;
      status: 'ok';
      /** Observations in the window, oldest first */
      observations: readonly Observation[];
      /** Whether any observation has an IV value; plot the IV line only if so */
      hasIV: boolean;
    };

/**
 * Chart data for one ticker, or why it cannot be charted.
 */
export type TickerPlotData =
  | {
      status: 'ok';
      ticker: string;
      /** Chart title */
      title: string;
      /** Exactly five panels in display order */
      windows: NamedWindow[];
    }
  | {
      status: 'unavailable';
      ticker: string;
      reason: 'not_found' | 'fetch_failed';
      /** Error message for `fetch_failed` */
      detail?: string;
    };
