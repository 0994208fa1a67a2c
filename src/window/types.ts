import { YtdPolicy } from '../types';

/**
 * Unit of a rolling-duration timeframe
 * - `Y`: 365.25 days
 * - `M`: 30 days
 * - `W`: 7 days
 * - `D`: 1 day
 */
export type DurationUnit = 'Y' | 'M' | 'W' | 'D';

/**
 * A parsed timeframe specifier.
 */
export type WindowPolicy =
  | {
      kind: 'rolling';
      /** Number of units, e.g. 5 for "5Y" */
      count: number;
      unit: DurationUnit;
      /** Total window length in milliseconds */
      durationMs: number;
    }
  | { kind: 'ytd' };

/**
 * Options for resolving a window.
 */
export interface ResolveWindowOptions {
  /** Which year "YTD" refers to. Default: 'series' */
  ytdPolicy?: YtdPolicy;
  /** Wall-clock time used by the 'calendar' YTD policy. Default: Date.now() */
  now?: number;
}
