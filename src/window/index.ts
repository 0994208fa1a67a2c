import {
  Observation,
  TickerSeries,
  MILLISECONDS_PER_DAY,
  DAYS_PER_YEAR,
  DAYS_PER_MONTH,
  DAYS_PER_WEEK,
} from '../types';
import { getUTCYear } from '../utils/dates';
import { lastObservation } from '../series';
import { DurationUnit, WindowPolicy, ResolveWindowOptions } from './types';

export type { DurationUnit, WindowPolicy, ResolveWindowOptions } from './types';

const ROLLING_PATTERN = /^(\d+)([YMWD])$/;

const DAYS_PER_UNIT: Record<DurationUnit, number> = {
  Y: DAYS_PER_YEAR,
  M: DAYS_PER_MONTH,
  W: DAYS_PER_WEEK,
  D: 1,
};

function isDurationUnit(value: string): value is DurationUnit {
  return value in DAYS_PER_UNIT;
}

const EMPTY: readonly Observation[] = Object.freeze([]);

/**
 * Parse a timeframe specifier such as "5Y", "6M", "1M" or "YTD".
 *
 * Rolling specifiers are a positive integer followed by a unit
 * (Y = 365.25 days, M = 30 days, W = 7 days, D = 1 day). Matching is
 * case-insensitive and ignores surrounding whitespace.
 *
 * @param spec - Timeframe specifier
 * @returns Parsed policy, or undefined if the specifier is not understood
 *
 * @example
 * ```typescript
 * parseTimeframe('6M'); // { kind: 'rolling', count: 6, unit: 'M', durationMs: 15552000000 }
 * parseTimeframe('YTD'); // { kind: 'ytd' }
 * parseTimeframe('0Y'); // undefined
 * ```
 */
export function parseTimeframe(spec: string): WindowPolicy | undefined {
  const normalized = spec.trim().toUpperCase();

  if (normalized === 'YTD') {
    return { kind: 'ytd' };
  }

  const match = ROLLING_PATTERN.exec(normalized);
  if (!match) return undefined;

  const count = Number(match[1]);
  const unit = match[2];
  if (!isDurationUnit(unit) || !Number.isSafeInteger(count) || count <= 0) {
    return undefined;
  }

  return {
    kind: 'rolling',
    count,
    unit,
    durationMs: count * DAYS_PER_UNIT[unit] * MILLISECONDS_PER_DAY,
  };
}

/**
 * Resolve a timeframe specifier to a contiguous sub-range of a series.
 *
 * - Rolling specifiers keep every observation dated within
 *   `[lastDate - duration, lastDate]`, inclusive at both ends.
 * - "YTD" keeps every observation in the same UTC calendar year as the
 *   series' last observation, or with `ytdPolicy: 'calendar'`, in the year of
 *   `options.now`. The calendar policy returns nothing when the series ends
 *   in an earlier year.
 *
 * Never throws: an empty series or an unknown specifier gives an empty result.
 *
 * @param series - Ticker series (or its observations)
 * @param spec - Timeframe specifier
 * @param options - YTD policy and clock
 * @returns Observations in the window, oldest first
 */
export function resolveWindow(
  series: TickerSeries | readonly Observation[],
  spec: string,
  options: ResolveWindowOptions = {},
): readonly Observation[] {
  const observations = isTickerSeries(series) ? series.observations : series;
  const last = lastObservation(observations);
  const policy = parseTimeframe(spec);

  if (!last || !policy || !Number.isFinite(last.timestamp)) {
    return EMPTY;
  }

  const maxDate = last.timestamp;

  if (policy.kind === 'rolling') {
    const startDate = maxDate - policy.durationMs;
    return observations.filter(
      (obs) => obs.timestamp >= startDate && obs.timestamp <= maxDate,
    );
  }

  const { ytdPolicy = 'series', now = Date.now() } = options;
  const year = ytdPolicy === 'calendar' ? getUTCYear(now) : getUTCYear(maxDate);
  return observations.filter((obs) => getUTCYear(obs.timestamp) === year);
}

function isTickerSeries(
  value: TickerSeries | readonly Observation[],
): value is TickerSeries {
  return !Array.isArray(value);
}
