import { parseTimeframe, resolveWindow } from '../window';
import { createTickerSeries } from '../series';
import { parseDate, formatDate } from '../utils/dates';
import { Observation, TickerSeries, MILLISECONDS_PER_DAY } from '../types';

// Helper to create one observation per calendar day
function dailySeries(start: string, days: number): TickerSeries {
  const first = parseDate(start) ?? NaN;
  const observations: Observation[] = [];
  for (let i = 0; i < days; i++) {
    observations.push({
      timestamp: first + i * MILLISECONDS_PER_DAY,
      hv30d: 0.2,
      iv30d: 0.25,
    });
  }
  return createTickerSeries('TEST', observations);
}

// 2022-01-01 through 2024-06-30
const series = dailySeries('2022-01-01', 912);

describe('parseTimeframe', () => {
  it('should parse rolling year and month specifiers', () => {
    expect(parseTimeframe('1Y')).toEqual({
      kind: 'rolling',
      count: 1,
      unit: 'Y',
      durationMs: 365.25 * MILLISECONDS_PER_DAY,
    });
    expect(parseTimeframe('6M')).toEqual({
      kind: 'rolling',
      count: 6,
      unit: 'M',
      durationMs: 15552000000,
    });
  });

  it('should parse YTD case-insensitively', () => {
    expect(parseTimeframe('YTD')).toEqual({ kind: 'ytd' });
    expect(parseTimeframe(' ytd ')).toEqual({ kind: 'ytd' });
  });

  it('should accept week and day units', () => {
    expect(parseTimeframe('2W')).toEqual({
      kind: 'rolling',
      count: 2,
      unit: 'W',
      durationMs: 14 * MILLISECONDS_PER_DAY,
    });
    expect(parseTimeframe('10d')).toEqual({
      kind: 'rolling',
      count: 10,
      unit: 'D',
      durationMs: 10 * MILLISECONDS_PER_DAY,
    });
  });

  it('should reject malformed specifiers', () => {
    expect(parseTimeframe('')).toBeUndefined();
    expect(parseTimeframe('0Y')).toBeUndefined();
    expect(parseTimeframe('Y')).toBeUndefined();
    expect(parseTimeframe('1Q')).toBeUndefined();
    expect(parseTimeframe('-1M')).toBeUndefined();
  });
});

describe('resolveWindow', () => {
  it('should return an empty window for an empty series', () => {
    const empty = createTickerSeries('EMPTY', []);
    for (const spec of ['5Y', '1Y', '6M', 'YTD', '1M']) {
      expect(resolveWindow(empty, spec)).toEqual([]);
    }
  });

  it('should return an empty window for an unknown specifier', () => {
    expect(resolveWindow(series, 'FOREVER')).toEqual([]);
  });

  it('should keep one year back from the last date', () => {
    const window = resolveWindow(series, '1Y');
    expect(window.length).toBe(366);
    expect(formatDate(window[0].timestamp)).toBe('2023-07-01');
    expect(formatDate(window[window.length - 1].timestamp)).toBe('2024-06-30');
  });

  it('should include the start date of a whole-day window', () => {
    const window = resolveWindow(series, '1M');
    expect(window.length).toBe(31);
    expect(formatDate(window[0].timestamp)).toBe('2024-05-31');
  });

  it('should resolve 6M as 180 days', () => {
    const window = resolveWindow(series, '6M');
    expect(window.length).toBe(181);
    expect(formatDate(window[0].timestamp)).toBe('2024-01-02');
  });

  it('should return the full series when it is shorter than the window', () => {
    expect(resolveWindow(series, '5Y').length).toBe(912);
  });

  it('should only contain observations within [last - duration, last]', () => {
    const last = series.observations[series.observations.length - 1].timestamp;
    for (const spec of ['5Y', '1Y', '6M', '1M', '3W']) {
      const policy = parseTimeframe(spec);
      if (!policy || policy.kind !== 'rolling') throw new Error(`bad spec ${spec}`);
      const start = last - policy.durationMs;
      const window = resolveWindow(series, spec);

      for (const obs of window) {
        expect(obs.timestamp).toBeGreaterThanOrEqual(start);
        expect(obs.timestamp).toBeLessThanOrEqual(last);
      }
      const excluded = series.observations.filter((obs) => obs.timestamp < start);
      expect(window.length + excluded.length).toBe(series.observations.length);
    }
  });

  it('should resolve YTD to the year of the last observation by default', () => {
    const window = resolveWindow(series, 'YTD');
    expect(window.length).toBe(182);
    expect(formatDate(window[0].timestamp)).toBe('2024-01-01');
  });

  it('should resolve YTD from the series even when the data is stale', () => {
    const now = parseDate('2025-03-15') ?? NaN;
    expect(resolveWindow(series, 'YTD', { now }).length).toBe(182);
  });

  it('should resolve YTD to the wall-clock year with the calendar policy', () => {
    const stale = parseDate('2025-03-15') ?? NaN;
    expect(resolveWindow(series, 'YTD', { ytdPolicy: 'calendar', now: stale })).toEqual([]);

    const current = parseDate('2023-08-01') ?? NaN;
    expect(resolveWindow(series, 'YTD', { ytdPolicy: 'calendar', now: current }).length).toBe(365);
  });

  it('should accept a bare observation array', () => {
    expect(resolveWindow(series.observations, '1M').length).toBe(31);
  });

  it('should not modify the series', () => {
    const before = series.observations.length;
    resolveWindow(series, '1M');
    expect(series.observations.length).toBe(before);
  });
});
