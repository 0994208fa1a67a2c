import { createTickerSeries, hasDefinedValue, lastObservation } from '../series';
import { Observation } from '../types';

describe('createTickerSeries', () => {
  it('should sort observations by date', () => {
    const series = createTickerSeries('TEST', [
      { timestamp: 300, hv30d: 0.3 },
      { timestamp: 100, hv30d: 0.1 },
      { timestamp: 200, hv30d: 0.2 },
    ]);

    expect(series.ticker).toBe('TEST');
    expect(series.observations.map((o) => o.timestamp)).toEqual([100, 200, 300]);
  });

  it('should keep the first of duplicate dates', () => {
    const series = createTickerSeries('TEST', [
      { timestamp: 100, iv30d: 0.25 },
      { timestamp: 100, iv30d: 0.99 },
    ]);

    expect(series.observations).toEqual([{ timestamp: 100, iv30d: 0.25 }]);
  });

  it('should drop invalid timestamps and non-finite values', () => {
    const series = createTickerSeries('TEST', [
      { timestamp: NaN, hv30d: 0.2 },
      { timestamp: 100, hv30d: Infinity, iv30d: NaN },
      { timestamp: 200, hv30d: 0.2, iv30d: 0.3 },
    ]);

    expect(series.observations).toEqual([
      { timestamp: 100 },
      { timestamp: 200, hv30d: 0.2, iv30d: 0.3 },
    ]);
  });

  it('should not modify its input', () => {
    const input: Observation[] = [{ timestamp: 2 }, { timestamp: 1 }];
    createTickerSeries('TEST', input);
    expect(input.map((o) => o.timestamp)).toEqual([2, 1]);
  });

  it('should freeze the result', () => {
    const series = createTickerSeries('TEST', [{ timestamp: 1 }]);
    expect(Object.isFrozen(series)).toBe(true);
    expect(Object.isFrozen(series.observations)).toBe(true);
    expect(Object.isFrozen(series.observations[0])).toBe(true);
  });
});

describe('lastObservation', () => {
  it('should return the most recent observation', () => {
    const series = createTickerSeries('TEST', [{ timestamp: 2, iv30d: 0.3 }, { timestamp: 1 }]);
    expect(lastObservation(series.observations)).toEqual({ timestamp: 2, iv30d: 0.3 });
  });

  it('should return undefined for no observations', () => {
    expect(lastObservation([])).toBeUndefined();
  });
});

describe('hasDefinedValue', () => {
  it('should detect a field with at least one value', () => {
    const observations: Observation[] = [{ timestamp: 1 }, { timestamp: 2, iv30d: 0.3 }];
    expect(hasDefinedValue(observations, 'iv30d')).toBe(true);
    expect(hasDefinedValue(observations, 'hv30d')).toBe(false);
  });
});
