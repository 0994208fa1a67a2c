import { Observation, TickerSeries } from '../types';
import { isDefinedNumber } from '../utils/statistics';

/**
 * Build a well-formed TickerSeries from raw observations.
 *
 * Observations are sorted by timestamp. When two share a date the first one
 * wins. Observations with a non-finite timestamp are dropped, and non-finite
 * HV/IV values become absent. The input array is not modified.
 *
 * @param ticker - Ticker symbol
 * @param observations - Raw observations in any order
 * @returns Frozen, ordered series
 */
export function createTickerSeries(
  ticker: string,
  observations: Iterable<Observation>,
): TickerSeries {
  const cleaned: Observation[] = [];

  for (const obs of observations) {
    if (!Number.isFinite(obs.timestamp)) continue;

    const entry: Observation = { timestamp: obs.timestamp };
    if (isDefinedNumber(obs.hv30d)) entry.hv30d = obs.hv30d;
    if (isDefinedNumber(obs.iv30d)) entry.iv30d = obs.iv30d;
    cleaned.push(entry);
  }

  // Array.prototype.sort is stable, so the first of equal dates stays first
  cleaned.sort((a, b) => a.timestamp - b.timestamp);

  const deduped: Observation[] = [];
  let lastTs = NaN;
  for (const obs of cleaned) {
    if (obs.timestamp === lastTs) continue;
    lastTs = obs.timestamp;
    deduped.push(Object.freeze(obs));
  }

  return Object.freeze({
    ticker,
    observations: Object.freeze(deduped),
  });
}

/**
 * Last observation of a sequence, if any
 */
export function lastObservation(
  observations: readonly Observation[],
): Observation | undefined {
  return observations.length > 0 ? observations[observations.length - 1] : undefined;
}

/**
 * Whether at least one observation defines the given field
 */
export function hasDefinedValue(
  observations: readonly Observation[],
  field: 'hv30d' | 'iv30d',
): boolean {
  return observations.some((obs) => isDefinedNumber(obs[field]));
}
