import * as dotenv from 'dotenv';
import { DEFAULT_MIN_OBSERVATIONS, YtdPolicy } from '../types';

/**
 * Runtime configuration for a screener run
 */
export interface ScreenerConfig {
  /** Directory holding the per-ticker CSV files */
  dataDir: string;
  /** Universe to screen; undefined screens every ticker in the data directory */
  tickers?: string[];
  /** Minimum observations in the trailing year */
  minObservations: number;
  /** Which year "YTD" refers to */
  ytdPolicy: YtdPolicy;
  /** Whether to log verbose debug information */
  verbose: boolean;
}

/**
 * Environment variables read by {@link loadConfig}
 */
export type ScreenerEnv = Partial<Record<string, string>>;

const DEFAULT_DATA_DIR = './data';

/**
 * Build the screener configuration from environment variables.
 *
 * | Variable | Default |
 * |---|---|
 * | VOLSCREEN_DATA_DIR | ./data |
 * | VOLSCREEN_TICKERS (comma-separated) | every ticker in the data directory |
 * | VOLSCREEN_MIN_OBSERVATIONS | 20 |
 * | VOLSCREEN_YTD_POLICY (series or calendar) | series |
 * | VOLSCREEN_VERBOSE (true or 1) | false |
 *
 * @param env - Environment variables
 * @returns Parsed configuration
 * @throws {Error} If a variable holds an invalid value
 */
export function loadConfig(env: ScreenerEnv = process.env): ScreenerConfig {
  const dataDir = env.VOLSCREEN_DATA_DIR?.trim() || DEFAULT_DATA_DIR;

  const tickers = (env.VOLSCREEN_TICKERS ?? '')
    .split(',')
    .map((ticker) => ticker.trim().toUpperCase())
    .filter((ticker) => ticker.length > 0);

  let minObservations = DEFAULT_MIN_OBSERVATIONS;
  const rawMin = env.VOLSCREEN_MIN_OBSERVATIONS?.trim();
  if (rawMin) {
    minObservations = Number(rawMin);
    if (!Number.isInteger(minObservations) || minObservations < 1) {
      throw new Error(`[Config] VOLSCREEN_MIN_OBSERVATIONS must be a positive integer, got "${rawMin}"`);
    }
  }

  const rawPolicy = env.VOLSCREEN_YTD_POLICY?.trim().toLowerCase() || 'series';
  if (rawPolicy !== 'series' && rawPolicy !== 'calendar') {
    throw new Error(`[Config] VOLSCREEN_YTD_POLICY must be "series" or "calendar", got "${rawPolicy}"`);
  }

  const rawVerbose = env.VOLSCREEN_VERBOSE?.trim().toLowerCase();

  return {
    dataDir,
    tickers: tickers.length > 0 ? tickers : undefined,
    minObservations,
    ytdPolicy: rawPolicy,
    verbose: rawVerbose === 'true' || rawVerbose === '1',
  };
}

/**
 * Load a `.env` file into `process.env`, then build the configuration.
 *
 * @param path - Optional path to the .env file (default: `.env` in the working directory)
 */
export function loadEnvConfig(path?: string): ScreenerConfig {
  dotenv.config(path ? { path } : undefined);
  return loadConfig(process.env);
}
