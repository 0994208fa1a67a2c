import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { Observation, TickerSeries } from '../types';
import { createTickerSeries } from '../series';
import { parseDate } from '../utils/dates';
import { TickerSeriesSource } from './types';

/**
 * Options for the CSV directory source
 */
export interface CsvDirectorySourceOptions {
  /** Directory holding one `<TICKER>.csv` file per ticker */
  dataDir: string;
  /** Whether to log verbose debug information */
  verbose?: boolean;
}

/** Tickers are used as file names, so keep them to a safe character set */
const TICKER_PATTERN = /^[A-Za-z0-9.^=_-]+$/;

const CSV_EXTENSION = '.csv';

/**
 * Reads per-ticker volatility history from a directory of CSV files.
 *
 * @remarks
 * Each file is named `<TICKER>.csv` and has a header row with a `date` column
 * (`YYYY-MM-DD`) and optional `hv_30d` and `iv_30d` columns. Header names are
 * matched case-insensitively. Blank cells are missing values, and rows with an
 * unparseable date are skipped.
 *
 * Example file:
 * ```
 * date,hv_30d,iv_30d
 * 2024-01-02,0.21,0.25
 * 2024-01-03,0.22,
 * ```
 *
 * Files are re-read on every call; memoize with `ScreenerCache`, which keys
 * on {@link CsvDirectorySource.snapshotId}.
 */
export class CsvDirectorySource implements TickerSeriesSource {
  private readonly dataDir: string;

  /** Whether to log verbose debug information */
  private readonly verbose: boolean;

  constructor(options: CsvDirectorySourceOptions) {
    this.dataDir = path.resolve(options.dataDir);
    this.verbose = options.verbose ?? false;
  }

  /**
   * Loads the series for a ticker.
   * @returns The series, or undefined if there is no file for the ticker
   * @throws {Error} If the file exists but cannot be read or parsed
   */
  get(ticker: string): TickerSeries | undefined {
    if (!TICKER_PATTERN.test(ticker)) {
      return undefined;
    }

    const filePath = path.join(this.dataDir, `${ticker}${CSV_EXTENSION}`);
    if (!fs.existsSync(filePath)) {
      if (this.verbose) {
        console.log(`[CsvSource] No data file for ${ticker} at ${filePath}`);
      }
      return undefined;
    }

    let observations: Observation[];
    try {
      observations = parseVolatilityCsv(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`[CsvSource] Failed to parse ${path.basename(filePath)}: ${message}`);
    }

    const series = createTickerSeries(ticker, observations);

    if (this.verbose) {
      console.log(`[CsvSource] Loaded ${series.observations.length} observations for ${ticker}`);
    }

    return series;
  }

  /**
   * Returns the tickers of every CSV file in the directory, sorted.
   * A missing or unreadable directory has no tickers.
   */
  listTickers(): string[] {
    return this.listFiles()
      .map((file) => file.slice(0, -CSV_EXTENSION.length))
      .filter((ticker) => TICKER_PATTERN.test(ticker))
      .sort();
  }

  /**
   * Latest modification time across the CSV files, so any rewrite of the
   * cache produces a new identifier. Files that cannot be stat'ed (e.g. a
   * dangling symlink) are left out.
   */
  snapshotId(): string {
    let latest = 0;
    const files = this.listFiles();
    for (const file of files) {
      let mtimeMs: number;
      try {
        mtimeMs = fs.statSync(path.join(this.dataDir, file)).mtimeMs;
      } catch (error) {
        if (this.verbose) {
          console.error(`[CsvSource] Cannot stat ${file}:`, error instanceof Error ? error.message : error);
        }
        continue;
      }
      if (mtimeMs > latest) latest = mtimeMs;
    }
    return `csv:${files.length}:${latest}`;
  }

  /**
   * CSV file names in the data directory. Only the exact `.csv` extension
   * counts, since `get` opens `<TICKER>.csv`. An unreadable or missing
   * directory has no files.
   */
  private listFiles(): string[] {
    if (!fs.existsSync(this.dataDir)) {
      if (this.verbose) {
        console.log(`[CsvSource] Data directory ${this.dataDir} does not exist`);
      }
      return [];
    }

    let entries: string[];
    try {
      entries = fs.readdirSync(this.dataDir);
    } catch (error) {
      if (this.verbose) {
        console.error(
          `[CsvSource] Cannot read data directory ${this.dataDir}:`,
          error instanceof Error ? error.message : error,
        );
      }
      return [];
    }

    return entries.filter((file) => file.endsWith(CSV_EXTENSION));
  }
}

/**
 * Parse the contents of a volatility CSV file into observations.
 *
 * @param content - Raw file contents
 * @returns Observations in file order (not yet sorted or de-duplicated)
 * @throws {Error} If the file has no `date` column
 */
export function parseVolatilityCsv(content: string): Observation[] {
  const records: unknown = parse(content, {
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    bom: true,
  });
  const rows = toStringRows(records);

  if (rows.length === 0) {
    return [];
  }

  const header = rows[0].map((name) => name.toLowerCase());
  const dateIndex = header.indexOf('date');
  const hvIndex = header.indexOf('hv_30d');
  const ivIndex = header.indexOf('iv_30d');

  if (dateIndex === -1) {
    throw new Error('missing "date" column');
  }

  const observations: Observation[] = [];

  for (let i = 1; i < rows.length; i++) {
    const row = rows[i];
    const timestamp = parseDate(row[dateIndex] ?? '');
    if (timestamp === undefined) continue;

    const obs: Observation = { timestamp };
    const hv = parseCell(hvIndex === -1 ? undefined : row[hvIndex]);
    const iv = parseCell(ivIndex === -1 ? undefined : row[ivIndex]);
    if (hv !== undefined) obs.hv30d = hv;
    if (iv !== undefined) obs.iv30d = iv;
    observations.push(obs);
  }

  return observations;
}

function parseCell(cell: string | undefined): number | undefined {
  if (cell === undefined || cell === '') return undefined;
  const value = Number(cell);
  return Number.isFinite(value) ? value : undefined;
}

function toStringRows(records: unknown): string[][] {
  if (!Array.isArray(records)) {
    throw new Error('unexpected parser output');
  }

  return records.map((record: unknown) => {
    if (!Array.isArray(record)) {
      throw new Error('unexpected parser output');
    }
    return record.map((cell: unknown) => (typeof cell === 'string' ? cell : String(cell)));
  });
}
