export type { TickerSeriesSource } from './types';
export { InMemorySeriesSource } from './memory';
export { CsvDirectorySource, parseVolatilityCsv } from './csv';
export type { CsvDirectorySourceOptions } from './csv';
