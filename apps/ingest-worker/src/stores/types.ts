import type { Dataset, Row } from '../lib/dataset';
import { StoreError } from '../lib/errors';

/** Columns every dataset handed to a store must carry. */
export const REQUIRED_STORE_COLUMNS = ['symbol', 'dt', 'partition_dt'] as const;

export interface TimeSeriesQuery {
  /** `'*'` for every column, or the columns to project. */
  filter?: '*' | string[];
  /** Inclusive lower bound on `dt`, as `YYYY-MM-DD`. */
  startDt?: string;
  symbols?: string[];
}

/**
 * Partitioned time-series storage.
 *
 * `upload` replaces every `(symbol, partition_dt)` partition present in the
 * dataset wholesale: callers must pass the complete row set of each partition
 * they touch, or the missing rows are lost.
 */
export interface TimeSeriesStore {
  query(table: string, query?: TimeSeriesQuery): Promise<Dataset>;
  upload(table: string, dataset: Dataset): Promise<void>;
}

export function assertStoreColumns(table: string, dataset: Dataset): void {
  const missing = REQUIRED_STORE_COLUMNS.filter((column) => !dataset.columns.includes(column));
  if (missing.length > 0) {
    throw new StoreError(`Dataset for ${table} is missing required columns: ${missing.join(', ')}`);
  }
  for (const row of dataset.rows) {
    for (const column of REQUIRED_STORE_COLUMNS) {
      if (typeof row[column] !== 'string' || row[column] === '') {
        throw new StoreError(`Dataset for ${table} has a row without ${column}`);
      }
    }
  }
}

export function partitionKey(row: Row): string {
  return `${row.symbol}|${row.partition_dt}`;
}

export function matchesQuery(row: Row, query: TimeSeriesQuery): boolean {
  if (query.startDt && String(row.dt) < query.startDt) {
    return false;
  }
  if (query.symbols && !query.symbols.includes(String(row.symbol))) {
    return false;
  }
  return true;
}

export function projectColumns(columns: string[], query: TimeSeriesQuery): string[] {
  const filter = query.filter ?? '*';
  return filter === '*' ? columns : columns.filter((column) => filter.includes(column));
}
