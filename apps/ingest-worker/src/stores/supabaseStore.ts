import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { Logger } from '@libs/jquants-client';
import type { Dataset, Row } from '../lib/dataset';
import { projectRow, scalarSchema } from '../lib/dataset';
import { StoreError } from '../lib/errors';
import type { TimeSeriesQuery, TimeSeriesStore } from './types';
import { assertStoreColumns, projectColumns } from './types';

export const ROWS_TABLE = 'time_series_rows';
export const COLUMNS_TABLE = 'time_series_tables';
export const REPLACE_PARTITIONS_RPC = 'replace_time_series_partitions';

const DEFAULT_PAGE_SIZE = 1000;

const storedRowSchema = z.object({
  symbol: z.string(),
  dt: z.string(),
  partition_dt: z.string(),
  payload: z.record(scalarSchema),
});

const columnsRowSchema = z.object({ columns: z.array(z.string()) });

export interface SupabaseTimeSeriesStoreOptions {
  pageSize?: number;
  logger?: Logger;
}

/**
 * Time-series store backed by Postgres through Supabase.
 *
 * Rows live in `time_series_rows` with the business columns in a `payload`
 * jsonb; the ordered header of each table lives in `time_series_tables`.
 * Uploads go through one RPC so that deleting and re-inserting the touched
 * partitions happens in a single transaction.
 */
export class SupabaseTimeSeriesStore implements TimeSeriesStore {
  private readonly pageSize: number;
  private readonly logger?: Logger;

  constructor(
    private readonly client: SupabaseClient,
    options: SupabaseTimeSeriesStoreOptions = {},
  ) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.logger = options.logger;
  }

  async query(table: string, query: TimeSeriesQuery = {}): Promise<Dataset> {
    const header = await this.client
      .from(COLUMNS_TABLE)
      .select('columns')
      .eq('table_name', table)
      .limit(1);
    if (header.error) {
      throw new StoreError(`Failed to read columns of ${table}: ${header.error.message}`, {
        cause: header.error,
      });
    }
    const parsedHeader = z.array(columnsRowSchema).safeParse(header.data ?? []);
    if (!parsedHeader.success) {
      throw new StoreError(`Malformed column header for ${table}`, { cause: parsedHeader.error });
    }
    if (parsedHeader.data.length === 0) {
      return { columns: [], rows: [] };
    }

    const columns = projectColumns(parsedHeader.data[0].columns, query);
    const rows: Row[] = [];

    for (let from = 0; ; from += this.pageSize) {
      let request = this.client
        .from(ROWS_TABLE)
        .select('symbol, dt, partition_dt, payload')
        .eq('table_name', table);
      if (query.startDt) {
        request = request.gte('dt', query.startDt);
      }
      if (query.symbols) {
        request = request.in('symbol', query.symbols);
      }

      const { data, error } = await request
        .order('dt', { ascending: true })
        .order('id', { ascending: true })
        .range(from, from + this.pageSize - 1);
      if (error) {
        throw new StoreError(`Failed to query ${table}: ${error.message}`, { cause: error });
      }

      const page = z.array(storedRowSchema).safeParse(data ?? []);
      if (!page.success) {
        throw new StoreError(`Malformed rows returned for ${table}`, { cause: page.error });
      }
      for (const stored of page.data) {
        rows.push(
          projectRow(
            {
              ...stored.payload,
              symbol: stored.symbol,
              dt: normalizeTimestamp(stored.dt),
              partition_dt: stored.partition_dt,
            },
            columns,
          ),
        );
      }
      if (page.data.length < this.pageSize) {
        break;
      }
    }

    this.logger?.debug?.(`[SupabaseTimeSeriesStore] ${table}: read ${rows.length} rows`);
    return { columns, rows };
  }

  async upload(table: string, dataset: Dataset): Promise<void> {
    assertStoreColumns(table, dataset);

    const rows = dataset.rows.map((row) => {
      const { symbol, dt, partition_dt, ...payload } = projectRow(row, dataset.columns);
      return { symbol, dt, partition_dt, payload };
    });

    const { error } = await this.client.rpc(REPLACE_PARTITIONS_RPC, {
      p_table: table,
      p_columns: dataset.columns,
      p_rows: rows,
    });
    if (error) {
      throw new StoreError(`Failed to upload ${table}: ${error.message}`, { cause: error });
    }

    this.logger?.info?.(`[SupabaseTimeSeriesStore] ${table}: uploaded ${rows.length} rows`);
  }
}

/** Postgres may render `timestamp` with a space separator. */
function normalizeTimestamp(value: string): string {
  return value.replace(' ', 'T').slice(0, 19);
}
