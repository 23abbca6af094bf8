import type { EndpointId, FetchOptions, Logger } from '@libs/jquants-client';
import type { Dataset, Row } from '../lib/dataset';
import { emptyDataset, projectRow, sortRows } from '../lib/dataset';
import { addDays, firstOfMonth, firstOfPreviousMonth, marketTime } from '../lib/dates';
import { SchemaError } from '../lib/errors';
import type { Notifier } from '../lib/notifier';
import { safeNotify } from '../lib/notifier';
import type { TimeSeriesStore } from '../stores/types';
import type { FetchStep, RangeFetchResult } from './rangeFetch';
import type { TableDefinition, TableName } from './tables';

// ============================================================================
// Types
// ============================================================================

export type PipelineState =
  | 'LOAD_PRIOR'
  | 'COMPUTE_WINDOW'
  | 'FETCH'
  | 'MERGE'
  | 'PERSIST'
  | 'DONE'
  | 'NO_NEW_DATA';

export interface DateWindow {
  start: string;
  end: string;
}

export interface PipelineOutcome {
  table: TableName;
  state: 'DONE' | 'NO_NEW_DATA' | 'FAILED';
  window?: DateWindow;
  fetchedRows: number;
  persistedRows: number;
  error?: Error;
}

/** The orchestrator surface the pipeline depends on. */
export interface RangeFetcher {
  fetchRange(
    endpoint: EndpointId,
    start: string,
    end: string,
    step: FetchStep,
    options?: FetchOptions,
  ): Promise<RangeFetchResult>;
}

export interface PipelineConfig {
  store: TimeSeriesStore;
  fetcher: RangeFetcher;
  notifier: Notifier;
  /** Constant `symbol` tag written on every stored row. */
  symbol: string;
  /** First date fetched for a table with no persisted rows. */
  initialStartDate: string;
  timeZone: string;
  /** Local hour before which today's data is not yet published. */
  cutoffHour: number;
  now?: () => Date;
  logger?: Logger;
}

export interface RunOptions {
  /** Ignore persisted rows and rebuild from the initial start date. */
  full?: boolean;
  signal?: AbortSignal;
}

/**
 * Keeps one persisted table current.
 *
 * LOAD_PRIOR -> COMPUTE_WINDOW -> FETCH -> MERGE -> PERSIST, with NO_NEW_DATA
 * when the window is empty or the upstream has nothing for it. PERSIST is the
 * only write; any earlier failure leaves the stored table as it was.
 */
export class IncrementalMergePipeline {
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(private readonly config: PipelineConfig) {
    this.now = config.now ?? (() => new Date());
    this.logger = config.logger ?? console;
  }

  async run(table: TableDefinition, options: RunOptions = {}): Promise<PipelineOutcome> {
    return this.execute(table, options, {});
  }

  /** Like `run`, but a failure becomes a FAILED outcome that keeps the date window. */
  async settle(table: TableDefinition, options: RunOptions = {}): Promise<PipelineOutcome> {
    const progress: { window?: DateWindow } = {};
    try {
      return await this.execute(table, options, progress);
    } catch (error) {
      return {
        table: table.name,
        state: 'FAILED',
        window: progress.window,
        fetchedRows: 0,
        persistedRows: 0,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
  }

  private async execute(
    table: TableDefinition,
    options: RunOptions,
    progress: { window?: DateWindow },
  ): Promise<PipelineOutcome> {
    const log = (msg: string) => this.logger.info?.(`[pipeline:${table.name}] ${msg}`);
    let state: PipelineState = 'LOAD_PRIOR';
    let window: DateWindow | undefined;

    try {
      const clock = marketTime(this.now(), this.config.timeZone);
      const prior = options.full ? emptyDataset() : await this.loadPrior(table, clock.date);
      log(`loaded ${prior.rows.length} prior rows`);

      state = 'COMPUTE_WINDOW';
      window = computeWindow(
        table,
        prior,
        clock.date,
        clock.hour,
        this.config.cutoffHour,
        this.config.initialStartDate,
      );
      progress.window = window;
      if (window.start > window.end) {
        log(`up to date (next ${window.start}, latest available ${window.end})`);
        return this.outcome(table, 'NO_NEW_DATA', window);
      }

      state = 'FETCH';
      log(`fetching ${window.start} to ${window.end}`);
      const result = await this.config.fetcher.fetchRange(
        table.endpoint,
        window.start,
        window.end,
        table.step,
        { signal: options.signal },
      );
      if (result.status === 'no_data') {
        await safeNotify(
          this.config.notifier,
          `There's no new data in ${table.name}. (${window.start} to ${window.end})`,
          this.logger,
        );
        return this.outcome(table, 'NO_NEW_DATA', window);
      }

      state = 'MERGE';
      const fresh = toStoreShape(table, result.dataset, this.config.symbol);
      const merged = mergeDatasets(table, prior, fresh);

      state = 'PERSIST';
      await this.config.store.upload(table.name, merged);
      log(`persisted ${merged.rows.length} rows (${fresh.rows.length} fetched)`);

      await safeNotify(this.config.notifier, `Renewed and uploaded: ${table.name}`, this.logger);
      const finding = table.inspect?.(fresh.rows);
      if (finding) {
        await safeNotify(this.config.notifier, `${table.name}: ${finding}`, this.logger);
      }

      return {
        ...this.outcome(table, 'DONE', window),
        fetchedRows: fresh.rows.length,
        persistedRows: merged.rows.length,
      };
    } catch (error) {
      const span = window ? ` (${window.start} to ${window.end})` : '';
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error?.(`[pipeline:${table.name}] failed during ${state}${span}`, error);
      await safeNotify(
        this.config.notifier,
        `Failed to update ${table.name}${span} during ${state}: ${message}`,
        this.logger,
      );
      throw error;
    }
  }

  /**
   * Rows from the first day of the previous month onward, so that the
   * partitions being rewritten are complete; the whole table when that
   * range is empty.
   */
  private async loadPrior(table: TableDefinition, today: string): Promise<Dataset> {
    const symbols = [this.config.symbol];
    const recent = await this.config.store.query(table.name, {
      filter: '*',
      startDt: firstOfPreviousMonth(today),
      symbols,
    });
    if (recent.rows.length > 0) {
      return recent;
    }
    return this.config.store.query(table.name, { filter: '*', symbols });
  }

  private outcome(table: TableDefinition, state: 'DONE' | 'NO_NEW_DATA', window: DateWindow): PipelineOutcome {
    return { table: table.name, state, window, fetchedRows: 0, persistedRows: 0 };
  }
}

/**
 * Run several tables concurrently. A failing table is reported in its
 * outcome and does not stop the others.
 */
export async function runPipelines(
  pipeline: IncrementalMergePipeline,
  tables: readonly TableDefinition[],
  options: RunOptions = {},
): Promise<PipelineOutcome[]> {
  return Promise.all(tables.map((table) => pipeline.settle(table, options)));
}

// ============================================================================
// Window, shaping and merge
// ============================================================================

export function computeWindow(
  table: TableDefinition,
  prior: Dataset,
  today: string,
  hour: number,
  cutoffHour: number,
  initialStartDate: string,
): DateWindow {
  const dateColumn = table.dateColumn.toLowerCase();
  let latest: string | undefined;
  for (const row of prior.rows) {
    const value = row[dateColumn];
    if (typeof value === 'string' && (latest === undefined || value > latest)) {
      latest = value;
    }
  }

  const start = latest ? addDays(latest, 1) : initialStartDate;
  const end = table.applyCutoff && hour < cutoffHour ? addDays(today, -1) : today;
  return { start, end };
}

/** Lower-case the columns and add `symbol`, `dt` and `partition_dt`. */
export function toStoreShape(table: TableDefinition, dataset: Dataset, symbol: string): Dataset {
  const columns = [...dataset.columns.map((column) => column.toLowerCase()), 'symbol', 'dt', 'partition_dt'];
  const rows = dataset.rows.map((source) => {
    const row: Row = {};
    for (const column of dataset.columns) {
      row[column.toLowerCase()] = source[column] ?? null;
    }
    const date = source[table.dateColumn];
    if (typeof date !== 'string') {
      throw new SchemaError(`${table.name}: row without ${table.dateColumn}`);
    }
    row.symbol = symbol;
    row.dt = `${date}T00:00:00`;
    row.partition_dt = firstOfMonth(date);
    return row;
  });
  return { columns, rows };
}

/**
 * Append `fresh` to `prior`, keep the last row per business key and sort by
 * date. The column set may not change across a merge.
 */
export function mergeDatasets(table: TableDefinition, prior: Dataset, fresh: Dataset): Dataset {
  const columns = prior.columns.length > 0 ? prior.columns : fresh.columns;
  if (prior.columns.length > 0) {
    const expected = new Set(prior.columns);
    const drifted =
      fresh.columns.length !== expected.size || fresh.columns.some((column) => !expected.has(column));
    if (drifted) {
      throw new SchemaError(
        `${table.name}: fetched ${fresh.columns.length} columns but the stored table has ${expected.size}`,
      );
    }
  }

  const byKey = new Map<string, Row>();
  for (const row of [...prior.rows, ...fresh.rows]) {
    const key = JSON.stringify(table.businessKey.map((column) => row[column] ?? null));
    byKey.delete(key);
    byKey.set(key, projectRow(row, columns));
  }

  return {
    columns: [...columns],
    rows: sortRows([...byKey.values()], ['dt', ...table.businessKey]),
  };
}
