import { join } from 'node:path';
import { CancelledError } from '@libs/jquants-client';
import type {
  EndpointId,
  EndpointQuery,
  EndpointRecord,
  FetchOptions,
  Logger,
} from '@libs/jquants-client';
import type { Dataset, Row } from '../lib/dataset';
import { datasetFileSchema } from '../lib/dataset';
import { eachDay, eachMonday, toCompactDate } from '../lib/dates';
import { readGzipJson, writeGzipJson } from '../lib/gzipJson';
import type { DatasetNormalizer } from '../lib/normalizer';

/**
 * How a date window is split into requests:
 * - `daily`: one `date=` request per calendar day
 * - `weekly`: one `date=` request per Monday in the window
 * - `range`: a single `from=`/`to=` request covering the window
 */
export type FetchStep = 'daily' | 'weekly' | 'range';

export type RangeFetchResult =
  | { status: 'ok'; dataset: Dataset }
  | { status: 'no_data'; columns: string[] };

/** The slice of the API client the orchestrator needs. */
export interface EndpointFetcher {
  fetchEndpoint(
    endpoint: EndpointId,
    query?: EndpointQuery,
    options?: FetchOptions,
  ): Promise<EndpointRecord[]>;
}

export interface RangeFetchConfig {
  /** Units fetched at once. */
  concurrency?: number;
  /** Directory of per-unit gzip JSON results reused across runs. */
  cacheDir?: string;
  logger?: Logger;
}

const PROGRESS_EVERY = 100;

interface FetchUnit {
  label: string;
  query: EndpointQuery;
  /** Set for single-date units; only those are cached. */
  date?: string;
}

export class RangeFetchOrchestrator {
  private readonly concurrency: number;
  private readonly cacheDir?: string;
  private readonly logger?: Logger;

  constructor(
    private readonly fetcher: EndpointFetcher,
    private readonly normalizer: DatasetNormalizer,
    config: RangeFetchConfig = {},
  ) {
    this.concurrency = Math.max(1, Math.floor(config.concurrency ?? 1));
    this.cacheDir = config.cacheDir;
    this.logger = config.logger;
  }

  /**
   * Fetch `endpoint` for every unit of `[start, end]` and return one dataset
   * sorted by the endpoint's sort key.
   *
   * The first failing unit aborts the whole range: in-flight siblings are
   * cancelled and its error is rethrown. Zero rows overall is reported as
   * `no_data`, not as an error.
   */
  async fetchRange(
    endpoint: EndpointId,
    start: string,
    end: string,
    step: FetchStep,
    options: FetchOptions = {},
  ): Promise<RangeFetchResult> {
    const columns = this.normalizer.columnsFor(endpoint);
    const units = buildUnits(start, end, step);
    const parts = await this.runUnits(endpoint, units, options.signal);

    const rows: Row[] = parts.flatMap((part) => part.rows);
    if (rows.length === 0) {
      this.logger?.info?.(`[rangeFetch] ${endpoint} ${start}..${end}: no data`);
      return { status: 'no_data', columns };
    }

    return {
      status: 'ok',
      dataset: { columns, rows: this.normalizer.sort(endpoint, rows) },
    };
  }

  private async runUnits(
    endpoint: EndpointId,
    units: FetchUnit[],
    signal?: AbortSignal,
  ): Promise<Dataset[]> {
    if (signal?.aborted) {
      throw new CancelledError(undefined, { cause: signal.reason });
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', forwardAbort);

    const results: Dataset[] = [];
    let next = 0;
    let completed = 0;

    const worker = async (): Promise<void> => {
      while (next < units.length) {
        if (controller.signal.aborted) {
          throw new CancelledError(undefined, { cause: controller.signal.reason });
        }
        const index = next;
        next += 1;
        results[index] = await this.fetchUnit(endpoint, units[index], controller.signal);

        completed += 1;
        if (completed % PROGRESS_EVERY === 0) {
          this.logger?.info?.(`[rangeFetch] ${endpoint} ${completed}/${units.length} units`);
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, units.length) }, () =>
      worker().catch((error: unknown) => {
        controller.abort(error);
        throw error;
      }),
    );

    try {
      await Promise.all(workers);
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }
    return results;
  }

  private async fetchUnit(
    endpoint: EndpointId,
    unit: FetchUnit,
    signal: AbortSignal,
  ): Promise<Dataset> {
    const cachePath = this.cachePath(endpoint, unit);
    if (cachePath) {
      const cached = await this.readCache(cachePath, endpoint);
      if (cached) {
        this.logger?.debug?.(`[rangeFetch] ${endpoint} ${unit.label} served from cache`);
        return cached;
      }
    }

    const records = await this.fetcher.fetchEndpoint(endpoint, unit.query, { signal });
    const dataset = this.normalizer.normalize(endpoint, records);

    if (cachePath && dataset.rows.length > 0) {
      await writeGzipJson(cachePath, dataset);
    }
    return dataset;
  }

  private cachePath(endpoint: EndpointId, unit: FetchUnit): string | undefined {
    if (!this.cacheDir || !unit.date) {
      return undefined;
    }
    return join(
      this.cacheDir,
      unit.date.slice(0, 4),
      `${endpoint}_${toCompactDate(unit.date)}.json.gz`,
    );
  }

  private async readCache(path: string, endpoint: EndpointId): Promise<Dataset | undefined> {
    const raw = await readGzipJson(path);
    if (raw === undefined) {
      return undefined;
    }
    const parsed = datasetFileSchema.safeParse(raw);
    const columns = this.normalizer.columnsFor(endpoint);
    if (!parsed.success || parsed.data.columns.join('\u0000') !== columns.join('\u0000')) {
      this.logger?.warn?.(`[rangeFetch] Ignoring stale cache entry ${path}`);
      return undefined;
    }
    return parsed.data;
  }
}

function buildUnits(start: string, end: string, step: FetchStep): FetchUnit[] {
  if (start > end) {
    return [];
  }
  switch (step) {
    case 'range':
      return [
        {
          label: `${start}..${end}`,
          query: { from: toCompactDate(start), to: toCompactDate(end) },
        },
      ];
    case 'weekly':
      return eachMonday(start, end).map(dateUnit);
    case 'daily':
      return eachDay(start, end).map(dateUnit);
  }
}

function dateUnit(date: string): FetchUnit {
  return { label: date, date, query: { date: toCompactDate(date) } };
}
