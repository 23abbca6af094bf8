import { mkdir, readdir, rename, rm } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '@libs/jquants-client';
import type { Dataset } from '../lib/dataset';
import { datasetFileSchema, emptyDataset, projectRow, sortRows } from '../lib/dataset';
import { toCompactDate } from '../lib/dates';
import { StoreError } from '../lib/errors';
import { isMissingFile, readGzipJson, writeGzipJson } from '../lib/gzipJson';
import type { TimeSeriesQuery, TimeSeriesStore } from './types';
import { assertStoreColumns, matchesQuery, partitionKey, projectColumns } from './types';

export interface LocalFileStoreOptions {
  dir: string;
  /** Supplies the save date stamped into artifact names. */
  now?: () => Date;
  logger?: Logger;
}

/**
 * One gzip JSON artifact per table, named `<table>_<yyyymmdd>.json.gz` after
 * the day it was written. A new artifact is staged and renamed into place
 * before the previous one is removed; a failed write leaves the previous one.
 */
export class LocalFileStore implements TimeSeriesStore {
  private readonly dir: string;
  private readonly now: () => Date;
  private readonly logger?: Logger;

  constructor(options: LocalFileStoreOptions) {
    this.dir = options.dir;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
  }

  async query(table: string, query: TimeSeriesQuery = {}): Promise<Dataset> {
    const artifact = await this.findArtifact(table);
    if (!artifact) {
      return emptyDataset();
    }
    const current = await this.readArtifact(artifact);
    const columns = projectColumns(current.columns, query);
    return {
      columns,
      rows: current.rows.filter((row) => matchesQuery(row, query)).map((row) => projectRow(row, columns)),
    };
  }

  async upload(table: string, dataset: Dataset): Promise<void> {
    assertStoreColumns(table, dataset);

    const previous = await this.findArtifact(table);
    const current = previous ? await this.readArtifact(previous) : emptyDataset();

    const touched = new Set(dataset.rows.map(partitionKey));
    const columns = [
      ...current.columns,
      ...dataset.columns.filter((column) => !current.columns.includes(column)),
    ];
    const rows = sortRows(
      [
        ...current.rows.filter((row) => !touched.has(partitionKey(row))),
        ...dataset.rows,
      ].map((row) => projectRow(row, columns)),
      ['dt'],
    );

    await mkdir(this.dir, { recursive: true });
    const target = join(this.dir, `${table}_${toCompactDate(this.now().toISOString().slice(0, 10))}.json.gz`);

    const staging = `${target}.tmp`;
    try {
      await writeGzipJson(staging, { columns, rows });
      await rename(staging, target);
    } catch (error) {
      await rm(staging, { force: true }).catch((cleanupError: unknown) => {
        this.logger?.warn?.(`[LocalFileStore] could not remove ${staging}`, cleanupError);
      });
      throw new StoreError(`Failed to write ${table} artifact ${target}`, { cause: error });
    }
    if (previous && previous !== target) {
      await rm(previous);
    }

    this.logger?.info?.(
      `[LocalFileStore] ${table}: wrote ${rows.length} rows (${touched.size} partitions replaced) to ${target}`,
    );
  }

  private async findArtifact(table: string): Promise<string | undefined> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    const pattern = new RegExp(`^${escapeRegExp(table)}_\\d{8}\\.json\\.gz$`);
    const matches = names.filter((name) => pattern.test(name)).sort();
    if (matches.length > 1) {
      throw new StoreError(
        `Found ${matches.length} artifacts for ${table} in ${this.dir}: ${matches.join(', ')}`,
      );
    }
    return matches.length === 1 ? join(this.dir, matches[0]) : undefined;
  }

  private async readArtifact(path: string): Promise<Dataset> {
    const parsed = datasetFileSchema.safeParse(await readGzipJson(path));
    if (!parsed.success) {
      throw new StoreError(`Artifact ${path} is not a dataset file`, { cause: parsed.error });
    }
    return parsed.data;
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
