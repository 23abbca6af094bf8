#!/usr/bin/env node
/**
 * Ingest entry point.
 *
 *   ingest [--full] [table ...]
 *
 * Updates the named tables (default: list price topix) and exits 1 when any
 * of them failed.
 */

import { pathToFileURL } from 'node:url';
import { loadEnv } from './config/env';
import { runPipelines } from './pipeline/incrementalMerge';
import { DEFAULT_TABLES, TABLES, TABLE_NAMES, isTableName } from './pipeline/tables';
import type { TableName } from './pipeline/tables';
import { createIngestRuntime } from './runtime';

const USAGE = `Usage: ingest [--full] [table ...]\nTables: ${TABLE_NAMES.join(', ')}`;

export interface CliArgs {
  full: boolean;
  tables: TableName[];
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const [command, ...rest] = argv;
  if (command !== 'ingest') {
    throw new Error(USAGE);
  }

  let full = false;
  const tables: TableName[] = [];
  for (const arg of rest) {
    if (arg === '--full') {
      full = true;
    } else if (isTableName(arg)) {
      if (!tables.includes(arg)) tables.push(arg);
    } else {
      throw new Error(`Unknown table "${arg}"\n${USAGE}`);
    }
  }
  return { full, tables: tables.length > 0 ? tables : [...DEFAULT_TABLES] };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const { pipeline } = createIngestRuntime(loadEnv());

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const outcomes = await runPipelines(
    pipeline,
    args.tables.map((name) => TABLES[name]),
    { full: args.full, signal: controller.signal },
  );

  for (const outcome of outcomes) {
    const span = outcome.window ? ` ${outcome.window.start}..${outcome.window.end}` : '';
    console.log(
      `${outcome.table}: ${outcome.state}${span} fetched=${outcome.fetchedRows} persisted=${outcome.persistedRows}` +
        (outcome.error ? ` error=${outcome.error.message}` : ''),
    );
  }

  if (outcomes.some((outcome) => outcome.state === 'FAILED')) {
    process.exitCode = 1;
  }
}

if (process.argv[1] && pathToFileURL(process.argv[1]).href === import.meta.url) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
