import type { EndpointId } from '@libs/jquants-client';
import type { Row } from '../lib/dataset';
import type { FetchStep } from './rangeFetch';

export const TABLE_NAMES = [
  'list',
  'price',
  'topix',
  'statements',
  'dividend',
  'margin_interest',
  'short_selling',
  'breakdown',
  'option',
  'trades_spec',
] as const;

export type TableName = (typeof TABLE_NAMES)[number];

export interface TableDefinition {
  name: TableName;
  endpoint: EndpointId;
  step: FetchStep;
  /** Endpoint column carrying the row's business date; drives `dt`, `partition_dt` and the watermark. */
  dateColumn: string;
  /** Store columns (lower-case) identifying one logical row. */
  businessKey: string[];
  /** Hold back today's data until the daily publication cutoff has passed. */
  applyCutoff: boolean;
  /** Optional check on freshly fetched store rows; a returned message is sent to the notifier. */
  inspect?: (rows: readonly Row[]) => string | undefined;
}

export const DEFAULT_TABLES: readonly TableName[] = ['list', 'price', 'topix'];

export const TABLES: Record<TableName, TableDefinition> = {
  list: {
    name: 'list',
    endpoint: 'listed_info',
    step: 'weekly',
    dateColumn: 'Date',
    businessKey: ['code', 'date'],
    applyCutoff: false,
  },
  price: {
    name: 'price',
    endpoint: 'daily_quotes',
    step: 'daily',
    dateColumn: 'Date',
    businessKey: ['code', 'date'],
    applyCutoff: true,
    inspect: reportAdjustedCodes,
  },
  topix: {
    name: 'topix',
    endpoint: 'topix',
    step: 'range',
    dateColumn: 'Date',
    businessKey: ['date'],
    applyCutoff: true,
  },
  statements: {
    name: 'statements',
    endpoint: 'fins_statements',
    step: 'daily',
    dateColumn: 'DisclosedDate',
    businessKey: ['disclosurenumber'],
    applyCutoff: true,
  },
  dividend: {
    name: 'dividend',
    endpoint: 'fins_dividend',
    step: 'daily',
    dateColumn: 'AnnouncementDate',
    businessKey: ['referencenumber', 'announcementdate', 'announcementtime'],
    applyCutoff: true,
  },
  margin_interest: {
    name: 'margin_interest',
    endpoint: 'weekly_margin_interest',
    step: 'daily',
    dateColumn: 'Date',
    businessKey: ['code', 'date'],
    applyCutoff: true,
  },
  short_selling: {
    name: 'short_selling',
    endpoint: 'short_selling',
    step: 'daily',
    dateColumn: 'Date',
    businessKey: ['sector33code', 'date'],
    applyCutoff: true,
  },
  breakdown: {
    name: 'breakdown',
    endpoint: 'breakdown',
    step: 'daily',
    dateColumn: 'Date',
    businessKey: ['code', 'date'],
    applyCutoff: true,
  },
  option: {
    name: 'option',
    endpoint: 'index_option',
    step: 'daily',
    dateColumn: 'Date',
    businessKey: ['code', 'date', 'emergencymargintriggerdivision'],
    applyCutoff: true,
  },
  trades_spec: {
    name: 'trades_spec',
    endpoint: 'trades_spec',
    step: 'range',
    dateColumn: 'PublishedDate',
    businessKey: ['publisheddate', 'section', 'startdate'],
    applyCutoff: true,
  },
};

export function isTableName(value: string): value is TableName {
  return TABLE_NAMES.some((name) => name === value);
}

/** Codes whose adjustment factor is not 1, i.e. splits or consolidations took effect. */
export function reportAdjustedCodes(rows: readonly Row[]): string | undefined {
  const adjusted = rows
    .filter((row) => typeof row.adjustmentfactor === 'number' && row.adjustmentfactor !== 1)
    .map((row) => `${row.code} ${row.date} x${row.adjustmentfactor}`);
  if (adjusted.length === 0) {
    return undefined;
  }
  return `Adjustment factor changed:\n${adjusted.join('\n')}`;
}
