import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { EndpointId } from '@libs/jquants-client';

export const PLANS = ['light', 'standard', 'premium'] as const;
export type Plan = (typeof PLANS)[number];

export const columnTypeSchema = z.enum(['date', 'integer', 'float', 'string']);
export type ColumnType = z.infer<typeof columnTypeSchema>;

const datasetSchemaEntry = z
  .object({
    sortKey: z.array(z.string()).min(1),
    columns: z.record(columnTypeSchema),
    /** Columns only served from the named plan upward. */
    minimumPlan: z.record(z.enum(PLANS)).default({}),
  })
  .superRefine((entry, ctx) => {
    const known = new Set(Object.keys(entry.columns));
    for (const column of [...entry.sortKey, ...Object.keys(entry.minimumPlan)]) {
      if (!known.has(column)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown column ${column}` });
      }
    }
  });

export type DatasetSchema = z.infer<typeof datasetSchemaEntry>;
export type DatasetSchemas = Record<EndpointId, DatasetSchema>;

const datasetSchemasFile = z.record(datasetSchemaEntry);

export const DATASET_SCHEMAS_PATH = fileURLToPath(
  new URL('../../config/dataset-schemas.json', import.meta.url),
);

/** Parse and validate the per-endpoint column table. Every endpoint must be present. */
export function parseDatasetSchemas(raw: unknown): DatasetSchemas {
  const parsed = datasetSchemasFile.parse(raw);
  const pick = (endpoint: EndpointId): DatasetSchema => {
    const entry = parsed[endpoint];
    if (!entry) {
      throw new Error(`dataset-schemas.json has no entry for ${endpoint}`);
    }
    return entry;
  };

  return {
    listed_info: pick('listed_info'),
    daily_quotes: pick('daily_quotes'),
    fins_statements: pick('fins_statements'),
    fins_announcement: pick('fins_announcement'),
    fins_dividend: pick('fins_dividend'),
    index_option: pick('index_option'),
    trades_spec: pick('trades_spec'),
    weekly_margin_interest: pick('weekly_margin_interest'),
    short_selling: pick('short_selling'),
    breakdown: pick('breakdown'),
    topix: pick('topix'),
  };
}

let cached: DatasetSchemas | undefined;

/** Load `config/dataset-schemas.json` once per process. */
export function loadDatasetSchemas(path: string = DATASET_SCHEMAS_PATH): DatasetSchemas {
  if (path === DATASET_SCHEMAS_PATH && cached) {
    return cached;
  }
  const schemas = parseDatasetSchemas(JSON.parse(readFileSync(path, 'utf8')));
  if (path === DATASET_SCHEMAS_PATH) {
    cached = schemas;
  }
  return schemas;
}
