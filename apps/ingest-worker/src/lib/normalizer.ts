import type { EndpointId, EndpointRecord, EndpointValue } from '@libs/jquants-client';
import type { ColumnType, DatasetSchemas, Plan } from '../config/datasets';
import { PLANS } from '../config/datasets';
import type { Dataset, Row, Scalar } from './dataset';
import { sortRows } from './dataset';
import { isIsoDate } from './dates';
import { SchemaError } from './errors';

/** Values the upstream uses for "no value". */
const MISSING_MARKERS = new Set(['', '-']);

/**
 * Maps raw endpoint records onto the endpoint's declared column schema.
 *
 * The subscription plan is fixed per normalizer; columns whose minimum plan is
 * above it are left out of every dataset. Fields outside the schema are
 * dropped, absent fields become null.
 */
export class DatasetNormalizer {
  private readonly columnCache = new Map<EndpointId, string[]>();

  constructor(
    private readonly schemas: DatasetSchemas,
    readonly plan: Plan = 'premium',
  ) {}

  columnsFor(endpoint: EndpointId): string[] {
    const cached = this.columnCache.get(endpoint);
    if (cached) {
      return [...cached];
    }
    const schema = this.schemas[endpoint];
    const rank = PLANS.indexOf(this.plan);
    const columns = Object.keys(schema.columns).filter((column) => {
      const minimum = schema.minimumPlan[column];
      return minimum === undefined || PLANS.indexOf(minimum) <= rank;
    });
    this.columnCache.set(endpoint, columns);
    return [...columns];
  }

  normalize(endpoint: EndpointId, records: readonly EndpointRecord[]): Dataset {
    const columns = this.columnsFor(endpoint);
    const types = this.schemas[endpoint].columns;

    const rows = records.map((record) => {
      const row: Row = {};
      for (const column of columns) {
        row[column] = coerce(record[column], types[column], endpoint, column);
      }
      return row;
    });

    return { columns, rows: this.sort(endpoint, rows) };
  }

  /** Stable ascending sort on the endpoint's sort key. */
  sort(endpoint: EndpointId, rows: readonly Row[]): Row[] {
    return sortRows(rows, this.schemas[endpoint].sortKey);
  }
}

function coerce(
  value: EndpointValue | undefined,
  type: ColumnType,
  endpoint: EndpointId,
  column: string,
): Scalar {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'string' && MISSING_MARKERS.has(value.trim())) {
    return null;
  }

  const fail = (): never => {
    throw new SchemaError(
      `${endpoint}.${column}: ${JSON.stringify(value)} is not a valid ${type}`,
    );
  };

  switch (type) {
    case 'string':
      return String(value);
    case 'date':
      if (typeof value !== 'string' || !isIsoDate(value)) {
        return fail();
      }
      return value;
    case 'integer':
    case 'float': {
      const num = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
      if (!Number.isFinite(num) || (type === 'integer' && !Number.isInteger(num))) {
        return fail();
      }
      return num;
    }
  }
}
