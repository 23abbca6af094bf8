import { z } from 'zod';

export type Scalar = string | number | null;
export type Row = Record<string, Scalar>;

/** Ordered rows sharing one column header. The header is kept even when there are no rows. */
export interface Dataset {
  columns: string[];
  rows: Row[];
}

export const scalarSchema = z.union([z.string(), z.number(), z.null()]);

/** Shape of a dataset serialized to disk (store artifacts and fetch cache entries). */
export const datasetFileSchema = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.record(scalarSchema)),
});

export function emptyDataset(): Dataset {
  return { columns: [], rows: [] };
}

/** Ascending order with `null` first; numbers compare numerically, everything else by code unit. */
export function compareScalars(a: Scalar | undefined, b: Scalar | undefined): number {
  const left = a ?? null;
  const right = b ?? null;
  if (left === right) return 0;
  if (left === null) return -1;
  if (right === null) return 1;
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  const l = String(left);
  const r = String(right);
  return l < r ? -1 : l > r ? 1 : 0;
}

/** Stable sort on the given key columns. Returns a new array. */
export function sortRows(rows: readonly Row[], key: readonly string[]): Row[] {
  return [...rows].sort((a, b) => {
    for (const column of key) {
      const order = compareScalars(a[column], b[column]);
      if (order !== 0) return order;
    }
    return 0;
  });
}

/** Project a row onto `columns`, filling absent fields with null. */
export function projectRow(row: Row, columns: readonly string[]): Row {
  const out: Row = {};
  for (const column of columns) {
    out[column] = row[column] ?? null;
  }
  return out;
}
