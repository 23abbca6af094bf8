import { z } from 'zod';
import type { EndpointRecord, JsonRequester, Logger, QueryParams } from './types';
import { ProtocolError, endpointRecordSchema } from './types';

export const DEFAULT_MAX_PAGES = 10_000;

export interface FetchAllOptions {
  maxPages?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

const pageEnvelopeSchema = z
  .object({
    pagination_key: z.string().optional(),
  })
  .passthrough();

const recordArraySchema = z.array(endpointRecordSchema);

/**
 * Drain a paginated endpoint into one list of records.
 *
 * The first request carries `params` as given; while a response body carries a
 * `pagination_key`, the same query is repeated with that cursor and the records
 * under `resultKey` are appended in page-arrival order. The same `resultKey` is
 * read on every page.
 *
 * @returns every record across all pages; an empty array when there is no data
 * @throws ProtocolError when a page is malformed or more than `maxPages` pages arrive
 */
export async function fetchAll(
  http: JsonRequester,
  path: string,
  params: QueryParams,
  resultKey: string,
  options: FetchAllOptions = {},
): Promise<EndpointRecord[]> {
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const records: EndpointRecord[] = [];
  const query: QueryParams = { ...params };
  let pages = 0;

  while (true) {
    if (pages >= maxPages) {
      throw new ProtocolError(
        `Pagination for ${path} did not terminate within ${maxPages} pages`,
      );
    }

    const body = await http.request('GET', path, { params: { ...query }, signal: options.signal });
    pages += 1;

    const page = parsePage(body, path, resultKey);
    records.push(...page.records);

    if (!page.cursor) {
      break;
    }
    query.pagination_key = page.cursor;
    options.logger?.debug?.(`[fetchAll] ${path} continuing with page ${pages + 1}`);
  }

  return records;
}

function parsePage(
  body: unknown,
  path: string,
  resultKey: string,
): { records: EndpointRecord[]; cursor?: string } {
  const envelope = pageEnvelopeSchema.safeParse(body);
  if (!envelope.success) {
    throw new ProtocolError(`J-Quants response for ${path} is not a page object`, {
      cause: envelope.error,
    });
  }

  const records = recordArraySchema.safeParse(envelope.data[resultKey]);
  if (!records.success) {
    throw new ProtocolError(
      `J-Quants response for ${path} does not carry a "${resultKey}" record array`,
      { cause: records.error },
    );
  }

  return { records: records.data, cursor: envelope.data.pagination_key };
}
