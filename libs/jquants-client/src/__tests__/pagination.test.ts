import { describe, test, expect, vi } from 'vitest';
import { fetchAll } from '../pagination';
import type { JsonRequester } from '../types';
import { ProtocolError } from '../types';

type RequestFn = JsonRequester['request'];

function pagedRequester(pages: unknown[]) {
  let index = 0;
  return vi.fn<RequestFn>(async () => {
    const page = pages[index];
    index += 1;
    return page;
  });
}

describe('fetchAll', () => {
  test('concatenates pages in arrival order and follows the cursor', async () => {
    const request = pagedRequester([
      { dividend: [{ Code: '1301' }, { Code: '1332' }], pagination_key: 'k1' },
      { dividend: [{ Code: '1333' }], pagination_key: 'k2' },
      { dividend: [{ Code: '1375' }] },
    ]);

    const records = await fetchAll({ request }, 'fins/dividend', { date: '20240304' }, 'dividend');

    expect(records.map((r) => r.Code)).toEqual(['1301', '1332', '1333', '1375']);
    expect(request).toHaveBeenCalledTimes(3);
    expect(request.mock.calls.map(([, , options]) => options?.params)).toEqual([
      { date: '20240304' },
      { date: '20240304', pagination_key: 'k1' },
      { date: '20240304', pagination_key: 'k2' },
    ]);
  });

  test('returns an empty list for an empty single page', async () => {
    const request = pagedRequester([{ daily_quotes: [] }]);

    await expect(
      fetchAll({ request }, 'prices/daily_quotes', { date: '20240302' }, 'daily_quotes'),
    ).resolves.toEqual([]);
    expect(request).toHaveBeenCalledTimes(1);
  });

  test('treats an empty cursor as the last page', async () => {
    const request = pagedRequester([{ topix: [{ Date: '2024-03-04' }], pagination_key: '' }]);

    await expect(fetchAll({ request }, 'indices/topix', {}, 'topix')).resolves.toHaveLength(1);
    expect(request).toHaveBeenCalledTimes(1);
  });

  test('stops with ProtocolError when pagination never ends', async () => {
    const request = vi.fn<RequestFn>(async () => ({ info: [], pagination_key: 'again' }));

    await expect(
      fetchAll({ request }, 'listed/info', {}, 'info', { maxPages: 3 }),
    ).rejects.toBeInstanceOf(ProtocolError);
    expect(request).toHaveBeenCalledTimes(3);
  });

  test('reads the declared result key on continuation pages', async () => {
    const request = pagedRequester([
      { breakdown: [{ Code: '1301' }], pagination_key: 'k1' },
      { dividend: [{ Code: '1332' }] },
    ]);

    await expect(
      fetchAll({ request }, 'markets/breakdown', {}, 'breakdown'),
    ).rejects.toBeInstanceOf(ProtocolError);
  });

  test('rejects a page whose records are not flat', async () => {
    const request = pagedRequester([{ info: [{ Code: '1301', Nested: { a: 1 } }] }]);

    await expect(fetchAll({ request }, 'listed/info', {}, 'info')).rejects.toBeInstanceOf(
      ProtocolError,
    );
  });

  test('forwards the abort signal to every request', async () => {
    const controller = new AbortController();
    const request = pagedRequester([{ topix: [], pagination_key: 'k1' }, { topix: [] }]);

    await fetchAll({ request }, 'indices/topix', {}, 'topix', { signal: controller.signal });

    expect(request.mock.calls.every(([, , options]) => options?.signal === controller.signal)).toBe(
      true,
    );
  });
});
