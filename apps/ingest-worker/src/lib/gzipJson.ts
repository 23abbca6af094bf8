import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { gunzipSync, gzipSync, strFromU8, strToU8 } from 'fflate';

/** Read and decompress a gzip JSON file; `undefined` when the file does not exist. */
export async function readGzipJson(path: string): Promise<unknown> {
  let buffer: Buffer;
  try {
    buffer = await readFile(path);
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw error;
  }
  return JSON.parse(strFromU8(gunzipSync(new Uint8Array(buffer))));
}

export async function writeGzipJson(path: string, value: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, gzipSync(strToU8(JSON.stringify(value))));
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
