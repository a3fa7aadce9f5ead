import fs from 'node:fs/promises';
import path from 'node:path';
import { request, type Dispatcher } from 'undici';
import { logger } from '../utils/logger.js';
import { WorkbookDownloadError } from './errors.js';

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'OffseasonTracker/1.0',
  Accept: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet,*/*;q=0.8',
};

export interface DownloadOptions {
  /** Defaults to undici's global dispatcher */
  dispatcher?: Dispatcher;
}

/**
 * Fetch the published .xlsx export and write it to `destination`,
 * replacing any earlier copy. Returns the number of bytes written.
 */
export async function downloadWorkbook(
  url: string,
  destination: string,
  options: DownloadOptions = {},
): Promise<number> {
  let statusCode: number;
  let data: ArrayBuffer;
  try {
    const res = await request(url, {
      method: 'GET',
      headers: DEFAULT_HEADERS,
      maxRedirections: 5,
      headersTimeout: 15000,
      bodyTimeout: 60000,
      ...(options.dispatcher ? { dispatcher: options.dispatcher } : {}),
    });
    statusCode = res.statusCode;
    data = await res.body.arrayBuffer();
  } catch (err) {
    throw new WorkbookDownloadError(url, null, { cause: err });
  }

  if (statusCode < 200 || statusCode >= 300) {
    throw new WorkbookDownloadError(url, statusCode);
  }

  await fs.mkdir(path.dirname(destination), { recursive: true });
  await fs.writeFile(destination, Buffer.from(data));

  logger.info({ url, destination, bytes: data.byteLength }, 'Workbook downloaded');
  return data.byteLength;
}
