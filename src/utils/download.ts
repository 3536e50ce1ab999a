import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import { DownloadError } from '../errors';
import { debug } from './misc';

/**
 * Streams `url` to `destination`. Any network error or non-2xx status is
 * fatal; there is no retry.
 */
export async function downloadFile(
  url: string,
  destination: string
): Promise<void> {
  debug(`Downloading ${url} -> ${destination}`);

  let response: Response;
  try {
    response = await fetch(url);
  } catch (error) {
    throw new DownloadError(
      url,
      error instanceof Error ? error.message : String(error)
    );
  }

  if (!response.ok || !response.body) {
    throw new DownloadError(
      url,
      `HTTP ${response.status} ${response.statusText}`
    );
  }

  await fsPromises.mkdir(path.dirname(destination), { recursive: true });
  try {
    await pipeline(
      Readable.fromWeb(response.body),
      fs.createWriteStream(destination)
    );
  } catch (error) {
    await fsPromises.rm(destination, { force: true });
    throw new DownloadError(
      url,
      error instanceof Error ? error.message : String(error)
    );
  }
}
