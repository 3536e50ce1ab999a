import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import path from 'node:path';

import { DownloadError } from '../errors';
import { makeTempDir, readText } from '@/tests/tempTree';
import { downloadFile } from './download';
import { doesFileExist } from './misc';

const INSTALLER_URL = 'https://downloads.example.test/Claude-Setup-x64.exe';

describe('downloadFile', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await cleanup();
  });

  it('writes the response body, creating parent directories', async () => {
    const fetchMock = vi.fn(async () => new Response('installer bytes'));
    vi.stubGlobal('fetch', fetchMock);

    const destination = path.join(dir, 'downloads', 'setup.exe');
    await downloadFile(INSTALLER_URL, destination);

    expect(fetchMock).toHaveBeenCalledWith(INSTALLER_URL);
    expect(await readText(dir, 'downloads/setup.exe')).toBe('installer bytes');
  });

  it('fails on a non-2xx status without leaving a file', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        async () =>
          new Response('missing', { status: 404, statusText: 'Not Found' })
      )
    );

    const destination = path.join(dir, 'setup.exe');
    await expect(downloadFile(INSTALLER_URL, destination)).rejects.toThrow(
      new DownloadError(INSTALLER_URL, 'HTTP 404 Not Found')
    );
    expect(await doesFileExist(destination)).toBe(false);
  });

  it('wraps network errors', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    await expect(downloadFile(INSTALLER_URL, path.join(dir, 'setup.exe'))).rejects.toThrow(
      `Failed to download ${INSTALLER_URL}: fetch failed`
    );
  });

  it('removes the partial file when the body breaks off', async () => {
    let pulls = 0;
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        pulls += 1;
        if (pulls === 1) {
          controller.enqueue(new TextEncoder().encode('partial'));
        } else {
          controller.error(new Error('connection reset'));
        }
      },
    });
    vi.stubGlobal('fetch', vi.fn(async () => new Response(body)));

    const destination = path.join(dir, 'setup.exe');
    await expect(downloadFile(INSTALLER_URL, destination)).rejects.toThrow(DownloadError);
    expect(await doesFileExist(destination)).toBe(false);
  });
});
