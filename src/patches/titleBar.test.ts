import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ArtifactNotFoundError } from '../errors';
import { makeTempDir, writeTree } from '@/tests/tempTree';
import {
  applyTitleBarDetection,
  findMainWindowPage,
  writeTitleBarDetection,
} from './titleBar';
import { PatchWorkspace } from './workspace';

const ASSETS = '.vite/renderer/main_window/assets';

describe('writeTitleBarDetection', () => {
  it('drops the negation from if(!A&&B)', () => {
    expect(writeTitleBarDetection('if(!Kn&&Qr)return null;if(!a && b)x()')).toBe(
      'if(Kn&&Qr)return null;if(a&&b)x()'
    );
  });

  it('leaves patched content unchanged', () => {
    expect(writeTitleBarDetection('if(Kn&&Qr)return null;')).toBe(
      'if(Kn&&Qr)return null;'
    );
  });
});

describe('findMainWindowPage', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('returns the single MainWindowPage chunk', async () => {
    await writeTree(dir, {
      [`${ASSETS}/MainWindowPage-abc123.js`]: '',
      [`${ASSETS}/index-def456.js`]: '',
    });
    expect(await findMainWindowPage(new PatchWorkspace(dir))).toBe(
      `${ASSETS}/MainWindowPage-abc123.js`
    );
  });

  it('throws when there is none', async () => {
    await writeTree(dir, { [`${ASSETS}/index.js`]: '' });
    await expect(findMainWindowPage(new PatchWorkspace(dir))).rejects.toThrow(
      ArtifactNotFoundError
    );
  });

  it('throws when there are several', async () => {
    await writeTree(dir, {
      [`${ASSETS}/MainWindowPage-a.js`]: '',
      [`${ASSETS}/MainWindowPage-b.js`]: '',
    });
    await expect(findMainWindowPage(new PatchWorkspace(dir))).rejects.toThrow(
      `Expected exactly one MainWindowPage-*.js under ${ASSETS}, found 2`
    );
  });

  it('reports whether the chunk changed', async () => {
    await writeTree(dir, {
      [`${ASSETS}/MainWindowPage-a.js`]: 'if(!w&&m)return null;',
    });
    const workspace = new PatchWorkspace(dir);
    expect(await applyTitleBarDetection(workspace)).toBe(true);
    expect(await workspace.read(`${ASSETS}/MainWindowPage-a.js`)).toBe(
      'if(w&&m)return null;'
    );
    expect(await applyTitleBarDetection(workspace)).toBe(false);
  });
});
