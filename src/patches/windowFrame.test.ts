import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { makeTempDir, readText, writeTree } from '@/tests/tempTree';
import { applyNativeFrame, writeNativeFrame } from './windowFrame';
import { PatchWorkspace } from './workspace';

describe('writeNativeFrame', () => {
  it('forces frame:true and blanks titleBarStyle', () => {
    expect(
      writeNativeFrame(
        'new BrowserWindow({frame:false,titleBarStyle:"hidden",width:800})'
      )
    ).toBe('new BrowserWindow({frame:true,titleBarStyle:"",width:800})');
  });

  it('handles minified booleans and spacing', () => {
    expect(writeNativeFrame('{frame : !1,a:1}')).toBe('{frame:true,a:1}');
    expect(writeNativeFrame('{frame:!0}')).toBe('{frame:true}');
  });

  it('blanks conditional titleBarStyle values', () => {
    expect(writeNativeFrame('{titleBarStyle:e?"hidden":"default"}')).toBe(
      '{titleBarStyle:""}'
    );
  });

  it('is idempotent', () => {
    const once = writeNativeFrame('{frame:false,titleBarStyle:"hidden"}');
    expect(writeNativeFrame(once)).toBe(once);
  });
});

describe('applyNativeFrame', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('only touches scripts that mention BrowserWindow', async () => {
    await writeTree(dir, {
      '.vite/build/index.js': 'new BrowserWindow({frame:!1})',
      '.vite/build/other.js': 'x={frame:false}',
    });
    const workspace = new PatchWorkspace(dir);

    expect(await applyNativeFrame(workspace)).toEqual(['.vite/build/index.js']);
    await workspace.commit();

    expect(await readText(dir, '.vite/build/index.js')).toBe(
      'new BrowserWindow({frame:true})'
    );
    expect(await readText(dir, '.vite/build/other.js')).toBe('x={frame:false}');
  });

  it('throws when no script mentions BrowserWindow', async () => {
    await writeTree(dir, { '.vite/build/index.js': 'x=1' });
    await expect(applyNativeFrame(new PatchWorkspace(dir))).rejects.toThrow(
      'patch native-frame: could not find a script mentioning BrowserWindow in .vite/build'
    );
  });
});
