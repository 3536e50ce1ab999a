import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { PatchAnchorError } from '../errors';
import { makeTempDir, readText, writeTree } from '@/tests/tempTree';
import { doesFileExist } from '../utils';
import { applyAppPatches } from './index';

const TIMING = { trayMutexResetMs: 500, trayCleanupDelayMs: 50 };

const MAIN_INDEX =
  'const w=new BrowserWindow({frame:false,titleBarStyle:"hidden"});' +
  'n.on("menuBarEnabled",()=>{Kt()});let Ue=null;' +
  'function Kt(){const t=1;Ue&&(Ue.destroy(),Ue=null)}' +
  'function q(e){e.hide()}' +
  'function p(){if(process.platform==="win32")return"win32-x64";}';

const APP_TREE = {
  'package.json': JSON.stringify({ name: 'claude', main: '.vite/build/index.js' }),
  '.vite/build/index.js': MAIN_INDEX,
  '.vite/renderer/main_window/assets/MainWindowPage-x1.js':
    'if(!a&&b)return null;',
};

describe('applyAppPatches', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('applies every patch once', async () => {
    await writeTree(dir, APP_TREE);

    const results = await applyAppPatches(dir, { timing: TIMING });
    expect(results.map(r => [r.id, r.applied])).toEqual([
      ['frame-fix-shim', true],
      ['manifest-entry-point', true],
      ['native-frame', true],
      ['title-bar-detection', true],
      ['native-stub', true],
      ['tray-mutex', true],
      ['quick-window-blur', true],
      ['linux-cli-platform', true],
    ]);
    expect(results.find(r => r.id === 'tray-mutex')?.details).toBe(
      'function=Kt, tray=Ue'
    );

    expect(await readText(dir, '.vite/build/index.js')).toBe(
      'const w=new BrowserWindow({frame:true,titleBarStyle:""});' +
        'n.on("menuBarEnabled",()=>{Kt()});let Ue=null;' +
        'async function Kt(){if(Kt._running)return;Kt._running=true;' +
        'setTimeout(()=>Kt._running=false,500);const t=1;' +
        'Ue&&(Ue.destroy(),Ue=null,await new Promise(r=>setTimeout(r,50)))}' +
        'function q(e){e.blur(),e.hide()}' +
        'function p(){if(process.platform==="win32")return"win32-x64";' +
        'if(process.platform==="linux")return process.arch==="arm64"?"linux-arm64":"linux-x64";}'
    );
    expect(
      await readText(dir, '.vite/renderer/main_window/assets/MainWindowPage-x1.js')
    ).toBe('if(a&&b)return null;');
    expect(JSON.parse(await readText(dir, 'package.json')).main).toBe(
      'frame-fix-entry.js'
    );
    expect(
      await doesFileExist(`${dir}/node_modules/@ant/claude-native/index.js`)
    ).toBe(true);
    expect(await doesFileExist(`${dir}/frame-fix-wrapper.js`)).toBe(true);
  });

  it('reports nothing applied on a second run', async () => {
    await writeTree(dir, APP_TREE);
    await applyAppPatches(dir, { timing: TIMING });
    const before = await readText(dir, '.vite/build/index.js');

    const results = await applyAppPatches(dir, { timing: TIMING });
    expect(results.every(r => !r.applied)).toBe(true);
    expect(await readText(dir, '.vite/build/index.js')).toBe(before);
  });

  it('writes nothing when a patch cannot find its anchor', async () => {
    await writeTree(dir, {
      ...APP_TREE,
      '.vite/build/index.js': MAIN_INDEX.replace('menuBarEnabled', 'other'),
    });

    await expect(applyAppPatches(dir, { timing: TIMING })).rejects.toThrow(
      PatchAnchorError
    );
    expect(await readText(dir, 'package.json')).toBe(APP_TREE['package.json']);
    expect(await readText(dir, '.vite/build/index.js')).toBe(
      MAIN_INDEX.replace('menuBarEnabled', 'other')
    );
    expect(await doesFileExist(`${dir}/frame-fix-wrapper.js`)).toBe(false);
  });
});
