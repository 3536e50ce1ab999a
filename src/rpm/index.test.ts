import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';

import { makeTempDir, readText, writeTree } from '@/tests/tempTree';
import { doesFileExist, runCommand } from '../utils';
import {
  buildRpmPackage,
  getRpmLayout,
  PackageParams,
  rpmFileName,
  stageRpmTree,
} from './index';

vi.mock('../utils', async importOriginal => ({
  ...(await importOriginal<typeof import('../utils')>()),
  runCommand: vi.fn(),
}));

describe('rpm package builder', () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let params: PackageParams;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
    params = {
      version: '1.1.381',
      arch: 'x86_64',
      workDir: dir,
      stagingDir: path.join(dir, 'electron-app'),
      packageName: 'claude-desktop',
      maintainer: 'Test Maintainer',
      description: 'Claude Desktop for Linux',
    };
    await writeTree(dir, {
      'claude_8_48x48x32.png': 'png',
      'electron-app/app.asar': 'asar',
      'electron-app/app.asar.unpacked/node_modules/@ant/claude-native/index.js':
        'stub',
      'electron-app/node_modules/electron/dist/electron': 'elf',
    });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.mocked(runCommand).mockReset();
    await cleanup();
  });

  it('names the package file', () => {
    expect(rpmFileName(params)).toBe('claude-desktop-1.1.381-1.x86_64.rpm');
  });

  it('lays out the install root', async () => {
    const layout = await stageRpmTree(params);
    const lib = path.join(layout.usrDir, 'lib', 'claude-desktop');

    expect(layout.installRoot).toBe(
      path.join(dir, 'rpmbuild', 'BUILDROOT', 'claude-desktop-1.1.381-1.x86_64')
    );
    for (const sub of ['BUILD', 'RPMS', 'SOURCES', 'SPECS', 'SRPMS']) {
      expect(await doesFileExist(path.join(dir, 'rpmbuild', sub))).toBe(true);
    }
    expect(
      await readText(lib, 'node_modules/electron/dist/resources/app.asar')
    ).toBe('asar');
    expect(
      await readText(
        lib,
        'node_modules/electron/dist/resources/app.asar.unpacked/node_modules/@ant/claude-native/index.js'
      )
    ).toBe('stub');
    expect(await readText(lib, 'node_modules/electron/dist/electron')).toBe('elf');
    expect(
      await doesFileExist(
        path.join(
          layout.usrDir,
          'share/icons/hicolor/48x48/apps/claude-desktop.png'
        )
      )
    ).toBe(true);

    const launcher = path.join(layout.usrDir, 'bin', 'claude-desktop');
    expect((await fs.stat(launcher)).mode & 0o777).toBe(0o755);
    expect(
      await doesFileExist(
        path.join(layout.usrDir, 'share/applications/claude-desktop.desktop')
      )
    ).toBe(true);
    expect(layout.specFile).toBe(
      path.join(dir, 'rpmbuild', 'SPECS', 'claude-desktop.spec')
    );
    expect(await doesFileExist(layout.specFile)).toBe(true);
  });

  it('runs rpmbuild and moves the package into the work dir', async () => {
    const layout = getRpmLayout(params);
    vi.mocked(runCommand).mockImplementation(async () => {
      await writeTree(layout.topDir, {
        'RPMS/x86_64/claude-desktop-1.1.381-1.fc40.x86_64.rpm': 'rpm',
      });
      return { status: 0, stdout: '', stderr: '' };
    });

    const rpm = await buildRpmPackage(params);

    expect(rpm).toBe(path.join(dir, 'claude-desktop-1.1.381-1.x86_64.rpm'));
    expect(await readText(dir, 'claude-desktop-1.1.381-1.x86_64.rpm')).toBe('rpm');
    expect(runCommand).toHaveBeenCalledWith('rpmbuild', [
      '--define',
      `_topdir ${layout.topDir}`,
      '--define',
      `buildroot ${layout.installRoot}`,
      '-bb',
      layout.specFile,
    ]);
  });

  it('does not pick up an RPM left by an earlier build', async () => {
    await writeTree(dir, {
      'rpmbuild/RPMS/x86_64/claude-desktop-1.1.300-1.fc40.x86_64.rpm': 'old',
    });
    const layout = getRpmLayout(params);
    vi.mocked(runCommand).mockImplementation(async () => {
      await writeTree(layout.topDir, {
        'RPMS/x86_64/claude-desktop-1.1.381-1.fc40.x86_64.rpm': 'new',
      });
      return { status: 0, stdout: '', stderr: '' };
    });

    await buildRpmPackage(params);

    expect(await readText(dir, 'claude-desktop-1.1.381-1.x86_64.rpm')).toBe('new');
    expect(await fs.readdir(path.join(layout.topDir, 'RPMS', 'x86_64'))).toEqual([]);
  });

  it('fails when rpmbuild produces nothing', async () => {
    vi.mocked(runCommand).mockResolvedValue({ status: 0, stdout: '', stderr: '' });
    await expect(buildRpmPackage(params)).rejects.toThrow(
      'Failed to find built RPM package'
    );
  });
});
