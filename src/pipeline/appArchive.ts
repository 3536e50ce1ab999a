import * as asar from '@electron/asar';
import chalk from 'chalk';
import fs from 'node:fs/promises';
import path from 'node:path';

import { applyAppPatches, PatchResult } from '../patches';
import { loadNativeStubSurface, writeNativeStub } from '../patches/nativeStub';
import { BuildContext } from '../types';
import { debug, doesFileExist, warn } from '../utils';
import { requirePath } from './context';

export const LOCALE_FILE_PATTERN = /^.+-.+\.json$/;

/**
 * Copies files in `fromDir` (not recursing) whose names match `pattern`.
 * Returns the names copied.
 */
export async function copyMatching(
  fromDir: string,
  toDir: string,
  pattern: RegExp
): Promise<string[]> {
  if (!(await doesFileExist(fromDir))) {
    return [];
  }
  const entries = await fs.readdir(fromDir, { withFileTypes: true });
  const names = entries
    .filter(entry => entry.isFile() && pattern.test(entry.name))
    .map(entry => entry.name)
    .sort();

  if (names.length > 0) {
    await fs.mkdir(toDir, { recursive: true });
  }
  for (const name of names) {
    await fs.copyFile(path.join(fromDir, name), path.join(toDir, name));
  }
  return names;
}

/**
 * Copies the vendor archive into the staging tree and extracts it.
 */
export async function unpackAppArchive(ctx: BuildContext): Promise<void> {
  const resourcesDir = requirePath(ctx, 'resourcesDir');
  const stagingDir = requirePath(ctx, 'stagingDir');

  const appAsar = path.join(stagingDir, 'app.asar');
  const appAsarUnpacked = path.join(stagingDir, 'app.asar.unpacked');
  const contentsDir = path.join(stagingDir, 'app.asar.contents');

  await fs.copyFile(path.join(resourcesDir, 'app.asar'), appAsar);
  await fs.cp(path.join(resourcesDir, 'app.asar.unpacked'), appAsarUnpacked, {
    recursive: true,
    verbatimSymlinks: true,
  });

  console.log('Extracting app.asar...');
  asar.extractAll(appAsar, contentsDir);

  const locales = await copyMatching(
    resourcesDir,
    path.join(contentsDir, 'resources', 'i18n'),
    LOCALE_FILE_PATTERN
  );
  debug(`Copied locale files: ${locales.join(', ') || '(none)'}`);

  ctx.paths.appAsar = appAsar;
  ctx.paths.appAsarUnpacked = appAsarUnpacked;
  ctx.paths.asarContents = contentsDir;
}

export async function patchAppArchive(ctx: BuildContext): Promise<void> {
  const contentsDir = requirePath(ctx, 'asarContents');
  const results = await applyAppPatches(contentsDir, {
    timing: ctx.config.patches,
  });
  printPatchResults(results);
}

/**
 * Packs the patched tree back into app.asar and puts the native stub and
 * node-pty binaries next to it.
 */
export async function repackAppArchive(ctx: BuildContext): Promise<void> {
  const contentsDir = requirePath(ctx, 'asarContents');
  const appAsar = requirePath(ctx, 'appAsar');
  const appAsarUnpacked = requirePath(ctx, 'appAsarUnpacked');

  console.log('Repacking app.asar...');
  await asar.createPackage(contentsDir, appAsar);

  const stubFile = await writeNativeStub(
    appAsarUnpacked,
    await loadNativeStubSurface()
  );
  debug(`Wrote ${stubFile}`);

  await copyNodePtyBinaries(ctx, appAsarUnpacked);
}

const NODE_PTY_RELEASE_DIR = path.join('build', 'Release');

async function copyNodePtyBinaries(
  ctx: BuildContext,
  appAsarUnpacked: string
): Promise<void> {
  const nodePtyModule = ctx.paths.nodePtyModule;
  const releaseDir = nodePtyModule
    ? path.join(nodePtyModule, NODE_PTY_RELEASE_DIR)
    : undefined;

  if (!releaseDir || !(await doesFileExist(releaseDir))) {
    warn(
      'Warning: node-pty native binaries not found - terminal features may not work'
    );
    return;
  }

  const dest = path.join(
    appAsarUnpacked,
    'node_modules',
    'node-pty',
    NODE_PTY_RELEASE_DIR
  );
  await fs.cp(releaseDir, dest, { recursive: true });
  for (const entry of await fs.readdir(dest, { withFileTypes: true })) {
    if (entry.isFile()) {
      await fs.chmod(path.join(dest, entry.name), 0o755);
    }
  }
  console.log('node-pty native binaries copied');
}

/**
 * Prints one line per patch, grouped, like:
 *
 *   Window Frame
 *     ✓ frame fix shim: wraps .vite/build/index.js
 *     ○ native frame flags
 */
export function printPatchResults(results: PatchResult[]): void {
  const groups = [...new Set(results.map(r => r.group))];
  for (const group of groups) {
    console.log(chalk.bold(group));
    for (const result of results.filter(r => r.group === group)) {
      const mark = result.applied ? chalk.green('✓') : chalk.dim('○');
      const details = result.details ? chalk.dim(`: ${result.details}`) : '';
      console.log(`  ${mark} ${result.name}${details}`);
    }
  }
  const applied = results.filter(r => r.applied).length;
  console.log(
    `${applied} of ${results.length} patches applied, ` +
      `${results.length - applied} already present`
  );
}
