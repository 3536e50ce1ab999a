import fs from 'node:fs/promises';
import path from 'node:path';

import { CommandError } from '../errors';
import { BuildContext } from '../types';
import { debug, doesFileExist, runCommand, warn } from '../utils';
import { copyMatching, LOCALE_FILE_PATTERN } from './appArchive';
import { requirePath } from './context';

const NODE_PTY_BUILD_MANIFEST = {
  name: 'node-pty-build',
  version: '1.0.0',
  private: true,
};

const TRAY_ICON_PATTERN = /^Tray/;

/**
 * Builds node-pty for this host and copies its JavaScript into the app tree.
 * Failure only costs terminal support, so it is reported and swallowed.
 */
export async function installNodePty(ctx: BuildContext): Promise<void> {
  const buildDir = path.join(requirePath(ctx, 'workDir'), 'node-pty-build');
  const contentsDir = requirePath(ctx, 'asarContents');

  await fs.mkdir(buildDir, { recursive: true });
  await fs.writeFile(
    path.join(buildDir, 'package.json'),
    JSON.stringify(NODE_PTY_BUILD_MANIFEST)
  );

  console.log('Installing node-pty (this will compile native module for Linux)...');
  try {
    await runCommand('npm', ['install', 'node-pty'], { cwd: buildDir });
  } catch (error) {
    if (!(error instanceof CommandError)) throw error;
    warn('Warning: Failed to install node-pty - terminal features may not work');
    debug(error.message);
    return;
  }

  const moduleDir = path.join(buildDir, 'node_modules', 'node-pty');
  if (!(await doesFileExist(moduleDir))) {
    warn('Warning: node-pty installation directory not found');
    return;
  }

  const dest = path.join(contentsDir, 'node_modules', 'node-pty');
  await fs.mkdir(dest, { recursive: true });
  await fs.cp(path.join(moduleDir, 'lib'), path.join(dest, 'lib'), {
    recursive: true,
  });
  await fs.copyFile(
    path.join(moduleDir, 'package.json'),
    path.join(dest, 'package.json')
  );
  console.log('node-pty JavaScript files copied');

  ctx.paths.nodePtyModule = moduleDir;
  ctx.terminalSupport = true;
}

/**
 * Stages the Electron runtime and the vendor resources it loads directly
 * from `process.resourcesPath`.
 */
export async function bundleElectron(ctx: BuildContext): Promise<void> {
  const electronModule = requirePath(ctx, 'electronModule');
  const stagingDir = requirePath(ctx, 'stagingDir');
  const resourcesDir = requirePath(ctx, 'resourcesDir');

  const stagedElectron = path.join(stagingDir, 'node_modules', 'electron');
  console.log(`Copying Electron from ${electronModule}`);
  await fs.cp(electronModule, stagedElectron, {
    recursive: true,
    verbatimSymlinks: true,
  });

  const binary = path.join(stagedElectron, 'dist', 'electron');
  if (await doesFileExist(binary)) {
    await fs.chmod(binary, 0o755);
  } else {
    warn(`Warning: Staged Electron binary not found at ${binary}`);
  }

  const electronResources = path.join(stagedElectron, 'dist', 'resources');
  const trayIcons = await copyMatching(
    resourcesDir,
    electronResources,
    TRAY_ICON_PATTERN
  );
  if (trayIcons.length === 0) {
    warn(`Warning: No tray icon files found at ${resourcesDir}/Tray*`);
  }

  const locales = await copyMatching(
    resourcesDir,
    electronResources,
    LOCALE_FILE_PATTERN
  );
  if (locales.length === 0) {
    warn(`Warning: No locale files found at ${resourcesDir}/*-*.json`);
  }
  debug(`Copied ${trayIcons.length} tray icons, ${locales.length} locale files`);
}
