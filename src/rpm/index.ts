import chalk from 'chalk';
import fs from 'node:fs/promises';
import path from 'node:path';

import { ArtifactNotFoundError } from '../errors';
import { debug, doesFileExist, runCommand } from '../utils';
import { renderDesktopEntry } from './desktopEntry';
import { installIcons } from './icons';
import { renderLauncher } from './launcher';
import { renderSpecFile } from './specFile';

export { renderDesktopEntry } from './desktopEntry';
export { renderLauncher } from './launcher';
export { renderSpecFile, formatChangelogDate } from './specFile';
export { installIcons, ICON_SOURCES } from './icons';

/**
 * Everything the package step needs. It shares no state with the rest of
 * the pipeline, so the `package` command can run it on its own.
 */
export interface PackageParams {
  version: string;
  arch: string;
  workDir: string;
  stagingDir: string;
  packageName: string;
  maintainer: string;
  description: string;
}

export const RPM_TOPDIR_SUBDIRS = [
  'BUILD',
  'RPMS',
  'SOURCES',
  'SPECS',
  'SRPMS',
  'BUILDROOT',
];

export const rpmFileName = (params: PackageParams): string =>
  `${params.packageName}-${params.version}-1.${params.arch}.rpm`;

export interface RpmLayout {
  topDir: string;
  installRoot: string;
  usrDir: string;
  libDir: string;
  specFile: string;
}

export const getRpmLayout = (params: PackageParams): RpmLayout => {
  const topDir = path.join(params.workDir, 'rpmbuild');
  const installRoot = path.join(
    topDir,
    'BUILDROOT',
    `${params.packageName}-${params.version}-1.${params.arch}`
  );
  const usrDir = path.join(installRoot, 'usr');
  return {
    topDir,
    installRoot,
    usrDir,
    libDir: path.join(usrDir, 'lib', params.packageName),
    specFile: path.join(topDir, 'SPECS', `${params.packageName}.spec`),
  };
};

/**
 * Lays out the install root under BUILDROOT and writes the spec file.
 */
export async function stageRpmTree(
  params: PackageParams,
  date: Date = new Date()
): Promise<RpmLayout> {
  const layout = getRpmLayout(params);
  const { topDir, installRoot, usrDir, libDir } = layout;

  // A leftover RPM would be mistaken for this build's output.
  await fs.rm(path.join(topDir, 'RPMS'), { recursive: true, force: true });
  for (const dir of RPM_TOPDIR_SUBDIRS) {
    await fs.mkdir(path.join(topDir, dir), { recursive: true });
  }
  await fs.rm(installRoot, { recursive: true, force: true });

  console.log(`Creating package structure in ${installRoot}...`);
  for (const dir of [
    libDir,
    path.join(usrDir, 'share', 'applications'),
    path.join(usrDir, 'share', 'icons'),
    path.join(usrDir, 'bin'),
  ]) {
    await fs.mkdir(dir, { recursive: true });
  }

  const icons = await installIcons(params.workDir, usrDir, params.packageName);
  debug(`Installed icon sizes: ${icons.installed.join(', ') || '(none)'}`);

  const stagedModules = path.join(params.stagingDir, 'node_modules');
  if (await doesFileExist(stagedModules)) {
    await fs.cp(stagedModules, path.join(libDir, 'node_modules'), {
      recursive: true,
      verbatimSymlinks: true,
    });
  }

  // Electron resolves the app from process.resourcesPath.
  const resourcesDir = path.join(
    libDir,
    'node_modules',
    'electron',
    'dist',
    'resources'
  );
  await fs.mkdir(resourcesDir, { recursive: true });
  await fs.copyFile(
    path.join(params.stagingDir, 'app.asar'),
    path.join(resourcesDir, 'app.asar')
  );
  await fs.cp(
    path.join(params.stagingDir, 'app.asar.unpacked'),
    path.join(resourcesDir, 'app.asar.unpacked'),
    { recursive: true }
  );

  await fs.writeFile(
    path.join(usrDir, 'share', 'applications', `${params.packageName}.desktop`),
    renderDesktopEntry(params.packageName)
  );

  const launcher = path.join(usrDir, 'bin', params.packageName);
  await fs.writeFile(launcher, renderLauncher(params.packageName));
  await fs.chmod(launcher, 0o755);

  await fs.writeFile(layout.specFile, renderSpecFile(params, date));
  console.log(`RPM spec file created at ${layout.specFile}`);

  return layout;
}

/**
 * First `*.rpm` anywhere under `dir`, or undefined.
 */
export async function findBuiltRpm(dir: string): Promise<string | undefined> {
  if (!(await doesFileExist(dir))) {
    return undefined;
  }
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isFile() && entry.name.endsWith('.rpm')) {
      return full;
    }
    if (entry.isDirectory()) {
      const nested = await findBuiltRpm(full);
      if (nested) return nested;
    }
  }
  return undefined;
}

/**
 * Builds `<workDir>/<package>-<version>-1.<arch>.rpm` and returns its path.
 */
export async function buildRpmPackage(params: PackageParams): Promise<string> {
  console.log(chalk.bold.cyan('--- Starting RPM Package Build ---'));
  console.log(`Version: ${params.version}`);
  console.log(`Architecture: ${params.arch}`);
  console.log(`Work Directory: ${params.workDir}`);
  console.log(`App Staging Directory: ${params.stagingDir}`);
  console.log(`Package Name: ${params.packageName}`);

  const layout = await stageRpmTree(params);

  console.log('Building RPM package...');
  await runCommand('rpmbuild', [
    '--define',
    `_topdir ${layout.topDir}`,
    '--define',
    `buildroot ${layout.installRoot}`,
    '-bb',
    layout.specFile,
  ]);

  const built = await findBuiltRpm(path.join(layout.topDir, 'RPMS'));
  if (!built) {
    throw new ArtifactNotFoundError('Failed to find built RPM package');
  }

  const finalRpm = path.join(params.workDir, rpmFileName(params));
  await fs.rename(built, finalRpm);
  console.log(`RPM package built successfully: ${finalRpm}`);
  return finalRpm;
}
