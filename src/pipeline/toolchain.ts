import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as tar from 'tar';

import { PreconditionError } from '../errors';
import { BuildContext } from '../types';
import { requirePath } from './context';
import {
  debug,
  doesFileExist,
  downloadFile,
  resolveCommand,
  runCommand,
} from '../utils';

/** Checked on PATH before anything is downloaded. */
export const REQUIRED_TOOLS = ['7z', 'wrestool', 'icotool', 'rpmbuild', 'npm'];

export const DNF_PACKAGES = [
  'p7zip',
  'p7zip-plugins',
  'wget',
  'icoutils',
  'ImageMagick',
  'rpm-build',
  'nodejs',
  'npm',
  'findutils',
  'sed',
  'grep',
  'make',
  'gcc',
  'gcc-c++',
  'python3',
];

const BUILD_MANIFEST = {
  name: 'claude-desktop-build',
  version: '0.0.1',
  private: true,
};

export const parseNodeMajor = (versionOutput: string): number | null => {
  const match = versionOutput.trim().match(/^v?(\d+)\.\d+\.\d+/);
  return match ? Number(match[1]) : null;
};

export const nodeTarballName = (version: string, nodeArch: string): string =>
  `node-v${version}-linux-${nodeArch}.tar.gz`;

export async function detectNodeMajor(): Promise<number | null> {
  const node = await resolveCommand('node');
  if (!node) {
    return null;
  }
  const { stdout } = await runCommand(node, ['--version'], { capture: true });
  return parseNodeMajor(stdout);
}

/**
 * Installs the distribution packages the build relies on. Needs root.
 */
export async function installSystemPackages(): Promise<void> {
  if (process.getuid && process.getuid() !== 0) {
    throw new PreconditionError(
      '--install-deps needs root. Run with sudo, or install the packages yourself: ' +
        DNF_PACKAGES.join(' ')
    );
  }
  await runCommand('dnf', ['install', '-y', ...DNF_PACKAGES]);
}

/**
 * Reports every tool missing from PATH in one error.
 */
export async function ensureSystemTools(
  tools: string[] = REQUIRED_TOOLS
): Promise<void> {
  const missing: string[] = [];
  for (const tool of tools) {
    const resolved = await resolveCommand(tool);
    if (resolved) {
      debug(`Found ${tool}: ${resolved}`);
    } else {
      missing.push(tool);
    }
  }
  if (missing.length > 0) {
    throw new PreconditionError(
      `Missing required tools: ${missing.join(', ')}. ` +
        'Install them (see --install-deps) and try again.'
    );
  }
}

/**
 * Uses the system Node.js when it is new enough, otherwise downloads the
 * pinned release into the work dir and puts it first on PATH.
 */
export async function ensureNodeRuntime(ctx: BuildContext): Promise<void> {
  const { minMajor, pinnedVersion, distUrl } = ctx.config.node;

  const major = await detectNodeMajor();
  if (major !== null && major >= minMajor) {
    console.log(`System Node.js ${major} is new enough`);
    return;
  }
  console.log(
    major === null
      ? 'Node.js not found'
      : `Node.js ${major} is older than ${minMajor}`
  );

  const workDir = requirePath(ctx, 'workDir');
  const tarball = nodeTarballName(pinnedVersion, ctx.download.nodeArch);
  const tarballPath = path.join(workDir, tarball);
  const nodeDir = path.join(workDir, 'node');

  console.log(`Downloading Node.js ${pinnedVersion}...`);
  await downloadFile(`${distUrl}/v${pinnedVersion}/${tarball}`, tarballPath);

  await fs.mkdir(nodeDir, { recursive: true });
  await tar.x({ file: tarballPath, cwd: nodeDir, strip: 1 });
  await fs.rm(tarballPath, { force: true });

  process.env.PATH = `${path.join(nodeDir, 'bin')}${path.delimiter}${process.env.PATH ?? ''}`;
  debug(`PATH=${process.env.PATH}`);

  const installed = await detectNodeMajor();
  if (installed === null || installed < minMajor) {
    throw new PreconditionError(
      `Node.js ${pinnedVersion} was installed to ${nodeDir} but is not usable`
    );
  }
  console.log(`Using local Node.js ${pinnedVersion}`);
}

/**
 * Installs Electron into the work dir unless it is already there.
 */
export async function ensureElectron(ctx: BuildContext): Promise<void> {
  const workDir = requirePath(ctx, 'workDir');
  const manifest = path.join(workDir, 'package.json');
  const moduleDir = path.join(workDir, 'node_modules', 'electron');
  const distDir = path.join(moduleDir, 'dist');

  if (!(await doesFileExist(manifest))) {
    debug(`Writing ${manifest}`);
    await fs.writeFile(manifest, JSON.stringify(BUILD_MANIFEST));
  }

  if (await doesFileExist(distDir)) {
    console.log('Electron already installed');
  } else {
    console.log('Installing Electron...');
    await runCommand('npm', ['install', '--no-save', 'electron'], {
      cwd: workDir,
    });
    if (!(await doesFileExist(distDir))) {
      throw new PreconditionError(
        `Electron installation did not produce ${distDir}`
      );
    }
  }

  ctx.paths.electronModule = await fs.realpath(moduleDir);
}
