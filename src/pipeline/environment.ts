import * as fs from 'node:fs/promises';
import * as os from 'node:os';

import { PreconditionError, UnsupportedArchitectureError } from '../errors';
import {
  Architecture,
  BuildConfig,
  DownloadSelection,
  NodeArchitecture,
} from '../types';
import { debug, doesFileExist, warn } from '../utils';

const ARCH_ALIASES = new Map<string, Architecture>([
  ['x86_64', 'x86_64'],
  ['x64', 'x86_64'],
  ['amd64', 'x86_64'],
  ['aarch64', 'aarch64'],
  ['arm64', 'aarch64'],
]);

const NODE_ARCH: Record<Architecture, NodeArchitecture> = {
  x86_64: 'x64',
  aarch64: 'arm64',
};

const RELEASE_FILES = ['/etc/fedora-release', '/etc/redhat-release'];

/**
 * The host architecture as `uname -m` would print it.
 */
export const getHostArch = (): string => os.machine();

/**
 * Maps a host architecture to the package architecture tag. Accepts both
 * uname names and Node.js names.
 */
export const resolveArchitecture = (hostArch: string): Architecture => {
  const arch = ARCH_ALIASES.get(hostArch);
  if (!arch) {
    throw new UnsupportedArchitectureError(hostArch);
  }
  return arch;
};

export const selectDownloads = (
  arch: Architecture,
  config: BuildConfig
): DownloadSelection => ({
  installer: config.installers[arch],
  nodeArch: NODE_ARCH[arch],
});

export interface EnvironmentProbe {
  arch: Architecture;
  download: DownloadSelection;
}

/**
 * Resolves the architecture and what to download for it. Runs before the
 * work directory exists, so an unsupported host leaves nothing behind.
 */
export const probeEnvironment = (
  config: BuildConfig,
  hostArch: string = getHostArch()
): EnvironmentProbe => {
  const arch = resolveArchitecture(hostArch);
  debug(`Detected architecture: ${hostArch} -> ${arch}`);
  return { arch, download: selectDownloads(arch, config) };
};

/**
 * Reads the first release file that exists. Anything but Fedora/RHEL gets a
 * warning; the build still runs.
 */
export async function detectDistribution(
  releaseFiles: string[] = RELEASE_FILES
): Promise<string | undefined> {
  for (const file of releaseFiles) {
    if (await doesFileExist(file)) {
      const release = (await fs.readFile(file, 'utf8')).trim();
      debug(`Distribution: ${release}`);
      return release;
    }
  }
  warn('Warning: This tool is designed for Fedora/RHEL-based distributions');
  return undefined;
}

export const assertHomeDirectory = (): string => {
  const { username, homedir } = os.userInfo();
  if (!homedir) {
    throw new PreconditionError(
      `Could not determine home directory for user ${username}.`
    );
  }
  debug(`Running as user: ${username} (Home: ${homedir})`);
  return homedir;
};
