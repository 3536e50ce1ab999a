import * as fs from 'node:fs/promises';

import { BuildConfig } from './types';
import { deepMergeWithDefaults, debug } from './utils';

export const CONFIG_ENV_VAR = 'CLAUDE_DESKTOP_RPM_CONFIG';

export const DEFAULT_CONFIG: BuildConfig = {
  package: {
    name: 'claude-desktop',
    maintainer: 'Claude Desktop Linux Maintainers',
    description: 'Claude Desktop for Linux',
  },
  installers: {
    x86_64: {
      url: 'https://downloads.claude.ai/releases/win32/x64/1.1.381/Claude-c2a39e9c82f5a4d51f511f53f532afd276312731.exe',
      filename: 'Claude-Setup-x64.exe',
    },
    aarch64: {
      url: 'https://downloads.claude.ai/releases/win32/arm64/1.1.381/Claude-c2a39e9c82f5a4d51f511f53f532afd276312731.exe',
      filename: 'Claude-Setup-arm64.exe',
    },
  },
  node: {
    minMajor: 20,
    pinnedVersion: '20.18.1',
    distUrl: 'https://nodejs.org/dist',
  },
  patches: {
    trayMutexResetMs: 500,
    trayCleanupDelayMs: 50,
  },
  compatibility: {
    minVersion: '1.1.0',
    maxVersion: '1.2.0',
  },
};

/**
 * Reads the optional JSON config file and fills in everything it leaves out
 * from DEFAULT_CONFIG. Without a path, falls back to $CLAUDE_DESKTOP_RPM_CONFIG.
 */
export async function loadConfig(configPath?: string): Promise<BuildConfig> {
  const file = configPath ?? process.env[CONFIG_ENV_VAR];
  if (!file) {
    return DEFAULT_CONFIG;
  }

  debug(`Reading config from ${file}`);
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(file, 'utf8'));
  } catch (error) {
    throw new Error(
      `Failed to read config file ${file}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const config = deepMergeWithDefaults(parsed, DEFAULT_CONFIG);
  assertNumericSettings(file, config);
  return config;
}

/**
 * The tray delays end up in the patched app's JavaScript, so anything but a
 * plain number is rejected here.
 */
function assertNumericSettings(file: string, config: BuildConfig): void {
  const numeric: Array<[string, unknown]> = [
    ['patches.trayMutexResetMs', config.patches.trayMutexResetMs],
    ['patches.trayCleanupDelayMs', config.patches.trayCleanupDelayMs],
    ['node.minMajor', config.node.minMajor],
  ];
  for (const [name, value] of numeric) {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new Error(
        `Invalid config file ${file}: ${name} must be a non-negative number, got ${JSON.stringify(value)}`
      );
    }
  }
}
