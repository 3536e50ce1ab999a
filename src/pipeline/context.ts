import * as path from 'node:path';

import { PreconditionError } from '../errors';
import { BuildConfig, BuildContext, BuildOptions, PathKey } from '../types';
import { probeEnvironment } from './environment';

/**
 * Creates the per-run context. Probing the host happens here, before any
 * step touches the disk.
 */
export const createBuildContext = (
  config: BuildConfig,
  options: BuildOptions
): BuildContext => {
  const { arch, download } = probeEnvironment(config, options.hostArch);
  const workDir = path.resolve(options.workDir);
  return {
    config,
    options: { ...options, workDir, outputDir: path.resolve(options.outputDir) },
    arch,
    download,
    paths: {},
    terminalSupport: false,
  };
};

/**
 * A path an earlier step set. The runner checks step contracts, so a miss
 * here means the step list is wired wrong.
 */
export const requirePath = (ctx: BuildContext, key: PathKey): string => {
  const value = ctx.paths[key];
  if (!value) {
    throw new PreconditionError(`Build path "${key}" has not been set`);
  }
  return value;
};

export const requireVersion = (ctx: BuildContext): string => {
  if (!ctx.version) {
    throw new PreconditionError('The app version has not been determined yet');
  }
  return ctx.version;
};
