import chalk from 'chalk';
import fs from 'node:fs/promises';
import path from 'node:path';

import { buildRpmPackage } from '../rpm';
import { BuildContext } from '../types';
import { warn } from '../utils';
import { requirePath, requireVersion } from './context';

export async function packageRpm(ctx: BuildContext): Promise<void> {
  const { name, maintainer, description } = ctx.config.package;
  ctx.paths.rpm = await buildRpmPackage({
    version: requireVersion(ctx),
    arch: ctx.arch,
    workDir: requirePath(ctx, 'workDir'),
    stagingDir: requirePath(ctx, 'stagingDir'),
    packageName: name,
    maintainer,
    description,
  });
}

const moveFile = async (from: string, to: string): Promise<void> => {
  try {
    await fs.rename(from, to);
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'EXDEV')) {
      throw error;
    }
    await fs.copyFile(from, to);
    await fs.rm(from);
  }
};

/**
 * Moves the package out of the work dir, then removes the work dir unless
 * asked to keep it.
 */
export async function collectOutput(ctx: BuildContext): Promise<void> {
  const rpm = requirePath(ctx, 'rpm');
  const workDir = requirePath(ctx, 'workDir');
  const output = path.join(ctx.options.outputDir, path.basename(rpm));

  await fs.mkdir(ctx.options.outputDir, { recursive: true });
  await moveFile(rpm, output);
  ctx.paths.output = output;
  console.log(`Package created at: ${output}`);

  if (ctx.options.keepWorkDir) {
    console.log(`Keeping work directory ${workDir}`);
    return;
  }
  console.log(`Cleaning up intermediate build files in ${workDir}...`);
  try {
    await fs.rm(workDir, { recursive: true, force: true });
  } catch (error) {
    warn(
      `Warning: Cleanup of ${workDir} failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export function printNextSteps(ctx: BuildContext): void {
  const output = ctx.paths.output;
  console.log(chalk.bold.blue('\n====== Next Steps ======'));
  if (output) {
    const fromCwd = path.relative(process.cwd(), output);
    const relative = fromCwd.startsWith('..') ? output : `./${fromCwd}`;
    console.log('To install the RPM package, run:');
    console.log(`   ${chalk.bold.green(`sudo dnf install ${relative}`)}`);
    console.log(`   (or 'sudo rpm -i ${relative}')`);
  } else {
    console.log('RPM package file not found. Cannot provide installation instructions.');
  }
  if (!ctx.terminalSupport) {
    console.log(chalk.yellow('Built without node-pty: terminal features are unavailable.'));
  }
  console.log(chalk.bold.blue('======================'));
}
