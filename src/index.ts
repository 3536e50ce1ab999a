#!/usr/bin/env tsx
import { Command } from 'commander';
import chalk from 'chalk';

import { loadConfig } from './config';
import { applyAppPatches } from './patches';
import { printPatchResults, runBuild } from './pipeline';
import { buildRpmPackage } from './rpm';
import { enableDebug, enableVerbose, isDebug } from './utils';

interface GlobalOptions {
  debug?: boolean;
  verbose?: boolean;
  config?: string;
}

interface BuildCommandOptions {
  workDir: string;
  arch?: string;
  allowUntestedVersion?: boolean;
  installDeps?: boolean;
  keepWorkDir?: boolean;
}

const handleError = (error: unknown): never => {
  if (error instanceof Error) {
    console.error(chalk.red(`Error: ${error.message}`));
    if (isDebug() && error.stack) {
      console.error(chalk.dim(error.stack));
    }
  } else {
    console.error(chalk.red(`Error: ${String(error)}`));
  }
  process.exit(1);
};

const main = async () => {
  const program = new Command();
  program
    .name('claude-desktop-rpm')
    .description(
      'Repackage the Claude Desktop Windows installer as a Fedora/RHEL RPM.'
    )
    .version('0.1.0')
    .option('-d, --debug', 'enable debug mode')
    .option('-v, --verbose', 'enable verbose debug mode (includes diffs)')
    .option('--config <file>', 'JSON file merged over the default config')
    .hook('preAction', command => {
      const options = command.opts<GlobalOptions>();
      if (options.verbose) {
        enableVerbose();
      } else if (options.debug) {
        enableDebug();
      }
    });

  program
    .command('build', { isDefault: true })
    .description('download, patch and package Claude Desktop')
    .option('--work-dir <dir>', 'working directory', './build')
    .option('--arch <arch>', 'override host architecture detection')
    .option(
      '--allow-untested-version',
      'build app versions outside the tested range'
    )
    .option('--install-deps', 'install build dependencies with dnf (needs root)')
    .option('--keep-work-dir', 'keep the working directory after the build')
    .action(async (options: BuildCommandOptions) => {
      const config = await loadConfig(program.opts<GlobalOptions>().config);
      await runBuild(config, {
        workDir: options.workDir,
        outputDir: process.cwd(),
        hostArch: options.arch,
        allowUntestedVersion: options.allowUntestedVersion ?? false,
        installDeps: options.installDeps ?? false,
        keepWorkDir: options.keepWorkDir ?? false,
      });
    });

  program
    .command('package')
    .description('build the RPM from an already staged app')
    .argument('<version>')
    .argument('<arch>')
    .argument('<workDir>')
    .argument('<stagingDir>')
    .argument('<packageName>')
    .argument('<maintainer>')
    .argument('<description>')
    .action(
      async (
        version: string,
        arch: string,
        workDir: string,
        stagingDir: string,
        packageName: string,
        maintainer: string,
        description: string
      ) => {
        await buildRpmPackage({
          version,
          arch,
          workDir,
          stagingDir,
          packageName,
          maintainer,
          description,
        });
      }
    );

  program
    .command('patch')
    .description('patch an extracted app.asar.contents directory in place')
    .argument('<contentsDir>')
    .action(async (contentsDir: string) => {
      const config = await loadConfig(program.opts<GlobalOptions>().config);
      printPatchResults(
        await applyAppPatches(contentsDir, { timing: config.patches })
      );
    });

  await program.parseAsync();
};

main().catch(handleError);
