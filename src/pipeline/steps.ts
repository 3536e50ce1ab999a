import fs from 'node:fs/promises';
import path from 'node:path';

import { PreconditionError } from '../errors';
import { BuildContext } from '../types';
import { patchAppArchive, repackAppArchive, unpackAppArchive } from './appArchive';
import { assertHomeDirectory, detectDistribution } from './environment';
import { extractIcons } from './icons';
import { extractInstaller, fetchInstaller } from './installer';
import { collectOutput, packageRpm } from './output';
import { Step } from './runner';
import { bundleElectron, installNodePty } from './runtime';
import {
  ensureElectron,
  ensureNodeRuntime,
  ensureSystemTools,
  installSystemPackages,
} from './toolchain';

async function prepareWorkDir(ctx: BuildContext): Promise<void> {
  const { workDir, outputDir } = ctx.options;
  const fromWork = path.relative(workDir, outputDir);
  const outside =
    fromWork === '..' ||
    fromWork.startsWith(`..${path.sep}`) ||
    path.isAbsolute(fromWork);
  if (!outside) {
    throw new PreconditionError(
      `Refusing to clear work directory ${workDir}: it contains the output directory ${outputDir}`
    );
  }

  // No incremental builds: leftovers from an earlier run (a second nupkg,
  // an old RPM) would be picked up by later steps.
  await fs.rm(workDir, { recursive: true, force: true });
  const stagingDir = path.join(workDir, 'electron-app');
  await fs.mkdir(stagingDir, { recursive: true });

  ctx.paths.workDir = workDir;
  ctx.paths.stagingDir = stagingDir;
}

/**
 * The build, in order. Each step's `requires` names what earlier steps
 * must have produced.
 */
export const BUILD_STEPS: readonly Step[] = [
  {
    id: 'environment',
    title: 'Checking Environment',
    requires: [],
    produces: [],
    run: async ctx => {
      console.log(`Architecture: ${ctx.arch}`);
      ctx.distribution = await detectDistribution();
      assertHomeDirectory();
    },
  },
  {
    id: 'prepare',
    title: 'Preparing Work Directory',
    requires: [],
    produces: ['workDir', 'stagingDir'],
    run: prepareWorkDir,
  },
  {
    id: 'node',
    title: 'Checking Node.js',
    requires: ['workDir'],
    produces: [],
    run: ensureNodeRuntime,
  },
  {
    id: 'system-tools',
    title: 'Checking Build Tools',
    requires: [],
    produces: [],
    run: async ctx => {
      if (ctx.options.installDeps) {
        await installSystemPackages();
      }
      await ensureSystemTools();
    },
  },
  {
    id: 'electron',
    title: 'Installing Electron',
    requires: ['workDir'],
    produces: ['electronModule'],
    run: ensureElectron,
  },
  {
    id: 'download',
    title: 'Downloading Claude Desktop',
    requires: ['workDir'],
    produces: ['installerExe'],
    run: fetchInstaller,
  },
  {
    id: 'extract-installer',
    title: 'Extracting Installer',
    requires: ['installerExe', 'workDir'],
    produces: ['extractDir', 'nupkg', 'resourcesDir', 'vendorExe'],
    run: extractInstaller,
  },
  {
    id: 'unpack-app',
    title: 'Unpacking app.asar',
    requires: ['resourcesDir', 'stagingDir'],
    produces: ['appAsar', 'appAsarUnpacked', 'asarContents'],
    run: unpackAppArchive,
  },
  {
    id: 'patch-app',
    title: 'Patching Application',
    requires: ['asarContents'],
    produces: [],
    run: patchAppArchive,
  },
  {
    id: 'node-pty',
    title: 'Installing node-pty for terminal support',
    requires: ['workDir', 'asarContents'],
    produces: [],
    run: installNodePty,
  },
  {
    id: 'repack-app',
    title: 'Repacking app.asar',
    requires: ['asarContents', 'appAsarUnpacked'],
    produces: ['appAsar'],
    run: repackAppArchive,
  },
  {
    id: 'bundle-electron',
    title: 'Bundling Electron',
    requires: ['electronModule', 'stagingDir', 'resourcesDir'],
    produces: [],
    run: bundleElectron,
  },
  {
    id: 'icons',
    title: 'Extracting Icons',
    requires: ['vendorExe', 'extractDir', 'workDir'],
    produces: ['iconsDir'],
    run: extractIcons,
  },
  {
    id: 'package',
    title: 'Building RPM Package',
    requires: ['workDir', 'stagingDir', 'appAsar', 'iconsDir'],
    produces: ['rpm'],
    run: packageRpm,
  },
  {
    id: 'output',
    title: 'Cleanup',
    requires: ['rpm'],
    produces: ['output'],
    run: collectOutput,
  },
];
