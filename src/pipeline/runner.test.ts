import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import path from 'node:path';

import { DEFAULT_CONFIG } from '../config';
import { StepContractError } from '../errors';
import { makeTempDir, writeTree } from '@/tests/tempTree';
import { BuildContext } from '../types';
import { createBuildContext } from './context';
import { runStep, runSteps, Step } from './runner';
import { BUILD_STEPS } from './steps';

describe('runStep', () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let ctx: BuildContext;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
    ctx = createBuildContext(DEFAULT_CONFIG, {
      workDir: dir,
      outputDir: dir,
      hostArch: 'x86_64',
      allowUntestedVersion: false,
      installDeps: false,
      keepWorkDir: false,
    });
  });

  afterEach(async () => {
    await cleanup();
  });

  it('refuses to run a step whose inputs are not set', async () => {
    const run = vi.fn(async () => {});
    const step: Step = {
      id: 'needs-work-dir',
      title: 'Needs',
      requires: ['workDir'],
      produces: [],
      run,
    };

    await expect(runStep(ctx, step)).rejects.toThrow(
      'step needs-work-dir: missing input workDir (not set)'
    );
    expect(run).not.toHaveBeenCalled();
  });

  it('refuses inputs that do not exist on disk', async () => {
    ctx.paths.installerExe = path.join(dir, 'missing.exe');
    const step: Step = {
      id: 'extract',
      title: 'Extract',
      requires: ['installerExe'],
      produces: [],
      run: async () => {},
    };

    await expect(runStep(ctx, step)).rejects.toThrow(
      `step extract: missing input installerExe (${path.join(dir, 'missing.exe')} does not exist)`
    );
  });

  it('checks what the step produced', async () => {
    const step: Step = {
      id: 'package',
      title: 'Package',
      requires: [],
      produces: ['rpm'],
      run: async c => {
        c.paths.rpm = path.join(dir, 'out.rpm');
      },
    };

    await expect(runStep(ctx, step)).rejects.toThrow(StepContractError);

    await writeTree(dir, { 'out.rpm': '' });
    await expect(runStep(ctx, step)).resolves.toBeUndefined();
  });

  it('stops at the first failing step', async () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const second = vi.fn(async () => {});
    const steps: Step[] = [
      {
        id: 'first',
        title: 'First',
        requires: [],
        produces: [],
        run: async () => {
          throw new Error('boom');
        },
      },
      { id: 'second', title: 'Second', requires: [], produces: [], run: second },
    ];

    await expect(runSteps(ctx, steps)).rejects.toThrow('boom');
    expect(second).not.toHaveBeenCalled();
    spy.mockRestore();
  });
});

describe('BUILD_STEPS', () => {
  it('only requires paths an earlier step produces', () => {
    const produced = new Set<string>();
    for (const step of BUILD_STEPS) {
      for (const key of step.requires) {
        expect(produced.has(key), `${step.id} requires ${key}`).toBe(true);
      }
      step.produces.forEach(key => produced.add(key));
    }
  });

  it('ends with the package in the output directory', () => {
    expect(BUILD_STEPS.map(step => step.id).slice(-2)).toEqual([
      'package',
      'output',
    ]);
  });
});
