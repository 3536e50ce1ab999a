import chalk from 'chalk';

import { StepContractError } from '../errors';
import { BuildContext, PathKey } from '../types';
import { debug, doesFileExist } from '../utils';

export interface Step {
  id: string;
  title: string;
  /** Paths that must be set and exist before the step runs. */
  requires: PathKey[];
  /** Paths the step must set, existing on disk, by the time it returns. */
  produces: PathKey[];
  run: (ctx: BuildContext) => Promise<void>;
}

const missingPaths = async (
  ctx: BuildContext,
  keys: PathKey[]
): Promise<string[]> => {
  const missing: string[] = [];
  for (const key of keys) {
    const value = ctx.paths[key];
    if (!value) {
      missing.push(`${key} (not set)`);
    } else if (!(await doesFileExist(value))) {
      missing.push(`${key} (${value} does not exist)`);
    }
  }
  return missing;
};

export async function runStep(ctx: BuildContext, step: Step): Promise<void> {
  const unmet = await missingPaths(ctx, step.requires);
  if (unmet.length > 0) {
    throw new StepContractError(step.id, `missing input ${unmet.join(', ')}`);
  }

  await step.run(ctx);

  const unproduced = await missingPaths(ctx, step.produces);
  if (unproduced.length > 0) {
    throw new StepContractError(
      step.id,
      `did not produce ${unproduced.join(', ')}`
    );
  }
}

/**
 * Runs the steps in order, stopping at the first failure.
 */
export async function runSteps(
  ctx: BuildContext,
  steps: readonly Step[]
): Promise<void> {
  for (const step of steps) {
    console.log(chalk.bold.cyan(`--- ${step.title} ---`));
    debug(`step ${step.id}: requires [${step.requires.join(', ')}]`);
    await runStep(ctx, step);
  }
}
