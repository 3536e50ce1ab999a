import { BuildConfig, BuildContext, BuildOptions } from '../types';
import { createBuildContext } from './context';
import { printNextSteps } from './output';
import { runSteps } from './runner';
import { BUILD_STEPS } from './steps';

export { createBuildContext, requirePath } from './context';
export { runSteps, runStep } from './runner';
export type { Step } from './runner';
export { BUILD_STEPS } from './steps';
export { printPatchResults } from './appArchive';

/**
 * Runs the whole build. Rejects on the first failing step.
 */
export async function runBuild(
  config: BuildConfig,
  options: BuildOptions
): Promise<BuildContext> {
  const ctx = createBuildContext(config, options);
  await runSteps(ctx, BUILD_STEPS);
  printNextSteps(ctx);
  return ctx;
}
