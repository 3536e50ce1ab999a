// The renderer hides its title bar with `if(!isWindows&&isMainWindow)return null;`.
// Dropping the negation keeps the title bar on Linux. The minifier names both
// flags, so any `if(!A&&B)` in MainWindowPage is rewritten.

import { ArtifactNotFoundError } from '../errors';
import { globalReplace } from './patchDiffing';
import { PatchWorkspace } from './workspace';

export const MAIN_WINDOW_ASSETS_DIR = '.vite/renderer/main_window/assets';
const MAIN_WINDOW_PAGE = /^MainWindowPage-.*\.js$/;

const NEGATED_CONDITION = /if\(!([a-zA-Z]+)\s*&&\s*([a-zA-Z]+)\)/g;

export const writeTitleBarDetection = (
  content: string,
  label = 'bundle'
): string =>
  globalReplace(
    label,
    content,
    NEGATED_CONDITION,
    match => `if(${match[1]}&&${match[2]})`
  ).content;

/**
 * Finds the one MainWindowPage chunk. Zero or several matches abort.
 */
export const findMainWindowPage = async (
  workspace: PatchWorkspace
): Promise<string> => {
  const matches = await workspace.list(MAIN_WINDOW_ASSETS_DIR, MAIN_WINDOW_PAGE);
  if (matches.length !== 1) {
    throw new ArtifactNotFoundError(
      `Expected exactly one MainWindowPage-*.js under ${MAIN_WINDOW_ASSETS_DIR}, found ${matches.length}` +
        (matches.length > 0 ? `:\n  ${matches.join('\n  ')}` : '')
    );
  }
  return matches[0];
};

export const applyTitleBarDetection = async (
  workspace: PatchWorkspace
): Promise<boolean> => {
  const file = await findMainWindowPage(workspace);
  const content = await workspace.read(file);
  return workspace.write(file, writeTitleBarDetection(content, file));
};
