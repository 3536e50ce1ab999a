// Native window frames in the main process bundle.
//
// The minifier writes `frame:false` as `frame:!1`, and sometimes folds it to
// `frame:!0` through inverted flags, so all three spellings are forced to
// `frame:true`. Any titleBarStyle is blanked.

import { PatchAnchorError } from '../errors';
import { globalReplace } from './patchDiffing';
import { PatchWorkspace } from './workspace';

export const MAIN_BUILD_DIR = '.vite/build';

const FRAME_PATTERNS: RegExp[] = [
  /\bframe\s*:\s*false\b/g,
  /\bframe\s*:\s*!0/g,
  /\bframe\s*:\s*!1/g,
];

const TITLE_BAR_STYLE_PATTERN = /\btitleBarStyle\s*:\s*[^,}]*/g;

export const writeNativeFrame = (content: string, label = 'bundle'): string => {
  let result = content;
  for (const pattern of FRAME_PATTERNS) {
    result = globalReplace(label, result, pattern, () => 'frame:true').content;
  }
  return globalReplace(
    label,
    result,
    TITLE_BAR_STYLE_PATTERN,
    () => 'titleBarStyle:""'
  ).content;
};

/**
 * Patches every script under .vite/build that mentions BrowserWindow.
 * Returns the files that changed.
 */
export const applyNativeFrame = async (
  workspace: PatchWorkspace
): Promise<string[]> => {
  const candidates = await workspace.list(MAIN_BUILD_DIR, /\.js$/);
  const targets: string[] = [];
  for (const file of candidates) {
    if ((await workspace.read(file)).includes('BrowserWindow')) {
      targets.push(file);
    }
  }

  if (targets.length === 0) {
    throw new PatchAnchorError(
      'native-frame',
      'a script mentioning BrowserWindow',
      MAIN_BUILD_DIR
    );
  }

  const changed: string[] = [];
  for (const file of targets) {
    const content = await workspace.read(file);
    const patched = writeNativeFrame(content, file);
    if (await workspace.write(file, patched)) {
      changed.push(file);
    }
  }
  return changed;
};
