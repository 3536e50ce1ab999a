// Please see the note about identifier patterns in ./rules
//
// Every patch is idempotent and fatal when its anchor is missing. Patches
// run against a PatchWorkspace, so all of them either apply (or confirm they
// were already applied) before a single file is written.

import { TrayPatchTiming } from '../types';
import { debug } from '../utils';
import { applyFrameFixShim, applyManifestEntryPoint } from './frameFix';
import { applyNativeFrame } from './windowFrame';
import {
  applyNativeStub,
  loadNativeStubSurface,
  NativeStubSurface,
} from './nativeStub';
import { MAIN_INDEX_FILE, writeTrayMutex } from './trayMutex';
import { writeLinuxCliPlatform, writeQuickWindowBlur } from './oneLineFixes';
import { applyTitleBarDetection } from './titleBar';
import { PatchWorkspace } from './workspace';

export { showDiff, globalReplace } from './patchDiffing';
export {
  escapeIdent,
  escapeRegExp,
  discoverIdentifiers,
  applyRewriteRules,
} from './rules';
export type { IdentifierRule, RewriteRule, Identifiers } from './rules';
export { PatchWorkspace } from './workspace';

// =============================================================================
// Patch Group and Result Types
// =============================================================================

export enum PatchGroup {
  WINDOW_FRAME = 'Window Frame',
  NATIVE_INTEGRATION = 'Native Integration',
  BEHAVIOR_FIXES = 'Behavior Fixes',
}

export interface PatchResult {
  id: string;
  name: string;
  group: PatchGroup;
  applied: boolean;
  details?: string;
  description?: string;
}

export interface PatchOptions {
  timing: TrayPatchTiming;
  stubSurface?: NativeStubSurface;
}

interface PatchContext {
  workspace: PatchWorkspace;
  timing: TrayPatchTiming;
  stubSurface: NativeStubSurface;
}

interface Patch {
  id: string;
  name: string;
  group: PatchGroup;
  description?: string;
  /** Returns details worth printing, or undefined. */
  fn: (ctx: PatchContext) => Promise<string | undefined>;
}

/**
 * Runs a pure string patch on one file of the workspace.
 */
const patchFile = async (
  workspace: PatchWorkspace,
  file: string,
  fn: (content: string) => string
): Promise<void> => {
  const content = await workspace.read(file);
  await workspace.write(file, fn(content));
};

export const PATCHES: Patch[] = [
  {
    id: 'frame-fix-shim',
    name: 'frame fix shim',
    group: PatchGroup.WINDOW_FRAME,
    fn: async ({ workspace }) =>
      `wraps ${await applyFrameFixShim(workspace)}`,
    description: 'BrowserWindow is forced to a native frame on Linux',
  },
  {
    id: 'manifest-entry-point',
    name: 'manifest entry point',
    group: PatchGroup.WINDOW_FRAME,
    fn: async ({ workspace }) => {
      await applyManifestEntryPoint(workspace);
      return undefined;
    },
    description: 'package.json main loads the frame fix first',
  },
  {
    id: 'native-frame',
    name: 'native frame flags',
    group: PatchGroup.WINDOW_FRAME,
    fn: async ({ workspace }) => {
      const changed = await applyNativeFrame(workspace);
      return changed.length > 0 ? changed.join(', ') : undefined;
    },
    description: 'frame:false and titleBarStyle are rewritten in the main bundle',
  },
  {
    id: 'title-bar-detection',
    name: 'title bar detection',
    group: PatchGroup.WINDOW_FRAME,
    fn: async ({ workspace }) => {
      await applyTitleBarDetection(workspace);
      return undefined;
    },
    description: 'The title bar is rendered on Linux',
  },
  {
    id: 'native-stub',
    name: 'native addon stub',
    group: PatchGroup.NATIVE_INTEGRATION,
    fn: async ({ workspace, stubSurface }) => {
      await applyNativeStub(workspace, stubSurface);
      return `${stubSurface.module} surface v${stubSurface.surfaceVersion}`;
    },
    description: 'Windows-only native calls become no-ops',
  },
  {
    id: 'tray-mutex',
    name: 'tray menu mutex',
    group: PatchGroup.BEHAVIOR_FIXES,
    fn: async ({ workspace, timing }) => {
      let details: string | undefined;
      await patchFile(workspace, MAIN_INDEX_FILE, content => {
        const result = writeTrayMutex(content, timing);
        details = `function=${result.ids.trayFn}, tray=${result.ids.trayVar}`;
        return result.content;
      });
      return details;
    },
    description: 'Tray rebuilds no longer overlap',
  },
  {
    id: 'quick-window-blur',
    name: 'quick window blur',
    group: PatchGroup.BEHAVIOR_FIXES,
    fn: async ({ workspace }) => {
      await patchFile(workspace, MAIN_INDEX_FILE, content =>
        writeQuickWindowBlur(content, MAIN_INDEX_FILE)
      );
      return undefined;
    },
    description: 'Quick window submit releases focus',
  },
  {
    id: 'linux-cli-platform',
    name: 'Linux Claude Code platform',
    group: PatchGroup.BEHAVIOR_FIXES,
    fn: async ({ workspace }) => {
      await patchFile(workspace, MAIN_INDEX_FILE, content =>
        writeLinuxCliPlatform(content, MAIN_INDEX_FILE)
      );
      return undefined;
    },
    description: 'Claude Code downloads the Linux build',
  },
];

/**
 * Applies every patch to an extracted app.asar tree and writes the result.
 *
 * If any patch throws, nothing is written.
 */
export const applyAppPatches = async (
  contentsDir: string,
  options: PatchOptions
): Promise<PatchResult[]> => {
  const workspace = new PatchWorkspace(contentsDir);
  const ctx: PatchContext = {
    workspace,
    timing: options.timing,
    stubSurface: options.stubSurface ?? (await loadNativeStubSurface()),
  };

  const results: PatchResult[] = [];
  for (const patch of PATCHES) {
    debug(`Applying patch: ${patch.name}`);
    const revision = workspace.revision;
    const details = await patch.fn(ctx);
    const applied = workspace.revision !== revision;

    results.push({
      id: patch.id,
      name: patch.name,
      group: patch.group,
      applied,
      details,
      description: patch.description,
    });
  }

  const written = await workspace.commit();
  debug(`Patched files: ${written.join(', ') || '(none)'}`);
  return results;
};
