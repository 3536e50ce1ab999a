// Frame fix shim and entry point rewiring.
//
// The app creates frameless windows and draws its own Windows-style title
// bar. On Linux we want native decorations, so the entry point is swapped for
// a small file that first hooks require('electron') and then loads the
// original main module.

import { PatchAnchorError } from '../errors';
import { PatchWorkspace } from './workspace';

export const FRAME_FIX_WRAPPER_FILE = 'frame-fix-wrapper.js';
export const FRAME_FIX_ENTRY_FILE = 'frame-fix-entry.js';
export const NODE_PTY_RANGE = '^1.0.0';

export const renderFrameFixWrapper = (): string => `// Inject frame fix before main app loads
const Module = require('module');
const originalRequire = Module.prototype.require;

console.log('[Frame Fix] Wrapper loaded');

Module.prototype.require = function(id) {
  const module = originalRequire.apply(this, arguments);

  if (id === 'electron') {
    console.log('[Frame Fix] Intercepting electron module');
    const OriginalBrowserWindow = module.BrowserWindow;

    module.BrowserWindow = class BrowserWindowWithFrame extends OriginalBrowserWindow {
      constructor(options) {
        if (process.platform === 'linux') {
          options = options || {};
          const originalFrame = options.frame;
          options.frame = true;
          delete options.titleBarStyle;
          delete options.titleBarOverlay;
          console.log(\`[Frame Fix] Modified frame from \${originalFrame} to true\`);
        }
        super(options);
      }
    };

    // Static members only; the prototype chain comes from extends.
    for (const key of Object.getOwnPropertyNames(OriginalBrowserWindow)) {
      if (key !== 'prototype' && key !== 'length' && key !== 'name') {
        try {
          const descriptor = Object.getOwnPropertyDescriptor(OriginalBrowserWindow, key);
          if (descriptor) {
            Object.defineProperty(module.BrowserWindow, key, descriptor);
          }
        } catch (e) {
          console.log(\`[Frame Fix] Skipped static \${key}: \${e.message}\`);
        }
      }
    }
  }

  return module;
};
`;

export const renderFrameFixEntry = (originalMain: string): string => {
  const mainPath = /^\.\.?\//.test(originalMain)
    ? originalMain
    : `./${originalMain}`;
  return `// Load frame fix first
require('./${FRAME_FIX_WRAPPER_FILE}');
// Then load original main
require(${JSON.stringify(mainPath)});
`;
};

interface AppManifest {
  main?: unknown;
  originalMain?: unknown;
  optionalDependencies?: unknown;
  [key: string]: unknown;
}

const isManifest = (value: unknown): value is AppManifest =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseManifest = (text: string): AppManifest => {
  const parsed: unknown = JSON.parse(text);
  if (!isManifest(parsed)) {
    throw new PatchAnchorError('manifest-entry-point', 'a JSON object', 'package.json');
  }
  return parsed;
};

/**
 * The entry point the app shipped with, whether or not the manifest has
 * already been rewired.
 */
export const getOriginalMain = (manifestText: string): string => {
  const manifest = parseManifest(manifestText);
  if (typeof manifest.originalMain === 'string') {
    return manifest.originalMain;
  }
  if (typeof manifest.main === 'string' && manifest.main !== FRAME_FIX_ENTRY_FILE) {
    return manifest.main;
  }
  throw new PatchAnchorError('manifest-entry-point', 'the "main" field', 'package.json');
};

/**
 * Points `main` at the frame fix entry, keeps the original under
 * `originalMain`, and declares node-pty as an optional dependency.
 */
export const writeManifestEntryPoint = (manifestText: string): string => {
  const manifest = parseManifest(manifestText);
  const originalMain = getOriginalMain(manifestText);

  const optionalDependencies = isManifest(manifest.optionalDependencies)
    ? manifest.optionalDependencies
    : {};

  const updated: AppManifest = {
    ...manifest,
    main: FRAME_FIX_ENTRY_FILE,
    originalMain,
    optionalDependencies: {
      ...optionalDependencies,
      'node-pty': NODE_PTY_RANGE,
    },
  };
  return JSON.stringify(updated, null, 2);
};

export const applyFrameFixShim = async (
  workspace: PatchWorkspace
): Promise<string> => {
  const originalMain = getOriginalMain(await workspace.read('package.json'));
  await workspace.write(FRAME_FIX_WRAPPER_FILE, renderFrameFixWrapper());
  await workspace.write(FRAME_FIX_ENTRY_FILE, renderFrameFixEntry(originalMain));
  return originalMain;
};

export const applyManifestEntryPoint = async (
  workspace: PatchWorkspace
): Promise<void> => {
  const manifest = await workspace.read('package.json');
  await workspace.write('package.json', writeManifestEntryPoint(manifest));
};
