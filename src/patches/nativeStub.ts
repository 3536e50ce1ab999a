// No-op replacement for the Windows-only native addon.
//
// The surface (function names, fixed return values, enums and classes) lives
// in data/claude-native-stub.json and carries its own surfaceVersion, so it
// can follow the app's expectations without touching the patch code.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import { PatchWorkspace } from './workspace';

type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface NativeStubFunction {
  name: string;
  /** Omitted for functions that return nothing. */
  returns?: JsonValue;
}

export interface NativeStubClass {
  name: string;
  /** Thrown by every async method. */
  message: string;
  asyncMethods: string[];
  methods: string[];
}

export interface NativeStubSurface {
  module: string;
  surfaceVersion: number;
  functions: NativeStubFunction[];
  enums: Record<string, Record<string, number>>;
  unavailableClasses: NativeStubClass[];
}

export const NATIVE_STUB_SURFACE_FILE = fileURLToPath(
  new URL('./data/claude-native-stub.json', import.meta.url)
);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(v => typeof v === 'string');

const isNumberRecord = (value: unknown): value is Record<string, number> =>
  isRecord(value) && Object.values(value).every(v => typeof v === 'number');

const isStubFunction = (value: unknown): value is NativeStubFunction =>
  isRecord(value) && typeof value.name === 'string';

const isStubClass = (value: unknown): value is NativeStubClass =>
  isRecord(value) &&
  typeof value.name === 'string' &&
  typeof value.message === 'string' &&
  isStringArray(value.asyncMethods) &&
  isStringArray(value.methods);

export const isNativeStubSurface = (
  value: unknown
): value is NativeStubSurface =>
  isRecord(value) &&
  typeof value.module === 'string' &&
  typeof value.surfaceVersion === 'number' &&
  Array.isArray(value.functions) &&
  value.functions.every(isStubFunction) &&
  isRecord(value.enums) &&
  Object.values(value.enums).every(isNumberRecord) &&
  Array.isArray(value.unavailableClasses) &&
  value.unavailableClasses.every(isStubClass);

export async function loadNativeStubSurface(
  file = NATIVE_STUB_SURFACE_FILE
): Promise<NativeStubSurface> {
  const parsed: unknown = JSON.parse(await fs.readFile(file, 'utf8'));
  if (!isNativeStubSurface(parsed)) {
    throw new Error(`Invalid native stub surface description: ${file}`);
  }
  return parsed;
}

const renderClass = (cls: NativeStubClass): string => {
  const members = [
    `  static isAvailable() {\n    return false;\n  }`,
    ...cls.asyncMethods.map(
      method =>
        `  async ${method}() {\n    throw new Error(${JSON.stringify(cls.message)});\n  }`
    ),
    ...cls.methods.map(method => `  ${method}() {}`),
  ];
  return `class ${cls.name} {\n${members.join('\n\n')}\n}`;
};

export const renderNativeStub = (surface: NativeStubSurface): string => {
  const enumNames = Object.keys(surface.enums);
  const classNames = surface.unavailableClasses.map(c => c.name);

  const sections = [
    `// Stub implementation of ${surface.module} for Linux (surface v${surface.surfaceVersion})`,
    ...enumNames.map(
      name =>
        `const ${name} = Object.freeze(${JSON.stringify(surface.enums[name])});`
    ),
    ...surface.unavailableClasses.map(renderClass),
  ];

  const exportsList = [
    ...surface.functions.map(fn =>
      fn.returns === undefined
        ? `  ${fn.name}: () => {},`
        : `  ${fn.name}: () => ${JSON.stringify(fn.returns)},`
    ),
    ...enumNames.map(name => `  ${name},`),
    ...classNames.map(name => `  ${name},`),
  ];

  return `${sections.join('\n\n')}\n\nmodule.exports = {\n${exportsList.join('\n')}\n};\n`;
};

export const nativeStubPath = (surface: NativeStubSurface): string =>
  path.posix.join('node_modules', surface.module, 'index.js');

export const applyNativeStub = async (
  workspace: PatchWorkspace,
  surface: NativeStubSurface
): Promise<void> => {
  await workspace.write(nativeStubPath(surface), renderNativeStub(surface));
};

/**
 * Writes the stub outside of a workspace, for the app.asar.unpacked copy.
 */
export const writeNativeStub = async (
  rootDir: string,
  surface: NativeStubSurface
): Promise<string> => {
  const target = path.join(rootDir, nativeStubPath(surface));
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, renderNativeStub(surface), 'utf8');
  return target;
};
