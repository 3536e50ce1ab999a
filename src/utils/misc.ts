import * as fs from 'node:fs/promises';

let debugEnabled = false;
let verboseEnabled = false;

export const enableDebug = (): void => {
  debugEnabled = true;
};

export const enableVerbose = (): void => {
  debugEnabled = true;
  verboseEnabled = true;
};

/**
 * Debug output is on when --debug/--verbose was passed, or when DEBUG names
 * this tool (or is `*`).
 */
export const isDebug = (): boolean => {
  if (debugEnabled) return true;
  const env = process.env.DEBUG;
  return env === 'claude-desktop-rpm' || env === '*';
};

export const isVerbose = (): boolean => verboseEnabled;

export const debug = (message: unknown, ...optionalParams: unknown[]): void => {
  if (isDebug()) {
    console.log(message, ...optionalParams);
  }
};

export const verbose = (
  message: unknown,
  ...optionalParams: unknown[]
): void => {
  if (isVerbose()) {
    console.log(message, ...optionalParams);
  }
};

export const warn = (message: unknown, ...optionalParams: unknown[]): void => {
  console.warn(message, ...optionalParams);
};

export const doesFileExist = async (filePath: string): Promise<boolean> => {
  try {
    await fs.stat(filePath);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
};

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Recursively fills in anything `partial` leaves out with the value from
 * `defaults`. Arrays, primitives and explicit nulls in `partial` replace the
 * default outright.
 */
export function deepMergeWithDefaults<T>(partial: unknown, defaults: T): T;
export function deepMergeWithDefaults(
  partial: unknown,
  defaults: unknown
): unknown {
  if (partial === null || partial === undefined) {
    return defaults;
  }
  if (!isPlainObject(defaults) || !isPlainObject(partial)) {
    return partial;
  }

  const result: Record<string, unknown> = { ...defaults };
  for (const [key, value] of Object.entries(partial)) {
    result[key] =
      Object.hasOwn(defaults, key) && value !== null
        ? deepMergeWithDefaults(value, defaults[key])
        : value;
  }
  return result;
}
