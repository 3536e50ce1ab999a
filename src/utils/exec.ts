import { spawn } from 'node:child_process';
import which from 'which';

import { CommandError } from '../errors';
import { debug } from './misc';

export interface RunCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Collect stdout/stderr instead of streaming them to the terminal. */
  capture?: boolean;
  /** Resolve with the exit status instead of throwing on a non-zero one. */
  allowNonZero?: boolean;
}

export interface CommandResult {
  status: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs an external command to completion.
 *
 * Throws CommandError when the process cannot start, or when it exits
 * non-zero and `allowNonZero` is unset.
 */
export async function runCommand(
  command: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<CommandResult> {
  debug(`$ ${[command, ...args].join(' ')}`);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: options.capture ? ['ignore', 'pipe', 'pipe'] : 'inherit',
    });

    let stdout = '',
      stderr = '';
    child.stdout?.on('data', (d: Buffer) => (stdout += d));
    child.stderr?.on('data', (d: Buffer) => (stderr += d));

    child.on('error', error => {
      reject(new CommandError(command, args, null, error.message));
    });

    child.on('close', code => {
      const status = code ?? 1;
      if (status !== 0 && !options.allowNonZero) {
        reject(new CommandError(command, args, status, stderr));
        return;
      }
      resolve({ status, stdout, stderr });
    });
  });
}

/**
 * Finds an executable on PATH using the `which` package.
 */
export async function resolveCommand(name: string): Promise<string | null> {
  try {
    return await which(name);
  } catch {
    debug(`resolveCommand: ${name} not found on PATH`);
    return null;
  }
}
