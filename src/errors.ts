/**
 * Error types raised by the build pipeline.
 *
 * Every one of them aborts the run; the CLI entry point prints the message
 * and exits with status 1.
 */

export class UnsupportedArchitectureError extends Error {
  constructor(readonly hostArch: string) {
    super(
      `Unsupported architecture: ${hostArch}. Only x86_64 and aarch64 are supported.`
    );
    this.name = 'UnsupportedArchitectureError';
  }
}

export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

export class CommandError extends Error {
  constructor(
    readonly command: string,
    readonly args: string[],
    readonly status: number | null,
    readonly stderr: string
  ) {
    const rendered = [command, ...args].join(' ');
    const detail = stderr.trim() ? `\n${stderr.trim()}` : '';
    super(
      status === null
        ? `Command failed to start: ${rendered}${detail}`
        : `Command exited with code ${status}: ${rendered}${detail}`
    );
    this.name = 'CommandError';
  }
}

export class DownloadError extends Error {
  constructor(
    readonly url: string,
    reason: string
  ) {
    super(`Failed to download ${url}: ${reason}`);
    this.name = 'DownloadError';
  }
}

export class ArtifactNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArtifactNotFoundError';
  }
}

export class PatchAnchorError extends Error {
  constructor(
    readonly patchId: string,
    readonly anchor: string,
    readonly file?: string
  ) {
    super(
      `patch ${patchId}: could not find ${anchor}${file ? ` in ${file}` : ''}`
    );
    this.name = 'PatchAnchorError';
  }
}

export class StepContractError extends Error {
  constructor(
    readonly stepId: string,
    message: string
  ) {
    super(`step ${stepId}: ${message}`);
    this.name = 'StepContractError';
  }
}

export class UnsupportedVersionError extends Error {
  constructor(
    readonly version: string,
    readonly minVersion: string,
    readonly maxVersion: string
  ) {
    super(
      `Claude Desktop ${version} is outside the tested range >=${minVersion} <${maxVersion}. ` +
        `Pass --allow-untested-version to build it anyway.`
    );
    this.name = 'UnsupportedVersionError';
  }
}
