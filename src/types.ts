export type Architecture = 'x86_64' | 'aarch64';

export type NodeArchitecture = 'x64' | 'arm64';

export interface InstallerSource {
  url: string;
  filename: string;
}

export interface DownloadSelection {
  installer: InstallerSource;
  nodeArch: NodeArchitecture;
}

/**
 * Every path a pipeline step can require or produce.
 */
export type PathKey =
  | 'workDir'
  | 'stagingDir'
  | 'installerExe'
  | 'extractDir'
  | 'nupkg'
  | 'resourcesDir'
  | 'appAsar'
  | 'appAsarUnpacked'
  | 'asarContents'
  | 'electronModule'
  | 'nodePtyModule'
  | 'vendorExe'
  | 'iconsDir'
  | 'rpm'
  | 'output';

export type BuildPaths = Partial<Record<PathKey, string>>;

export interface PackageMetadata {
  name: string;
  maintainer: string;
  description: string;
}

export interface TrayPatchTiming {
  /** How long the tray handler stays locked after it starts. */
  trayMutexResetMs: number;
  /** Pause after destroying the old tray, before a new one is created. */
  trayCleanupDelayMs: number;
}

export interface CompatibilityRange {
  /** Inclusive. */
  minVersion: string;
  /** Exclusive. */
  maxVersion: string;
}

export interface BuildConfig {
  package: PackageMetadata;
  installers: Record<Architecture, InstallerSource>;
  node: {
    minMajor: number;
    pinnedVersion: string;
    distUrl: string;
  };
  patches: TrayPatchTiming;
  compatibility: CompatibilityRange;
}

export interface BuildOptions {
  workDir: string;
  /** Where the finished package is moved to. */
  outputDir: string;
  hostArch?: string;
  allowUntestedVersion: boolean;
  installDeps: boolean;
  keepWorkDir: boolean;
}

export interface BuildContext {
  config: BuildConfig;
  options: BuildOptions;
  arch: Architecture;
  download: DownloadSelection;
  distribution?: string;
  /** Unknown until the payload archive's filename has been parsed. */
  version?: string;
  paths: BuildPaths;
  /** False when node-pty failed to build; the package ships without it. */
  terminalSupport: boolean;
}
