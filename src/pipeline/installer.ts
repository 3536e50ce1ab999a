import fs from 'node:fs';
import fsPromises from 'node:fs/promises';
import path from 'node:path';
import { open as yauzlOpen } from 'yauzl';

import { ArtifactNotFoundError, UnsupportedVersionError } from '../errors';
import { BuildContext, CompatibilityRange } from '../types';
import { debug, downloadFile, runCommand, warn } from '../utils';
import { requirePath } from './context';

const NUPKG_PATTERN = /^AnthropicClaude-.*\.nupkg$/;
const NUPKG_VERSION_PATTERN = /AnthropicClaude-(\d+\.\d+\.\d+)(?=-full|-arm64-full)/;

export const RESOURCES_SUBDIR = path.join('lib', 'net45', 'resources');
export const VENDOR_EXE_SUBDIR = path.join('lib', 'net45', 'claude.exe');

/**
 * Finds the single Squirrel payload archive at the top of `extractDir`.
 */
export async function findNupkg(extractDir: string): Promise<string> {
  const entries = await fsPromises.readdir(extractDir, { withFileTypes: true });
  const matches = entries
    .filter(entry => entry.isFile() && NUPKG_PATTERN.test(entry.name))
    .map(entry => entry.name)
    .sort();

  if (matches.length === 0) {
    throw new ArtifactNotFoundError(
      `Could not find AnthropicClaude nupkg file in ${extractDir}`
    );
  }
  if (matches.length > 1) {
    throw new ArtifactNotFoundError(
      `Found more than one nupkg file in ${extractDir}: ${matches.join(', ')}`
    );
  }
  return path.join(extractDir, matches[0]);
}

export const parseNupkgVersion = (nupkgPath: string): string => {
  const name = path.basename(nupkgPath);
  const match = name.match(NUPKG_VERSION_PATTERN);
  if (!match) {
    throw new ArtifactNotFoundError(
      `Could not extract version from nupkg filename: ${name}`
    );
  }
  return match[1];
};

const parseVersion = (version: string): number[] =>
  version.split('.').map(part => Number.parseInt(part, 10) || 0);

/**
 * Numeric comparison of dotted versions; missing parts count as 0.
 */
export const compareVersions = (a: string, b: string): number => {
  const left = parseVersion(a);
  const right = parseVersion(b);
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
};

export const isVersionInRange = (
  version: string,
  range: CompatibilityRange
): boolean =>
  compareVersions(version, range.minVersion) >= 0 &&
  compareVersions(version, range.maxVersion) < 0;

/**
 * The patches are written against a known range of app releases. Anything
 * outside it fails unless the caller opted in.
 */
export const assertSupportedVersion = (
  version: string,
  range: CompatibilityRange,
  allowUntested: boolean
): void => {
  if (isVersionInRange(version, range)) {
    return;
  }
  if (!allowUntested) {
    throw new UnsupportedVersionError(
      version,
      range.minVersion,
      range.maxVersion
    );
  }
  warn(
    `Warning: Claude Desktop ${version} is outside the tested range ` +
      `>=${range.minVersion} <${range.maxVersion}; patches may not apply`
  );
};

// NuGet packages store part names percent-encoded.
const decodeEntryName = (fileName: string): string => {
  try {
    return decodeURIComponent(fileName);
  } catch {
    return fileName;
  }
};

/**
 * Extracts a zip archive (the nupkg) into `destDir`.
 */
export async function extractZip(
  zipPath: string,
  destDir: string
): Promise<void> {
  debug(`Extracting ${zipPath} to ${destDir}`);
  const root = path.resolve(destDir);
  await fsPromises.mkdir(root, { recursive: true });

  await new Promise<void>((resolve, reject) => {
    yauzlOpen(zipPath, { lazyEntries: true }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(err ?? new Error(`Could not open ${zipPath}`));
        return;
      }

      zipfile.on('entry', entry => {
        if (entry.fileName.endsWith('/')) {
          zipfile.readEntry();
          return;
        }

        const outputPath = path.resolve(root, decodeEntryName(entry.fileName));
        if (!outputPath.startsWith(root + path.sep)) {
          reject(
            new Error(`Refusing to extract ${entry.fileName} outside ${root}`)
          );
          zipfile.close();
          return;
        }

        fsPromises
          .mkdir(path.dirname(outputPath), { recursive: true })
          .then(() => {
            zipfile.openReadStream(entry, (err, stream) => {
              if (err || !stream) {
                reject(err ?? new Error(`Could not read ${entry.fileName}`));
                return;
              }

              const writeStream = fs.createWriteStream(outputPath);
              stream.pipe(writeStream);

              writeStream.on('finish', () => {
                zipfile.readEntry();
              });

              writeStream.on('error', reject);
              stream.on('error', reject);
            });
          })
          .catch(reject);
      });

      zipfile.on('end', resolve);
      zipfile.on('error', reject);
      zipfile.readEntry();
    });
  });
}

export async function fetchInstaller(ctx: BuildContext): Promise<void> {
  const workDir = requirePath(ctx, 'workDir');
  const { url, filename } = ctx.download.installer;
  const installerExe = path.join(workDir, filename);

  console.log(`Downloading Claude Desktop installer for ${ctx.arch}...`);
  await downloadFile(url, installerExe);
  console.log(`Downloaded ${filename}`);
  ctx.paths.installerExe = installerExe;
}

/**
 * Unpacks the Squirrel installer, then its nupkg, and records the app
 * version from the nupkg's filename.
 */
export async function extractInstaller(ctx: BuildContext): Promise<void> {
  const installerExe = requirePath(ctx, 'installerExe');
  const extractDir = path.join(requirePath(ctx, 'workDir'), 'claude-extract');
  await fsPromises.mkdir(extractDir, { recursive: true });

  console.log('Extracting installer...');
  await runCommand('7z', ['x', '-y', installerExe, `-o${extractDir}`], {
    capture: true,
  });

  const nupkg = await findNupkg(extractDir);
  console.log(`Found nupkg: ${path.basename(nupkg)}`);

  const version = parseNupkgVersion(nupkg);
  console.log(`Detected Claude version: ${version}`);
  assertSupportedVersion(
    version,
    ctx.config.compatibility,
    ctx.options.allowUntestedVersion
  );

  await extractZip(nupkg, extractDir);
  console.log('Resources extracted from nupkg');

  ctx.version = version;
  ctx.paths.extractDir = extractDir;
  ctx.paths.nupkg = nupkg;
  ctx.paths.resourcesDir = path.join(extractDir, RESOURCES_SUBDIR);
  ctx.paths.vendorExe = path.join(extractDir, VENDOR_EXE_SUBDIR);
}
