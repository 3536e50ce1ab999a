import fs from 'node:fs/promises';
import path from 'node:path';

import { doesFileExist, warn } from '../utils';

/** hicolor size -> the PNG icotool writes for it. */
export const ICON_SOURCES: ReadonlyArray<readonly [number, string]> = [
  [16, 'claude_13_16x16x32.png'],
  [24, 'claude_11_24x24x32.png'],
  [32, 'claude_10_32x32x32.png'],
  [48, 'claude_8_48x48x32.png'],
  [64, 'claude_7_64x64x32.png'],
  [256, 'claude_6_256x256x32.png'],
];

export interface IconInstallResult {
  installed: number[];
  missing: number[];
}

/**
 * Installs each size that was extracted into `usrDir/share/icons/hicolor`.
 * A missing size is a warning.
 */
export async function installIcons(
  iconSourceDir: string,
  usrDir: string,
  packageName: string
): Promise<IconInstallResult> {
  const result: IconInstallResult = { installed: [], missing: [] };

  for (const [size, fileName] of ICON_SOURCES) {
    const iconDir = path.join(
      usrDir,
      'share',
      'icons',
      'hicolor',
      `${size}x${size}`,
      'apps'
    );
    await fs.mkdir(iconDir, { recursive: true });

    const source = path.join(iconSourceDir, fileName);
    if (!(await doesFileExist(source))) {
      warn(`Warning: Missing ${size}x${size} icon at ${source}`);
      result.missing.push(size);
      continue;
    }

    const target = path.join(iconDir, `${packageName}.png`);
    await fs.copyFile(source, target);
    await fs.chmod(target, 0o644);
    result.installed.push(size);
  }

  return result;
}
