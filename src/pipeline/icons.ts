import path from 'node:path';

import { ArtifactNotFoundError } from '../errors';
import { BuildContext } from '../types';
import { doesFileExist, runCommand } from '../utils';
import { copyMatching } from './appArchive';
import { requirePath } from './context';

const ICON_GROUP_TYPE = '14';
const ICON_PNG_PATTERN = /^claude_.*\.png$/;

/**
 * Pulls the icon group out of the vendor exe and leaves one PNG per size in
 * the work dir, named like `claude_8_48x48x32.png`.
 */
export async function extractIcons(ctx: BuildContext): Promise<void> {
  const vendorExe = requirePath(ctx, 'vendorExe');
  const extractDir = requirePath(ctx, 'extractDir');
  const workDir = requirePath(ctx, 'workDir');

  if (!(await doesFileExist(vendorExe))) {
    throw new ArtifactNotFoundError(`Cannot find claude.exe at ${vendorExe}`);
  }

  console.log('Extracting application icons...');
  const icoFile = path.join(extractDir, 'claude.ico');
  await runCommand(
    'wrestool',
    ['-x', '-t', ICON_GROUP_TYPE, vendorExe, '-o', icoFile],
    { cwd: extractDir }
  );
  await runCommand('icotool', ['-x', icoFile], { cwd: extractDir });

  const copied = await copyMatching(extractDir, workDir, ICON_PNG_PATTERN);
  if (copied.length === 0) {
    throw new ArtifactNotFoundError(`icotool produced no PNGs in ${extractDir}`);
  }
  console.log(`Extracted ${copied.length} icons`);

  ctx.paths.iconsDir = workDir;
}
