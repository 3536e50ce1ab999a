import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { ArtifactNotFoundError } from '../errors';
import { debug, doesFileExist } from '../utils';

interface BufferedFile {
  original: string | null;
  content: string;
}

/**
 * Buffered view of an extracted app.asar tree.
 *
 * Patches read and write through the workspace; nothing reaches the disk
 * until commit(), so a patch that fails leaves every file untouched.
 */
export class PatchWorkspace {
  private readonly files = new Map<string, BufferedFile>();

  /** Bumped on every write that changes a file. */
  revision = 0;

  constructor(readonly root: string) {}

  private key(relativePath: string): string {
    return path.posix.normalize(relativePath.split(path.sep).join('/'));
  }

  async exists(relativePath: string): Promise<boolean> {
    if (this.files.has(this.key(relativePath))) return true;
    return doesFileExist(path.join(this.root, relativePath));
  }

  async read(relativePath: string): Promise<string> {
    const key = this.key(relativePath);
    const buffered = this.files.get(key);
    if (buffered) return buffered.content;

    const absolute = path.join(this.root, key);
    if (!(await doesFileExist(absolute))) {
      throw new ArtifactNotFoundError(`Expected file not found: ${absolute}`);
    }
    const content = await fs.readFile(absolute, 'utf8');
    this.files.set(key, { original: content, content });
    return content;
  }

  /**
   * Buffers new content for a file. Returns true when that changes what the
   * file would hold.
   */
  async write(relativePath: string, content: string): Promise<boolean> {
    const key = this.key(relativePath);
    let buffered = this.files.get(key);
    if (!buffered) {
      const absolute = path.join(this.root, key);
      const original = (await doesFileExist(absolute))
        ? await fs.readFile(absolute, 'utf8')
        : null;
      buffered = { original, content: original ?? '' };
      this.files.set(key, buffered);
    }

    if (buffered.content === content && buffered.original !== null) {
      return false;
    }
    buffered.content = content;
    this.revision++;
    return true;
  }

  /**
   * Lists files (relative, `/`-separated) under `directory` whose base name
   * matches `namePattern`.
   */
  async list(directory: string, namePattern: RegExp): Promise<string[]> {
    const base = path.join(this.root, directory);
    if (!(await doesFileExist(base))) {
      return [];
    }

    const found: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile() && namePattern.test(entry.name)) {
          found.push(this.key(path.relative(this.root, full)));
        }
      }
    };
    await walk(base);
    return found.sort();
  }

  /** Files whose buffered content differs from what is on disk. */
  pendingWrites(): string[] {
    return [...this.files.entries()]
      .filter(([, file]) => file.content !== file.original)
      .map(([key]) => key);
  }

  async commit(): Promise<string[]> {
    const written = this.pendingWrites();
    for (const key of written) {
      const file = this.files.get(key);
      if (!file) continue;
      const absolute = path.join(this.root, key);
      await fs.mkdir(path.dirname(absolute), { recursive: true });
      await fs.writeFile(absolute, file.content, 'utf8');
      file.original = file.content;
      debug(`Wrote ${absolute}`);
    }
    return written;
  }
}
