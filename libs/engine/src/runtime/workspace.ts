/**
 * Filesystem workspace store
 *
 * One directory per slot under the workspace root, named exactly like the
 * slot's container. Files are written with mode 0600 since `.env` carries
 * the signer key.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { InvalidInputError } from '@slotwarden/ipc';
import type { WorkspaceEntry, WorkspaceStore } from './types';

const FILE_MODE = 0o600;
const DIR_MODE = 0o700;

export class FsWorkspaceStore implements WorkspaceStore {
  constructor(readonly root: string) {}

  pathFor(name: string): string {
    if (!name || name.includes('/') || name.includes('\\') || name === '.' || name === '..') {
      throw new InvalidInputError(`Invalid workspace name "${name}"`, 'workspace');
    }
    return path.join(this.root, name);
  }

  async materialize(name: string, files: Record<string, string>): Promise<string> {
    const dir = this.pathFor(name);
    await fs.mkdir(dir, { recursive: true, mode: DIR_MODE });
    for (const [file, content] of Object.entries(files)) {
      const target = path.join(dir, file);
      await fs.writeFile(target, content, { mode: FILE_MODE });
      // writeFile keeps the mode of an existing file
      await fs.chmod(target, FILE_MODE);
    }
    return dir;
  }

  async list(): Promise<WorkspaceEntry[]> {
    let entries;
    try {
      entries = await fs.readdir(this.root, { withFileTypes: true });
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
      throw err;
    }
    return entries
      .filter((e) => e.isDirectory())
      .map((e) => ({ name: e.name, path: path.join(this.root, e.name) }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async remove(dir: string): Promise<void> {
    const resolved = path.resolve(dir);
    if (path.dirname(resolved) !== path.resolve(this.root)) {
      throw new InvalidInputError(`Refusing to remove "${dir}" outside ${this.root}`, 'workspace');
    }
    await fs.rm(resolved, { recursive: true, force: true });
  }
}
