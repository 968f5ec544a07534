// Filesystem access shared by the sync engine and the service layer.

import { promises as fs } from 'fs';
import path from 'path';
import { InvalidReferenceError, errnoCode } from './errors.js';

/** The filesystem operations the sync engine needs; swapped out in tests */
export interface FileSystemAccess {
  readFile(absolutePath: string): Promise<Uint8Array>;
  /** Replace a file's content atomically (temp file + rename) */
  writeFile(absolutePath: string, content: string): Promise<void>;
  exists(absolutePath: string): Promise<boolean>;
  /** Move a file, creating the destination directory */
  rename(fromPath: string, toPath: string): Promise<void>;
  /** Delete a file; a missing file is not an error */
  remove(absolutePath: string): Promise<void>;
  makeDirectory(absolutePath: string): Promise<void>;
}

export async function fileExists(absolutePath: string): Promise<boolean> {
  try {
    await fs.access(absolutePath);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') return false;
    throw error;
  }
}

/** Write via a temp file in the same directory, then rename over the target */
export async function writeFileAtomic(absolutePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(absolutePath), { recursive: true });
  const temp = `${absolutePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    await fs.writeFile(temp, content, 'utf-8');
    await fs.rename(temp, absolutePath);
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw error;
  }
}

export const nodeFileSystem: FileSystemAccess = {
  readFile: absolutePath => fs.readFile(absolutePath),
  writeFile: writeFileAtomic,
  exists: fileExists,
  rename: async (fromPath, toPath) => {
    await fs.mkdir(path.dirname(toPath), { recursive: true });
    await fs.rename(fromPath, toPath);
  },
  remove: absolutePath => fs.rm(absolutePath, { force: true }),
  makeDirectory: async absolutePath => {
    await fs.mkdir(absolutePath, { recursive: true });
  },
};

/**
 * Normalize a project-relative path ('/'-separated, no leading slash) and
 * reject anything that would escape the project root.
 */
export function normalizeProjectPath(relativePath: string): string {
  const normalized = path.posix.normalize(relativePath.replace(/\\/g, '/').trim()).replace(/^\/+/, '');
  if (normalized === '' || normalized === '.' || normalized === '..' || normalized.startsWith('../')) {
    throw new InvalidReferenceError(`Path "${relativePath}" is outside the project`);
  }
  return normalized;
}

export function absolutePath(root: string, relativePath: string): string {
  return path.join(root, ...normalizeProjectPath(relativePath).split('/'));
}
