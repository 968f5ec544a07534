// Folder listings built from the index rather than the disk, so they show
// exactly what sync has seen.

import picomatch from 'picomatch';
import type { Entity } from './types.js';
import { normalizeProjectPath } from './files.js';

export type DirectoryEntry =
  | { readonly kind: 'directory'; readonly name: string; readonly path: string }
  | { readonly kind: 'file'; readonly name: string; readonly path: string; readonly entity: Entity };

export interface DirectoryListingOptions {
  /** 1 lists immediate children only */
  readonly depth: number;
  /** Matched against file names; directories are walked but not listed */
  readonly glob?: string;
}

interface FolderNode {
  readonly path: string;
  readonly folders: Map<string, FolderNode>;
  readonly files: Entity[];
}

/** "" for the project root, else a project-relative folder without slashes at either end */
export function normalizeDirectory(dir: string): string {
  const trimmed = dir.replace(/\\/g, '/').trim().replace(/^\/+|\/+$/g, '');
  return trimmed === '' || trimmed === '.' ? '' : normalizeProjectPath(trimmed);
}

function childPath(parent: string, name: string): string {
  return parent === '' ? name : `${parent}/${name}`;
}

function buildTree(entities: readonly Entity[], dir: string): FolderNode {
  const root: FolderNode = { path: dir, folders: new Map(), files: [] };
  const prefix = dir === '' ? '' : `${dir}/`;
  for (const entity of entities) {
    if (!entity.filePath.startsWith(prefix)) continue;
    const parts = entity.filePath.slice(prefix.length).split('/');
    let node = root;
    for (const part of parts.slice(0, -1)) {
      let next = node.folders.get(part);
      if (!next) {
        next = { path: childPath(node.path, part), folders: new Map(), files: [] };
        node.folders.set(part, next);
      }
      node = next;
    }
    node.files.push(entity);
  }
  return root;
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function baseName(filePath: string): string {
  return filePath.slice(filePath.lastIndexOf('/') + 1);
}

/**
 * Entries under dir, folders before files at each level, each sorted by name
 * and followed by their own contents while depth allows.
 */
export function listDirectory(entities: readonly Entity[], dir: string, options: DirectoryListingOptions): DirectoryEntry[] {
  const matches = options.glob ? picomatch(options.glob, { dot: true }) : null;
  const entries: DirectoryEntry[] = [];

  const visit = (node: FolderNode, level: number): void => {
    if (level > options.depth) return;
    for (const name of Array.from(node.folders.keys()).sort(byName)) {
      const folder = node.folders.get(name);
      if (!folder) continue;
      if (!matches) entries.push({ kind: 'directory', name, path: folder.path });
      visit(folder, level + 1);
    }
    const files = [...node.files].sort((a, b) => byName(baseName(a.filePath), baseName(b.filePath)));
    for (const entity of files) {
      const name = baseName(entity.filePath);
      if (matches && !matches(name)) continue;
      entries.push({ kind: 'file', name, path: entity.filePath, entity });
    }
  };

  visit(buildTree(entities, dir), 1);
  return entries;
}
