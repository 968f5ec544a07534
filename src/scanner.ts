// Full-scan change detection: walk a project root, checksum every indexable
// file, and diff the result against what the store last synced.

import { promises as fs, type Dirent } from 'fs';
import crypto from 'crypto';
import path from 'path';
import type { ChangeEvent } from './types.js';
import type { FileRecord } from './store.js';
import { shouldDescend, shouldIndex } from './ignore.js';
import { errorMessage } from './errors.js';

export interface ScannedFile {
  readonly path: string;          // project-relative, '/'-separated
  readonly checksum: string;
  readonly mtimeMs: number;
  readonly size: number;
}

export interface ScanResult {
  readonly files: ReadonlyMap<string, ScannedFile>;
  /** Files seen in the tree that could not be read; never treated as deleted */
  readonly unreadable: ReadonlyMap<string, string>;
  /** Directories below the root that could not be listed; nothing under them is treated as deleted */
  readonly unreadableDirs: ReadonlyMap<string, string>;
}

export interface MovedPath {
  readonly from: string;
  readonly to: string;
}

export interface ScanReport {
  readonly created: readonly string[];
  readonly modified: readonly string[];
  readonly deleted: readonly string[];
  readonly moved: readonly MovedPath[];
}

export function computeChecksum(bytes: Uint8Array | string): string {
  return crypto.createHash('sha256').update(bytes).digest('hex');
}

export function toProjectPath(root: string, absolutePath: string): string {
  return path.relative(root, absolutePath).split(path.sep).join('/');
}

function byPath(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Walk root, pruning ignored directories, and checksum every indexable file */
export async function scanDirectory(root: string): Promise<ScanResult> {
  const files = new Map<string, ScannedFile>();
  const unreadable = new Map<string, string>();
  const unreadableDirs = new Map<string, string>();

  async function walk(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      // A root that cannot be listed is a project failure, not a path failure
      if (dir === root) throw error;
      unreadableDirs.set(toProjectPath(root, dir), errorMessage(error));
      return;
    }
    for (const entry of entries) {
      const absolute = path.join(dir, entry.name);
      const relative = toProjectPath(root, absolute);
      if (entry.isDirectory()) {
        if (shouldDescend(relative)) await walk(absolute);
        continue;
      }
      if (!entry.isFile() || !shouldIndex(relative)) continue;
      try {
        const [bytes, stat] = await Promise.all([fs.readFile(absolute), fs.stat(absolute)]);
        files.set(relative, {
          path: relative,
          checksum: computeChecksum(bytes),
          mtimeMs: stat.mtimeMs,
          size: stat.size,
        });
      } catch (error) {
        unreadable.set(relative, errorMessage(error));
      }
    }
  }

  await walk(root);
  return { files, unreadable, unreadableDirs };
}

/**
 * Compare a scan with stored (path, checksum) records. A path that vanished and
 * a new path with the same checksum as its last sync form a move. Output lists
 * are sorted so the same inputs always yield the same report.
 */
export function diffScan(scan: ScanResult, stored: ReadonlyMap<string, FileRecord>): ScanReport {
  const modified: string[] = [];
  const added: string[] = [];
  for (const [filePath, file] of scan.files) {
    const record = stored.get(filePath);
    if (!record) added.push(filePath);
    else if (record.checksum !== file.checksum) modified.push(filePath);
  }

  const hiddenPrefixes = Array.from(scan.unreadableDirs.keys(), dir => `${dir}/`);
  const missingByChecksum = new Map<string, string[]>();
  const missing: string[] = [];
  for (const [filePath, record] of stored) {
    if (scan.files.has(filePath) || scan.unreadable.has(filePath)) continue;
    if (hiddenPrefixes.some(prefix => filePath.startsWith(prefix))) continue;
    missing.push(filePath);
    if (record.checksum !== null) {
      const list = missingByChecksum.get(record.checksum) ?? [];
      list.push(filePath);
      missingByChecksum.set(record.checksum, list);
    }
  }
  for (const list of missingByChecksum.values()) list.sort(byPath);

  const moved: MovedPath[] = [];
  const movedFrom = new Set<string>();
  const created: string[] = [];
  for (const filePath of added.sort(byPath)) {
    const file = scan.files.get(filePath);
    const candidates = file ? missingByChecksum.get(file.checksum) : undefined;
    const from = candidates?.shift();
    if (from !== undefined) {
      moved.push({ from, to: filePath });
      movedFrom.add(from);
    } else {
      created.push(filePath);
    }
  }

  return {
    created,
    modified: modified.sort(byPath),
    deleted: missing.filter(p => !movedFrom.has(p)).sort(byPath),
    moved,
  };
}

/** Moves first (so identities survive), then deletions, creations, modifications */
export function reportToEvents(report: ScanReport): ChangeEvent[] {
  return [
    ...report.moved.map((m): ChangeEvent => ({ kind: 'moved', from: m.from, path: m.to })),
    ...report.deleted.map((p): ChangeEvent => ({ kind: 'deleted', path: p })),
    ...report.created.map((p): ChangeEvent => ({ kind: 'created', path: p })),
    ...report.modified.map((p): ChangeEvent => ({ kind: 'modified', path: p })),
  ];
}

export function isEmptyReport(report: ScanReport): boolean {
  return report.created.length + report.modified.length + report.deleted.length + report.moved.length === 0;
}
