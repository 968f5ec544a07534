// Shared test helpers: deterministic time and drafts built from Markdown text.

import { mock } from 'node:test';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { parseMarkdown } from '../parser.js';
import { computeChecksum } from '../scanner.js';
import type { Clock, EntityDraft, ScheduledTask, Scheduler } from '../types.js';

/** Clock that advances one second every time it is read */
export function steppingClock(start = '2024-01-01T00:00:00.000Z'): Clock & { set(iso: string): void } {
  let current = new Date(start).getTime();
  const next = (): Date => {
    const date = new Date(current);
    current += 1000;
    return date;
  };
  return {
    now: next,
    isoNow: () => next().toISOString(),
    set: iso => { current = new Date(iso).getTime(); },
  };
}

/** Scheduler driven by advance(); nothing runs until the test moves time forward */
export class ManualScheduler implements Scheduler {
  private time = 0;
  private tasks: Array<{ at: number; fn: () => void; cancelled: boolean }> = [];

  now(): number {
    return this.time;
  }

  schedule(fn: () => void, delayMs: number): ScheduledTask {
    const task = { at: this.time + delayMs, fn, cancelled: false };
    this.tasks.push(task);
    return { cancel: () => { task.cancelled = true; } };
  }

  get pending(): number {
    return this.tasks.filter(t => !t.cancelled).length;
  }

  advance(ms: number): void {
    const target = this.time + ms;
    for (;;) {
      const due = this.tasks
        .filter(t => !t.cancelled && t.at <= target)
        .sort((a, b) => a.at - b.at)[0];
      if (!due) break;
      this.time = due.at;
      due.cancelled = true;
      due.fn();
    }
    this.time = target;
    this.tasks = this.tasks.filter(t => !t.cancelled);
  }
}

export function draftFor(filePath: string, text: string): EntityDraft {
  return { ...parseMarkdown(text, filePath), filePath, checksum: computeChecksum(text) };
}

export async function createTempDir(prefix: string): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function cleanupTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeNote(root: string, relative: string, text: string): Promise<void> {
  const abs = path.join(root, relative);
  await fs.mkdir(path.dirname(abs), { recursive: true });
  await fs.writeFile(abs, text, 'utf-8');
}

export const COFFEE_NOTE = '# Coffee\n\n- [method] Pour over is best #brewing\n- relates_to [[Tea]]\n';
export const TEA_NOTE = '# Tea\n\n- [fact] Green tea has less caffeine\n';

/** Make fs.promises.readdir fail with EACCES for directories with this name; undo with mock.restoreAll() */
export function denyDirectory(name: string): void {
  const readdir = fs.readdir;
  mock.method(fs, 'readdir', async (dir: string, options: { withFileTypes: true }) => {
    if (path.basename(dir) === name) {
      throw Object.assign(new Error(`EACCES: permission denied, scandir '${dir}'`), { code: 'EACCES' });
    }
    return readdir(dir, options);
  });
}

/** Poll until check() holds; rejects after timeoutMs */
export async function waitFor(check: () => boolean, timeoutMs = 5000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error(`Condition not met within ${timeoutMs}ms`);
    await new Promise(resolve => setTimeout(resolve, 20));
  }
}
