// Watch-mode change detection.
//
// chokidar delivers raw notifications; EventCoalescer folds bursts for the same
// path into one logical change and releases them as a batch once the project
// has been quiet for delayMs (or maxWaitMs after the first pending change).
// When too many paths are pending, or the subscription reports an error, the
// buffer is dropped and an overflow is signalled so the caller rescans.

import { watch, type FSWatcher, type WatchOptions } from 'chokidar';
import type { ChangeEvent, ScheduledTask, Scheduler } from './types.js';
import { realScheduler } from './types.js';
import { shouldDescend, shouldIndex } from './ignore.js';
import { toProjectPath } from './scanner.js';
import type { Logger } from './logger.js';
import { errorMessage } from './errors.js';

/** Raw notifications carry no move information */
export type RawChange = { readonly kind: 'created' | 'modified' | 'deleted'; readonly path: string };

export type CoalescerOutput =
  | { readonly kind: 'batch'; readonly events: readonly ChangeEvent[] }
  | { readonly kind: 'overflow'; readonly reason: string };

export interface CoalescerOptions {
  readonly delayMs: number;
  /** Upper bound on how long the first pending change may wait; defaults to 4 x delayMs */
  readonly maxWaitMs?: number;
  /** Pending paths allowed before the buffer is dropped */
  readonly capacity: number;
  readonly scheduler?: Scheduler;
}

type PendingKind = RawChange['kind'];

/** Fold a new notification into what is already pending; null drops the path */
export function mergeChange(previous: PendingKind | undefined, next: PendingKind): PendingKind | null {
  if (previous === undefined) return next;
  switch (previous) {
    case 'created':
      return next === 'deleted' ? null : 'created';
    case 'modified':
      return next === 'deleted' ? 'deleted' : 'modified';
    case 'deleted':
      return next === 'deleted' ? 'deleted' : 'modified';
  }
}

export class EventCoalescer {
  private readonly pending = new Map<string, PendingKind>();
  private readonly scheduler: Scheduler;
  private readonly maxWaitMs: number;
  private quietTimer: ScheduledTask | null = null;
  private maxWaitTimer: ScheduledTask | null = null;
  private closed = false;

  constructor(
    private readonly options: CoalescerOptions,
    private readonly onOutput: (output: CoalescerOutput) => void,
  ) {
    this.scheduler = options.scheduler ?? realScheduler;
    this.maxWaitMs = options.maxWaitMs ?? options.delayMs * 4;
  }

  get size(): number {
    return this.pending.size;
  }

  push(change: RawChange): void {
    if (this.closed) return;
    const merged = mergeChange(this.pending.get(change.path), change.kind);
    this.pending.delete(change.path);
    if (merged !== null) this.pending.set(change.path, merged);

    if (this.pending.size > this.options.capacity) {
      this.signalOverflow(`more than ${this.options.capacity} pending changes`);
      return;
    }

    this.quietTimer?.cancel();
    this.quietTimer = this.scheduler.schedule(() => this.flush(), this.options.delayMs);
    if (this.maxWaitTimer === null) {
      this.maxWaitTimer = this.scheduler.schedule(() => this.flush(), this.maxWaitMs);
    }
  }

  /** Release everything pending as one batch */
  flush(): void {
    this.cancelTimers();
    if (this.pending.size === 0) return;
    const events = Array.from(this.pending, ([path, kind]): ChangeEvent => ({ kind, path }));
    this.pending.clear();
    this.onOutput({ kind: 'batch', events });
  }

  /** Drop the buffer and ask for a full rescan */
  signalOverflow(reason: string): void {
    this.cancelTimers();
    this.pending.clear();
    if (!this.closed) this.onOutput({ kind: 'overflow', reason });
  }

  close(): void {
    this.closed = true;
    this.cancelTimers();
    this.pending.clear();
  }

  private cancelTimers(): void {
    this.quietTimer?.cancel();
    this.maxWaitTimer?.cancel();
    this.quietTimer = null;
    this.maxWaitTimer = null;
  }
}

export type WatchSubscriber = (root: string, options: WatchOptions) => FSWatcher;

export interface ProjectWatcherOptions extends CoalescerOptions {
  readonly root: string;
  readonly logger: Logger;
  /** Opens the underlying subscription; chokidar's watch unless given */
  readonly subscribe?: WatchSubscriber;
}

/** Live subscription to one project root */
export class ProjectWatcher {
  private watcher: FSWatcher | null = null;
  private readonly coalescer: EventCoalescer;

  constructor(
    private readonly options: ProjectWatcherOptions,
    onOutput: (output: CoalescerOutput) => void,
  ) {
    this.coalescer = new EventCoalescer(options, onOutput);
  }

  get active(): boolean {
    return this.watcher !== null;
  }

  /** Resolves once the initial directory crawl is done and events are flowing */
  async start(): Promise<void> {
    if (this.watcher) return;
    const { root, logger, subscribe = watch } = this.options;
    const watcher = subscribe(root, {
      ignoreInitial: true,
      persistent: true,
      ignored: (candidate: string) => {
        const relative = toProjectPath(root, candidate);
        return relative !== '' && !shouldDescend(relative);
      },
    });
    this.watcher = watcher;

    const forward = (kind: RawChange['kind']) => (absolutePath: string) => {
      const relative = toProjectPath(root, absolutePath);
      if (shouldIndex(relative)) this.coalescer.push({ kind, path: relative });
    };
    watcher.on('add', forward('created'));
    watcher.on('change', forward('modified'));
    watcher.on('unlink', forward('deleted'));
    watcher.on('error', (error: unknown) => {
      logger.warn(`Watcher error under ${root}: ${errorMessage(error)}; falling back to a full rescan`);
      this.coalescer.signalOverflow('watch stream error');
    });

    await new Promise<void>(resolve => watcher.once('ready', () => resolve()));
  }

  async close(): Promise<void> {
    this.coalescer.close();
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) await watcher.close();
  }
}
