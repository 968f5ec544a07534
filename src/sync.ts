// Sync orchestrator: keeps the knowledge store consistent with project files.
//
// One ProjectWorker per project. Each worker owns a single-consumer queue, so
// full scans and watch batches for a project never overlap, while different
// projects sync independently. Each change is applied in its own store
// transaction; a failing file is recorded and the batch moves on. Only a
// StoreConsistencyError stops a worker, which then refuses writes until reset.
//
//   idle -> scanning -> applying -> watching      error reachable from any state

import type { ChangeEvent, Clock, EntityContent, Entity, Project, Scheduler, SyncState, SyncStatus } from './types.js';
import { realClock, realScheduler, frontmatterString } from './types.js';
import type { KnowledgeStore } from './store.js';
import { parseKnowledge, fileEntityContent, splitFrontmatter, parseFrontmatter, updateFrontmatter, decodeText } from './parser.js';
import { isMarkdownPath } from './ignore.js';
import { scanDirectory, diffScan, reportToEvents, computeChecksum } from './scanner.js';
import { ProjectWatcher, type CoalescerOutput } from './watcher.js';
import { nodeFileSystem, absolutePath, type FileSystemAccess } from './files.js';
import { silentLogger, type Logger } from './logger.js';
import {
  StoreConsistencyError,
  SyncCancelledError,
  TransientIOError,
  WorkerHaltedError,
  errnoCode,
  errorMessage,
} from './errors.js';

export interface SyncSettings {
  /** Quiet window before a burst of file events is applied */
  readonly syncDelayMs: number;
  /** Pending watch paths allowed before falling back to a full rescan */
  readonly maxPendingEvents: number;
  /** A full scan yields after this long and continues in a follow-up task */
  readonly maxScanDurationMs: number;
  readonly ioRetryAttempts: number;
  readonly ioRetryDelayMs: number;
  /** Derive a new permalink from the destination path when a file moves */
  readonly updatePermalinksOnMove: boolean;
  /** Write resolved permalinks back into frontmatter */
  readonly writePermalinks: boolean;
}

export const DEFAULT_SYNC_SETTINGS: SyncSettings = {
  syncDelayMs: 1000,
  maxPendingEvents: 10_000,
  maxScanDurationMs: 300_000,
  ioRetryAttempts: 3,
  ioRetryDelayMs: 50,
  updatePermalinksOnMove: false,
  writePermalinks: true,
};

export type ApplyOutcome = 'written' | 'unchanged' | 'moved' | 'deleted' | 'failed';

export interface ScanSummary {
  readonly created: number;
  readonly modified: number;
  readonly deleted: number;
  readonly moved: number;
  readonly failed: number;
  readonly resolvedRelations: number;
  readonly durationMs: number;
  /** True when the scan hit maxScanDurationMs and queued a continuation */
  readonly truncated: boolean;
}

/** Errnos worth retrying: the file is busy or briefly inaccessible */
const RETRYABLE_CODES = new Set(['EBUSY', 'EAGAIN', 'EACCES', 'EPERM', 'EMFILE', 'ENFILE']);

type ReadResult =
  | { readonly kind: 'read'; readonly bytes: Uint8Array }
  | { readonly kind: 'missing' }
  | { readonly kind: 'failed'; readonly error: TransientIOError };

interface Extracted {
  readonly content: EntityContent;
  readonly markdown: boolean;
  readonly degraded: boolean;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/** Single-consumer task queue. Cancelling drops tasks that have not started. */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private generation = 0;

  constructor(private readonly onCancelled: () => Error) {}

  get size(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    const generation = this.generation;
    this.pending++;
    const result = this.tail.then(async () => {
      try {
        if (generation !== this.generation) throw this.onCancelled();
        return await task();
      } finally {
        this.pending--;
      }
    });
    this.tail = result.then(() => undefined, () => undefined);
    return result;
  }

  cancelPending(): void {
    this.generation++;
  }

  /** Resolves when everything queued so far has settled */
  idle(): Promise<void> {
    return this.tail;
  }
}

export interface ProjectWorkerOptions {
  readonly project: Project;
  readonly store: KnowledgeStore;
  readonly settings: SyncSettings;
  readonly logger: Logger;
  readonly clock: Clock;
  readonly scheduler: Scheduler;
  readonly fileSystem: FileSystemAccess;
  readonly sleep: (ms: number) => Promise<void>;
  readonly onHalt?: (project: Project, error: StoreConsistencyError) => void;
}

export class ProjectWorker {
  private state: SyncState = 'idle';
  private readonly queue: SerialQueue;
  private watcher: ProjectWatcher | null = null;
  private watchRequested = false;
  private stopped = false;
  private processed = 0;
  private unchanged = 0;
  private degraded = 0;
  private skipped = 0;
  private readonly failedPaths = new Set<string>();
  private lastScanAt: string | null = null;
  private lastScanDurationMs: number | null = null;
  private lastError: string | null = null;

  constructor(private readonly options: ProjectWorkerOptions) {
    this.queue = new SerialQueue(() => new SyncCancelledError(options.project.name));
  }

  get project(): Project {
    return this.options.project;
  }

  get currentState(): SyncState {
    return this.state;
  }

  private get log(): Logger {
    return this.options.logger;
  }

  private get projectId(): number {
    return this.options.project.id;
  }

  private abs(relativePath: string): string {
    return absolutePath(this.options.project.rootPath, relativePath);
  }

  /** Reconcile once with a full scan, then (optionally) keep watching */
  async start(watch: boolean): Promise<ScanSummary> {
    this.stopped = false;
    this.watchRequested = watch;
    // Subscribe first so edits made during the scan are queued behind it
    if (watch) await this.startWatching();
    return this.scan();
  }

  /** Queue a full-scan reconciliation */
  scan(): Promise<ScanSummary> {
    return this.enqueue(() => this.runFullScan());
  }

  /** Queue a batch of changes; resolves with one outcome per applied event */
  applyChanges(events: readonly ChangeEvent[]): Promise<ApplyOutcome[]> {
    return this.enqueue(() => this.runBatch(events));
  }

  status(): SyncStatus {
    return {
      project: this.options.project.name,
      state: this.state,
      watching: this.watcher?.active ?? false,
      processed: this.processed,
      unchanged: this.unchanged,
      degraded: this.degraded,
      skipped: this.skipped,
      failedPaths: Array.from(this.failedPaths).sort(),
      pendingTasks: this.queue.size,
      lastScanAt: this.lastScanAt,
      lastScanDurationMs: this.lastScanDurationMs,
      lastError: this.lastError,
    };
  }

  /** Resolves once every task queued so far has settled */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  /** Leave the error state and reconcile again from a full scan */
  async reset(): Promise<ScanSummary> {
    this.queue.cancelPending();
    await this.queue.idle();
    this.state = 'idle';
    this.lastError = null;
    this.failedPaths.clear();
    this.log.info('Sync reset');
    return this.start(this.watchRequested);
  }

  /** Stop watching and drop queued work; the in-flight change finishes first */
  async stop(): Promise<void> {
    this.stopped = true;
    this.queue.cancelPending();
    await this.stopWatching();
    await this.queue.idle();
    if (this.state !== 'error') this.state = 'idle';
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    if (this.state === 'error') {
      return Promise.reject(new WorkerHaltedError(this.options.project.name, this.lastError ?? 'store failure'));
    }
    return this.queue.run(async () => {
      if (this.state === 'error') {
        throw new WorkerHaltedError(this.options.project.name, this.lastError ?? 'store failure');
      }
      return task();
    });
  }

  private restingState(): SyncState {
    return this.watcher?.active ? 'watching' : 'idle';
  }

  private handleTaskError(error: unknown): void {
    if (error instanceof StoreConsistencyError) {
      this.halt(error);
      return;
    }
    if (error instanceof SyncCancelledError) return;
    this.lastError = errorMessage(error);
    this.state = this.restingState();
  }

  private halt(error: StoreConsistencyError): void {
    this.state = 'error';
    this.lastError = error.message;
    this.log.error(`Store failure, sync halted until reset: ${error.message}`);
    this.options.onHalt?.(this.options.project, error);
    this.stopWatching().catch(closeError => {
      this.log.warn(`Could not close watcher: ${errorMessage(closeError)}`);
    });
  }

  // --- Watch mode ---

  private async startWatching(): Promise<void> {
    if (this.watcher) return;
    const { settings, project, scheduler } = this.options;
    const watcher = new ProjectWatcher(
      {
        root: project.rootPath,
        delayMs: settings.syncDelayMs,
        capacity: settings.maxPendingEvents,
        scheduler,
        logger: this.log,
      },
      output => this.onWatchOutput(output),
    );
    await watcher.start();
    this.watcher = watcher;
    if (this.state === 'idle') this.state = 'watching';
    this.log.debug(`Watching ${project.rootPath}`);
  }

  private async stopWatching(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) await watcher.close();
  }

  private onWatchOutput(output: CoalescerOutput): void {
    if (this.state === 'error' || this.stopped) return;
    const task = output.kind === 'overflow'
      ? async () => {
          this.log.warn(`Change stream overflowed (${output.reason}); running a full rescan`);
          await this.runFullScan();
        }
      : async () => {
          await this.runBatch(output.events);
        };
    this.enqueue(task).catch(error => this.logTaskFailure(error));
  }

  private logTaskFailure(error: unknown): void {
    if (error instanceof SyncCancelledError || error instanceof WorkerHaltedError) {
      this.log.debug(errorMessage(error));
      return;
    }
    this.log.error(`Sync task failed: ${errorMessage(error)}`);
  }

  // --- Full scan ---

  private async runFullScan(): Promise<ScanSummary> {
    const { store, settings, clock, project } = this.options;
    const started = clock.now().getTime();
    this.state = 'scanning';
    try {
      const scan = await scanDirectory(project.rootPath);
      for (const [filePath, reason] of scan.unreadable) this.markFailed(filePath, reason);
      for (const [dir, reason] of scan.unreadableDirs) this.markFailed(`${dir}/`, reason);

      const report = diffScan(scan, store.fileState(this.projectId));
      const events = reportToEvents(report);
      this.state = 'applying';

      let failed = 0;
      let applied = 0;
      let truncated = false;
      for (const event of events) {
        if (this.stopped) break;
        if (applied > 0 && clock.now().getTime() - started > settings.maxScanDurationMs) {
          truncated = true;
          break;
        }
        if (await this.applyGuarded(event) === 'failed') failed++;
        applied++;
      }

      const resolvedRelations = store.resolveDanglingRelations(this.projectId);
      const durationMs = clock.now().getTime() - started;
      this.lastScanAt = clock.isoNow();
      this.lastScanDurationMs = durationMs;

      if (truncated) {
        this.log.info(`Scan yielded after ${durationMs}ms with ${events.length - applied} change(s) left; continuing`);
        this.enqueue(() => this.runFullScan()).catch(error => this.logTaskFailure(error));
      } else if (events.length > 0) {
        this.log.info(
          `Scan applied ${applied} change(s): ${report.created.length} created, ${report.modified.length} modified, ` +
          `${report.deleted.length} deleted, ${report.moved.length} moved (${durationMs}ms)`,
        );
      }

      this.state = this.restingState();
      return {
        created: report.created.length,
        modified: report.modified.length,
        deleted: report.deleted.length,
        moved: report.moved.length,
        failed: failed + scan.unreadable.size + scan.unreadableDirs.size,
        resolvedRelations,
        durationMs,
        truncated,
      };
    } catch (error) {
      this.handleTaskError(error);
      throw error;
    }
  }

  // --- Watch batches ---

  private async runBatch(events: readonly ChangeEvent[]): Promise<ApplyOutcome[]> {
    this.state = 'applying';
    try {
      const outcomes: ApplyOutcome[] = [];
      for (const event of await this.pairMoves(events)) {
        if (this.stopped) break;
        outcomes.push(await this.applyGuarded(event));
      }
      this.state = this.restingState();
      return outcomes;
    } catch (error) {
      this.handleTaskError(error);
      throw error;
    }
  }

  /**
   * A deletion and a creation in the same batch whose content matches the
   * deleted entity's last sync are a move. The move takes the deletion's place.
   */
  private async pairMoves(events: readonly ChangeEvent[]): Promise<readonly ChangeEvent[]> {
    const deletions = events.filter(e => e.kind === 'deleted');
    const creations = events.filter(e => e.kind === 'created');
    if (deletions.length === 0 || creations.length === 0) return events;

    const deletedByChecksum = new Map<string, string[]>();
    for (const deletion of deletions) {
      const entity = this.options.store.getEntityByPath(this.projectId, deletion.path);
      if (!entity?.checksum || await this.options.fileSystem.exists(this.abs(deletion.path))) continue;
      const list = deletedByChecksum.get(entity.checksum) ?? [];
      list.push(deletion.path);
      deletedByChecksum.set(entity.checksum, list);
    }
    if (deletedByChecksum.size === 0) return events;

    const moveTarget = new Map<string, string>();
    const pairedCreations = new Set<string>();
    for (const creation of creations) {
      const read = await this.readWithRetry(creation.path);
      if (read.kind !== 'read') continue;
      const from = deletedByChecksum.get(computeChecksum(read.bytes))?.shift();
      if (from === undefined) continue;
      moveTarget.set(from, creation.path);
      pairedCreations.add(creation.path);
    }

    return events.flatMap((event): ChangeEvent[] => {
      const target = event.kind === 'deleted' ? moveTarget.get(event.path) : undefined;
      if (target !== undefined) return [{ kind: 'moved', from: event.path, path: target }];
      if (event.kind === 'created' && pairedCreations.has(event.path)) return [];
      return [event];
    });
  }

  // --- Applying one change ---

  /** Apply one change; anything short of a store failure is recorded and swallowed into 'failed' */
  private async applyGuarded(event: ChangeEvent): Promise<ApplyOutcome> {
    try {
      const outcome = await this.applyEvent(event);
      this.processed++;
      if (outcome === 'unchanged') this.unchanged++;
      return outcome;
    } catch (error) {
      if (error instanceof StoreConsistencyError) throw error;
      this.markFailed(event.path, errorMessage(error));
      return 'failed';
    }
  }

  private markFailed(filePath: string, reason: string): void {
    this.failedPaths.add(filePath);
    this.skipped++;
    this.log.warn(`Skipped ${filePath}: ${reason}`);
  }

  private applyEvent(event: ChangeEvent): Promise<ApplyOutcome> {
    switch (event.kind) {
      case 'deleted':
        return this.applyDeletion(event.path);
      case 'moved':
        return this.applyMove(event.from, event.path);
      case 'created':
      case 'modified':
        return this.applyContent(event.path, true);
    }
  }

  private async applyDeletion(filePath: string): Promise<ApplyOutcome> {
    // Deleted and recreated before we got here: index what is there now
    if (await this.options.fileSystem.exists(this.abs(filePath))) {
      return this.applyContent(filePath, false);
    }
    this.failedPaths.delete(filePath);
    const removed = this.options.store.deleteEntityByPath(this.projectId, filePath);
    if (!removed) return 'unchanged';
    this.log.debug(`Removed ${filePath}`);
    return 'deleted';
  }

  private async applyMove(from: string, to: string): Promise<ApplyOutcome> {
    const { store, settings } = this.options;
    // An entity already bound to the destination was overwritten by the moved file
    const result = store.moveEntity(this.projectId, from, to, {
      regeneratePermalink: settings.updatePermalinksOnMove,
      replaceOccupant: true,
    });
    if (!result.moved) return this.applyContent(to, true);

    this.failedPaths.delete(from);
    this.log.debug(`Moved ${from} -> ${to}`);
    if (result.entity.checksum !== null && isMarkdownPath(to)) {
      await this.writeBackPermalink(to, result.entity, result.entity.checksum);
    }
    return 'moved';
  }

  private async applyContent(filePath: string, deleteIfMissing: boolean): Promise<ApplyOutcome> {
    const { store } = this.options;
    const read = await this.readWithRetry(filePath);
    if (read.kind === 'missing') {
      return deleteIfMissing ? this.applyDeletion(filePath) : 'unchanged';
    }
    if (read.kind === 'failed') throw read.error;

    const checksum = computeChecksum(read.bytes);
    const existing = store.getEntityByPath(this.projectId, filePath);
    if (existing && existing.checksum === checksum) {
      this.failedPaths.delete(filePath);
      return 'unchanged';
    }
    if (!existing && await this.adoptMovedEntity(filePath, checksum)) {
      return 'moved';
    }

    const extracted = this.extract(filePath, read.bytes);
    const result = store.upsertEntity(this.projectId, { ...extracted.content, filePath, checksum });
    this.failedPaths.delete(filePath);
    if (extracted.degraded) this.degraded++;
    this.log.debug(`${result.created ? 'Indexed' : 'Updated'} ${filePath} as ${result.entity.permalink}`);

    if (extracted.markdown) await this.writeBackPermalink(filePath, result.entity, checksum);
    return 'written';
  }

  /**
   * A new path whose bytes match an entity whose own file is gone is that
   * entity, moved. Catches moves whose halves landed in different batches.
   */
  private async adoptMovedEntity(filePath: string, checksum: string): Promise<boolean> {
    const { store, settings, fileSystem } = this.options;
    for (const candidate of store.findByChecksum(this.projectId, checksum)) {
      if (candidate.filePath === filePath) continue;
      if (await fileSystem.exists(this.abs(candidate.filePath))) continue;
      const result = store.moveEntity(this.projectId, candidate.filePath, filePath, {
        checksum,
        regeneratePermalink: settings.updatePermalinksOnMove,
      });
      if (!result.moved) continue;
      this.log.debug(`Moved ${candidate.filePath} -> ${filePath}`);
      if (isMarkdownPath(filePath)) await this.writeBackPermalink(filePath, result.entity, checksum);
      return true;
    }
    return false;
  }

  private extract(filePath: string, bytes: Uint8Array): Extracted {
    if (!isMarkdownPath(filePath)) {
      return { content: fileEntityContent(filePath), markdown: false, degraded: false };
    }
    const outcome = parseKnowledge(bytes, filePath);
    if (!outcome.ok) {
      this.log.warn(`${filePath}: ${outcome.error.message}; tracked without graph content`);
      return { content: fileEntityContent(filePath), markdown: false, degraded: true };
    }
    for (const issue of outcome.draft.issues) {
      this.log.warn(`${filePath}:${issue.line}: ${issue.message}`);
    }
    return { content: outcome.draft, markdown: true, degraded: outcome.draft.issues.length > 0 };
  }

  /**
   * Record the resolved permalink in the file's frontmatter. Only files that
   * already have a valid frontmatter block are rewritten, and only when their
   * content still matches what was synced.
   */
  private async writeBackPermalink(filePath: string, entity: Entity, syncedChecksum: string): Promise<void> {
    const { settings, fileSystem, store } = this.options;
    if (!settings.writePermalinks) return;

    const read = await this.readWithRetry(filePath);
    if (read.kind !== 'read' || computeChecksum(read.bytes) !== syncedChecksum) return;
    const decoded = decodeText(read.bytes);
    if (!decoded.ok) return;

    const split = splitFrontmatter(decoded.text);
    if (split.yaml === null) return;
    const frontmatter = parseFrontmatter(split.yaml);
    if (!frontmatter.valid) return;
    if (frontmatterString(frontmatter.frontmatter.get('permalink')) === entity.permalink) return;

    const updated = updateFrontmatter(decoded.text, { permalink: entity.permalink });
    if (updated === null) return;
    await fileSystem.writeFile(this.abs(filePath), updated);
    store.updateChecksum(this.projectId, entity.id, computeChecksum(updated));
    this.log.debug(`Wrote permalink ${entity.permalink} into ${filePath}`);
  }

  private async readWithRetry(filePath: string): Promise<ReadResult> {
    const { ioRetryAttempts, ioRetryDelayMs } = this.options.settings;
    const attempts = Math.max(1, ioRetryAttempts);
    for (let attempt = 1; ; attempt++) {
      try {
        return { kind: 'read', bytes: await this.options.fileSystem.readFile(this.abs(filePath)) };
      } catch (error) {
        const code = errnoCode(error);
        if (code === 'ENOENT' || code === 'ENOTDIR') return { kind: 'missing' };
        if (code !== undefined && RETRYABLE_CODES.has(code) && attempt < attempts) {
          await this.options.sleep(ioRetryDelayMs * 2 ** (attempt - 1));
          continue;
        }
        return { kind: 'failed', error: new TransientIOError(filePath, attempt, error) };
      }
    }
  }
}

export type ProjectStartResult =
  | { readonly project: Project; readonly ok: true; readonly scan: ScanSummary }
  | { readonly project: Project; readonly ok: false; readonly error: unknown };

export interface SyncOrchestratorOptions {
  readonly store: KnowledgeStore;
  readonly settings?: Partial<SyncSettings>;
  readonly logger?: Logger;
  readonly clock?: Clock;
  readonly scheduler?: Scheduler;
  readonly fileSystem?: FileSystemAccess;
  readonly sleep?: (ms: number) => Promise<void>;
  /** Called when a project's worker stops on a store failure */
  readonly onHalt?: (project: Project, error: StoreConsistencyError) => void;
}

/** Owns one worker per project; every call names its project explicitly */
export class SyncOrchestrator {
  private readonly workers = new Map<number, ProjectWorker>();
  readonly settings: SyncSettings;

  constructor(private readonly options: SyncOrchestratorOptions) {
    this.settings = { ...DEFAULT_SYNC_SETTINGS, ...options.settings };
  }

  /** The project's worker, created on first use (not watching until started) */
  worker(project: Project): ProjectWorker {
    const existing = this.workers.get(project.id);
    if (existing) return existing;
    const worker = new ProjectWorker({
      project,
      store: this.options.store,
      settings: this.settings,
      logger: (this.options.logger ?? silentLogger).child(project.name),
      clock: this.options.clock ?? realClock,
      scheduler: this.options.scheduler ?? realScheduler,
      fileSystem: this.options.fileSystem ?? nodeFileSystem,
      sleep: this.options.sleep ?? defaultSleep,
      onHalt: this.options.onHalt,
    });
    this.workers.set(project.id, worker);
    return worker;
  }

  hasWorker(projectId: number): boolean {
    return this.workers.has(projectId);
  }

  startProject(project: Project, options: { watch: boolean }): Promise<ScanSummary> {
    return this.worker(project).start(options.watch);
  }

  /** Start projects side by side; a project that fails is stopped and reported, the rest carry on */
  async startProjects(projects: readonly Project[], options: { watch: boolean }): Promise<ProjectStartResult[]> {
    const settled = await Promise.allSettled(projects.map(project => this.startProject(project, options)));
    return Promise.all(settled.map(async (result, index): Promise<ProjectStartResult> => {
      const project = projects[index];
      if (result.status === 'fulfilled') return { project, ok: true, scan: result.value };
      await this.stopProject(project.id);
      return { project, ok: false, error: result.reason };
    }));
  }

  /** Apply changes for one project through its queue */
  applyChanges(project: Project, events: readonly ChangeEvent[]): Promise<ApplyOutcome[]> {
    return this.worker(project).applyChanges(events);
  }

  /** Push one file through the project's queue, e.g. right after a tool wrote it */
  async syncPath(project: Project, filePath: string): Promise<ApplyOutcome> {
    const [outcome] = await this.applyChanges(project, [{ kind: 'modified', path: filePath }]);
    return outcome ?? 'unchanged';
  }

  status(project: Project): SyncStatus {
    return this.worker(project).status();
  }

  reset(project: Project): Promise<ScanSummary> {
    return this.worker(project).reset();
  }

  async stopProject(projectId: number): Promise<void> {
    const worker = this.workers.get(projectId);
    if (!worker) return;
    this.workers.delete(projectId);
    await worker.stop();
  }

  async stopAll(): Promise<void> {
    const workers = Array.from(this.workers.values());
    this.workers.clear();
    await Promise.all(workers.map(w => w.stop()));
  }
}
