// KnowledgeService: the operations the tool layer calls.
//
// Every call names its project explicitly or falls back to the configured
// default; there is no ambient "current project". Writes land on disk first
// (atomic temp file + rename) and then go through the project's sync queue, so
// the store and the files never disagree about who wrote last.

import path from 'path';
import type { Clock, Entity, Frontmatter, FrontmatterValue, Page, Pagination, Project, SyncStatus } from './types.js';
import { realClock } from './types.js';
import type { KnowledgeStore, ProjectStats, SearchHit } from './store.js';
import type { ApplyOutcome, ScanSummary, SyncOrchestrator } from './sync.js';
import { buildContext, parseTimeframe, resolveReference, type GraphSnapshot } from './context.js';
import { formatMemoryUrl, isMemoryUrl, parseMemoryUrl } from './memory-url.js';
import { decodeText, parseFrontmatter, renderDocument, splitFrontmatter, DEFAULT_ENTITY_TYPE } from './parser.js';
import { sanitizeFilename } from './permalink.js';
import { absolutePath, nodeFileSystem, normalizeProjectPath, type FileSystemAccess } from './files.js';
import { applyEdit, type EditOperation } from './edit.js';
import { listDirectory, normalizeDirectory, type DirectoryEntry } from './directory.js';
import { silentLogger, type Logger } from './logger.js';
import {
  EntityNotFoundError,
  InvalidEditError,
  InvalidReferenceError,
  ProjectNotFoundError,
  TransientIOError,
  WorkerHaltedError,
} from './errors.js';

export interface KnowledgeServiceOptions {
  readonly store: KnowledgeStore;
  readonly sync: SyncOrchestrator;
  /** Start file watching for projects created at run time */
  readonly watch: boolean;
  readonly fileSystem?: FileSystemAccess;
  readonly logger?: Logger;
  readonly clock?: Clock;
}

export interface WriteEntityInput {
  readonly title: string;
  readonly content: string;
  /** Project-relative folder; the project root when omitted */
  readonly folder?: string;
  readonly tags?: readonly string[];
  readonly entityType?: string;
  readonly project?: string;
}

export interface WriteEntityResult {
  readonly project: Project;
  readonly entity: Entity;
  readonly permalink: string;
  readonly url: string;
  readonly created: boolean;
  readonly outcome: ApplyOutcome;
}

export interface ReadEntityResult {
  readonly project: Project;
  readonly entity: Entity;
  readonly url: string;
  /** File text; null when the file is not text */
  readonly content: string | null;
}

export interface EditEntityInput {
  readonly identifier: string;
  readonly operation: EditOperation;
  readonly project?: string;
}

export interface EditEntityResult {
  readonly project: Project;
  readonly entity: Entity;
  readonly url: string;
  readonly outcome: ApplyOutcome;
}

export interface DirectoryListing {
  readonly project: Project;
  /** Project-relative folder; "" is the root */
  readonly dir: string;
  readonly depth: number;
  readonly glob?: string;
  readonly entries: readonly DirectoryEntry[];
}

export interface SearchInput {
  readonly text?: string;
  readonly entityTypes?: readonly string[];
  readonly tags?: readonly string[];
  readonly timeframe?: string;
  readonly project?: string;
}

export interface ContextInput {
  readonly url: string;
  readonly depth?: number;
  readonly timeframe?: string;
  readonly maxRelated?: number;
  readonly page?: number;
  readonly pageSize?: number;
  readonly project?: string;
}

export interface ProjectOverview {
  readonly project: Project;
  readonly stats: ProjectStats;
  readonly status: SyncStatus;
}

export class KnowledgeService {
  private readonly store: KnowledgeStore;
  private readonly sync: SyncOrchestrator;
  private readonly fileSystem: FileSystemAccess;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(private readonly options: KnowledgeServiceOptions) {
    this.store = options.store;
    this.sync = options.sync;
    this.fileSystem = options.fileSystem ?? nodeFileSystem;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? realClock;
  }

  // --- Project resolution ---

  resolveProject(ref?: string): Project {
    if (ref !== undefined && ref.trim() !== '') return this.store.requireProject(ref);
    const fallback = this.store.defaultProject();
    if (!fallback) throw new ProjectNotFoundError('(default)');
    return fallback;
  }

  /** Resolve an identifier (memory:// URL, permalink, title, or path) to exactly one entity */
  resolveEntity(identifier: string, projectRef?: string): { project: Project; entity: Entity } {
    const { project, reference } = this.splitReference(identifier, projectRef);
    if (reference.includes('*')) {
      throw new InvalidReferenceError(`"${identifier}" is a pattern; name a single note`);
    }
    const matches = resolveReference(this.store, project, reference);
    const entity = matches.length > 0 ? matches[0] : this.store.resolveLink(project.id, reference);
    if (!entity) throw new EntityNotFoundError(identifier, project.name);
    return { project, entity };
  }

  private splitReference(identifier: string, projectRef?: string): { project: Project; reference: string } {
    if (isMemoryUrl(identifier)) {
      const parsed = parseMemoryUrl(identifier);
      return { project: this.resolveProject(parsed.project ?? projectRef), reference: parsed.path };
    }
    return { project: this.resolveProject(projectRef), reference: parseMemoryUrl(identifier).path };
  }

  private assertWritable(project: Project): void {
    const status = this.sync.status(project);
    if (status.state === 'error') {
      throw new WorkerHaltedError(project.name, status.lastError ?? 'store failure');
    }
  }

  private requireSynced(project: Project, filePath: string, outcome: ApplyOutcome): Entity {
    const entity = this.store.getEntityByPath(project.id, filePath);
    if (entity) return entity;
    const detail = this.sync.status(project).lastError ?? `sync outcome was "${outcome}"`;
    throw new TransientIOError(filePath, this.sync.settings.ioRetryAttempts, new Error(detail));
  }

  // --- Notes ---

  async writeEntity(input: WriteEntityInput): Promise<WriteEntityResult> {
    const project = this.resolveProject(input.project);
    this.assertWritable(project);

    const title = input.title.trim();
    if (title === '') throw new InvalidReferenceError('Title is required');
    const folder = (input.folder ?? '').replace(/\\/g, '/').replace(/^\/+|\/+$/g, '');
    const fileName = `${sanitizeFilename(title)}.md`;
    const filePath = normalizeProjectPath(folder === '' ? fileName : `${folder}/${fileName}`);
    const target = absolutePath(project.rootPath, filePath);

    // Content may open with its own frontmatter block; its keys join the file's
    const supplied = splitFrontmatter(input.content);
    const suppliedFrontmatter = supplied.yaml === null ? new Map<string, FrontmatterValue>() : parseSupplied(supplied.yaml);

    const existed = await this.fileSystem.exists(target);
    const frontmatter = new Map<string, FrontmatterValue>(existed ? await this.existingFrontmatter(target, filePath) : []);
    for (const [key, value] of suppliedFrontmatter) frontmatter.set(key, value);
    frontmatter.set('title', title);
    if (input.entityType) frontmatter.set('type', input.entityType);
    else if (!frontmatter.has('type')) frontmatter.set('type', DEFAULT_ENTITY_TYPE);
    if (input.tags && input.tags.length > 0) {
      frontmatter.set('tags', input.tags.map(t => t.replace(/^#+/, '').trim()).filter(t => t !== ''));
    }

    await this.fileSystem.writeFile(target, renderDocument(frontmatter, supplied.body));
    const outcome = await this.sync.syncPath(project, filePath);
    const entity = this.requireSynced(project, filePath, outcome);
    this.logger.info(`${existed ? 'Updated' : 'Created'} ${filePath} in ${project.name}`);

    return {
      project,
      entity,
      permalink: entity.permalink,
      url: formatMemoryUrl(project, entity.permalink),
      created: !existed,
      outcome,
    };
  }

  /** Frontmatter of a file being overwritten; kept so hand-added keys survive */
  private async existingFrontmatter(target: string, filePath: string): Promise<Frontmatter> {
    const decoded = decodeText(await this.fileSystem.readFile(target));
    if (!decoded.ok) return new Map();
    const split = splitFrontmatter(decoded.text);
    if (split.yaml === null) return new Map();
    const parsed = parseFrontmatter(split.yaml);
    if (!parsed.valid) {
      this.logger.warn(`${filePath}: replacing malformed frontmatter (${parsed.reason})`);
      return new Map();
    }
    return parsed.frontmatter;
  }

  async readEntity(identifier: string, projectRef?: string): Promise<ReadEntityResult> {
    const { project, entity } = this.resolveEntity(identifier, projectRef);
    const decoded = decodeText(await this.fileSystem.readFile(absolutePath(project.rootPath, entity.filePath)));
    return {
      project,
      entity,
      url: formatMemoryUrl(project, entity.permalink),
      content: decoded.ok ? decoded.text : null,
    };
  }

  /** Edit a note's body in place, then sync it before returning */
  async editEntity(input: EditEntityInput): Promise<EditEntityResult> {
    const { project, entity } = this.resolveEntity(input.identifier, input.project);
    this.assertWritable(project);
    const target = absolutePath(project.rootPath, entity.filePath);
    const decoded = decodeText(await this.fileSystem.readFile(target));
    if (!decoded.ok) throw new InvalidEditError(`${entity.filePath} is not a text file`);

    const updated = applyEdit(decoded.text, input.operation);
    if (updated !== decoded.text) await this.fileSystem.writeFile(target, updated);
    const outcome = await this.sync.syncPath(project, entity.filePath);
    const synced = this.requireSynced(project, entity.filePath, outcome);
    this.logger.info(`Edited ${entity.filePath} in ${project.name} (${input.operation.kind})`);
    return { project, entity: synced, url: formatMemoryUrl(project, synced.permalink), outcome };
  }

  async moveEntity(identifier: string, destination: string, projectRef?: string): Promise<Entity> {
    const { project, entity } = this.resolveEntity(identifier, projectRef);
    this.assertWritable(project);

    let toPath = normalizeProjectPath(destination);
    const extension = path.posix.extname(entity.filePath);
    if (path.posix.extname(toPath) === '' && extension !== '') toPath = `${toPath}${extension}`;
    if (toPath === entity.filePath) return entity;

    const target = absolutePath(project.rootPath, toPath);
    if (await this.fileSystem.exists(target)) {
      throw new InvalidReferenceError(`Destination "${toPath}" already exists in ${project.name}`);
    }
    await this.fileSystem.rename(absolutePath(project.rootPath, entity.filePath), target);
    const [outcome = 'unchanged'] = await this.sync.applyChanges(project, [
      { kind: 'moved', from: entity.filePath, path: toPath },
    ]);
    const moved = this.requireSynced(project, toPath, outcome);
    this.logger.info(`Moved ${entity.filePath} -> ${toPath} in ${project.name}`);
    return moved;
  }

  async deleteEntity(identifier: string, projectRef?: string): Promise<Entity> {
    const { project, entity } = this.resolveEntity(identifier, projectRef);
    this.assertWritable(project);
    await this.fileSystem.remove(absolutePath(project.rootPath, entity.filePath));
    await this.sync.applyChanges(project, [{ kind: 'deleted', path: entity.filePath }]);
    this.logger.info(`Deleted ${entity.filePath} from ${project.name}`);
    return entity;
  }

  // --- Queries ---

  private since(timeframe: string | undefined): string | undefined {
    if (timeframe === undefined || timeframe.trim() === '') return undefined;
    const bound = parseTimeframe(timeframe, this.clock.now());
    if (bound === null) throw new InvalidReferenceError(`Unrecognized timeframe "${timeframe}"`);
    return bound.toISOString();
  }

  search(input: SearchInput, pagination?: Partial<Pagination>): { project: Project; results: Page<SearchHit> } {
    const project = this.resolveProject(input.project);
    const results = this.store.search(project.id, {
      text: input.text,
      entityTypes: input.entityTypes,
      tags: input.tags,
      updatedAfter: this.since(input.timeframe),
    }, pagination);
    return { project, results };
  }

  /** Folders and indexed files under dir, depth levels deep (clamped to 1-10) */
  listDirectory(input: { dir?: string; depth?: number; glob?: string; project?: string }): DirectoryListing {
    const project = this.resolveProject(input.project);
    const dir = normalizeDirectory(input.dir ?? '');
    const depth = Math.min(10, Math.max(1, Math.floor(input.depth ?? 1)));
    const glob = input.glob?.trim() || undefined;
    const entities: Entity[] = [];
    for (let page = 1; ; page++) {
      const batch = this.store.query(project.id, { folder: dir }, { page, pageSize: 100 });
      entities.push(...batch.items);
      if (!batch.hasMore) break;
    }
    return { project, dir, depth, glob, entries: listDirectory(entities, dir, { depth, glob }) };
  }

  buildContext(input: ContextInput): { project: Project; snapshot: GraphSnapshot } {
    const { project, reference } = this.splitReference(input.url, input.project);
    const snapshot = buildContext(this.store, project, reference, {
      depth: input.depth,
      timeframe: input.timeframe,
      maxRelated: input.maxRelated,
      page: input.page,
      pageSize: input.pageSize,
      clock: this.clock,
    });
    return { project, snapshot };
  }

  recentActivity(
    input: { timeframe?: string; entityTypes?: readonly string[]; project?: string },
    pagination?: Partial<Pagination>,
  ): { project: Project; results: Page<Entity> } {
    const project = this.resolveProject(input.project);
    const results = this.store.query(project.id, {
      entityTypes: input.entityTypes,
      updatedAfter: this.since(input.timeframe ?? '7d'),
    }, pagination);
    return { project, results };
  }

  syncStatus(projectRef?: string): ProjectOverview[] {
    const projects = projectRef ? [this.resolveProject(projectRef)] : this.store.listProjects();
    return projects.map(project => this.overview(project));
  }

  private overview(project: Project): ProjectOverview {
    return { project, stats: this.store.stats(project.id), status: this.sync.status(project) };
  }

  // --- Projects ---

  listProjects(): ProjectOverview[] {
    return this.store.listProjects().map(project => this.overview(project));
  }

  async createProject(input: { name: string; rootPath: string; setDefault?: boolean }): Promise<{ project: Project; scan: ScanSummary }> {
    const rootPath = path.resolve(input.rootPath);
    const project = this.store.createProject({ name: input.name, rootPath, isDefault: input.setDefault });
    await this.fileSystem.makeDirectory(rootPath);
    const scan = await this.sync.startProject(project, { watch: this.options.watch });
    this.logger.info(`Created project ${project.name} at ${rootPath}`);
    return { project, scan };
  }

  /** Forget a project and its index. Files on disk are left alone. */
  async removeProject(ref: string): Promise<Project> {
    const project = this.store.requireProject(ref);
    await this.sync.stopProject(project.id);
    this.store.removeProject(project.id);
    this.logger.info(`Removed project ${project.name}`);
    return project;
  }

  setDefaultProject(ref: string): Project {
    return this.store.setDefaultProject(this.store.requireProject(ref).id);
  }

  /**
   * Clear a halted worker and reconcile from a full scan. With reindex, the
   * project's index is dropped first and rebuilt from the files.
   */
  async resetProject(ref: string, options: { reindex?: boolean } = {}): Promise<ScanSummary> {
    const project = this.store.requireProject(ref);
    if (!options.reindex) return this.sync.reset(project);
    await this.sync.stopProject(project.id);
    const removed = this.store.clearProject(project.id);
    this.logger.info(`Cleared ${removed} entities from ${project.name}; rebuilding`);
    return this.sync.startProject(project, { watch: this.options.watch });
  }
}

function parseSupplied(yamlText: string): Frontmatter {
  const parsed = parseFrontmatter(yamlText);
  if (!parsed.valid) throw new InvalidReferenceError(`Content frontmatter is not usable: ${parsed.reason}`);
  return parsed.frontmatter;
}
