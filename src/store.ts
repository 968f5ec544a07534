// Knowledge store: projects, entities, observations, relations and the
// full-text search index, persisted in SQLite.
//
// Every mutation runs in its own IMMEDIATE transaction, so permalink
// resolution and the write that depends on it are one atomic step.
// Everything is scoped by project id; an entity id that belongs to another
// project is rejected before anything is written.

import Database from 'better-sqlite3';
import { promises as fs } from 'fs';
import path from 'path';
import type {
  Clock,
  Entity,
  EntityDraft,
  Frontmatter,
  FrontmatterValue,
  Observation,
  Page,
  Pagination,
  Project,
  Relation,
} from './types.js';
import { realClock, toFrontmatterValue, normalizePagination } from './types.js';
import { migrate, SEARCH_BODY_COLUMN, SEARCH_WEIGHTS } from './schema.js';
import { generatePermalink, permalinkForPath, resolvePermalink } from './permalink.js';
import {
  CrossProjectReferenceError,
  KnowledgeGraphError,
  ProjectConflictError,
  ProjectNotFoundError,
  StoreConsistencyError,
  errorMessage,
} from './errors.js';

// --- Row shapes ---

interface ProjectRow {
  id: number;
  name: string;
  permalink: string;
  root_path: string;
  is_default: number;
  created_at: string;
}

interface EntityRow {
  id: number;
  project_id: number;
  title: string;
  permalink: string;
  file_path: string;
  entity_type: string;
  content_type: string;
  checksum: string | null;
  tags: string;
  frontmatter: string;
  body: string;
  created_at: string;
  updated_at: string;
}

interface ObservationRow {
  id: number;
  entity_id: number;
  category: string;
  content: string;
  tags: string;
  context: string | null;
}

interface RelationRow {
  id: number;
  project_id: number;
  from_entity_id: number;
  to_entity_id: number | null;
  target_title: string;
  relation_type: string;
  context: string | null;
}

interface SearchRow extends EntityRow {
  score: number;
  snippet: string | null;
}

interface CountRow {
  n: number;
}

// --- Public result shapes ---

export interface UpsertResult {
  readonly entity: Entity;
  readonly created: boolean;
  /** Dangling relations elsewhere in the project that now point at this entity */
  readonly resolvedInbound: number;
}

export type MoveResult =
  | { readonly moved: true; readonly entity: Entity }
  | { readonly moved: false; readonly reason: 'not-found' }
  | { readonly moved: false; readonly reason: 'conflict'; readonly occupant: Entity };

export interface EntityFilters {
  readonly entityTypes?: readonly string[];
  /** Project-relative folder prefix, e.g. "specs" or "specs/api" */
  readonly folder?: string;
  /** Glob over permalinks, e.g. "specs/*" */
  readonly permalinkGlob?: string;
  /** ISO 8601 lower bound on updated_at */
  readonly updatedAfter?: string;
}

export interface SearchQuery {
  readonly text?: string;
  readonly entityTypes?: readonly string[];
  /** Every listed tag must be present on the entity or one of its observations */
  readonly tags?: readonly string[];
  readonly updatedAfter?: string;
}

export interface SearchHit {
  readonly entity: Entity;
  /** Higher is better; 0 when listing without a text query */
  readonly score: number;
  readonly snippet: string | null;
}

export interface FileRecord {
  readonly entityId: number;
  readonly checksum: string | null;
}

export interface ProjectStats {
  readonly entities: number;
  readonly observations: number;
  readonly relations: number;
  readonly danglingRelations: number;
}

export interface KnowledgeStoreOptions {
  /** File path, or ':memory:' */
  readonly databasePath: string;
  readonly clock?: Clock;
}

// --- Row decoding ---

function parseStringArray(json: string): string[] {
  const data: unknown = JSON.parse(json);
  return Array.isArray(data) ? data.filter((v): v is string => typeof v === 'string') : [];
}

function parseFrontmatterJson(json: string): Frontmatter {
  const data: unknown = JSON.parse(json);
  const map = new Map<string, FrontmatterValue>();
  if (!Array.isArray(data)) return map;
  for (const pair of data) {
    if (Array.isArray(pair) && pair.length === 2 && typeof pair[0] === 'string') {
      map.set(pair[0], toFrontmatterValue(pair[1]));
    }
  }
  return map;
}

function toProject(row: ProjectRow): Project {
  return {
    id: row.id,
    name: row.name,
    permalink: row.permalink,
    rootPath: row.root_path,
    isDefault: row.is_default === 1,
    createdAt: row.created_at,
  };
}

function toEntity(row: EntityRow): Entity {
  return {
    id: row.id,
    projectId: row.project_id,
    title: row.title,
    permalink: row.permalink,
    filePath: row.file_path,
    entityType: row.entity_type,
    contentType: row.content_type,
    checksum: row.checksum,
    tags: parseStringArray(row.tags),
    frontmatter: parseFrontmatterJson(row.frontmatter),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toObservation(row: ObservationRow): Observation {
  return {
    id: row.id,
    entityId: row.entity_id,
    category: row.category,
    content: row.content,
    tags: parseStringArray(row.tags),
    context: row.context,
  };
}

function toRelation(row: RelationRow): Relation {
  return {
    id: row.id,
    projectId: row.project_id,
    fromEntityId: row.from_entity_id,
    toEntityId: row.to_entity_id,
    targetTitle: row.target_title,
    relationType: row.relation_type,
    context: row.context,
  };
}

function relationKey(relationType: string, target: string): string {
  return `${relationType}\u0000${target}`;
}

function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}

function toPage<T>(items: T[], total: number, pagination: Pagination): Page<T> {
  return {
    items,
    page: pagination.page,
    pageSize: pagination.pageSize,
    total,
    hasMore: pagination.page * pagination.pageSize < total,
  };
}

/**
 * Turn free text into an FTS5 query: each term is quoted and prefix-matched,
 * AND/OR/NOT pass through, quoted phrases are kept. Returns null when nothing
 * searchable is left.
 */
export function toFtsQuery(text: string): string | null {
  const tokens = text.match(/"[^"]*"|\S+/g) ?? [];
  const parts: string[] = [];
  for (const token of tokens) {
    if (token === 'AND' || token === 'OR' || token === 'NOT') {
      const previous = parts[parts.length - 1];
      if (previous !== undefined && previous !== 'AND' && previous !== 'OR' && previous !== 'NOT') {
        parts.push(token);
      }
      continue;
    }
    if (token.startsWith('"') && token.endsWith('"') && token.length > 2) {
      parts.push(token);
      continue;
    }
    const term = token.replace(/"/g, '').replace(/^#+/, '');
    if (/[\p{L}\p{N}]/u.test(term)) parts.push(`"${term}"*`);
  }
  while (parts.length > 0 && ['AND', 'OR', 'NOT'].includes(parts[parts.length - 1])) parts.pop();
  return parts.length > 0 ? parts.join(' ') : null;
}

function isFtsSyntaxError(error: unknown): boolean {
  return error instanceof Database.SqliteError && /fts5|syntax error|unterminated/i.test(error.message);
}

// --- Store ---

export class KnowledgeStore {
  private readonly db: Database.Database;
  private readonly clock: Clock;

  private constructor(db: Database.Database, clock: Clock) {
    this.db = db;
    this.clock = clock;
  }

  /** Open (creating if needed) the database and bring its schema up to date */
  static async open(options: KnowledgeStoreOptions): Promise<KnowledgeStore> {
    if (options.databasePath !== ':memory:') {
      await fs.mkdir(path.dirname(options.databasePath), { recursive: true });
    }
    return KnowledgeStore.openSync(options);
  }

  static openSync(options: KnowledgeStoreOptions): KnowledgeStore {
    const db = new Database(options.databasePath);
    try {
      if (options.databasePath !== ':memory:') db.pragma('journal_mode = WAL');
      db.pragma('foreign_keys = ON');
      db.pragma('busy_timeout = 5000');
      migrate(db);
    } catch (error) {
      db.close();
      throw new StoreConsistencyError(`Cannot open knowledge store at ${options.databasePath}: ${errorMessage(error)}`, error);
    }
    return new KnowledgeStore(db, options.clock ?? realClock);
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  /** Run fn in an IMMEDIATE transaction; unexpected SQLite failures become StoreConsistencyError */
  private write<T>(description: string, fn: () => T): T {
    try {
      return this.db.transaction(fn).immediate();
    } catch (error) {
      if (error instanceof KnowledgeGraphError) throw error;
      throw new StoreConsistencyError(`${description} failed: ${errorMessage(error)}`, error);
    }
  }

  // --- Projects ---

  createProject(input: { name: string; rootPath: string; isDefault?: boolean }): Project {
    return this.write('Create project', () => {
      const name = input.name.trim();
      const permalink = generatePermalink(name);
      if (this.findProjectRow(name) || this.findProjectRow(permalink)) {
        throw new ProjectConflictError(`Project "${name}" already exists`);
      }
      const hasProjects = (this.db.prepare<[], CountRow>('SELECT count(*) AS n FROM project').get()?.n ?? 0) > 0;
      const isDefault = input.isDefault === true || !hasProjects;
      if (isDefault) this.db.prepare('UPDATE project SET is_default = 0').run();
      const row = this.db.prepare<[string, string, string, number, string], ProjectRow>(
        `INSERT INTO project (name, permalink, root_path, is_default, created_at)
         VALUES (?, ?, ?, ?, ?) RETURNING *`,
      ).get(name, permalink, input.rootPath, isDefault ? 1 : 0, this.clock.isoNow());
      if (!row) throw new StoreConsistencyError(`Project "${name}" was not created`);
      return toProject(row);
    });
  }

  private findProjectRow(ref: string): ProjectRow | undefined {
    return this.db.prepare<[string, string], ProjectRow>(
      'SELECT * FROM project WHERE name = ? COLLATE NOCASE OR permalink = ? ORDER BY id LIMIT 1',
    ).get(ref, ref);
  }

  /** Look a project up by name or permalink, case-insensitively */
  getProject(ref: string): Project | null {
    const row = this.findProjectRow(ref.trim()) ?? this.findProjectRow(generatePermalink(ref));
    return row ? toProject(row) : null;
  }

  requireProject(ref: string): Project {
    const project = this.getProject(ref);
    if (!project) throw new ProjectNotFoundError(ref);
    return project;
  }

  getProjectById(id: number): Project | null {
    const row = this.db.prepare<[number], ProjectRow>('SELECT * FROM project WHERE id = ?').get(id);
    return row ? toProject(row) : null;
  }

  listProjects(): Project[] {
    return this.db.prepare<[], ProjectRow>('SELECT * FROM project ORDER BY name COLLATE NOCASE, id').all().map(toProject);
  }

  defaultProject(): Project | null {
    const row = this.db.prepare<[], ProjectRow>('SELECT * FROM project WHERE is_default = 1 ORDER BY id LIMIT 1').get();
    return row ? toProject(row) : null;
  }

  setDefaultProject(projectId: number): Project {
    return this.write('Set default project', () => {
      const project = this.getProjectById(projectId);
      if (!project) throw new ProjectNotFoundError(String(projectId));
      this.db.prepare('UPDATE project SET is_default = CASE WHEN id = ? THEN 1 ELSE 0 END').run(projectId);
      return { ...project, isDefault: true };
    });
  }

  /** Remove a project and all of its rows. Files on disk are not touched. */
  removeProject(projectId: number): void {
    this.write('Remove project', () => {
      const project = this.getProjectById(projectId);
      if (!project) throw new ProjectNotFoundError(String(projectId));
      this.db.prepare('DELETE FROM search_index WHERE project_id = ?').run(projectId);
      this.db.prepare('DELETE FROM project WHERE id = ?').run(projectId);
      if (project.isDefault) {
        this.db.prepare('UPDATE project SET is_default = 1 WHERE id = (SELECT min(id) FROM project)').run();
      }
    });
  }

  /** Drop every entity of a project, keeping the project itself */
  clearProject(projectId: number): number {
    return this.write('Clear project', () => {
      this.db.prepare('DELETE FROM search_index WHERE project_id = ?').run(projectId);
      return this.db.prepare('DELETE FROM entity WHERE project_id = ?').run(projectId).changes;
    });
  }

  private requireProjectId(projectId: number): void {
    const row = this.db.prepare<[number], { id: number }>('SELECT id FROM project WHERE id = ?').get(projectId);
    if (!row) throw new ProjectNotFoundError(String(projectId));
  }

  // --- Entity lookups ---

  private entityRow(projectId: number, entityId: number): EntityRow | undefined {
    const row = this.db.prepare<[number], EntityRow>('SELECT * FROM entity WHERE id = ?').get(entityId);
    if (row && row.project_id !== projectId) throw new CrossProjectReferenceError(entityId, projectId);
    return row;
  }

  private entityRowByPath(projectId: number, filePath: string): EntityRow | undefined {
    return this.db.prepare<[number, string], EntityRow>(
      'SELECT * FROM entity WHERE project_id = ? AND file_path = ?',
    ).get(projectId, filePath);
  }

  private permalinkOwner(projectId: number, permalink: string): number | null {
    const row = this.db.prepare<[number, string], { id: number }>(
      'SELECT id FROM entity WHERE project_id = ? AND permalink = ?',
    ).get(projectId, permalink);
    return row?.id ?? null;
  }

  getEntity(projectId: number, entityId: number): Entity | null {
    const row = this.entityRow(projectId, entityId);
    return row ? toEntity(row) : null;
  }

  getEntityByPath(projectId: number, filePath: string): Entity | null {
    const row = this.entityRowByPath(projectId, filePath);
    return row ? toEntity(row) : null;
  }

  getEntityByPermalink(projectId: number, permalink: string): Entity | null {
    const row = this.db.prepare<[number, string], EntityRow>(
      'SELECT * FROM entity WHERE project_id = ? AND permalink = ?',
    ).get(projectId, permalink);
    return row ? toEntity(row) : null;
  }

  getEntitiesByTitle(projectId: number, title: string): Entity[] {
    return this.db.prepare<[number, string, string], EntityRow>(
      'SELECT * FROM entity WHERE project_id = ? AND title = ? COLLATE NOCASE ORDER BY title = ? DESC, id',
    ).all(projectId, title, title).map(toEntity);
  }

  /** Entities whose permalink matches a glob (SQLite GLOB syntax: *, ?, [...]) */
  findByPermalinkGlob(projectId: number, glob: string): Entity[] {
    return this.db.prepare<[number, string], EntityRow>(
      'SELECT * FROM entity WHERE project_id = ? AND permalink GLOB ? ORDER BY permalink',
    ).all(projectId, glob).map(toEntity);
  }

  /** Entities whose last synced content had this checksum */
  findByChecksum(projectId: number, checksum: string): Entity[] {
    return this.db.prepare<[number, string], EntityRow>(
      'SELECT * FROM entity WHERE project_id = ? AND checksum = ? ORDER BY id',
    ).all(projectId, checksum).map(toEntity);
  }

  /** Resolve link text: permalink, then exact title, then title ignoring case, then file path */
  private resolveTargetId(projectId: number, target: string): number | null {
    const text = target.trim();
    const lookups: Array<[string, string]> = [
      ['SELECT id FROM entity WHERE project_id = ? AND permalink = ? ORDER BY id LIMIT 1', text],
      ['SELECT id FROM entity WHERE project_id = ? AND title = ? ORDER BY id LIMIT 1', text],
      ['SELECT id FROM entity WHERE project_id = ? AND title = ? COLLATE NOCASE ORDER BY id LIMIT 1', text],
      ['SELECT id FROM entity WHERE project_id = ? AND file_path = ? ORDER BY id LIMIT 1', text],
      ['SELECT id FROM entity WHERE project_id = ? AND file_path = ? ORDER BY id LIMIT 1', `${text}.md`],
    ];
    for (const [sql, value] of lookups) {
      const row = this.db.prepare<[number, string], { id: number }>(sql).get(projectId, value);
      if (row) return row.id;
    }
    return null;
  }

  /** Resolve link text the way relations are resolved */
  resolveLink(projectId: number, text: string): Entity | null {
    const id = this.resolveTargetId(projectId, text);
    return id === null ? null : this.getEntity(projectId, id);
  }

  /** file_path -> (entity id, checksum) for every entity of the project */
  fileState(projectId: number): Map<string, FileRecord> {
    const rows = this.db.prepare<[number], { id: number; file_path: string; checksum: string | null }>(
      'SELECT id, file_path, checksum FROM entity WHERE project_id = ?',
    ).all(projectId);
    return new Map(rows.map(r => [r.file_path, { entityId: r.id, checksum: r.checksum }]));
  }

  // --- Entity writes ---

  /**
   * Create or update the entity for draft.filePath in one transaction:
   * resolve the permalink, write the entity row, replace observations,
   * upsert outbound relations, resolve dangling relations that now match,
   * refresh the search row.
   */
  upsertEntity(projectId: number, draft: EntityDraft): UpsertResult {
    return this.write(`Sync of ${draft.filePath}`, () => {
      this.requireProjectId(projectId);
      const now = this.clock.isoNow();
      const existing = this.entityRowByPath(projectId, draft.filePath);
      const permalink = resolvePermalink(
        {
          title: draft.title,
          selfId: existing?.id ?? null,
          explicit: draft.explicitPermalink,
          current: existing?.permalink ?? null,
        },
        candidate => this.permalinkOwner(projectId, candidate),
      );

      const tagsJson = JSON.stringify(draft.tags);
      const frontmatterJson = JSON.stringify(Array.from(draft.frontmatter.entries()));
      let entityId: number;

      if (existing) {
        this.db.prepare(
          `UPDATE entity SET title = ?, permalink = ?, entity_type = ?, content_type = ?, checksum = ?,
             tags = ?, frontmatter = ?, body = ?, updated_at = ?
           WHERE id = ?`,
        ).run(draft.title, permalink, draft.entityType, draft.contentType, draft.checksum,
          tagsJson, frontmatterJson, draft.body, now, existing.id);
        entityId = existing.id;
      } else {
        // Permalink was resolved against committed state in this same transaction;
        // the conflict clause turns any remaining clash into an update in place.
        const row = this.db.prepare<unknown[], { id: number }>(
          `INSERT INTO entity (project_id, title, permalink, file_path, entity_type, content_type, checksum,
             tags, frontmatter, body, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT (project_id, permalink) DO UPDATE SET
             title = excluded.title, file_path = excluded.file_path, entity_type = excluded.entity_type,
             content_type = excluded.content_type, checksum = excluded.checksum, tags = excluded.tags,
             frontmatter = excluded.frontmatter, body = excluded.body, updated_at = excluded.updated_at
           RETURNING id`,
        ).get(projectId, draft.title, permalink, draft.filePath, draft.entityType, draft.contentType,
          draft.checksum, tagsJson, frontmatterJson, draft.body, now, now);
        if (!row) throw new StoreConsistencyError(`Entity for ${draft.filePath} was not written`);
        entityId = row.id;
      }

      this.replaceObservations(entityId, draft);
      this.upsertRelations(projectId, entityId, draft);
      const resolvedInbound = this.resolveDanglingFor(projectId, entityId);
      this.writeSearchRow(projectId, entityId);

      const row = this.entityRow(projectId, entityId);
      if (!row) throw new StoreConsistencyError(`Entity ${entityId} vanished during sync of ${draft.filePath}`);
      return { entity: toEntity(row), created: !existing, resolvedInbound };
    });
  }

  private replaceObservations(entityId: number, draft: EntityDraft): void {
    this.db.prepare('DELETE FROM observation WHERE entity_id = ?').run(entityId);
    const insert = this.db.prepare(
      'INSERT INTO observation (entity_id, position, category, content, tags, context) VALUES (?, ?, ?, ?, ?, ?)',
    );
    draft.observations.forEach((o, position) => {
      insert.run(entityId, position, o.category, o.content, JSON.stringify(o.tags), o.context);
    });
  }

  /** Relations keep their ids while (type, target) stays the same */
  private upsertRelations(projectId: number, entityId: number, draft: EntityDraft): void {
    const current = new Map(
      this.db.prepare<[number], RelationRow>('SELECT * FROM relation WHERE from_entity_id = ?')
        .all(entityId)
        .map(r => [relationKey(r.relation_type, r.target_title), r]),
    );
    const update = this.db.prepare('UPDATE relation SET to_entity_id = ?, context = ?, position = ? WHERE id = ?');
    const insert = this.db.prepare(
      `INSERT INTO relation (project_id, from_entity_id, to_entity_id, target_title, relation_type, context, position)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    );

    const wanted = new Set<string>();
    draft.relations.forEach((relation, position) => {
      const key = relationKey(relation.relationType, relation.target);
      if (wanted.has(key)) return;
      wanted.add(key);
      const targetId = this.resolveTargetId(projectId, relation.target);
      const row = current.get(key);
      if (row) update.run(targetId, relation.context, position, row.id);
      else insert.run(projectId, entityId, targetId, relation.target, relation.relationType, relation.context, position);
    });

    const remove = this.db.prepare('DELETE FROM relation WHERE id = ?');
    for (const [key, row] of current) {
      if (!wanted.has(key)) remove.run(row.id);
    }
  }

  /** Point dangling relations at this entity when it is now their best match */
  private resolveDanglingFor(projectId: number, entityId: number): number {
    const entity = this.db.prepare<[number], EntityRow>('SELECT * FROM entity WHERE id = ?').get(entityId);
    if (!entity) return 0;
    const stem = entity.file_path.replace(/\.md$/i, '');
    const candidates = this.db.prepare<[number, string, string, string, string], RelationRow>(
      `SELECT * FROM relation
       WHERE project_id = ? AND to_entity_id IS NULL
         AND (target_title = ? OR target_title = ? COLLATE NOCASE OR target_title = ? OR target_title = ?)`,
    ).all(projectId, entity.permalink, entity.title, entity.file_path, stem);
    return this.resolveRelations(projectId, candidates);
  }

  private resolveRelations(projectId: number, rows: readonly RelationRow[]): number {
    const update = this.db.prepare('UPDATE relation SET to_entity_id = ? WHERE id = ?');
    let resolved = 0;
    for (const row of rows) {
      const targetId = this.resolveTargetId(projectId, row.target_title);
      if (targetId !== null) {
        update.run(targetId, row.id);
        resolved++;
      }
    }
    return resolved;
  }

  /** Retry every dangling relation in the project. Returns how many resolved. */
  resolveDanglingRelations(projectId: number): number {
    return this.write('Resolve relations', () => {
      const rows = this.db.prepare<[number], RelationRow>(
        'SELECT * FROM relation WHERE project_id = ? AND to_entity_id IS NULL ORDER BY id',
      ).all(projectId);
      return this.resolveRelations(projectId, rows);
    });
  }

  private writeSearchRow(projectId: number, entityId: number): void {
    const entity = this.db.prepare<[number], EntityRow>('SELECT * FROM entity WHERE id = ?').get(entityId);
    this.db.prepare('DELETE FROM search_index WHERE entity_id = ?').run(entityId);
    if (!entity) return;
    const tags = new Set(parseStringArray(entity.tags));
    const observationTags = this.db.prepare<[number], { tags: string }>(
      'SELECT tags FROM observation WHERE entity_id = ?',
    ).all(entityId);
    for (const row of observationTags) {
      for (const tag of parseStringArray(row.tags)) tags.add(tag);
    }
    this.db.prepare(
      'INSERT INTO search_index (entity_id, project_id, title, body, tags, permalink) VALUES (?, ?, ?, ?, ?, ?)',
    ).run(entityId, projectId, entity.title, entity.body, Array.from(tags).join(' '), entity.permalink);
  }

  /** Regenerate every search row of a project from entity and observation state */
  rebuildSearchIndex(projectId: number): number {
    return this.write('Rebuild search index', () => {
      this.requireProjectId(projectId);
      this.db.prepare('DELETE FROM search_index WHERE project_id = ?').run(projectId);
      const ids = this.db.prepare<[number], { id: number }>('SELECT id FROM entity WHERE project_id = ?').all(projectId);
      for (const { id } of ids) this.writeSearchRow(projectId, id);
      return ids.length;
    });
  }

  /**
   * Delete an entity: its observations and outbound relations go with it.
   * Inbound relations are resolved again against what remains, and dangle
   * only when nothing else matches their link text.
   */
  deleteEntity(projectId: number, entityId: number): boolean {
    return this.write('Delete entity', () => {
      const row = this.entityRow(projectId, entityId);
      if (!row) return false;
      this.removeEntityRow(projectId, row.id);
      return true;
    });
  }

  deleteEntityByPath(projectId: number, filePath: string): Entity | null {
    return this.write('Delete entity', () => {
      const row = this.entityRowByPath(projectId, filePath);
      if (!row) return null;
      this.removeEntityRow(projectId, row.id);
      return toEntity(row);
    });
  }

  /** Must run inside a write transaction */
  private removeEntityRow(projectId: number, entityId: number): void {
    const inbound = this.db.prepare<[number, number], { id: number }>(
      'SELECT id FROM relation WHERE to_entity_id = ? AND from_entity_id != ?',
    ).all(entityId, entityId).map(r => r.id);
    this.db.prepare('DELETE FROM search_index WHERE entity_id = ?').run(entityId);
    this.db.prepare('DELETE FROM entity WHERE id = ?').run(entityId);
    if (inbound.length === 0) return;
    const demoted = this.db.prepare<unknown[], RelationRow>(
      `SELECT * FROM relation WHERE id IN (${placeholders(inbound.length)}) ORDER BY id`,
    ).all(...inbound);
    this.resolveRelations(projectId, demoted);
  }

  /**
   * Rebind an entity to a new path. Graph content and ids are untouched; the
   * permalink changes only when regeneratePermalink is set, in which case it is
   * derived from the new path. With replaceOccupant, an entity already bound to
   * toPath is deleted in the same transaction instead of reported as a conflict.
   */
  moveEntity(
    projectId: number,
    fromPath: string,
    toPath: string,
    options: { checksum?: string | null; regeneratePermalink?: boolean; replaceOccupant?: boolean } = {},
  ): MoveResult {
    return this.write(`Move of ${fromPath}`, (): MoveResult => {
      const row = this.entityRowByPath(projectId, fromPath);
      if (!row) return { moved: false, reason: 'not-found' };
      const occupant = this.entityRowByPath(projectId, toPath);
      if (occupant && occupant.id !== row.id) {
        if (!options.replaceOccupant) return { moved: false, reason: 'conflict', occupant: toEntity(occupant) };
        this.removeEntityRow(projectId, occupant.id);
      }

      const permalink = options.regeneratePermalink
        ? resolvePermalink(
            { title: row.title, selfId: row.id, explicit: permalinkForPath(toPath), current: null },
            candidate => this.permalinkOwner(projectId, candidate),
          )
        : row.permalink;
      const checksum = options.checksum === undefined ? row.checksum : options.checksum;

      this.db.prepare('UPDATE entity SET file_path = ?, permalink = ?, checksum = ?, updated_at = ? WHERE id = ?')
        .run(toPath, permalink, checksum, this.clock.isoNow(), row.id);
      if (permalink !== row.permalink) {
        this.db.prepare('UPDATE search_index SET permalink = ? WHERE entity_id = ?').run(permalink, row.id);
        this.resolveDanglingFor(projectId, row.id);
      }

      const moved = this.entityRow(projectId, row.id);
      if (!moved) throw new StoreConsistencyError(`Entity ${row.id} vanished during move`);
      return { moved: true, entity: toEntity(moved) };
    });
  }

  /** Record the checksum of content written back to the file (e.g. a permalink rewrite) */
  updateChecksum(projectId: number, entityId: number, checksum: string): void {
    this.write('Update checksum', () => {
      if (!this.entityRow(projectId, entityId)) return;
      this.db.prepare('UPDATE entity SET checksum = ? WHERE id = ?').run(checksum, entityId);
    });
  }

  // --- Graph reads ---

  getObservations(projectId: number, entityId: number): Observation[] {
    this.entityRow(projectId, entityId);
    return this.db.prepare<[number], ObservationRow>(
      'SELECT * FROM observation WHERE entity_id = ? ORDER BY position, id',
    ).all(entityId).map(toObservation);
  }

  getOutboundRelations(projectId: number, entityId: number): Relation[] {
    this.entityRow(projectId, entityId);
    return this.db.prepare<[number], RelationRow>(
      'SELECT * FROM relation WHERE from_entity_id = ? ORDER BY position, id',
    ).all(entityId).map(toRelation);
  }

  getInboundRelations(projectId: number, entityId: number): Relation[] {
    this.entityRow(projectId, entityId);
    return this.db.prepare<[number, number], RelationRow>(
      'SELECT * FROM relation WHERE project_id = ? AND to_entity_id = ? ORDER BY id',
    ).all(projectId, entityId).map(toRelation);
  }

  /** Relations with either end in the given set of entities */
  getRelationsTouching(projectId: number, entityIds: readonly number[]): Relation[] {
    if (entityIds.length === 0) return [];
    const list = placeholders(entityIds.length);
    return this.db.prepare<unknown[], RelationRow>(
      `SELECT * FROM relation WHERE project_id = ?
         AND (from_entity_id IN (${list}) OR to_entity_id IN (${list}))
       ORDER BY id`,
    ).all(projectId, ...entityIds, ...entityIds).map(toRelation);
  }

  getDanglingRelations(projectId: number): Relation[] {
    return this.db.prepare<[number], RelationRow>(
      'SELECT * FROM relation WHERE project_id = ? AND to_entity_id IS NULL ORDER BY id',
    ).all(projectId).map(toRelation);
  }

  // --- Queries ---

  query(projectId: number, filters: EntityFilters = {}, pagination?: Partial<Pagination>): Page<Entity> {
    const page = normalizePagination(pagination);
    const clauses = ['project_id = ?'];
    const params: unknown[] = [projectId];
    if (filters.entityTypes && filters.entityTypes.length > 0) {
      clauses.push(`entity_type IN (${placeholders(filters.entityTypes.length)})`);
      params.push(...filters.entityTypes);
    }
    if (filters.folder) {
      const folder = filters.folder.replace(/^\/+|\/+$/g, '');
      if (folder !== '') {
        clauses.push("substr(file_path, 1, length(?) + 1) = ? || '/'");
        params.push(folder, folder);
      }
    }
    if (filters.permalinkGlob) {
      clauses.push('permalink GLOB ?');
      params.push(filters.permalinkGlob);
    }
    if (filters.updatedAfter) {
      clauses.push('updated_at >= ?');
      params.push(filters.updatedAfter);
    }
    const where = clauses.join(' AND ');
    const total = this.db.prepare<unknown[], CountRow>(`SELECT count(*) AS n FROM entity WHERE ${where}`).get(...params)?.n ?? 0;
    const rows = this.db.prepare<unknown[], EntityRow>(
      `SELECT * FROM entity WHERE ${where} ORDER BY updated_at DESC, id DESC LIMIT ? OFFSET ?`,
    ).all(...params, page.pageSize, (page.page - 1) * page.pageSize);
    return toPage(rows.map(toEntity), total, page);
  }

  /** Keyword search ranked by bm25 with title and tag boosting */
  search(projectId: number, query: SearchQuery, pagination?: Partial<Pagination>): Page<SearchHit> {
    const page = normalizePagination(pagination);
    const text = query.text?.trim() ?? '';

    const clauses: string[] = ['e.project_id = ?'];
    const params: unknown[] = [projectId];
    if (query.entityTypes && query.entityTypes.length > 0) {
      clauses.push(`e.entity_type IN (${placeholders(query.entityTypes.length)})`);
      params.push(...query.entityTypes);
    }
    if (query.updatedAfter) {
      clauses.push('e.updated_at >= ?');
      params.push(query.updatedAfter);
    }
    for (const tag of query.tags ?? []) {
      clauses.push(`(EXISTS (SELECT 1 FROM json_each(e.tags) WHERE value = ?)
        OR EXISTS (SELECT 1 FROM observation o, json_each(o.tags) WHERE o.entity_id = e.id AND value = ?))`);
      const bare = tag.replace(/^#+/, '');
      params.push(bare, bare);
    }

    if (text === '') {
      const where = clauses.join(' AND ');
      const total = this.db.prepare<unknown[], CountRow>(`SELECT count(*) AS n FROM entity e WHERE ${where}`).get(...params)?.n ?? 0;
      const rows = this.db.prepare<unknown[], EntityRow>(
        `SELECT e.* FROM entity e WHERE ${where} ORDER BY e.updated_at DESC, e.id DESC LIMIT ? OFFSET ?`,
      ).all(...params, page.pageSize, (page.page - 1) * page.pageSize);
      return toPage(rows.map(r => ({ entity: toEntity(r), score: 0, snippet: null })), total, page);
    }

    const fts = toFtsQuery(text);
    if (fts === null) return toPage([], 0, page);

    const where = ['search_index MATCH ?', 'search_index.project_id = ?', ...clauses].join(' AND ');
    const ftsParams = [fts, projectId, ...params];
    try {
      const total = this.db.prepare<unknown[], CountRow>(
        `SELECT count(*) AS n FROM search_index JOIN entity e ON e.id = search_index.entity_id WHERE ${where}`,
      ).get(...ftsParams)?.n ?? 0;
      const rows = this.db.prepare<unknown[], SearchRow>(
        `SELECT e.*, -bm25(search_index, ${SEARCH_WEIGHTS.join(', ')}) AS score,
           snippet(search_index, ${SEARCH_BODY_COLUMN}, '**', '**', '...', 12) AS snippet
         FROM search_index JOIN entity e ON e.id = search_index.entity_id
         WHERE ${where}
         ORDER BY score DESC, e.id
         LIMIT ? OFFSET ?`,
      ).all(...ftsParams, page.pageSize, (page.page - 1) * page.pageSize);
      const hits = rows.map(r => ({
        entity: toEntity(r),
        score: r.score,
        snippet: r.snippet === null || r.snippet === '' ? null : r.snippet,
      }));
      return toPage(hits, total, page);
    } catch (error) {
      if (isFtsSyntaxError(error)) return toPage([], 0, page);
      throw error;
    }
  }

  stats(projectId: number): ProjectStats {
    const count = (sql: string): number => this.db.prepare<[number], CountRow>(sql).get(projectId)?.n ?? 0;
    return {
      entities: count('SELECT count(*) AS n FROM entity WHERE project_id = ?'),
      observations: count('SELECT count(*) AS n FROM observation o JOIN entity e ON e.id = o.entity_id WHERE e.project_id = ?'),
      relations: count('SELECT count(*) AS n FROM relation WHERE project_id = ?'),
      danglingRelations: count('SELECT count(*) AS n FROM relation WHERE project_id = ? AND to_entity_id IS NULL'),
    };
  }
}
