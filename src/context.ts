// Context traversal: a read-only breadth-first walk over persisted relations.
//
// The walk starts from every entity the reference resolves to, follows
// resolved relations in both directions, and never visits an entity twice, so
// cyclic graphs terminate at any depth.

import type { Clock, Entity, Observation, Project, Relation } from './types.js';
import { normalizePagination, realClock } from './types.js';
import type { KnowledgeStore } from './store.js';
import { normalizePermalink } from './permalink.js';
import { InvalidReferenceError } from './errors.js';

export const DEFAULT_CONTEXT_DEPTH = 1;
export const MAX_CONTEXT_DEPTH = 5;
export const DEFAULT_MAX_RELATED = 10;

export interface ContextOptions {
  readonly depth?: number;
  /** "7d", "24h", "2 weeks", "today", "yesterday", or an ISO date */
  readonly timeframe?: string;
  readonly maxRelated?: number;
  readonly page?: number;
  readonly pageSize?: number;
  readonly clock?: Clock;
}

export interface PrimaryNode {
  readonly entity: Entity;
  readonly observations: readonly Observation[];
}

export interface RelatedNode {
  readonly entity: Entity;
  /** Hops from the nearest primary entity */
  readonly depth: number;
  /** Relation through which the walk first reached this entity */
  readonly viaRelationId: number;
}

export interface GraphSnapshot {
  readonly primary: readonly PrimaryNode[];
  readonly related: readonly RelatedNode[];
  /** Relations among the returned entities, plus dangling relations leaving them */
  readonly edges: readonly Relation[];
  readonly metadata: {
    readonly reference: string;
    readonly depth: number;
    readonly timeframe: string | null;
    readonly since: string | null;
    readonly maxRelated: number;
    readonly totalPrimary: number;
    readonly page: number;
    readonly pageSize: number;
    readonly hasMore: boolean;
    /** True when maxRelated cut the walk short */
    readonly relatedTruncated: boolean;
    readonly generatedAt: string;
  };
}

const UNIT_MS: Record<string, number> = {
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 7 * 86_400_000,
  mo: 30 * 86_400_000,
};

const UNIT_ALIASES: Record<string, string> = {
  m: 'm', min: 'm', mins: 'm', minute: 'm', minutes: 'm',
  h: 'h', hr: 'h', hrs: 'h', hour: 'h', hours: 'h',
  d: 'd', day: 'd', days: 'd',
  w: 'w', wk: 'w', wks: 'w', week: 'w', weeks: 'w',
  mo: 'mo', month: 'mo', months: 'mo',
};

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/** Lower bound on updated_at for a timeframe expression; null if unrecognized */
export function parseTimeframe(raw: string, now: Date): Date | null {
  const text = raw.trim().toLowerCase();
  if (text === '') return null;
  if (text === 'today') return startOfUtcDay(now);
  if (text === 'yesterday') return new Date(startOfUtcDay(now).getTime() - UNIT_MS.d);

  const relative = /^(\d+)\s*([a-z]+)(?:\s+ago)?$/.exec(text);
  if (relative) {
    const unit = UNIT_ALIASES[relative[2]];
    if (unit === undefined) return null;
    return new Date(now.getTime() - Number(relative[1]) * UNIT_MS[unit]);
  }

  if (/^\d{4}-\d{2}-\d{2}/.test(text)) {
    const parsed = new Date(raw.trim());
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
}

/** Entities a reference names: permalink glob, else permalink, title, file path */
export function resolveReference(store: KnowledgeStore, project: Project, reference: string): Entity[] {
  const text = reference.trim();
  if (text === '') return [];
  if (text.includes('*')) return store.findByPermalinkGlob(project.id, text);

  const byPermalink = store.getEntityByPermalink(project.id, text);
  if (byPermalink) return [byPermalink];
  const normalized = normalizePermalink(text);
  if (normalized !== null && normalized !== text) {
    const entity = store.getEntityByPermalink(project.id, normalized);
    if (entity) return [entity];
  }
  const byTitle = store.getEntitiesByTitle(project.id, text);
  if (byTitle.length > 0) return byTitle;
  const byPath = store.getEntityByPath(project.id, text) ?? store.getEntityByPath(project.id, `${text}.md`);
  return byPath ? [byPath] : [];
}

function clampInt(value: number | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(value)));
}

export function buildContext(
  store: KnowledgeStore,
  project: Project,
  reference: string,
  options: ContextOptions = {},
): GraphSnapshot {
  const clock = options.clock ?? realClock;
  const now = clock.now();
  const depth = clampInt(options.depth, DEFAULT_CONTEXT_DEPTH, 0, MAX_CONTEXT_DEPTH);
  const maxRelated = clampInt(options.maxRelated, DEFAULT_MAX_RELATED, 0, 1000);
  const pagination = normalizePagination({ page: options.page, pageSize: options.pageSize });

  let since: Date | null = null;
  if (options.timeframe !== undefined && options.timeframe.trim() !== '') {
    since = parseTimeframe(options.timeframe, now);
    if (since === null) {
      throw new InvalidReferenceError(`Unrecognized timeframe "${options.timeframe}" (try 7d, 24h, 2 weeks, today, or an ISO date)`);
    }
  }
  const sinceIso = since?.toISOString() ?? null;

  const matches = resolveReference(store, project, reference);
  const offset = (pagination.page - 1) * pagination.pageSize;
  const pageEntities = matches.slice(offset, offset + pagination.pageSize);

  const visited = new Set<number>(pageEntities.map(e => e.id));
  const related: RelatedNode[] = [];
  let truncated = false;
  let frontier = pageEntities.map(e => e.id);

  for (let hop = 1; hop <= depth && frontier.length > 0; hop++) {
    const next: number[] = [];
    for (const relation of store.getRelationsTouching(project.id, frontier)) {
      for (const endpoint of [relation.fromEntityId, relation.toEntityId]) {
        if (endpoint === null || visited.has(endpoint)) continue;
        visited.add(endpoint);
        const entity = store.getEntity(project.id, endpoint);
        if (!entity) continue;
        if (sinceIso !== null && entity.updatedAt < sinceIso) continue;
        if (related.length >= maxRelated) {
          truncated = true;
          continue;
        }
        related.push({ entity, depth: hop, viaRelationId: relation.id });
        next.push(endpoint);
      }
    }
    frontier = next;
  }

  const included = new Set<number>([...pageEntities.map(e => e.id), ...related.map(r => r.entity.id)]);
  const edges = store.getRelationsTouching(project.id, Array.from(included)).filter(relation =>
    included.has(relation.fromEntityId) && (relation.toEntityId === null || included.has(relation.toEntityId)),
  );

  return {
    primary: pageEntities.map(entity => ({ entity, observations: store.getObservations(project.id, entity.id) })),
    related,
    edges,
    metadata: {
      reference,
      depth,
      timeframe: options.timeframe?.trim() || null,
      since: sinceIso,
      maxRelated,
      totalPrimary: matches.length,
      page: pagination.page,
      pageSize: pagination.pageSize,
      hasMore: offset + pageEntities.length < matches.length,
      relatedTruncated: truncated,
      generatedAt: clock.isoNow(),
    },
  };
}
