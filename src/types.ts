// Core types for the knowledge graph engine
//
// Design principles:
//   - Make illegal states unrepresentable: discriminated unions over boolean+optional
//   - Validate at boundaries, trust inside: parse functions at system edges
//   - Every entity, observation and relation is scoped by an explicit project

/** A frontmatter value as YAML can express it, after dates are turned into ISO strings */
export type FrontmatterValue =
  | string
  | number
  | boolean
  | null
  | readonly FrontmatterValue[]
  | { readonly [key: string]: FrontmatterValue };

/** Ordered key -> value mapping; unrecognized keys pass through rewrites unchanged */
export type Frontmatter = ReadonlyMap<string, FrontmatterValue>;

/** Convert an arbitrary decoded value (YAML or JSON) into a FrontmatterValue */
export function toFrontmatterValue(raw: unknown): FrontmatterValue {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'string' || typeof raw === 'boolean') return raw;
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : String(raw);
  if (typeof raw === 'bigint') return raw.toString();
  if (raw instanceof Date) return isNaN(raw.getTime()) ? null : raw.toISOString();
  if (Array.isArray(raw)) return raw.map(toFrontmatterValue);
  if (raw instanceof Map) {
    const out: Record<string, FrontmatterValue> = {};
    for (const [k, v] of raw) out[String(k)] = toFrontmatterValue(v);
    return out;
  }
  if (typeof raw === 'object') {
    const out: Record<string, FrontmatterValue> = {};
    for (const [k, v] of Object.entries(raw)) out[k] = toFrontmatterValue(v);
    return out;
  }
  return String(raw);
}

/** Read a frontmatter value as a plain string, if it is a scalar */
export function frontmatterString(value: FrontmatterValue | undefined): string | null {
  if (typeof value === 'string') return value.trim() === '' ? null : value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
}

/** Injectable clock for deterministic time in tests */
export interface Clock {
  now(): Date;
  isoNow(): string;
}

/** Production clock using real wall time */
export const realClock: Clock = {
  now: () => new Date(),
  isoNow: () => new Date().toISOString(),
};

/** A pending timer that can be cancelled */
export interface ScheduledTask {
  cancel(): void;
}

/** Timer boundary for debouncing, injected so tests can drive time by hand */
export interface Scheduler {
  /** Milliseconds on a monotonic-enough scale */
  now(): number;
  schedule(fn: () => void, delayMs: number): ScheduledTask;
}

export const realScheduler: Scheduler = {
  now: () => Date.now(),
  schedule: (fn, delayMs) => {
    const timer = setTimeout(fn, delayMs);
    return { cancel: () => clearTimeout(timer) };
  },
};

/** An isolated namespace of notes rooted at one directory */
export interface Project {
  readonly id: number;
  readonly name: string;
  readonly permalink: string;
  readonly rootPath: string;
  readonly isDefault: boolean;
  readonly createdAt: string;
}

/** Content type recorded for files that are parsed into graph content */
export const MARKDOWN_CONTENT_TYPE = 'text/markdown';

/** Graph node bound to one source file */
export interface Entity {
  readonly id: number;
  readonly projectId: number;
  readonly title: string;
  readonly permalink: string;
  readonly filePath: string;          // relative to the project root, '/'-separated
  readonly entityType: string;
  readonly contentType: string;
  readonly checksum: string | null;
  readonly tags: readonly string[];
  readonly frontmatter: Frontmatter;
  readonly createdAt: string;          // ISO 8601
  readonly updatedAt: string;          // ISO 8601
}

/** Atomic fact owned by one entity */
export interface Observation {
  readonly id: number;
  readonly entityId: number;
  readonly category: string;
  readonly content: string;
  readonly tags: readonly string[];
  readonly context: string | null;
}

/** Directed, typed edge. toEntityId is null while the target does not exist ("dangling") */
export interface Relation {
  readonly id: number;
  readonly projectId: number;
  readonly fromEntityId: number;
  readonly toEntityId: number | null;
  readonly targetTitle: string;
  readonly relationType: string;
  readonly context: string | null;
}

export interface ObservationDraft {
  readonly category: string;
  readonly content: string;
  readonly tags: readonly string[];
  readonly context: string | null;
}

export interface RelationDraft {
  readonly relationType: string;
  readonly target: string;
  readonly context: string | null;
}

/** Graph content extracted from one file, before identity is assigned */
export interface EntityContent {
  readonly title: string;
  readonly entityType: string;
  readonly contentType: string;
  /** Permalink requested by frontmatter, if any */
  readonly explicitPermalink: string | null;
  readonly tags: readonly string[];
  readonly frontmatter: Frontmatter;
  readonly body: string;
  readonly observations: readonly ObservationDraft[];
  readonly relations: readonly RelationDraft[];
}

/** A non-fatal problem found while parsing; the file is still indexed */
export interface ParseIssue {
  readonly line: number;
  readonly message: string;
}

export interface ParsedDraft extends EntityContent {
  readonly hasFrontmatter: boolean;
  /** False when a frontmatter block exists but could not be read as a YAML mapping */
  readonly frontmatterValid: boolean;
  readonly issues: readonly ParseIssue[];
}

/** Input to the store: parsed content bound to a file */
export interface EntityDraft extends EntityContent {
  readonly filePath: string;
  readonly checksum: string | null;
}

/** Path-level change, shared by full scans and watch mode */
export type ChangeEvent =
  | { readonly kind: 'created' | 'modified' | 'deleted'; readonly path: string }
  | { readonly kind: 'moved'; readonly path: string; readonly from: string };

export type ChangeKind = ChangeEvent['kind'];

/** Per-project sync state machine */
export type SyncState = 'idle' | 'scanning' | 'applying' | 'watching' | 'error';

export interface Pagination {
  readonly page: number;       // 1-based
  readonly pageSize: number;
}

export interface Page<T> {
  readonly items: readonly T[];
  readonly page: number;
  readonly pageSize: number;
  readonly total: number;
  readonly hasMore: boolean;
}

export const DEFAULT_PAGINATION: Pagination = { page: 1, pageSize: 10 };

/** Clamp page numbers into a valid range */
export function normalizePagination(p?: Partial<Pagination>): Pagination {
  const page = Math.max(1, Math.floor(p?.page ?? DEFAULT_PAGINATION.page));
  const pageSize = Math.min(100, Math.max(1, Math.floor(p?.pageSize ?? DEFAULT_PAGINATION.pageSize)));
  return { page, pageSize };
}

/** Snapshot of a project's sync progress, reported in aggregate */
export interface SyncStatus {
  readonly project: string;
  readonly state: SyncState;
  readonly watching: boolean;
  readonly processed: number;
  /** Changes that needed no write (checksum unchanged) */
  readonly unchanged: number;
  /** Files indexed with parse issues or without graph content */
  readonly degraded: number;
  /** Files that could not be read after retries */
  readonly skipped: number;
  readonly failedPaths: readonly string[];
  readonly pendingTasks: number;
  readonly lastScanAt: string | null;
  readonly lastScanDurationMs: number | null;
  readonly lastError: string | null;
}
