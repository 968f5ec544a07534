// Permalink derivation and collision resolution.
//
// Permalinks are unique per project. Collisions get the first free numeric
// suffix (slug, slug-1, slug-2, ...), so the outcome depends only on which
// permalinks are already taken.

import crypto from 'crypto';

/** Letters NFD does not decompose into a base letter plus marks */
const TRANSLITERATIONS: Readonly<Record<string, string>> = {
  'ø': 'o',
  'æ': 'ae',
  'œ': 'oe',
  'ß': 'ss',
  'đ': 'd',
  'ð': 'd',
  'ł': 'l',
  'þ': 'th',
  'ħ': 'h',
  'ı': 'i',
};

function slugify(text: string): string {
  const stripped = text
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .normalize('NFC')
    .replace(/(\p{Ll})(\p{Lu})/gu, '$1-$2')
    .toLowerCase();

  let transliterated = '';
  for (const ch of stripped) {
    transliterated += TRANSLITERATIONS[ch] ?? ch;
  }

  return transliterated
    .replace(/[\s_/.]+/gu, '-')
    .replace(/[^\p{L}\p{N}-]/gu, '')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');
}

/** Derive a URL-safe slug from a title. Never returns an empty string. */
export function generatePermalink(title: string): string {
  const slug = slugify(title);
  if (slug !== '') return slug;
  const hash = crypto.createHash('sha256').update(title).digest('hex');
  return `note-${hash.substring(0, 8)}`;
}

/** Normalize a permalink given explicitly (frontmatter, tool input). '/' separates segments. */
export function normalizePermalink(raw: string): string | null {
  const segments = raw.split('/').map(slugify).filter(s => s !== '');
  return segments.length > 0 ? segments.join('/') : null;
}

export interface PermalinkRequest {
  readonly title: string;
  /** Entity already bound to this file, if any */
  readonly selfId: number | null;
  /** Permalink asked for explicitly (frontmatter, or the new path on a regenerating move) */
  readonly explicit: string | null;
  /** Permalink already recorded for this entity */
  readonly current: string | null;
}

/** Returns the id of the entity holding a permalink, or null when it is free */
export type PermalinkOwnerLookup = (permalink: string) => number | null;

/**
 * Pick the permalink for an entity: the explicit one, else the recorded one,
 * else a slug of the title. A taken candidate gets the first free numeric suffix.
 * Must run inside the transaction that writes the result.
 */
export function resolvePermalink(request: PermalinkRequest, ownerOf: PermalinkOwnerLookup): string {
  const available = (permalink: string): boolean => {
    const owner = ownerOf(permalink);
    return owner === null || owner === request.selfId;
  };

  const explicit = request.explicit ? normalizePermalink(request.explicit) : null;
  if (explicit && available(explicit)) return explicit;
  if (request.current && available(request.current)) return request.current;

  return firstAvailable(explicit ?? generatePermalink(request.title), available);
}

/** Permalink derived from a project-relative file path: folder/stem, slugged per segment */
export function permalinkForPath(filePath: string): string | null {
  return normalizePermalink(filePath.replace(/\\/g, '/').replace(/\.[^./]*$/, ''));
}

function firstAvailable(base: string, available: (permalink: string) => boolean): string {
  if (available(base)) return base;
  for (let suffix = 1; ; suffix++) {
    const candidate = `${base}-${suffix}`;
    if (available(candidate)) return candidate;
  }
}

/** Make a title safe to use as a file name (without extension) */
export function sanitizeFilename(title: string): string {
  const cleaned = title
    .trim()
    .replace(/:/g, '-')
    .replace(/\./g, '_')
    .replace(/[^\p{L}\p{N}\p{M}_\- ]/gu, '_')
    .replace(/_+/g, '_')
    .replace(/^[_ ]+|[_ ]+$/g, '');
  return cleaned === '' ? 'untitled' : cleaned;
}
