// memory:// references: memory://<project-permalink>/<entity-permalink or path>

import type { Project } from './types.js';
import { InvalidReferenceError } from './errors.js';

export const MEMORY_SCHEME = 'memory://';

export interface MemoryReference {
  /** Project named in the URL; null for a bare reference resolved in the caller's project */
  readonly project: string | null;
  /** Permalink, title, path, or permalink glob */
  readonly path: string;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export function isMemoryUrl(raw: string): boolean {
  return raw.trim().toLowerCase().startsWith(MEMORY_SCHEME);
}

export function parseMemoryUrl(raw: string): MemoryReference {
  const text = raw.trim();
  if (!isMemoryUrl(text)) {
    const bare = text.replace(/^\/+/, '');
    if (bare === '') throw new InvalidReferenceError('Reference is empty');
    return { project: null, path: bare };
  }

  const rest = text.slice(MEMORY_SCHEME.length);
  const slash = rest.indexOf('/');
  const project = decodeSegment(slash === -1 ? rest : rest.slice(0, slash)).trim();
  const entityPath = slash === -1 ? '' : rest.slice(slash + 1).split('/').map(decodeSegment).join('/').replace(/^\/+|\/+$/g, '');
  if (project === '') throw new InvalidReferenceError(`"${raw}" names no project`);
  if (entityPath === '') throw new InvalidReferenceError(`"${raw}" names no entity`);
  return { project, path: entityPath };
}

export function formatMemoryUrl(project: Pick<Project, 'permalink'>, entityPermalink: string): string {
  return `${MEMORY_SCHEME}${project.permalink}/${entityPermalink}`;
}
