// Response formatters for MCP tool handlers.
//
// Pure functions: no side effects, no state. Each takes structured data
// and returns the Markdown text of a tool response.

import type { Entity, Page, Project, Relation } from './types.js';
import type { SearchHit } from './store.js';
import type { ScanSummary } from './sync.js';
import type { GraphSnapshot } from './context.js';
import type { DirectoryListing, EditEntityResult, ProjectOverview, WriteEntityResult } from './service.js';
import type { EditOperation } from './edit.js';
import { formatMemoryUrl } from './memory-url.js';

/** "page 1 of 3 (25 total)", or an empty string when everything fits on one page */
export function formatPageFooter(page: Pick<Page<unknown>, 'page' | 'pageSize' | 'total' | 'hasMore'>): string {
  const pages = Math.max(1, Math.ceil(page.total / page.pageSize));
  if (pages === 1 && page.page === 1) return '';
  const next = page.hasMore ? `; next: page ${page.page + 1}` : '';
  return `Page ${page.page} of ${pages} (${page.total} total${next})`;
}

function entityLine(project: Project, entity: Entity): string {
  return `**${entity.title}** (${entity.entityType}) ${formatMemoryUrl(project, entity.permalink)}`;
}

export function formatWriteResult(result: WriteEntityResult): string {
  const { entity } = result;
  const lines = [
    `${result.created ? 'Created' : 'Updated'} note **${entity.title}** in ${result.project.name}`,
    `- file: ${entity.filePath}`,
    `- permalink: ${entity.permalink}`,
    `- url: ${result.url}`,
  ];
  if (entity.tags.length > 0) lines.push(`- tags: ${entity.tags.join(', ')}`);
  return lines.join('\n');
}

export function formatEditResult(operation: EditOperation['kind'], result: EditEntityResult): string {
  const { entity } = result;
  const verb = result.outcome === 'unchanged' ? 'left unchanged' : `edited (${operation})`;
  return [
    `Note **${entity.title}** ${verb} in ${result.project.name}`,
    `- file: ${entity.filePath}`,
    `- permalink: ${entity.permalink}`,
    `- url: ${result.url}`,
  ].join('\n');
}

function plural(count: number, one: string, many: string): string {
  return `${count} ${count === 1 ? one : many}`;
}

export function formatDirectoryListing(listing: DirectoryListing): string {
  const where = `/${listing.dir}`;
  const filter = listing.glob ? ` matching "${listing.glob}"` : '';
  if (listing.entries.length === 0) {
    return `No files found in ${where}${filter} (${listing.project.name}).`;
  }
  const heading = listing.glob
    ? `## Files in ${where}${filter} (${listing.project.name}, depth ${listing.depth})`
    : `## Contents of ${where} (${listing.project.name}, depth ${listing.depth})`;
  const lines = [heading, ''];
  let folders = 0;
  for (const entry of listing.entries) {
    if (entry.kind === 'directory') {
      folders++;
      lines.push(`- ${entry.path}/`);
      continue;
    }
    const { entity } = entry;
    const title = entity.title === entry.name ? '' : ` | ${entity.title}`;
    lines.push(`- ${entry.path}${title} | ${entity.updatedAt.slice(0, 10)}`);
  }
  const files = listing.entries.length - folders;
  lines.push('', `Total: ${plural(listing.entries.length, 'item', 'items')} (${plural(folders, 'directory', 'directories')}, ${plural(files, 'file', 'files')})`);
  return lines.join('\n');
}

export function formatSearchResults(project: Project, query: string, results: Page<SearchHit>): string {
  const heading = query.trim() === '' ? `## Notes in ${project.name}` : `## Search: "${query.trim()}" in ${project.name}`;
  if (results.items.length === 0) {
    return `${heading}\n\nNo matching notes.`;
  }
  const lines = [heading, ''];
  results.items.forEach((hit, i) => {
    const rank = (results.page - 1) * results.pageSize + i + 1;
    lines.push(`${rank}. ${entityLine(project, hit.entity)}`);
    if (hit.snippet) lines.push(`   ${hit.snippet.replace(/\s+/g, ' ').trim()}`);
  });
  const footer = formatPageFooter(results);
  if (footer) lines.push('', footer);
  return lines.join('\n');
}

function relationLine(relation: Relation, titles: ReadonlyMap<number, string>): string {
  const from = titles.get(relation.fromEntityId) ?? `#${relation.fromEntityId}`;
  const to = relation.toEntityId === null
    ? `${relation.targetTitle} (unresolved)`
    : titles.get(relation.toEntityId) ?? relation.targetTitle;
  const context = relation.context ? ` (${relation.context})` : '';
  return `- ${from} --${relation.relationType}--> ${to}${context}`;
}

export function formatContext(project: Project, snapshot: GraphSnapshot): string {
  const { primary, related, edges, metadata } = snapshot;
  if (primary.length === 0) {
    return `Nothing in ${project.name} matches "${metadata.reference}".`;
  }

  const titles = new Map<number, string>();
  for (const node of primary) titles.set(node.entity.id, node.entity.title);
  for (const node of related) titles.set(node.entity.id, node.entity.title);

  const lines: string[] = [`## Context: ${metadata.reference} (${project.name})`, ''];
  for (const { entity, observations } of primary) {
    lines.push(`### ${entity.title}`);
    lines.push(`${formatMemoryUrl(project, entity.permalink)} | ${entity.entityType} | updated ${entity.updatedAt}`);
    if (entity.tags.length > 0) lines.push(`tags: ${entity.tags.join(', ')}`);
    for (const obs of observations) {
      const context = obs.context ? ` (${obs.context})` : '';
      lines.push(`- [${obs.category}] ${obs.content}${context}`);
    }
    lines.push('');
  }

  if (related.length > 0) {
    lines.push(`### Related (depth ${metadata.depth})`);
    for (const node of related) {
      lines.push(`- ${entityLine(project, node.entity)} at depth ${node.depth}`);
    }
    if (metadata.relatedTruncated) {
      lines.push(`- ... more related notes beyond maxRelated=${metadata.maxRelated}`);
    }
    lines.push('');
  }

  if (edges.length > 0) {
    lines.push('### Relations');
    for (const edge of edges) lines.push(relationLine(edge, titles));
    lines.push('');
  }

  const footer = formatPageFooter({
    page: metadata.page,
    pageSize: metadata.pageSize,
    total: metadata.totalPrimary,
    hasMore: metadata.hasMore,
  });
  if (footer) lines.push(footer);
  return lines.join('\n').trimEnd();
}

export function formatRecentActivity(project: Project, timeframe: string, results: Page<Entity>): string {
  const heading = `## Recent activity in ${project.name} (${timeframe})`;
  if (results.items.length === 0) return `${heading}\n\nNo notes changed.`;
  const lines = [heading, ''];
  for (const entity of results.items) {
    lines.push(`- ${entity.updatedAt} ${entityLine(project, entity)}`);
  }
  const footer = formatPageFooter(results);
  if (footer) lines.push('', footer);
  return lines.join('\n');
}

export function formatScanSummary(project: string, summary: ScanSummary): string {
  const parts = [
    `${summary.created} created`,
    `${summary.modified} modified`,
    `${summary.deleted} deleted`,
    `${summary.moved} moved`,
  ];
  if (summary.failed > 0) parts.push(`${summary.failed} failed`);
  const tail = summary.truncated ? '; continuing in the background' : '';
  return `Synced ${project}: ${parts.join(', ')} in ${summary.durationMs}ms${tail}`;
}

export function formatSyncStatus(overviews: readonly ProjectOverview[]): string {
  if (overviews.length === 0) return 'No projects configured.';
  const sections = overviews.map(({ project, stats, status }) => {
    const lines = [
      `### ${project.name}${project.isDefault ? ' (default)' : ''}`,
      `- state: ${status.state}${status.watching ? ', watching' : ''}`,
      `- entities: ${stats.entities}, observations: ${stats.observations}, relations: ${stats.relations} (${stats.danglingRelations} unresolved)`,
      `- processed: ${status.processed}, unchanged: ${status.unchanged}, degraded: ${status.degraded}, skipped: ${status.skipped}`,
      `- pending tasks: ${status.pendingTasks}`,
      `- last scan: ${status.lastScanAt ?? 'never'}${status.lastScanDurationMs === null ? '' : ` (${status.lastScanDurationMs}ms)`}`,
    ];
    if (status.lastError) lines.push(`- last error: ${status.lastError}`);
    if (status.failedPaths.length > 0) lines.push(`- failed paths: ${status.failedPaths.join(', ')}`);
    return lines.join('\n');
  });
  return ['## Sync status', '', sections.join('\n\n')].join('\n');
}

export type ProjectHealth =
  | { readonly status: 'healthy' }
  | { readonly status: 'degraded'; readonly error: string; readonly since: string; readonly recovery: readonly string[] };

export function formatProjects(
  overviews: readonly ProjectOverview[],
  health: ReadonlyMap<string, ProjectHealth>,
): string {
  if (overviews.length === 0) return 'No projects configured. Use create_project to add one.';
  const lines = ['## Projects', ''];
  for (const { project, stats } of overviews) {
    const state: ProjectHealth = health.get(project.name) ?? { status: 'healthy' };
    const marker = project.isDefault ? ' (default)' : '';
    if (state.status === 'degraded') {
      lines.push(`- **${project.name}**${marker}: degraded, ${state.error} (${project.rootPath})`);
    } else {
      lines.push(`- **${project.name}**${marker}: ${stats.entities} notes, ${project.rootPath}`);
    }
  }
  return lines.join('\n');
}
