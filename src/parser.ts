// Markdown knowledge parser: raw file bytes -> draft graph fragment.
//
// Grammar (list items outside fenced code blocks):
//   - [category] content #tag #tag (context)     observation
//   - content with a #tag (context)              observation, category "note"
//   - relation_type [[Target Title]] (context)   relation
//   [[Target]] anywhere else in the body         "links_to" relation
// Anything else is plain body. Malformed pieces are skipped and reported as
// issues; only undecodable (binary) content fails the parse.

import path from 'path';
import { parseDocument, isMap, stringify } from 'yaml';
import {
  MARKDOWN_CONTENT_TYPE,
  frontmatterString,
  toFrontmatterValue,
  type EntityContent,
  type Frontmatter,
  type FrontmatterValue,
  type ObservationDraft,
  type ParsedDraft,
  type ParseIssue,
  type RelationDraft,
} from './types.js';

export interface ParseError {
  readonly kind: 'binary' | 'encoding';
  readonly message: string;
}

export type ParseOutcome =
  | { readonly ok: true; readonly draft: ParsedDraft }
  | { readonly ok: false; readonly error: ParseError };

export const DEFAULT_ENTITY_TYPE = 'note';
export const DEFAULT_CATEGORY = 'note';
export const DEFAULT_RELATION_TYPE = 'relates_to';
export const INLINE_LINK_TYPE = 'links_to';

const FRONTMATTER_RE = /^---[ \t]*\r?\n(?:([\s\S]*?)\r?\n)?---[ \t]*(?:\r?\n|$)/;
const LIST_ITEM_RE = /^\s*[-*+]\s+(.*)$/;
const TASK_RE = /^\[[ xX-]\](?:\s|$)/;
const CATEGORY_RE = /^\[([^\[\]]*)\]\s*(.*)$/;
const FENCE_RE = /^\s*(`{3,}|~{3,})/;
const HEADING_RE = /^#{1,6}\s+(.+?)\s*#*\s*$/;
const WIKI_LINK_RE = /\[\[([^\[\]]*)\]\]/g;
const TAG_BODY_RE = /^[\p{L}\p{N}_/-]+$/u;

// --- Decoding ---

/** Decode bytes as UTF-8 text, or explain why the file is not text */
export function decodeText(bytes: Uint8Array): { ok: true; text: string } | { ok: false; error: ParseError } {
  if (bytes.includes(0)) {
    return { ok: false, error: { kind: 'binary', message: 'File contains NUL bytes' } };
  }
  try {
    return { ok: true, text: new TextDecoder('utf-8', { fatal: true }).decode(bytes) };
  } catch {
    return { ok: false, error: { kind: 'encoding', message: 'File is not valid UTF-8' } };
  }
}

// --- Frontmatter ---

export interface SplitDocument {
  /** YAML text between the fences; null when the file has no frontmatter block */
  readonly yaml: string | null;
  readonly body: string;
  /** Number of lines the frontmatter block occupies */
  readonly bodyLineOffset: number;
}

export function splitFrontmatter(text: string): SplitDocument {
  const match = FRONTMATTER_RE.exec(text);
  if (!match) return { yaml: null, body: text, bodyLineOffset: 0 };
  const block = match[0];
  const newlines = block.split('\n').length - 1;
  return {
    yaml: match[1] ?? '',
    body: text.slice(block.length),
    bodyLineOffset: block.endsWith('\n') ? newlines : newlines + 1,
  };
}

type FrontmatterResult =
  | { readonly valid: true; readonly frontmatter: Frontmatter }
  | { readonly valid: false; readonly reason: string };

export function parseFrontmatter(yamlText: string): FrontmatterResult {
  const doc = parseDocument(yamlText);
  if (doc.errors.length > 0) {
    return { valid: false, reason: `Malformed frontmatter: ${doc.errors[0].message.split('\n')[0]}` };
  }
  const data: unknown = doc.toJS();
  if (data === null || data === undefined) return { valid: true, frontmatter: new Map() };
  if (typeof data !== 'object' || Array.isArray(data)) {
    return { valid: false, reason: 'Frontmatter is not a key/value mapping' };
  }
  const frontmatter = new Map<string, FrontmatterValue>();
  for (const [key, value] of Object.entries(data)) {
    frontmatter.set(key, toFrontmatterValue(value));
  }
  return { valid: true, frontmatter };
}

/** Serialize a new document. splitFrontmatter(renderDocument(fm, body)).body === body */
export function renderDocument(frontmatter: Frontmatter, body: string): string {
  if (frontmatter.size === 0) return body;
  const yamlText = stringify(Object.fromEntries(frontmatter), { lineWidth: 0 });
  return `---\n${yamlText}---\n${body}`;
}

/**
 * Set frontmatter keys in an existing document, keeping every other key,
 * key order and comments. Returns null when the existing block is not a
 * valid mapping, since rewriting it would lose data.
 */
export function updateFrontmatter(text: string, updates: Readonly<Record<string, FrontmatterValue>>): string | null {
  const split = splitFrontmatter(text);
  if (split.yaml === null) {
    return renderDocument(new Map(Object.entries(updates)), text);
  }
  const doc = parseDocument(split.yaml);
  if (doc.errors.length > 0) return null;
  if (doc.contents !== null && !isMap(doc.contents)) return null;
  for (const [key, value] of Object.entries(updates)) {
    doc.set(key, value);
  }
  return `---\n${doc.toString({ lineWidth: 0 })}---\n${split.body}`;
}

function frontmatterTags(value: FrontmatterValue | undefined): string[] {
  const raw: FrontmatterValue[] = [];
  if (Array.isArray(value)) {
    raw.push(...value);
  } else if (typeof value === 'string') {
    raw.push(...value.split(','));
  }
  const tags: string[] = [];
  for (const item of raw) {
    const tag = frontmatterString(item)?.replace(/^#+/, '').trim();
    if (tag && !tags.includes(tag)) tags.push(tag);
  }
  return tags;
}

// --- Body ---

/** Tags are whitespace-delimited tokens starting with '#'; '#a#b' holds two tags */
export function extractTags(text: string): string[] {
  const tags: string[] = [];
  for (const token of text.split(/\s+/)) {
    if (!token.startsWith('#') || token.startsWith('##')) continue;
    for (const piece of token.split('#')) {
      const tag = piece.replace(/[.,;:!?)\]]+$/, '');
      if (tag !== '' && TAG_BODY_RE.test(tag) && !tags.includes(tag)) tags.push(tag);
    }
  }
  return tags;
}

/** Split a trailing balanced "(context)" off a piece of text */
export function splitContext(text: string): { text: string; context: string | null } {
  const trimmed = text.trimEnd();
  if (!trimmed.endsWith(')')) return { text: trimmed, context: null };
  let depth = 0;
  for (let i = trimmed.length - 1; i >= 0; i--) {
    const ch = trimmed[i];
    if (ch === ')') depth++;
    else if (ch === '(') {
      depth--;
      if (depth === 0) {
        const context = trimmed.slice(i + 1, -1).trim();
        return { text: trimmed.slice(0, i).trimEnd(), context: context === '' ? null : context };
      }
    }
  }
  return { text: trimmed, context: null };
}

function wikiTargets(text: string): string[] {
  const targets: string[] = [];
  for (const match of text.matchAll(WIKI_LINK_RE)) {
    const target = match[1].split('|')[0].trim();
    if (target !== '') targets.push(target);
  }
  return targets;
}

type ListItem =
  | { readonly kind: 'observation'; readonly observation: ObservationDraft }
  | { readonly kind: 'relation'; readonly relation: RelationDraft }
  | { readonly kind: 'issue'; readonly message: string }
  | { readonly kind: 'plain' };

function parseObservation(category: string, rest: string): ListItem {
  const { text, context } = splitContext(rest);
  const content = text.trim();
  if (content === '') {
    return { kind: 'issue', message: `Observation [${category}] has no content` };
  }
  return {
    kind: 'observation',
    observation: { category, content, tags: extractTags(content), context },
  };
}

function parseRelation(item: string): ListItem | null {
  const open = item.indexOf('[[');
  const close = item.indexOf(']]', open);
  if (open < 0 || close < 0) return null;

  const after = item.slice(close + 2).trim();
  const { text: trailing, context } = splitContext(after);
  // "type [[Target]] prose" is prose with an inline link, not a relation line
  if (trailing !== '') return null;

  const target = item.slice(open + 2, close).split('|')[0].trim();
  if (target === '') return { kind: 'issue', message: 'Relation has an empty target' };
  const relationType = item.slice(0, open).trim().replace(/\s+/g, ' ');
  return {
    kind: 'relation',
    relation: { relationType: relationType || DEFAULT_RELATION_TYPE, target, context },
  };
}

export function classifyListItem(item: string): ListItem {
  const text = item.trim();
  if (TASK_RE.test(text)) return { kind: 'plain' };

  if (text.startsWith('[') && !text.startsWith('[[')) {
    const match = CATEGORY_RE.exec(text);
    if (match) return parseObservation(match[1].trim() || DEFAULT_CATEGORY, match[2]);
  }

  if (text.includes('[[')) {
    const relation = parseRelation(text);
    if (relation) return relation;
  }

  if (extractTags(text).length > 0) return parseObservation(DEFAULT_CATEGORY, text);
  return { kind: 'plain' };
}

interface BodyScan {
  heading: string | null;
  readonly observations: ObservationDraft[];
  readonly relations: RelationDraft[];
  readonly issues: ParseIssue[];
}

function scanBody(body: string, lineOffset: number): BodyScan {
  const scan: BodyScan = { heading: null, observations: [], relations: [], issues: [] };
  const seenRelations = new Set<string>();
  const addRelation = (relation: RelationDraft): void => {
    const key = `${relation.relationType}\u0000${relation.target}`;
    if (seenRelations.has(key)) return;
    seenRelations.add(key);
    scan.relations.push(relation);
  };

  let fence: string | null = null;
  const lines = body.split(/\r?\n/);

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    const lineNumber = index + 1 + lineOffset;
    const fenceMatch = FENCE_RE.exec(line);
    if (fenceMatch) {
      const marker = fenceMatch[1];
      if (fence === null) fence = marker;
      else if (marker[0] === fence[0] && marker.length >= fence.length) fence = null;
      continue;
    }
    if (fence !== null) continue;

    if (scan.heading === null) {
      const heading = HEADING_RE.exec(line);
      if (heading) scan.heading = heading[1].trim();
    }

    const listItem = LIST_ITEM_RE.exec(line);
    const item = listItem ? classifyListItem(listItem[1]) : ({ kind: 'plain' } as const);
    switch (item.kind) {
      case 'observation':
        scan.observations.push(item.observation);
        break;
      case 'relation':
        addRelation(item.relation);
        continue;
      case 'issue':
        scan.issues.push({ line: lineNumber, message: item.message });
        break;
      case 'plain':
        break;
    }
    for (const target of wikiTargets(line)) {
      addRelation({ relationType: INLINE_LINK_TYPE, target, context: null });
    }
  }

  if (fence !== null) {
    scan.issues.push({ line: lines.length + lineOffset, message: 'Unclosed code fence' });
  }
  return scan;
}

function fileStem(filePath: string): string {
  return path.posix.basename(filePath.replace(/\\/g, '/')).replace(/\.[^.]*$/, '');
}

// --- Entry points ---

/** Parse a Markdown file into a draft. filePath is used for the fallback title. */
export function parseKnowledge(bytes: Uint8Array, filePath: string): ParseOutcome {
  const decoded = decodeText(bytes);
  if (!decoded.ok) return decoded;
  return { ok: true, draft: parseMarkdown(decoded.text, filePath) };
}

export function parseMarkdown(text: string, filePath: string): ParsedDraft {
  const issues: ParseIssue[] = [];
  const split = splitFrontmatter(text);

  let frontmatter: Frontmatter = new Map();
  let frontmatterValid = true;
  if (split.yaml !== null) {
    const result = parseFrontmatter(split.yaml);
    if (result.valid) {
      frontmatter = result.frontmatter;
    } else {
      frontmatterValid = false;
      issues.push({ line: 1, message: result.reason });
    }
  }

  const scan = scanBody(split.body, split.bodyLineOffset);
  issues.push(...scan.issues);

  return {
    title: frontmatterString(frontmatter.get('title')) ?? scan.heading ?? fileStem(filePath),
    entityType: frontmatterString(frontmatter.get('type')) ?? DEFAULT_ENTITY_TYPE,
    contentType: MARKDOWN_CONTENT_TYPE,
    explicitPermalink: frontmatterString(frontmatter.get('permalink')),
    tags: frontmatterTags(frontmatter.get('tags')),
    frontmatter,
    body: split.body,
    observations: scan.observations,
    relations: scan.relations,
    hasFrontmatter: split.yaml !== null,
    frontmatterValid,
    issues,
  };
}

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.txt': 'text/plain',
  '.json': 'application/json',
  '.csv': 'text/csv',
  '.html': 'text/html',
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.svg': 'image/svg+xml',
  '.webp': 'image/webp',
  '.canvas': 'application/json',
};

export function contentTypeFor(filePath: string): string {
  const ext = path.posix.extname(filePath.toLowerCase());
  return CONTENT_TYPES[ext] ?? 'application/octet-stream';
}

/** Entity content for a file that is tracked but not parsed into graph content */
export function fileEntityContent(filePath: string): EntityContent {
  return {
    title: path.posix.basename(filePath.replace(/\\/g, '/')),
    entityType: 'file',
    contentType: contentTypeFor(filePath),
    explicitPermalink: null,
    tags: [],
    frontmatter: new Map(),
    body: '',
    observations: [],
    relations: [],
  };
}
