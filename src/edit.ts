// In-place note edits. Each operation rewrites the Markdown body only; a
// frontmatter block is carried over byte for byte.

import { splitFrontmatter } from './parser.js';
import { InvalidEditError } from './errors.js';

export const EDIT_OPERATIONS = ['append', 'prepend', 'find_replace', 'replace_section', 'replace'] as const;

export type EditOperation =
  | { readonly kind: 'append'; readonly content: string }
  | { readonly kind: 'prepend'; readonly content: string }
  | { readonly kind: 'find_replace'; readonly content: string; readonly findText: string; readonly expectedReplacements?: number }
  | { readonly kind: 'replace_section'; readonly content: string; readonly section: string }
  | { readonly kind: 'replace'; readonly content: string };

const HEADING_RE = /^#{1,6}(?:\s|$)/;

export function applyEdit(text: string, operation: EditOperation): string {
  const { body } = splitFrontmatter(text);
  const frontmatterBlock = text.slice(0, text.length - body.length);
  return frontmatterBlock + editBody(body, operation);
}

function editBody(body: string, operation: EditOperation): string {
  switch (operation.kind) {
    case 'append':
      if (body === '' || body.endsWith('\n')) return body + operation.content;
      return `${body}\n${operation.content}`;
    case 'prepend':
      if (operation.content === '' || operation.content.endsWith('\n')) return operation.content + body;
      return `${operation.content}\n${body}`;
    case 'find_replace':
      return findReplace(body, operation.findText, operation.content, operation.expectedReplacements ?? 1);
    case 'replace_section':
      return replaceSection(body, operation.section, operation.content);
    case 'replace':
      return operation.content;
  }
}

function findReplace(body: string, findText: string, replacement: string, expected: number): string {
  if (findText.trim() === '') throw new InvalidEditError('find_replace needs non-empty find text');
  // split/join: replacement text is literal, "$&" and friends included
  const pieces = body.split(findText);
  const found = pieces.length - 1;
  if (found === 0) throw new InvalidEditError(`Text to replace not found: "${findText}"`);
  if (found !== expected) {
    throw new InvalidEditError(`Expected ${expected} occurrence(s) of "${findText}", found ${found}`);
  }
  return pieces.join(replacement);
}

/**
 * Replace the lines under one heading, up to the next heading of any level.
 * A heading given without "#" is taken as level two. A missing heading is
 * appended to the end with the new content under it.
 */
function replaceSection(body: string, section: string, content: string): string {
  const trimmed = section.trim();
  if (trimmed === '') throw new InvalidEditError('replace_section needs a section heading');
  const heading = trimmed.startsWith('#') ? trimmed : `## ${trimmed}`;

  const lines = body.split('\n');
  const matches = lines.flatMap((line, index) => (line.trim() === heading ? [index] : []));
  if (matches.length > 1) {
    throw new InvalidEditError(`Heading "${heading}" appears ${matches.length} times; section edits need a unique heading`);
  }
  if (matches.length === 0) {
    const separator = body === '' || body.endsWith('\n\n') ? '' : body.endsWith('\n') ? '\n' : '\n\n';
    return `${body}${separator}${heading}\n${content}`;
  }

  const start = matches[0];
  let end = start + 1;
  while (end < lines.length && !HEADING_RE.test(lines[end])) end++;
  const head = lines.slice(0, start + 1).join('\n');
  if (end === lines.length) return `${head}\n${content}`;
  const next = lines.slice(end).join('\n');
  return `${head}\n${content}${content.endsWith('\n') ? '' : '\n'}${next}`;
}
