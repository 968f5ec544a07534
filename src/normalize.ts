// Argument normalization for MCP tool calls.
//
// Agents frequently guess wrong param names. This module resolves common aliases
// and coerces obvious shapes before zod validation, avoiding wasted round-trips.
// Pure functions: no side effects, no state.

/** Aliases that mean the same thing for every tool */
const COMMON_ALIASES: Record<string, string> = {
  workspace: 'project',
  repo: 'project',
  tag: 'tags',
  labels: 'tags',
  type: 'types',
  entityTypes: 'types',
  entity_types: 'types',
  page_size: 'pageSize',
  limit: 'pageSize',
};

/** Per-tool aliases, applied after the common ones */
const TOOL_ALIASES: Record<string, Record<string, string>> = {
  write_note: {
    name: 'title',
    key: 'title',
    text: 'content',
    body: 'content',
    value: 'content',
    directory: 'folder',
    dir: 'folder',
  },
  read_note: { id: 'identifier', url: 'identifier', permalink: 'identifier', title: 'identifier', path: 'identifier' },
  search_notes: { text: 'query', search: 'query', q: 'query', keyword: 'query', since: 'timeframe' },
  build_context: { identifier: 'url', permalink: 'url', uri: 'url', since: 'timeframe', max_related: 'maxRelated' },
  recent_activity: { since: 'timeframe' },
  move_note: {
    id: 'identifier', url: 'identifier', permalink: 'identifier', title: 'identifier', from: 'identifier',
    to: 'destination', destination_path: 'destination', path: 'destination', newPath: 'destination',
  },
  edit_note: {
    id: 'identifier', url: 'identifier', permalink: 'identifier', title: 'identifier', path: 'identifier',
    op: 'operation', mode: 'operation',
    text: 'content', body: 'content',
    find: 'findText', find_text: 'findText', search: 'findText',
    heading: 'section', header: 'section',
    expected_replacements: 'expectedReplacements', count: 'expectedReplacements',
  },
  list_directory: {
    dir_name: 'dir', directory: 'dir', folder: 'dir', path: 'dir',
    file_name_glob: 'glob', pattern: 'glob',
  },
  delete_note: { id: 'identifier', url: 'identifier', permalink: 'identifier', title: 'identifier', path: 'identifier' },
  create_project: { project: 'name', root: 'path', folder: 'path', directory: 'path', default: 'setDefault', set_default: 'setDefault' },
  delete_project: { project: 'name' },
  set_default_project: { project: 'name' },
  reset_project: { project: 'name', rebuild: 'reindex' },
};

/** Params that take a list; a comma-separated string is split */
const LIST_PARAMS = new Set(['tags', 'types']);

/** Params that take a number; numeric strings are converted */
const NUMBER_PARAMS = new Set(['page', 'pageSize', 'depth', 'maxRelated', 'expectedReplacements']);

function renameKeys(args: Record<string, unknown>, aliases: Record<string, string>): void {
  for (const [alias, canonical] of Object.entries(aliases)) {
    if (alias in args && !(canonical in args)) {
      args[canonical] = args[alias];
      delete args[alias];
    }
  }
}

/** Normalize args before zod validation: resolve aliases, split lists, parse numbers */
export function normalizeArgs(
  toolName: string,
  raw: Record<string, unknown> | undefined,
): Record<string, unknown> {
  const args: Record<string, unknown> = { ...(raw ?? {}) };

  renameKeys(args, TOOL_ALIASES[toolName] ?? {});
  renameKeys(args, COMMON_ALIASES);
  // write_note takes a single entity type
  if (toolName === 'write_note') renameKeys(args, { types: 'type' });

  for (const key of LIST_PARAMS) {
    const value = args[key];
    if (typeof value === 'string') {
      args[key] = value.split(',').map(v => v.trim()).filter(v => v !== '');
    }
  }

  for (const key of NUMBER_PARAMS) {
    const value = args[key];
    if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
      args[key] = Number(value);
    }
  }

  // An empty project means "use the default"
  if (args['project'] === '' || args['project'] === null) delete args['project'];

  return args;
}
