#!/usr/bin/env node

// Knowledge Graph MCP Server
// Keeps a SQLite knowledge graph in sync with folders of Markdown notes
// Serves several projects at once, each synced independently

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { KnowledgeStore } from './store.js';
import { SyncOrchestrator } from './sync.js';
import { KnowledgeService } from './service.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { InvalidEditError, KnowledgeGraphError, errorMessage } from './errors.js';
import { EDIT_OPERATIONS, type EditOperation } from './edit.js';
import { normalizeArgs } from './normalize.js';
import {
  formatContext, formatDirectoryListing, formatEditResult, formatProjects, formatRecentActivity,
  formatScanSummary, formatSearchResults, formatSyncStatus, formatWriteResult, type ProjectHealth,
} from './formatters.js';
import {
  CrashJournal, buildCrashReport, formatCrashReport, formatCrashSummary,
  markServerStarted, type CrashContext,
} from './crash-journal.js';

// --- Server health state ---
// Degradation ladder: Running -> Degraded -> SafeMode
// Health is a discriminated union, not a boolean flag.

type ServerMode =
  | { readonly kind: 'running' }
  | { readonly kind: 'degraded'; readonly reason: string }
  | { readonly kind: 'safe-mode'; readonly error: string; readonly recovery: readonly string[] };

let serverMode: ServerMode = { kind: 'running' };
const projectHealth = new Map<string, ProjectHealth>();
const serverStartTime = Date.now();

/** Track the last tool call for crash context */
let lastToolCall: string | undefined;

// --- Configuration ---
const { config, origin: configOrigin } = loadConfig();
const logger = createLogger({ level: config.logLevel });
const journal = new CrashJournal(config.crashDir);

/** Set once the store opens; null means safe mode */
let service: KnowledgeService | null = null;
let sync: SyncOrchestrator | null = null;
let store: KnowledgeStore | null = null;

function currentCrashContext(phase: CrashContext['phase']): CrashContext {
  return {
    phase,
    lastToolCall,
    configSource: configOrigin.source,
    projectCount: config.projects.length,
  };
}

// --- Process-level crash protection ---
// On uncaught exception: journal the crash to disk, then die.
// The next startup reports it through the diagnose tool.

function dieWithCrashReport(error: Error, type: 'uncaught-exception' | 'unhandled-rejection'): never {
  logger.error(`FATAL: ${type}; journaling and exiting.`);
  logger.error(error.message);
  if (error.stack) logger.error(`Stack: ${error.stack}`);
  const filepath = journal.writeSync(buildCrashReport(error, type, currentCrashContext('running')));
  if (filepath) logger.error(`Crash report saved: ${filepath}`);
  process.exit(1);
}

process.on('uncaughtException', error => dieWithCrashReport(error, 'uncaught-exception'));
process.on('unhandledRejection', reason => {
  dieWithCrashReport(reason instanceof Error ? reason : new Error(String(reason)), 'unhandled-rejection');
});

// --- Server setup ---

const server = new Server(
  { name: 'knowledge-graph-mcp', version: '0.1.0' },
  { capabilities: { tools: {} } },
);

const projectProperty = {
  type: 'string' as const,
  description: 'Project name. Defaults to the default project when omitted.',
};

const paginationProperties = {
  page: { type: 'number', description: 'Page number, starting at 1', default: 1 },
  pageSize: { type: 'number', description: 'Results per page (1-100)', default: 10 },
};

const identifierProperty = {
  type: 'string',
  description: 'memory:// URL, permalink, title, or file path of the note',
};

// --- Tool definitions ---
server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: [
    {
      name: 'write_note',
      description: 'Create or replace a Markdown note. Observations are list items like "- [category] fact #tag"; relations are "- relation_type [[Target]]". Example: write_note(title: "Coffee", content: "- [method] Pour over #brewing\\n- pairs_with [[Tea]]")',
      inputSchema: {
        type: 'object' as const,
        properties: {
          title: { type: 'string', description: 'Note title; also names the file' },
          content: { type: 'string', description: 'Markdown body' },
          folder: { type: 'string', description: 'Project-relative folder (default: project root)' },
          tags: { type: 'array', items: { type: 'string' }, description: 'Tags written to frontmatter' },
          type: { type: 'string', description: 'Entity type (default: note)' },
          project: projectProperty,
        },
        required: ['title', 'content'],
      },
    },
    {
      name: 'read_note',
      description: 'Read a note\'s file content by memory:// URL, permalink, title, or path.',
      inputSchema: {
        type: 'object' as const,
        properties: { identifier: identifierProperty, project: projectProperty },
        required: ['identifier'],
      },
    },
    {
      name: 'edit_note',
      description: 'Edit a note in place without rewriting it. Operations: append, prepend (after frontmatter), find_replace (needs findText; expectedReplacements defaults to 1), replace_section (needs section, e.g. "## Notes"; added at the end when missing), replace (whole body). Frontmatter is kept as written.',
      inputSchema: {
        type: 'object' as const,
        properties: {
          identifier: identifierProperty,
          operation: { type: 'string', enum: [...EDIT_OPERATIONS] },
          content: { type: 'string', description: 'Text to add or put in place' },
          findText: { type: 'string', description: 'Exact text to replace (find_replace)' },
          expectedReplacements: { type: 'number', description: 'How many times findText must occur', default: 1 },
          section: { type: 'string', description: 'Heading whose content is replaced (replace_section)' },
          project: projectProperty,
        },
        required: ['identifier', 'operation', 'content'],
      },
    },
    {
      name: 'list_directory',
      description: 'List folders and indexed notes under a project folder. Example: list_directory(dir: "/specs", depth: 2, glob: "*api*")',
      inputSchema: {
        type: 'object' as const,
        properties: {
          dir: { type: 'string', description: 'Project folder, "/" for the root', default: '/' },
          depth: { type: 'number', description: 'Levels to descend (1-10)', default: 1 },
          glob: { type: 'string', description: 'Only files whose name matches, e.g. "*.md"' },
          project: projectProperty,
        },
      },
    },
    {
      name: 'search_notes',
      description: 'Keyword search over titles, bodies, tags and permalinks. Titles and tags rank higher. An empty query lists notes by recency.',
      inputSchema: {
        type: 'object' as const,
        properties: {
          query: { type: 'string', description: 'Words or "quoted phrases"; AND/OR/NOT allowed' },
          types: { type: 'array', items: { type: 'string' }, description: 'Only these entity types' },
          tags: { type: 'array', items: { type: 'string' }, description: 'Notes carrying every tag' },
          timeframe: { type: 'string', description: 'Only notes updated within: 7d, 24h, 2 weeks, today, or an ISO date' },
          ...paginationProperties,
          project: projectProperty,
        },
      },
    },
    {
      name: 'build_context',
      description: 'Follow relations from a note (or a permalink glob like "specs/*") and return the surrounding graph.',
      inputSchema: {
        type: 'object' as const,
        properties: {
          url: { type: 'string', description: 'memory://project/permalink, a permalink, title, path, or glob' },
          depth: { type: 'number', description: 'Relation hops to follow (0-5)', default: 1 },
          timeframe: { type: 'string', description: 'Only related notes updated within this window' },
          maxRelated: { type: 'number', description: 'Cap on related notes', default: 10 },
          ...paginationProperties,
          project: projectProperty,
        },
        required: ['url'],
      },
    },
    {
      name: 'recent_activity',
      description: 'Notes changed recently, newest first.',
      inputSchema: {
        type: 'object' as const,
        properties: {
          timeframe: { type: 'string', description: 'Window, e.g. 7d, 24h, today', default: '7d' },
          types: { type: 'array', items: { type: 'string' } },
          ...paginationProperties,
          project: projectProperty,
        },
      },
    },
    {
      name: 'move_note',
      description: 'Move or rename a note\'s file. The note keeps its identity, observations and relations.',
      inputSchema: {
        type: 'object' as const,
        properties: {
          identifier: identifierProperty,
          destination: { type: 'string', description: 'New project-relative path, e.g. archive/coffee.md' },
          project: projectProperty,
        },
        required: ['identifier', 'destination'],
      },
    },
    {
      name: 'delete_note',
      description: 'Delete a note\'s file and its graph data. Relations pointing at it become unresolved.',
      inputSchema: {
        type: 'object' as const,
        properties: { identifier: identifierProperty, project: projectProperty },
        required: ['identifier'],
      },
    },
    {
      name: 'sync_status',
      description: 'Sync state, counters and failures for one project or all of them.',
      inputSchema: { type: 'object' as const, properties: { project: projectProperty } },
    },
    {
      name: 'list_projects',
      description: 'List projects with their folders, note counts and health.',
      inputSchema: { type: 'object' as const, properties: {} },
    },
    {
      name: 'create_project',
      description: 'Register a folder of Markdown notes as a project and sync it.',
      inputSchema: {
        type: 'object' as const,
        properties: {
          name: { type: 'string' },
          path: { type: 'string', description: 'Folder holding the notes (created if missing)' },
          setDefault: { type: 'boolean', default: false },
        },
        required: ['name', 'path'],
      },
    },
    {
      name: 'delete_project',
      description: 'Forget a project and its index. Files on disk are not touched.',
      inputSchema: { type: 'object' as const, properties: { name: { type: 'string' } }, required: ['name'] },
    },
    {
      name: 'set_default_project',
      description: 'Make a project the default for calls that omit "project".',
      inputSchema: { type: 'object' as const, properties: { name: { type: 'string' } }, required: ['name'] },
    },
    {
      name: 'reset_project',
      description: 'Resume a halted project sync with a full rescan. reindex: true drops and rebuilds the project\'s index.',
      inputSchema: {
        type: 'object' as const,
        properties: { name: { type: 'string' }, reindex: { type: 'boolean', default: false } },
        required: ['name'],
      },
    },
    {
      name: 'diagnose',
      description: 'Server health, project health, and the last crash report.',
      inputSchema: {
        type: 'object' as const,
        properties: { showCrashHistory: { type: 'boolean', default: false } },
      },
    },
  ],
}));

const projectArg = z.string().optional();
const pageArgs = {
  page: z.number().int().min(1).optional(),
  pageSize: z.number().int().min(1).max(100).optional(),
};

type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

function text(body: string): ToolResponse {
  return { content: [{ type: 'text', text: body }] };
}

function failure(body: string): ToolResponse {
  return { content: [{ type: 'text', text: body }], isError: true };
}

/** Refuse calls into a project whose startup failed */
function requireHealthyProject(svc: KnowledgeService, ref: string | undefined): void {
  const project = svc.resolveProject(ref);
  const health = projectHealth.get(project.name);
  if (health?.status === 'degraded') {
    throw new KnowledgeGraphError(
      'PROJECT_NOT_FOUND',
      `Project "${project.name}" is degraded: ${health.error}\nRecovery:\n${health.recovery.map(s => `- ${s}`).join('\n')}`,
    );
  }
}

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: rawArgs } = request.params;
  lastToolCall = name;
  const args = normalizeArgs(name, rawArgs);

  // In safe mode, only diagnose and list_projects work
  if (serverMode.kind === 'safe-mode' && name !== 'diagnose' && name !== 'list_projects') {
    return failure([
      `## Knowledge graph server is in Safe Mode`,
      ``,
      `**Reason:** ${serverMode.error}`,
      ``,
      `Available tools in safe mode: diagnose, list_projects`,
      ``,
      `### Recovery Steps`,
      ...serverMode.recovery.map(s => `- ${s}`),
    ].join('\n'));
  }

  try {
    if (name === 'diagnose') {
      const { showCrashHistory } = z.object({ showCrashHistory: z.boolean().default(false) }).parse(args);
      return text(await buildDiagnosticsText(showCrashHistory));
    }

    const svc = service;
    if (!svc) {
      return text(config.projects.map(p => `- ${p.name}: ${p.root} (unavailable, store not open)`).join('\n'));
    }

    switch (name) {
      case 'write_note': {
        const input = z.object({
          title: z.string().min(1),
          content: z.string(),
          folder: z.string().optional(),
          tags: z.array(z.string()).optional(),
          type: z.string().min(1).optional(),
          project: projectArg,
        }).parse(args);
        requireHealthyProject(svc, input.project);
        const result = await svc.writeEntity({ ...input, entityType: input.type });
        return text(formatWriteResult(result));
      }

      case 'read_note': {
        const { identifier, project } = z.object({ identifier: z.string().min(1), project: projectArg }).parse(args);
        requireHealthyProject(svc, project);
        const result = await svc.readEntity(identifier, project);
        if (result.content === null) {
          return text(`${result.entity.title} is not a text file (${result.entity.contentType}): ${result.entity.filePath}`);
        }
        return text(result.content);
      }

      case 'edit_note': {
        const input = z.object({
          identifier: z.string().min(1),
          operation: z.enum(EDIT_OPERATIONS),
          content: z.string(),
          findText: z.string().optional(),
          expectedReplacements: z.number().int().min(1).optional(),
          section: z.string().optional(),
          project: projectArg,
        }).parse(args);
        requireHealthyProject(svc, input.project);
        const operation = toEditOperation(input);
        const result = await svc.editEntity({ identifier: input.identifier, operation, project: input.project });
        return text(formatEditResult(operation.kind, result));
      }

      case 'list_directory': {
        const input = z.object({
          dir: z.string().default('/'),
          depth: z.number().int().min(1).max(10).default(1),
          glob: z.string().optional(),
          project: projectArg,
        }).parse(args);
        requireHealthyProject(svc, input.project);
        return text(formatDirectoryListing(svc.listDirectory(input)));
      }

      case 'search_notes': {
        const input = z.object({
          query: z.string().default(''),
          types: z.array(z.string()).optional(),
          tags: z.array(z.string()).optional(),
          timeframe: z.string().optional(),
          ...pageArgs,
          project: projectArg,
        }).parse(args);
        requireHealthyProject(svc, input.project);
        const { project, results } = svc.search(
          { text: input.query, entityTypes: input.types, tags: input.tags, timeframe: input.timeframe, project: input.project },
          { page: input.page, pageSize: input.pageSize },
        );
        return text(formatSearchResults(project, input.query, results));
      }

      case 'build_context': {
        const input = z.object({
          url: z.string().min(1),
          depth: z.number().int().min(0).max(5).optional(),
          timeframe: z.string().optional(),
          maxRelated: z.number().int().min(0).max(1000).optional(),
          ...pageArgs,
          project: projectArg,
        }).parse(args);
        const { project, snapshot } = svc.buildContext(input);
        return text(formatContext(project, snapshot));
      }

      case 'recent_activity': {
        const input = z.object({
          timeframe: z.string().default('7d'),
          types: z.array(z.string()).optional(),
          ...pageArgs,
          project: projectArg,
        }).parse(args);
        requireHealthyProject(svc, input.project);
        const { project, results } = svc.recentActivity(
          { timeframe: input.timeframe, entityTypes: input.types, project: input.project },
          { page: input.page, pageSize: input.pageSize },
        );
        return text(formatRecentActivity(project, input.timeframe, results));
      }

      case 'move_note': {
        const { identifier, destination, project } = z.object({
          identifier: z.string().min(1),
          destination: z.string().min(1),
          project: projectArg,
        }).parse(args);
        requireHealthyProject(svc, project);
        const entity = await svc.moveEntity(identifier, destination, project);
        return text(`Moved **${entity.title}** to ${entity.filePath} (permalink: ${entity.permalink})`);
      }

      case 'delete_note': {
        const { identifier, project } = z.object({ identifier: z.string().min(1), project: projectArg }).parse(args);
        requireHealthyProject(svc, project);
        const entity = await svc.deleteEntity(identifier, project);
        return text(`Deleted **${entity.title}** (${entity.filePath})`);
      }

      case 'sync_status': {
        const { project } = z.object({ project: projectArg }).parse(args);
        return text(formatSyncStatus(svc.syncStatus(project)));
      }

      case 'list_projects': {
        const modeLine = serverMode.kind === 'running' ? '' : `\n\nServer mode: ${serverMode.kind}`;
        return text(`${formatProjects(svc.listProjects(), projectHealth)}${modeLine}`);
      }

      case 'create_project': {
        const { name: projectName, path: root, setDefault } = z.object({
          name: z.string().min(1),
          path: z.string().min(1),
          setDefault: z.boolean().default(false),
        }).parse(args);
        const { project, scan } = await svc.createProject({ name: projectName, rootPath: root, setDefault });
        projectHealth.set(project.name, { status: 'healthy' });
        return text(`Created project **${project.name}** at ${project.rootPath}\n${formatScanSummary(project.name, scan)}`);
      }

      case 'delete_project': {
        const { name: projectName } = z.object({ name: z.string().min(1) }).parse(args);
        const project = await svc.removeProject(projectName);
        projectHealth.delete(project.name);
        return text(`Removed project **${project.name}**. Files in ${project.rootPath} were not touched.`);
      }

      case 'set_default_project': {
        const { name: projectName } = z.object({ name: z.string().min(1) }).parse(args);
        const project = svc.setDefaultProject(projectName);
        return text(`Default project is now **${project.name}**`);
      }

      case 'reset_project': {
        const { name: projectName, reindex } = z.object({
          name: z.string().min(1),
          reindex: z.boolean().default(false),
        }).parse(args);
        const project = svc.resolveProject(projectName);
        const scan = await svc.resetProject(project.name, { reindex });
        projectHealth.set(project.name, { status: 'healthy' });
        refreshServerMode();
        return text(formatScanSummary(project.name, scan));
      }

      default:
        return failure(`Unknown tool: ${name}`);
    }
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(i => `${i.path.join('.') || '(arguments)'}: ${i.message}`);
      return failure(`Error: invalid arguments for ${name}\n${issues.map(i => `- ${i}`).join('\n')}`);
    }
    const hint = error instanceof KnowledgeGraphError && error.code === 'PROJECT_NOT_FOUND'
      ? '\n\nHint: use list_projects to see available projects.'
      : '';
    return failure(`Error: ${errorMessage(error)}${hint}`);
  }
});

// --- Helpers ---

/** Pair each edit operation with the arguments it needs */
function toEditOperation(input: {
  operation: EditOperation['kind'];
  content: string;
  findText?: string;
  expectedReplacements?: number;
  section?: string;
}): EditOperation {
  const { operation, content } = input;
  switch (operation) {
    case 'find_replace':
      if (input.findText === undefined) throw new InvalidEditError('find_replace needs findText');
      return { kind: operation, content, findText: input.findText, expectedReplacements: input.expectedReplacements };
    case 'replace_section':
      if (input.section === undefined) throw new InvalidEditError('replace_section needs section');
      return { kind: operation, content, section: input.section };
    case 'append':
    case 'prepend':
    case 'replace':
      return { kind: operation, content };
  }
}

function refreshServerMode(): void {
  if (!store) return;
  const names = store.listProjects().map(p => p.name);
  const degraded = names.filter(n => projectHealth.get(n)?.status === 'degraded');
  if (names.length > 0 && degraded.length === names.length) {
    serverMode = {
      kind: 'safe-mode',
      error: `All ${names.length} project(s) failed to initialize.`,
      recovery: [
        'Check that project folders in the config exist and are readable.',
        `Check permissions on ${config.home}.`,
        'Restart the server to retry.',
        'Call diagnose for detailed error information.',
      ],
    };
  } else if (degraded.length > 0) {
    serverMode = { kind: 'degraded', reason: `${degraded.length} project(s) degraded: ${degraded.join(', ')}` };
  } else {
    serverMode = { kind: 'running' };
  }
}

async function buildDiagnosticsText(showFullCrashHistory: boolean): Promise<string> {
  const sections: string[] = [];

  sections.push(`## Knowledge Graph Server Diagnostics`);
  sections.push('');
  sections.push(`**Server mode:** ${serverMode.kind}`);
  if (serverMode.kind === 'degraded') sections.push(`**Reason:** ${serverMode.reason}`);
  if (serverMode.kind === 'safe-mode') sections.push(`**Reason:** ${serverMode.error}`);
  sections.push(`**Uptime:** ${Math.round((Date.now() - serverStartTime) / 1000)}s`);
  sections.push(`**Config source:** ${configOrigin.source === 'file' ? configOrigin.path : configOrigin.source}`);
  sections.push(`**Database:** ${config.databasePath}`);
  sections.push('');

  sections.push(`### Project Health`);
  if (store && sync) {
    for (const project of store.listProjects()) {
      const health = projectHealth.get(project.name) ?? { status: 'healthy' as const };
      if (health.status === 'degraded') {
        sections.push(`- **${project.name}**: degraded since ${health.since}: ${health.error}`);
        for (const step of health.recovery) sections.push(`  - ${step}`);
        continue;
      }
      const status = sync.status(project);
      const stats = store.stats(project.id);
      const issues = status.lastError ? `, last error: ${status.lastError}` : '';
      sections.push(`- **${project.name}**: ${status.state} (${stats.entities} notes, ${status.skipped} skipped${issues})`);
    }
  } else {
    sections.push('- store not open; no project is being served');
  }
  sections.push('');

  const latest = await journal.readLatest();
  if (latest) {
    sections.push(formatCrashReport(latest));
  } else {
    sections.push('No recent crash reports.');
  }

  if (showFullCrashHistory) {
    const history = await journal.readHistory();
    sections.push('');
    sections.push(`### Crash History (${history.length})`);
    for (const report of history) sections.push(`- ${formatCrashSummary(report)}`);
  }

  return sections.join('\n');
}

/** Start every registered project; a failing project is marked degraded and the rest keep going */
async function startProjects(activeStore: KnowledgeStore, activeSync: SyncOrchestrator): Promise<void> {
  const projects = activeStore.listProjects();
  const results = await activeSync.startProjects(projects, { watch: config.watch });
  for (const result of results) {
    const { project } = result;
    if (result.ok) {
      projectHealth.set(project.name, { status: 'healthy' });
      logger.info(formatScanSummary(project.name, result.scan));
      continue;
    }
    const message = errorMessage(result.error);
    logger.error(`Project "${project.name}" failed to start: ${message}`);
    projectHealth.set(project.name, {
      status: 'degraded',
      error: message,
      since: new Date().toISOString(),
      recovery: [
        `Verify the folder exists: ${project.rootPath}`,
        'Check file permissions on the folder.',
        `Call reset_project(name: "${project.name}") to retry.`,
      ],
    });
    const report = buildCrashReport(result.error, 'project-init-failure', {
      phase: 'startup',
      project: project.name,
      configSource: configOrigin.source,
      projectCount: projects.length,
    });
    await journal.write(report).catch(writeError => {
      logger.warn(`Could not journal project failure: ${errorMessage(writeError)}`);
    });
  }
  refreshServerMode();
  const modeStr = serverMode.kind === 'running' ? '' : ` [${serverMode.kind.toUpperCase()}]`;
  const healthy = projects.filter(p => projectHealth.get(p.name)?.status === 'healthy').length;
  logger.info(`Sync started${modeStr}: ${healthy}/${projects.length} project(s) healthy`);
}

/** Make sure every configured project is registered */
function registerConfiguredProjects(activeStore: KnowledgeStore): void {
  for (const { name, root } of config.projects) {
    const existing = activeStore.getProject(name);
    if (!existing) {
      activeStore.createProject({ name, rootPath: root });
      logger.info(`Registered project "${name}" -> ${root}`);
    } else if (existing.rootPath !== root) {
      logger.warn(`Project "${name}" is registered at ${existing.rootPath}, config says ${root}; keeping the registered folder`);
    }
  }
  if (config.defaultProject) {
    const preferred = activeStore.getProject(config.defaultProject);
    if (preferred) activeStore.setDefaultProject(preferred.id);
    else logger.warn(`defaultProject "${config.defaultProject}" is not a known project`);
  }
}

async function main(): Promise<void> {
  markServerStarted();

  const previousCrash = await journal.readLatest();
  if (previousCrash) {
    logger.warn(`Previous crash detected: ${formatCrashSummary(previousCrash)}`);
    logger.warn('Details are available through the diagnose tool.');
  }

  try {
    const opened = await KnowledgeStore.open({ databasePath: config.databasePath });
    registerConfiguredProjects(opened);
    store = opened;
    sync = new SyncOrchestrator({
      store: opened,
      settings: config.sync,
      logger,
      onHalt: (project, error) => {
        const report = buildCrashReport(error, 'sync-halted', { ...currentCrashContext('running'), project: project.name });
        journal.write(report).catch(writeError => {
          logger.warn(`Could not journal sync halt: ${errorMessage(writeError)}`);
        });
      },
    });
    service = new KnowledgeService({ store: opened, sync, watch: config.watch, logger });
    logger.info(`Knowledge store -> ${config.databasePath}`);
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`Knowledge store failed to open: ${message}`);
    serverMode = {
      kind: 'safe-mode',
      error: `Knowledge store failed to open: ${message}`,
      recovery: [
        `Check that ${config.databasePath} is writable and not locked by another process.`,
        'If the database is corrupt, move it aside; it is rebuilt from the notes on the next start.',
        'Restart the server to retry.',
      ],
    };
    await journal.write(buildCrashReport(error, 'startup-failure', currentCrashContext('startup'))).catch(writeError => {
      logger.warn(`Could not journal startup failure: ${errorMessage(writeError)}`);
    });
  }

  const transport = new StdioServerTransport();

  transport.onerror = (error) => {
    logger.error(`Transport error: ${error.message}`);
    journal.writeSync(buildCrashReport(error, 'transport-error', currentCrashContext('running')));
  };

  server.onerror = (error) => {
    logger.error(`Server error: ${error.message}`);
  };

  const shutdown = (reason: string) => {
    logger.info(`${reason}; shutting down.`);
    const stopping = sync ? sync.stopAll() : Promise.resolve();
    stopping
      .then(() => {
        store?.close();
        process.exit(0);
      }, (error: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
  };

  // Host disconnects close stdin; a broken stdout means nobody is listening
  process.stdin.on('end', () => shutdown('stdin closed'));
  process.stdout.on('error', (error) => shutdown(`stdout error (${error.message})`));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.connect(transport);
  logger.info(`Server started with ${config.projects.length} configured project(s)`);

  // Sync after connecting so tools answer while the initial scans run
  if (store && sync) await startProjects(store, sync);
}

main().catch((error: unknown) => {
  logger.error(`Fatal startup error: ${errorMessage(error)}`);
  if (error instanceof Error && error.stack) logger.error(`Stack: ${error.stack}`);
  journal.writeSync(buildCrashReport(error, 'startup-failure', currentCrashContext('startup')));
  process.exit(1);
});
