// Configuration loading for the knowledge graph server.
//
// Priority: config file (KG_MCP_CONFIG or <home>/config.json) -> env vars -> single default project
// Graceful degradation: each source falls through to the next on failure.

import { readFileSync } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { DEFAULT_SYNC_SETTINGS, type SyncSettings } from './sync.js';
import { createLogger, parseLogLevel, type LogLevel, type Logger } from './logger.js';
import { errnoCode, errorMessage } from './errors.js';

/** How the config was loaded; path only exists when source is 'file' */
export type ConfigOrigin =
  | { readonly source: 'file'; readonly path: string }
  | { readonly source: 'env' }
  | { readonly source: 'default' };

export interface ProjectConfig {
  readonly name: string;
  readonly root: string;
}

export interface ServerConfig {
  /** Server state directory: database, crash journal */
  readonly home: string;
  readonly projects: readonly ProjectConfig[];
  readonly defaultProject: string | null;
  readonly databasePath: string;
  readonly crashDir: string;
  readonly sync: SyncSettings;
  readonly watch: boolean;
  readonly logLevel: LogLevel;
}

export interface LoadedConfig {
  readonly config: ServerConfig;
  readonly origin: ConfigOrigin;
}

export interface LoadConfigOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly homedir?: string;
  /** Receives warnings about the config itself */
  readonly logger?: Logger;
}

const ProjectEntrySchema = z.union([
  z.string().min(1),
  z.object({ root: z.string().min(1) }),
]);

const ConfigFileSchema = z.object({
  projects: z.record(z.string().min(1), ProjectEntrySchema),
  defaultProject: z.string().optional(),
  databasePath: z.string().optional(),
  syncDelayMs: z.number().optional(),
  maxPendingEvents: z.number().optional(),
  maxScanDurationMs: z.number().optional(),
  ioRetryAttempts: z.number().optional(),
  ioRetryDelayMs: z.number().optional(),
  updatePermalinksOnMove: z.boolean().optional(),
  writePermalinks: z.boolean().optional(),
  watch: z.boolean().optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

type NumericSetting = 'syncDelayMs' | 'maxPendingEvents' | 'maxScanDurationMs' | 'ioRetryAttempts' | 'ioRetryDelayMs';

const SETTING_RANGES: Record<NumericSetting, readonly [number, number]> = {
  syncDelayMs: [0, 60_000],
  maxPendingEvents: [1, 1_000_000],
  maxScanDurationMs: [1_000, 86_400_000],
  ioRetryAttempts: [1, 10],
  ioRetryDelayMs: [0, 10_000],
};

/** Integer setting within range, or the default with a warning */
function clampSetting(key: NumericSetting, value: number | undefined, logger: Logger): number {
  const fallback = DEFAULT_SYNC_SETTINGS[key];
  if (value === undefined) return fallback;
  const [min, max] = SETTING_RANGES[key];
  if (!Number.isFinite(value) || value < min || value > max) {
    logger.warn(`${key} out of range [${min}, ${max}]: ${value} (using default ${fallback})`);
    return fallback;
  }
  return Math.round(value);
}

/** Validated sync settings from a config file's values */
export function parseSyncSettings(raw: Partial<ConfigFile>, logger: Logger): SyncSettings {
  return {
    syncDelayMs: clampSetting('syncDelayMs', raw.syncDelayMs, logger),
    maxPendingEvents: clampSetting('maxPendingEvents', raw.maxPendingEvents, logger),
    maxScanDurationMs: clampSetting('maxScanDurationMs', raw.maxScanDurationMs, logger),
    ioRetryAttempts: clampSetting('ioRetryAttempts', raw.ioRetryAttempts, logger),
    ioRetryDelayMs: clampSetting('ioRetryDelayMs', raw.ioRetryDelayMs, logger),
    updatePermalinksOnMove: raw.updatePermalinksOnMove ?? DEFAULT_SYNC_SETTINGS.updatePermalinksOnMove,
    writePermalinks: raw.writePermalinks ?? DEFAULT_SYNC_SETTINGS.writePermalinks,
  };
}

/** Expand ~ and $HOME, then resolve against base */
export function resolveRoot(root: string, home: string, base: string): string {
  const expanded = root.replace(/^\$HOME(?=$|[\\/])/, home).replace(/^~(?=$|[\\/])/, home);
  return path.resolve(base, expanded);
}

function envLogLevel(env: NodeJS.ProcessEnv, logger: Logger): LogLevel | null {
  const raw = env.KG_MCP_LOG_LEVEL;
  if (!raw) return null;
  const level = parseLogLevel(raw);
  if (!level) logger.warn(`Ignoring KG_MCP_LOG_LEVEL="${raw}" (expected debug, info, warn or error)`);
  return level;
}

/** Load server config with priority: config file -> env vars -> single default project */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const homedir = options.homedir ?? os.homedir();
  const logger = options.logger ?? createLogger();
  const home = env.KG_MCP_HOME ? resolveRoot(env.KG_MCP_HOME, homedir, process.cwd()) : path.join(homedir, '.knowledge-graph-mcp');
  const envDatabase = env.KG_MCP_DB ? resolveRoot(env.KG_MCP_DB, homedir, process.cwd()) : null;

  const base = {
    home,
    crashDir: path.join(home, 'crashes'),
    databasePath: envDatabase ?? path.join(home, 'knowledge.db'),
    logLevel: envLogLevel(env, logger) ?? 'info',
  };

  // 1. Config file (highest priority)
  const configPath = env.KG_MCP_CONFIG ? resolveRoot(env.KG_MCP_CONFIG, homedir, process.cwd()) : path.join(home, 'config.json');
  try {
    const raw: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      logger.warn(`Invalid ${configPath}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    } else {
      const file = parsed.data;
      const configDir = path.dirname(configPath);
      const projects = Object.entries(file.projects).map(([name, entry]): ProjectConfig => ({
        name,
        root: resolveRoot(typeof entry === 'string' ? entry : entry.root, homedir, configDir),
      }));
      if (projects.length > 0) {
        logger.info(`Loaded ${projects.length} project(s) from ${configPath}`);
        return {
          config: {
            ...base,
            projects,
            defaultProject: file.defaultProject ?? null,
            databasePath: file.databasePath ? resolveRoot(file.databasePath, homedir, configDir) : base.databasePath,
            sync: parseSyncSettings(file, logger),
            watch: file.watch ?? true,
            logLevel: file.logLevel ?? base.logLevel,
          },
          origin: { source: 'file', path: configPath },
        };
      }
      logger.warn(`${configPath} lists no projects`);
    }
  } catch (error: unknown) {
    // A missing config file is the common case
    if (errnoCode(error) !== 'ENOENT') {
      logger.warn(`Failed to read ${configPath}: ${errorMessage(error)}`);
    }
  }

  const defaults = { ...base, defaultProject: null, sync: DEFAULT_SYNC_SETTINGS, watch: true };

  // 2. Env var project map
  const projectsJson = env.KG_MCP_PROJECTS;
  if (projectsJson) {
    const parsed = z.record(z.string().min(1), z.string().min(1)).safeParse(safeJson(projectsJson));
    if (parsed.success && Object.keys(parsed.data).length > 0) {
      const projects = Object.entries(parsed.data).map(([name, root]) => ({ name, root: resolveRoot(root, homedir, process.cwd()) }));
      logger.info(`Loaded ${projects.length} project(s) from KG_MCP_PROJECTS`);
      return { config: { ...defaults, projects }, origin: { source: 'env' } };
    }
    logger.warn('Ignoring KG_MCP_PROJECTS: expected a JSON object of project name -> folder');
  }

  // 3. Single default project
  const root = path.join(homedir, 'knowledge');
  logger.info(`Using single default project at ${root}`);
  return { config: { ...defaults, projects: [{ name: 'main', root }] }, origin: { source: 'default' } };
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
