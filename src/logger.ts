// Leveled logging to stderr. stdout belongs to the MCP stdio transport,
// so nothing here may ever write to it.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** Parse a raw string into a LogLevel, returning null for invalid input */
export function parseLogLevel(raw: string): LogLevel | null {
  const lower = raw.trim().toLowerCase();
  return LOG_LEVELS.find(level => level === lower) ?? null;
}

export type LogSink = (line: string) => void;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger whose lines are tagged with a scope, e.g. a project name */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly sink?: LogSink;
  readonly scope?: string;
}

export const LOG_PREFIX = '[kg-mcp]';

const stderrSink: LogSink = line => {
  process.stderr.write(`${line}\n`);
};

const LEVEL_TAGS: Record<LogLevel, string> = {
  debug: 'debug: ',
  info: '',
  warn: 'Warning: ',
  error: 'Error: ',
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const sink = options.sink ?? stderrSink;
  const scopeTag = options.scope ? ` [${options.scope}]` : '';

  const emit = (level: LogLevel, message: string): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    sink(`${LOG_PREFIX}${scopeTag} ${LEVEL_TAGS[level]}${message}`);
  };

  return {
    debug: message => emit('debug', message),
    info: message => emit('info', message),
    warn: message => emit('warn', message),
    error: message => emit('error', message),
    child: scope => createLogger({
      level: options.level,
      sink,
      scope: options.scope ? `${options.scope}/${scope}` : scope,
    }),
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = createLogger({ level: 'error', sink: () => {} });
