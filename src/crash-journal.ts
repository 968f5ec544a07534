// Crash journal: persistent, human-readable record of server failures.
//
// Design principles:
//   - Errors are data: crashes become structured records, not silent deaths
//   - Every failure is visible on next startup (diagnose tool)
//   - Fail fast: journal then die, never keep serving from unknown state
//
// Location: <home>/crashes/
//   crash-<timestamp>.json  one file per crash
//   LATEST.json             copy of the most recent crash

import { promises as fs, mkdirSync, writeFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { errnoCode } from './errors.js';

export type CrashType =
  | 'uncaught-exception'
  | 'unhandled-rejection'
  | 'startup-failure'
  | 'project-init-failure'
  | 'sync-halted'
  | 'transport-error'
  | 'unknown';

const CrashContextSchema = z.object({
  phase: z.enum(['startup', 'running', 'shutdown']),
  lastToolCall: z.string().optional(),
  project: z.string().optional(),
  configSource: z.string().optional(),
  projectCount: z.number().optional(),
});

const CrashReportSchema = z.object({
  timestamp: z.string(),
  pid: z.number(),
  error: z.string(),
  stack: z.string().optional(),
  type: z.enum([
    'uncaught-exception', 'unhandled-rejection', 'startup-failure',
    'project-init-failure', 'sync-halted', 'transport-error', 'unknown',
  ]),
  context: CrashContextSchema,
  recovery: z.array(z.string()),
  serverUptime: z.number(),
});

/** What the server was doing when it crashed */
export type CrashContext = z.infer<typeof CrashContextSchema>;
export type CrashReport = z.infer<typeof CrashReportSchema>;

const MAX_CRASH_FILES = 20;
const LATEST = 'LATEST.json';

let serverStartTime = Date.now();

/** Reset the start time (called on startup) */
export function markServerStarted(): void {
  serverStartTime = Date.now();
}

function crashFileName(report: CrashReport): string {
  return `crash-${report.timestamp.replace(/[:.]/g, '-')}.json`;
}

/** Parse a stored report; null for anything that is not one */
export function parseCrashReport(text: string): CrashReport | null {
  try {
    const parsed = CrashReportSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export class CrashJournal {
  constructor(readonly dir: string) {}

  private get latestPath(): string {
    return path.join(this.dir, LATEST);
  }

  async write(report: CrashReport): Promise<string> {
    await fs.mkdir(this.dir, { recursive: true });
    const filepath = path.join(this.dir, crashFileName(report));
    const content = JSON.stringify(report, null, 2);
    await fs.writeFile(filepath, content, 'utf-8');
    await fs.writeFile(this.latestPath, content, 'utf-8');
    await this.prune();
    return filepath;
  }

  /** Synchronous version for process exit handlers, where async work never completes */
  writeSync(report: CrashReport): string | null {
    try {
      mkdirSync(this.dir, { recursive: true });
      const filepath = path.join(this.dir, crashFileName(report));
      const content = JSON.stringify(report, null, 2);
      writeFileSync(filepath, content, 'utf-8');
      writeFileSync(this.latestPath, content, 'utf-8');
      return filepath;
    } catch {
      return null;
    }
  }

  /** Keep the newest MAX_CRASH_FILES reports */
  private async prune(): Promise<void> {
    const files = await this.crashFiles();
    await Promise.all(files.slice(MAX_CRASH_FILES).map(old => fs.rm(path.join(this.dir, old), { force: true })));
  }

  private async crashFiles(): Promise<string[]> {
    try {
      return (await fs.readdir(this.dir))
        .filter(f => f.startsWith('crash-') && f.endsWith('.json'))
        .sort()
        .reverse();
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return [];
      throw error;
    }
  }

  async readLatest(): Promise<CrashReport | null> {
    try {
      return parseCrashReport(await fs.readFile(this.latestPath, 'utf-8'));
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return null;
      throw error;
    }
  }

  /** Newest first; unreadable or corrupt files are skipped */
  async readHistory(limit: number = 10): Promise<CrashReport[]> {
    const reports: CrashReport[] = [];
    for (const file of (await this.crashFiles()).slice(0, limit)) {
      const text = await fs.readFile(path.join(this.dir, file), 'utf-8').catch(() => null);
      const report = text === null ? null : parseCrashReport(text);
      if (report) reports.push(report);
    }
    return reports;
  }

  /** Clear the latest crash indicator once it has been shown */
  async clearLatest(): Promise<void> {
    await fs.rm(this.latestPath, { force: true });
  }
}

/** Build a CrashReport from an error */
export function buildCrashReport(
  error: unknown,
  type: CrashType,
  context: CrashContext,
  now: Date = new Date(),
): CrashReport {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return {
    timestamp: now.toISOString(),
    pid: process.pid,
    error: message,
    stack,
    type,
    context,
    recovery: generateRecoverySteps(type, message, context),
    serverUptime: Math.round((now.getTime() - serverStartTime) / 1000),
  };
}

/** Human-readable recovery instructions based on crash type */
export function generateRecoverySteps(type: CrashType, message: string, context: CrashContext): string[] {
  const steps: string[] = ['Restart the MCP server from your client.'];

  switch (type) {
    case 'startup-failure':
      if (message.includes('config')) {
        steps.push('Check the config file for JSON syntax errors.');
        steps.push('Verify every project folder in "projects" exists on disk.');
      }
      if (message.includes('ENOENT') || message.includes('not found')) {
        steps.push('Verify the path named in the error exists and is accessible.');
      }
      steps.push('Run the server directly (node dist/index.js) to see its stderr output.');
      break;

    case 'project-init-failure':
      steps.push(`Project "${context.project ?? 'unknown'}" failed to initialize.`);
      steps.push('Check that the project folder exists and is readable.');
      steps.push('Other projects keep working; the server continues in degraded mode.');
      break;

    case 'sync-halted':
      steps.push(`Sync for "${context.project ?? 'unknown'}" stopped after a database failure.`);
      steps.push('Call reset_project (with reindex: true if the index looks wrong).');
      break;

    case 'uncaught-exception':
    case 'unhandled-rejection':
      steps.push('This is likely a bug in the server.');
      steps.push('If reproducible, note which tool call triggered it and report the issue.');
      if (message.includes('ENOSPC')) {
        steps.push('Disk is full: free space and restart.');
      }
      if (message.includes('EACCES') || message.includes('EPERM')) {
        steps.push('Permission error: check permissions on the server home directory and project folders.');
      }
      break;

    case 'transport-error':
      steps.push('The stdio channel between the client and the server broke.');
      steps.push('This usually happens when the client restarts.');
      break;

    default:
      steps.push('Check the stack trace for details.');
  }

  return steps;
}

/** Format a crash report for display in a tool response */
export function formatCrashReport(report: CrashReport): string {
  const lines: string[] = [
    `## Crash Report`,
    ``,
    `**When:** ${report.timestamp}`,
    `**Type:** ${report.type}`,
    `**Phase:** ${report.context.phase}`,
    `**Uptime:** ${report.serverUptime}s before crash`,
    `**Error:** ${report.error}`,
  ];

  if (report.context.lastToolCall) {
    lines.push(`**Last tool call:** ${report.context.lastToolCall}`);
  }
  if (report.context.project) {
    lines.push(`**Affected project:** ${report.context.project}`);
  }

  lines.push('');
  lines.push('### Recovery Steps');
  for (const step of report.recovery) {
    lines.push(`- ${step}`);
  }

  if (report.stack) {
    const stackLines = report.stack.split('\n');
    lines.push('');
    lines.push('### Stack Trace');
    lines.push('```');
    lines.push(stackLines.slice(0, 10).join('\n'));
    if (stackLines.length > 10) lines.push('... (truncated)');
    lines.push('```');
  }

  return lines.join('\n');
}

/** One-line crash summary */
export function formatCrashSummary(report: CrashReport, now: Date = new Date()): string {
  const minutes = Math.round((now.getTime() - new Date(report.timestamp).getTime()) / 1000 / 60);
  const age = minutes < 60 ? `${minutes}m ago` : `${Math.round(minutes / 60)}h ago`;
  return `[!] Server crashed ${age}: ${report.type}: ${report.error.substring(0, 100)}`;
}
