/**
 * Run Logger
 * Records every pipeline event and appends it to a per-target Markdown log
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { PipelinePhase } from './errors.js';

/**
 * Log levels for filtering and display
 */
export type LogLevel = 'info' | 'warn' | 'error' | 'success' | 'debug';

/**
 * Stages an entry can belong to: the pipeline phases plus the run itself
 */
export type RunStage = PipelinePhase | 'run';

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  stage: RunStage;
  message: string;
  data?: Record<string, unknown>;
  level: LogLevel;
}

export interface RunLoggerOptions {
  /** Markdown file to append to; null keeps entries in memory only */
  logFile: string | null;
  /** Called for every entry as it is recorded */
  onEntry?: (entry: LogEntry) => void;
}

/**
 * Run logger. One instance per pipeline run.
 */
export class RunLogger {
  private readonly logFile: string | null;
  private readonly onEntry?: (entry: LogEntry) => void;
  private entries: LogEntry[] = [];
  private initialized: boolean = false;

  constructor(options: RunLoggerOptions) {
    this.logFile = options.logFile;
    this.onEntry = options.onEntry;
  }

  /**
   * Start a session in the log file
   */
  async begin(title: string): Promise<void> {
    if (this.initialized) return;
    this.initialized = true;

    if (!this.logFile) return;
    try {
      await fs.mkdir(path.dirname(this.logFile), { recursive: true });
      let existing = '';
      try {
        existing = await fs.readFile(this.logFile, 'utf-8');
      } catch {
        // First run for this target
      }
      const header = existing ? '' : '# Static Resource Run Log\n\n';
      await fs.appendFile(this.logFile, `${header}## Run: ${title}\n\n`, 'utf-8');
    } catch (error) {
      console.error('Failed to initialize run log:', error);
    }
  }

  /**
   * Log an entry
   */
  async log(
    stage: RunStage,
    message: string,
    data?: Record<string, unknown>,
    level: LogLevel = 'info'
  ): Promise<void> {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      stage,
      message,
      data,
      level,
    };

    this.entries.push(entry);
    this.onEntry?.(entry);
    await this.persist(entry);
  }

  async info(stage: RunStage, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, message, data, 'info');
  }

  async warn(stage: RunStage, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, message, data, 'warn');
  }

  async error(stage: RunStage, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, message, data, 'error');
  }

  async success(stage: RunStage, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, message, data, 'success');
  }

  async debug(stage: RunStage, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, message, data, 'debug');
  }

  /**
   * Close the session with summary statistics
   */
  async end(outcome: 'succeeded' | 'failed'): Promise<void> {
    if (!this.logFile) return;

    const lines = [
      `**Outcome:** ${outcome}`,
      `- **Entries:** ${this.entries.length}`,
      `- **Errors:** ${this.entries.filter((e) => e.level === 'error').length}`,
      `- **Warnings:** ${this.entries.filter((e) => e.level === 'warn').length}`,
      '',
      '---',
      '',
    ];
    await this.append(lines.join('\n'));
  }

  /**
   * Get all log entries
   */
  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /**
   * Get error entries
   */
  getErrors(): LogEntry[] {
    return this.entries.filter((e) => e.level === 'error');
  }

  private async persist(entry: LogEntry): Promise<void> {
    if (!this.logFile) return;
    await this.append(formatEntry(entry));
  }

  private async append(content: string): Promise<void> {
    if (!this.logFile) return;
    try {
      await fs.appendFile(this.logFile, content, 'utf-8');
    } catch (error) {
      console.error('Failed to persist run log:', error);
    }
  }
}

/**
 * Get icon for log level
 */
export function getLevelIcon(level: LogLevel): string {
  switch (level) {
    case 'error':
      return '[ERROR]';
    case 'warn':
      return '[WARN]';
    case 'success':
      return '[OK]';
    case 'debug':
      return '[DEBUG]';
    default:
      return '[INFO]';
  }
}

/**
 * Format one entry as Markdown
 */
export function formatEntry(entry: LogEntry): string {
  const time = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
  const lines = [`- [${time}] ${getLevelIcon(entry.level)} **${entry.stage}** - ${entry.message}`];

  if (entry.data && Object.keys(entry.data).length > 0) {
    lines.push('');
    lines.push('  ```json');
    for (const line of JSON.stringify(entry.data, null, 2).split('\n')) {
      lines.push(`  ${line}`);
    }
    lines.push('  ```');
  }

  lines.push('');
  return lines.join('\n');
}

/**
 * Log file for a target label
 */
export function runLogPath(logsDir: string, target: string): string {
  return path.join(logsDir, `${target}.md`);
}
