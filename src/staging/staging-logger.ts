/**
 * Staging Logger
 * Records every step of a staging run, optionally forwarding entries to a
 * listener (the CLI console) and persisting them as markdown
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  stage: StagingStage;
  event: string;
  message: string;
  data?: Record<string, unknown>;
  level: LogLevel;
}

export type LogLevel = 'info' | 'warn' | 'error' | 'success' | 'debug';

/**
 * Parts of a run, for categorization
 */
export type StagingStage =
  | 'discovery'
  | 'generate'
  | 'configure'
  | 'render'
  | 'collect'
  | 'archive'
  | 'publish'
  | 'run';

export type LogListener = (entry: LogEntry) => void;

export class StagingLogger {
  private entries: LogEntry[] = [];
  private readonly listener?: LogListener;

  constructor(listener?: LogListener) {
    this.listener = listener;
  }

  log(
    stage: StagingStage,
    event: string,
    message: string,
    data?: Record<string, unknown>,
    level: LogLevel = 'info'
  ): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      stage,
      event,
      message,
      data,
      level,
    };
    this.entries.push(entry);
    this.listener?.(entry);
  }

  debug(stage: StagingStage, event: string, message: string, data?: Record<string, unknown>): void {
    this.log(stage, event, message, data, 'debug');
  }

  info(stage: StagingStage, event: string, message: string, data?: Record<string, unknown>): void {
    this.log(stage, event, message, data, 'info');
  }

  warn(stage: StagingStage, event: string, message: string, data?: Record<string, unknown>): void {
    this.log(stage, event, message, data, 'warn');
  }

  error(stage: StagingStage, event: string, message: string, data?: Record<string, unknown>): void {
    this.log(stage, event, message, data, 'error');
  }

  success(stage: StagingStage, event: string, message: string, data?: Record<string, unknown>): void {
    this.log(stage, event, message, data, 'success');
  }

  stageStart(stage: StagingStage, description: string, data?: Record<string, unknown>): void {
    this.info(stage, 'stage_start', `Starting: ${description}`, data);
  }

  stageComplete(stage: StagingStage, description: string, data?: Record<string, unknown>): void {
    this.success(stage, 'stage_complete', `Completed: ${description}`, data);
  }

  stageFailed(stage: StagingStage, description: string, error: string, data?: Record<string, unknown>): void {
    this.error(stage, 'stage_failed', `Failed: ${description} - ${error}`, data);
  }

  /**
   * Persist the log as markdown
   */
  writeMarkdown(logFile: string): void {
    mkdirSync(path.dirname(logFile), { recursive: true });
    writeFileSync(logFile, this.formatMarkdown(), 'utf-8');
  }

  formatMarkdown(): string {
    const lines: string[] = [
      '# Staging Log',
      '',
      '---',
      '',
    ];

    for (const entry of this.entries) {
      const time = entry.timestamp.split('T')[1].split('.')[0];
      lines.push(`### [${time}] ${getLevelIcon(entry.level)} **${entry.stage}** - ${entry.message}`);

      if (entry.data && Object.keys(entry.data).length > 0) {
        lines.push('');
        lines.push('```json');
        lines.push(JSON.stringify(entry.data, null, 2));
        lines.push('```');
      }

      lines.push('');
    }

    lines.push('---');
    lines.push('');
    lines.push(`- **Total Entries:** ${this.entries.length}`);
    lines.push(`- **Errors:** ${this.getErrors().length}`);
    lines.push(`- **Warnings:** ${this.entries.filter(e => e.level === 'warn').length}`);
    lines.push('');

    return lines.join('\n');
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesForStage(stage: StagingStage): LogEntry[] {
    return this.entries.filter(e => e.stage === stage);
  }

  getErrors(): LogEntry[] {
    return this.entries.filter(e => e.level === 'error');
  }

  clear(): void {
    this.entries = [];
  }
}

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

export function createStagingLogger(listener?: LogListener): StagingLogger {
  return new StagingLogger(listener);
}
