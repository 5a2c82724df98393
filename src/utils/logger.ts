/**
 * Structured logging
 *
 * Human-readable lines go to stderr, JSON lines to an optional file.
 * Child loggers share the sink and add their bindings to every record.
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';
import type { LogLevel } from '../types';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  critical: 4,
};

const LEVEL_STYLE: Record<LogLevel, ChalkInstance> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
  critical: chalk.magenta.bold,
};

type LogContext = Record<string, unknown>;

interface LoggerConfig {
  level: LogLevel;
  file?: string;
  console: boolean;
}

type NodeEventName =
  | 'planned'
  | 'executed'
  | 'approved'
  | 'rejected'
  | 'requeued'
  | 'decomposed'
  | 'exhausted'
  | 'cancelled';

type ToolEventName = 'called' | 'failed' | 'timeout' | 'discovered';

type RunEventName = 'started' | 'finished' | 'aborted' | 'cached';

class Logger {
  private config: LoggerConfig;
  private minLevel: number;
  private bindings: LogContext;

  constructor(config: LoggerConfig, bindings: LogContext = {}) {
    this.config = config;
    this.minLevel = LOG_LEVELS[config.level];
    this.bindings = bindings;

    if (config.file) {
      const dir = dirname(config.file);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  /**
   * A logger writing to the same sink with extra fields on every record
   */
  child(bindings: LogContext): Logger {
    return new Logger(this.config, { ...this.bindings, ...bindings });
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= this.minLevel;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const fields = { ...this.bindings, ...context };

    // stderr keeps stdout free for command output
    if (this.config.console) {
      console.error(this.formatConsole(level, message, fields));
    }

    if (this.config.file) {
      const record = { timestamp: new Date().toISOString(), level, message, ...fields };
      appendFileSync(this.config.file, JSON.stringify(record) + '\n');
    }
  }

  private formatConsole(level: LogLevel, message: string, fields: LogContext): string {
    const head = LEVEL_STYLE[level](`${new Date().toISOString()} [${level.toUpperCase().padEnd(8)}]`);
    const pairs = Object.entries(fields).map(([k, v]) => `${k}=${JSON.stringify(v)}`);
    return pairs.length > 0 ? `${head} ${message} ${chalk.gray(pairs.join(' '))}` : `${head} ${message}`;
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  critical(message: string, context?: LogContext): void {
    this.log('critical', message, context);
  }

  nodeEvent(event: NodeEventName, nodeId: string, context?: LogContext): void {
    const level: LogLevel =
      event === 'exhausted' ? 'error' : event === 'rejected' || event === 'cancelled' ? 'warn' : 'info';
    this.log(level, `node_${event}`, { nodeId, ...context });
  }

  /**
   * Timeouts get their own event so they can be told apart from other failures
   */
  toolEvent(event: ToolEventName, context?: LogContext): void {
    const level: LogLevel = event === 'called' || event === 'discovered' ? 'debug' : 'warn';
    this.log(level, `tool_${event}`, context);
  }

  runEvent(event: RunEventName, runId: string, context?: LogContext): void {
    const level: LogLevel = event === 'aborted' ? 'critical' : 'info';
    this.log(level, `run_${event}`, { runId, ...context });
  }
}

let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({
      level: process.env.LOG_LEVEL === 'debug' ? 'debug' : 'warn',
      console: true,
    });
  }
  return globalLogger;
}

export { Logger };
export type { LoggerConfig };
