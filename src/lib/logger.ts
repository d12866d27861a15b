/**
 * Structured Logger
 *
 * Console and daily-file logging for migration runs. Entries carry the active
 * migration id so one run can be followed across connectors, validator and executor.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { MigrationBaseError } from './error-handler';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  migration_id?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  logDirectory: string;
  maxFileSize: number; // in bytes
  maxFiles: number;
  enableStructuredLogging: boolean;
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export class Logger {
  private config: LoggerConfig;
  private migrationId: string | null = null;
  private currentLogFile: string | null = null;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = {
      level: LogLevel.INFO,
      enableConsole: true,
      enableFile: false,
      logDirectory: './logs',
      maxFileSize: 10 * 1024 * 1024, // 10MB
      maxFiles: 10,
      enableStructuredLogging: false,
      ...config
    };

    this.ensureLogDirectory();
    this.initializeLogFile();
  }

  /**
   * Scope subsequent entries to one migration run
   */
  setMigrationId(migrationId: string): void {
    this.migrationId = migrationId;
  }

  clearContext(): void {
    this.migrationId = null;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, {
      ...context,
      error_message: error?.message,
      stack_trace: error?.stack
    });
  }

  logMigrationError(error: MigrationBaseError): void {
    const entry = error.toLogFormat();
    if (!this.shouldLog(entry.level)) {
      return;
    }
    entry.migration_id = this.migrationId ?? undefined;
    this.writeLogEntry(entry);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    this.writeLogEntry({
      timestamp: new Date(),
      level,
      message,
      context,
      migration_id: this.migrationId ?? undefined
    });
  }

  private writeLogEntry(entry: LogEntry): void {
    const formattedEntry = this.formatLogEntry(entry);

    if (this.config.enableConsole) {
      this.writeToConsole(entry.level, formattedEntry);
    }

    if (this.config.enableFile) {
      this.writeToFile(formattedEntry);
    }
  }

  private formatLogEntry(entry: LogEntry): string {
    if (this.config.enableStructuredLogging) {
      return JSON.stringify({
        ...entry,
        timestamp: entry.timestamp.toISOString()
      });
    }

    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const migration = entry.migration_id ? `[${entry.migration_id}] ` : '';
    const context = entry.context && Object.keys(entry.context).length > 0 ? ` ${JSON.stringify(entry.context)}` : '';

    return `${timestamp} ${level} ${migration}${entry.message}${context}`;
  }

  private writeToConsole(level: LogLevel, message: string): void {
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(message);
        break;
      case LogLevel.INFO:
        console.info(message);
        break;
      case LogLevel.WARN:
        console.warn(message);
        break;
      case LogLevel.ERROR:
        console.error(message);
        break;
    }
  }

  private writeToFile(message: string): void {
    if (!this.currentLogFile) {
      return;
    }

    try {
      fs.appendFileSync(this.currentLogFile, message + '\n');
      this.checkLogRotation();
    } catch (error) {
      console.error('Failed to write to log file:', error);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }

  private ensureLogDirectory(): void {
    if (!this.config.enableFile) {
      return;
    }

    try {
      fs.mkdirSync(this.config.logDirectory, { recursive: true });
    } catch (error) {
      console.error('Failed to create log directory:', error);
      this.config.enableFile = false;
    }
  }

  private initializeLogFile(): void {
    if (!this.config.enableFile) {
      return;
    }

    const timestamp = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
    this.currentLogFile = path.join(this.config.logDirectory, `migration-${timestamp}.log`);
  }

  private checkLogRotation(): void {
    if (!this.currentLogFile) {
      return;
    }

    const stats = fs.statSync(this.currentLogFile);
    if (stats.size <= this.config.maxFileSize) {
      return;
    }

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    fs.renameSync(this.currentLogFile, this.currentLogFile.replace('.log', `-${timestamp}.log`));
    this.initializeLogFile();
    this.cleanupOldLogFiles();
  }

  private cleanupOldLogFiles(): void {
    const files = fs.readdirSync(this.config.logDirectory)
      .filter(file => file.startsWith('migration-') && file.endsWith('.log'))
      .map(file => {
        const filePath = path.join(this.config.logDirectory, file);
        return { path: filePath, mtime: fs.statSync(filePath).mtime };
      })
      .sort((a, b) => b.mtime.getTime() - a.mtime.getTime());

    for (const file of files.slice(this.config.maxFiles)) {
      fs.unlinkSync(file.path);
    }
  }
}

export function parseLogLevel(level: string | undefined): LogLevel {
  switch ((level ?? '').toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}
