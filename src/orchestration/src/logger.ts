/**
 * Logger module for tracking ingestion and question answering
 * Logs to both console and file with timestamps and log levels
 */

import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  SUCCESS = 'SUCCESS'
}

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.SUCCESS]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40
};

export interface LoggerOptions {
  logDirectory?: string;
  minLevel?: LogLevel;
  writeToFile?: boolean;
}

function parseLevel(value: string | undefined): LogLevel {
  const upper = (value || '').toUpperCase();
  const match = Object.values(LogLevel).find(level => level === upper);
  return match ?? LogLevel.INFO;
}

export class Logger {
  private logFilePath: string | null = null;
  private logStream: fs.WriteStream | null = null;
  private minLevel: LogLevel;

  constructor(options: LoggerOptions = {}) {
    const {
      logDirectory = './logs',
      minLevel = LogLevel.INFO,
      writeToFile = true
    } = options;

    this.minLevel = minLevel;

    if (writeToFile) {
      if (!fs.existsSync(logDirectory)) {
        fs.mkdirSync(logDirectory, { recursive: true });
      }

      // One file per run
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      this.logFilePath = path.join(logDirectory, `rag-${timestamp}.log`);
      this.logStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });

      this.log(LogLevel.INFO, `Logger initialized. Log file: ${this.logFilePath}`);
    }
  }

  /**
   * Write one entry to the file and the console, below-threshold levels dropped
   */
  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }

    const timestamp = new Date().toISOString();
    this.writeLine(`[${timestamp}] [${level}] ${message}`);

    if (data !== undefined) {
      this.writeLine(`  Data: ${formatData(data)}`);
    }

    const consoleMessage = this.formatConsoleMessage(level, message);
    if (level === LogLevel.ERROR) {
      console.error(consoleMessage);
    } else {
      console.log(consoleMessage);
    }

    if (data !== undefined) {
      console.log('  Data:', data);
    }
  }

  private writeLine(line: string): void {
    this.logStream?.write(line + '\n');
  }

  /**
   * Console prefix with the level tag
   */
  private formatConsoleMessage(level: LogLevel, message: string): string {
    return `[${level}] ${message}`;
  }

  /**
   * Log debug detail
   */
  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  /**
   * Log progress messages
   */
  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  /**
   * Log warnings
   */
  warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  /**
   * Log errors; stack traces only go to the file
   */
  error(message: string, error?: unknown): void {
    this.log(LogLevel.ERROR, message, error instanceof Error ? error.message : error);

    if (error instanceof Error && error.stack) {
      this.writeLine(`  Stack: ${error.stack}`);
    }
  }

  /**
   * Log a completed stage
   */
  success(message: string, data?: unknown): void {
    this.log(LogLevel.SUCCESS, message, data);
  }

  /**
   * Log a separator line; hidden when INFO is filtered out
   */
  separator(char: string = '=', length: number = 80): void {
    if (LEVEL_RANK[LogLevel.INFO] < LEVEL_RANK[this.minLevel]) {
      return;
    }
    const line = char.repeat(length);
    this.writeLine(line);
    console.log(line);
  }

  /**
   * Log a section header between separators
   */
  section(title: string): void {
    this.separator('=');
    this.info(title);
    this.separator('=');
  }

  /**
   * Close the log file stream
   */
  close(): void {
    this.info('Logger closing');
    this.logStream?.end();
    this.logStream = null;
  }

  /**
   * Path of the current log file, or null when file logging is off
   */
  getLogFilePath(): string | null {
    return this.logFilePath;
  }
}

function formatData(data: unknown): string {
  if (typeof data === 'object' && data !== null) {
    return JSON.stringify(data, null, 2);
  }
  return String(data);
}

// Export singleton instance
export const logger = new Logger({
  logDirectory: process.env.RAG_LOG_DIR || './logs',
  minLevel: parseLevel(process.env.RAG_LOG_LEVEL),
  writeToFile: process.env.RAG_LOG_TO_FILE !== 'false'
});
