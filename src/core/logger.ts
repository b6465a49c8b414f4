import { Logger, LogLevel } from '../types';
import * as fs from 'fs';
import * as path from 'path';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
  component?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  enableFileLogging: boolean;
  logDirectory: string;
  maxFileSize: number; // in bytes
  maxFiles: number;
  enableConsole: boolean;
  component?: string;
}

const LEVELS: LogLevel[] = ['ERROR', 'WARN', 'INFO', 'DEBUG'];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'INFO'): LogLevel {
  const upper = value?.toUpperCase();
  return LEVELS.find((level) => level === upper) ?? fallback;
}

function shouldLog(current: LogLevel, level: LogLevel): boolean {
  return LEVELS.indexOf(level) <= LEVELS.indexOf(current);
}

/**
 * Holds the log file a logger and its children append to.
 */
class LogFile {
  currentPath?: string;
  size = 0;

  constructor(private readonly directory: string, private readonly maxFileSize: number, private readonly maxFiles: number) {}

  open(): void {
    if (!fs.existsSync(this.directory)) {
      fs.mkdirSync(this.directory, { recursive: true });
    }

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.currentPath = path.join(this.directory, `migration-${timestamp}.log`);
    fs.writeFileSync(this.currentPath, '');
    this.size = 0;
  }

  append(line: string): void {
    if (!this.currentPath) {
      return;
    }

    fs.appendFileSync(this.currentPath, line);
    this.size += Buffer.byteLength(line);

    if (this.size > this.maxFileSize) {
      this.rotate();
    }
  }

  private rotate(): void {
    this.cleanupOldLogFiles();
    this.open();
  }

  private cleanupOldLogFiles(): void {
    const files = fs
      .readdirSync(this.directory)
      .filter((file) => file.startsWith('migration-') && file.endsWith('.log'))
      .map((file) => ({
        path: path.join(this.directory, file),
        mtime: fs.statSync(path.join(this.directory, file)).mtime,
      }))
      .sort((a, b) => b.mtime.getTime() - a.mtime.getTime());

    // Keep only the most recent files
    for (const file of files.slice(this.maxFiles - 1)) {
      fs.unlinkSync(file.path);
    }
  }
}

/**
 * Enhanced logger with file output and structured logging
 */
export class EnhancedLogger implements Logger {
  private readonly config: LoggerConfig;
  private readonly file?: LogFile;

  constructor(config: Partial<LoggerConfig> = {}, sharedFile?: LogFile) {
    this.config = {
      level: 'INFO',
      enableFileLogging: true,
      logDirectory: './logs',
      maxFileSize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
      enableConsole: true,
      ...config,
    };

    if (sharedFile) {
      this.file = sharedFile;
    } else if (this.config.enableFileLogging) {
      this.file = this.initializeFileLogging();
    }
  }

  error(message: string, meta?: unknown): void {
    this.log('ERROR', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('WARN', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('INFO', message, meta);
  }

  debug(message: string, meta?: unknown): void {
    this.log('DEBUG', message, meta);
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (!shouldLog(this.config.level, level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      meta,
      component: this.config.component,
    };

    if (this.config.enableConsole) {
      this.logToConsole(entry);
    }

    if (this.file) {
      this.logToFile(entry);
    }
  }

  private logToConsole(entry: LogEntry): void {
    const prefix = `[${entry.level}] ${entry.timestamp}`;
    const suffix = entry.component ? ` [${entry.component}]` : '';
    const metaStr = entry.meta !== undefined ? ` ${JSON.stringify(entry.meta)}` : '';

    const fullMessage = `${prefix}${suffix} ${entry.message}${metaStr}`;

    switch (entry.level) {
      case 'ERROR':
        console.error(fullMessage);
        break;
      case 'WARN':
        console.warn(fullMessage);
        break;
      case 'INFO':
        console.info(fullMessage);
        break;
      case 'DEBUG':
        console.debug(fullMessage);
        break;
    }
  }

  private logToFile(entry: LogEntry): void {
    try {
      this.file?.append(JSON.stringify(entry) + '\n');
    } catch (error) {
      console.error('Failed to write to log file:', error);
    }
  }

  private initializeFileLogging(): LogFile | undefined {
    try {
      const file = new LogFile(this.config.logDirectory, this.config.maxFileSize, this.config.maxFiles);
      file.open();
      return file;
    } catch (error) {
      console.error('Failed to initialize file logging:', error);
      return undefined;
    }
  }

  public getLogFilePath(): string | undefined {
    return this.file?.currentPath;
  }

  /**
   * Logger tagged with a component name, writing to the same file
   */
  public createChildLogger(component: string): EnhancedLogger {
    return new EnhancedLogger({ ...this.config, component }, this.file);
  }
}

/**
 * Simple console logger implementation
 */
export class ConsoleLogger implements Logger {
  private readonly logLevel: LogLevel;

  constructor(logLevel: LogLevel = 'INFO') {
    this.logLevel = logLevel;
  }

  error(message: string, meta?: unknown): void {
    if (shouldLog(this.logLevel, 'ERROR')) {
      console.error(`[ERROR] ${message}`, meta !== undefined ? JSON.stringify(meta, null, 2) : '');
    }
  }

  warn(message: string, meta?: unknown): void {
    if (shouldLog(this.logLevel, 'WARN')) {
      console.warn(`[WARN] ${message}`, meta !== undefined ? JSON.stringify(meta, null, 2) : '');
    }
  }

  info(message: string, meta?: unknown): void {
    if (shouldLog(this.logLevel, 'INFO')) {
      console.info(`[INFO] ${message}`, meta !== undefined ? JSON.stringify(meta, null, 2) : '');
    }
  }

  debug(message: string, meta?: unknown): void {
    if (shouldLog(this.logLevel, 'DEBUG')) {
      console.debug(`[DEBUG] ${message}`, meta !== undefined ? JSON.stringify(meta, null, 2) : '');
    }
  }
}
