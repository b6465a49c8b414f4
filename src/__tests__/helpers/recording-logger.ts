import { Logger, LogLevel } from '../../types';

export interface RecordedLog {
  level: LogLevel;
  message: string;
  meta?: unknown;
}

/**
 * Logger that keeps entries in memory so tests stay quiet and can assert on them
 */
export class RecordingLogger implements Logger {
  readonly entries: RecordedLog[] = [];

  error(message: string, meta?: unknown): void {
    this.entries.push({ level: 'ERROR', message, meta });
  }

  warn(message: string, meta?: unknown): void {
    this.entries.push({ level: 'WARN', message, meta });
  }

  info(message: string, meta?: unknown): void {
    this.entries.push({ level: 'INFO', message, meta });
  }

  debug(message: string, meta?: unknown): void {
    this.entries.push({ level: 'DEBUG', message, meta });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}
