/**
 * Structured logging for the broadcast service.
 *
 * Every component receives a sub-logger tagged with its module path
 * (e.g. `broadcast.scheduler`), so a single log line tells where it came from.
 * Lines go to the console and, when configured, are appended to a log file.
 */

import fs from 'fs';
import path from 'path';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

export type LogData = Record<string, unknown>;

export interface LogRecord {
  level: LogLevel;
  module: string;
  message: string;
  timestamp: Date;
  operation?: string;
  data?: LogData;
  error?: Error;
}

export interface LoggerOptions {
  /** Records below this level are dropped */
  minLevel?: LogLevel;
  consoleOutput?: boolean;
  fileOutput?: boolean;
  filePath?: string;
  moduleName?: string;
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.FATAL]: 50
};

const CONSOLE_METHOD: Record<LogLevel, 'debug' | 'info' | 'warn' | 'error'> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.FATAL]: 'error'
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  const wanted = value?.trim().toLowerCase();
  return Object.values(LogLevel).find(level => level === wanted) ?? fallback;
}

/**
 * One line per record; error, stack (fatal only) and data follow on their
 * own indented lines.
 */
export function formatLogRecord(record: LogRecord): string {
  const head = [
    record.timestamp.toISOString(),
    record.level.toUpperCase().padEnd(5),
    `[${record.module}]`,
    ...(record.operation ? [`(${record.operation})`] : []),
    record.message
  ].join(' ');

  const tail: string[] = [];
  if (record.error) {
    tail.push(`  error: ${record.error.message}`);
    if (record.level === LogLevel.FATAL && record.error.stack) {
      tail.push(`  stack: ${record.error.stack}`);
    }
  }
  if (record.data && Object.keys(record.data).length > 0) {
    tail.push(`  data: ${JSON.stringify(record.data)}`);
  }

  return [head, ...tail].join('\n');
}

export class BroadcastLogger {
  private readonly moduleName: string;
  private readonly consoleOutput: boolean;
  private readonly filePath?: string;
  private minLevel: LogLevel;

  constructor(options: LoggerOptions = {}) {
    this.moduleName = options.moduleName ?? 'broadcast';
    this.consoleOutput = options.consoleOutput ?? true;
    this.filePath = options.fileOutput ? options.filePath : undefined;
    this.minLevel = options.minLevel ?? LogLevel.INFO;
  }

  debug(message: string, data?: LogData, operation?: string): void {
    this.emit({ level: LogLevel.DEBUG, message, data, operation });
  }

  info(message: string, data?: LogData, operation?: string): void {
    this.emit({ level: LogLevel.INFO, message, data, operation });
  }

  warn(message: string, data?: LogData, operation?: string): void {
    this.emit({ level: LogLevel.WARN, message, data, operation });
  }

  error(message: string, error?: Error, data?: LogData, operation?: string): void {
    this.emit({ level: LogLevel.ERROR, message, error, data, operation });
  }

  fatal(message: string, error?: Error, data?: LogData, operation?: string): void {
    this.emit({ level: LogLevel.FATAL, message, error, data, operation });
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getModuleName(): string {
    return this.moduleName;
  }

  /** Child logger tagged `<parent>.<moduleName>`, same outputs and level. */
  createSubLogger(moduleName: string): BroadcastLogger {
    return new BroadcastLogger({
      moduleName: `${this.moduleName}.${moduleName}`,
      consoleOutput: this.consoleOutput,
      fileOutput: this.filePath !== undefined,
      filePath: this.filePath,
      minLevel: this.minLevel
    });
  }

  private emit(fields: Omit<LogRecord, 'module' | 'timestamp'>): void {
    if (SEVERITY[fields.level] < SEVERITY[this.minLevel]) {
      return;
    }

    const line = formatLogRecord({ ...fields, module: this.moduleName, timestamp: new Date() });

    if (this.consoleOutput) {
      console[CONSOLE_METHOD[fields.level]](line);
    }
    if (this.filePath) {
      this.append(this.filePath, line);
    }
  }

  private append(filePath: string, line: string): void {
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.appendFileSync(filePath, `${line}\n`, 'utf-8');
    } catch (error) {
      // Console output above already carries the line.
      console.error(`Failed to write log file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

export const defaultLogger = new BroadcastLogger();

export function createComponentLogger(component: string, parent: BroadcastLogger = defaultLogger): BroadcastLogger {
  return parent.createSubLogger(component);
}
