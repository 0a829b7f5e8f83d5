import fs from 'node:fs/promises';
import path from 'node:path';
import type { LogLevel } from '../types';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  message: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface StructuredLoggerOptions {
  consoleLevel?: LogLevel;
}

export class StructuredLogger {
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly filePath: string,
    private readonly consoleLevel: LogLevel
  ) {}

  public static async create(
    logDir: string,
    options: StructuredLoggerOptions = {}
  ): Promise<StructuredLogger> {
    await fs.mkdir(logDir, { recursive: true });

    const datePrefix = new Date().toISOString().slice(0, 10);
    const filePath = path.join(logDir, `streamscribe-${datePrefix}.log`);

    return new StructuredLogger(filePath, options.consoleLevel ?? 'info');
  }

  public getLogPath(): string {
    return this.filePath;
  }

  public debug(message: string, context: LogContext = {}): void {
    this.write('debug', message, context);
  }

  public info(message: string, context: LogContext = {}): void {
    this.write('info', message, context);
  }

  public warn(message: string, context: LogContext = {}): void {
    this.write('warn', message, context);
  }

  public error(message: string, context: LogContext = {}): void {
    this.write('error', message, context);
  }

  /** Resolves once every line queued so far has reached the file. */
  public async flush(): Promise<void> {
    await this.writeQueue;
  }

  private write(level: LogLevel, message: string, context: LogContext): void {
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      message,
      ...context
    };

    const line = `${JSON.stringify(entry)}\n`;

    this.writeQueue = this.writeQueue
      .then(async () => {
        await fs.appendFile(this.filePath, line, 'utf8');
      })
      .catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        console.error(`[streamscribe] Failed to write log file: ${detail}`);
      });

    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.consoleLevel]) {
      return;
    }

    if (level === 'error') {
      console.error(`[streamscribe] ${message}`, context);
      return;
    }

    if (level === 'warn') {
      console.warn(`[streamscribe] ${message}`, context);
      return;
    }

    console.log(`[streamscribe] ${message}`, context);
  }
}
