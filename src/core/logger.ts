// src/core/logger.ts
import { appendFileSync, mkdirSync } from 'fs';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

export class Logger {
  private level: LogLevel;
  private filePath?: string;

  constructor(level: string = process.env.SITEWATCH_LOG_LEVEL ?? 'info') {
    this.level = isLogLevel(level) ? level : 'info';
  }

  /** Mirror every line (timestamped) into a file as well as stderr. */
  attachLogFile(filePath: string): void {
    mkdirSync(path.dirname(filePath), { recursive: true });
    this.filePath = filePath;
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  private write(level: LogLevel, message: string): void {
    if (LEVELS[level] < LEVELS[this.level]) return;

    const line = `[${level.toUpperCase()}] ${message}`;
    console.error(line);

    if (this.filePath) {
      appendFileSync(this.filePath, `${new Date().toISOString()} ${line}\n`, 'utf-8');
    }
  }
}

export const logger = new Logger();
