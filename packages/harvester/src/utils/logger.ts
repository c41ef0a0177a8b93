import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHT;
}

interface LoggerSettings {
  level: LogLevel;
  filePath: string | null;
}

const envLevel = process.env.LOG_LEVEL;

const settings: LoggerSettings = {
  level: envLevel && isLogLevel(envLevel) ? envLevel : 'info',
  filePath: null,
};

/**
 * Set the console threshold and the optional log file.
 * The file receives everything from debug upwards regardless of the console level.
 */
export function configureLogger(options: { level?: LogLevel; filePath?: string | null }): void {
  if (options.level) {
    settings.level = options.level;
  }
  if (options.filePath !== undefined) {
    settings.filePath = options.filePath;
    if (settings.filePath) {
      mkdirSync(dirname(settings.filePath), { recursive: true });
    }
  }
}

function timestamp(): string {
  return new Date().toISOString().replace('T', ' ').slice(0, 19);
}

export class Logger {
  constructor(private readonly scope: string) {}

  debug(message: string, extra?: Record<string, unknown>) {
    this.write('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>) {
    this.write('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>) {
    this.write('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>) {
    this.write('error', message, extra);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, extra?: Record<string, unknown>) {
    const line = `[${this.scope}] ${message}`;

    if (LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[settings.level]) {
      const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      sink(line, extra ?? '');
    }

    if (settings.filePath) {
      const suffix = extra ? ` ${JSON.stringify(extra)}` : '';
      try {
        appendFileSync(
          settings.filePath,
          `${timestamp()} - ${level.toUpperCase()} - ${line}${suffix}\n`,
          'utf-8'
        );
      } catch (error) {
        // A sink that failed once stays off
        settings.filePath = null;
        console.error(`[Logger] File sink disabled: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
}

export const createLogger = (scope: string) => new Logger(scope);
