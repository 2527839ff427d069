import { appendFileSync, mkdirSync, existsSync } from 'fs';
import { join } from 'path';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerSettings {
  level: LogLevel;
  logDir?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// Until configure() runs (tests, library use) only warnings and errors reach stderr
const DEFAULT_SETTINGS: LoggerSettings = { level: 'warn' };

export class Logger {
  private static settings: LoggerSettings = { ...DEFAULT_SETTINGS };
  private static readonly preparedDirs = new Set<string>();

  static configure(settings: Partial<LoggerSettings>): void {
    Logger.settings = { ...Logger.settings, ...settings };
  }

  static reset(): void {
    Logger.settings = { ...DEFAULT_SETTINGS };
  }

  static get level(): LogLevel {
    return Logger.settings.level;
  }

  constructor(
    private readonly category: string,
    private readonly requestId?: string
  ) {}

  /** Returns a logger for the same category tagged with a request id. */
  child(requestId: string): Logger {
    return new Logger(this.category, requestId);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[Logger.settings.level]) return;

    const prefix = this.requestId ? `[${this.category}] [${this.requestId}]` : `[${this.category}]`;
    const suffix = data === undefined ? '' : ` ${serialize(data)}`;
    // stdout belongs to the MCP stdio transport
    process.stderr.write(`${prefix} ${level.toUpperCase()}: ${message}${suffix}\n`);

    const { logDir } = Logger.settings;
    if (logDir) {
      this.writeLog(logDir, this.formatLogEntry(level, message, data));
    }
  }

  private formatLogEntry(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const request = this.requestId ? ` [${this.requestId}]` : '';
    const entry = `[${timestamp}] [${level.toUpperCase()}]${request} ${message}`;

    if (data !== undefined) {
      return `${entry}\nData: ${serialize(data, 2)}\n---\n`;
    }
    return `${entry}\n`;
  }

  private writeLog(logDir: string, entry: string): void {
    const dir = join(logDir, this.category);
    try {
      if (!Logger.preparedDirs.has(dir)) {
        if (!existsSync(dir)) {
          mkdirSync(dir, { recursive: true });
        }
        Logger.preparedDirs.add(dir);
      }
      const date = new Date().toISOString().slice(0, 10);
      appendFileSync(join(dir, `log_${date}.txt`), entry);
    } catch (error) {
      process.stderr.write(`Failed to write log entry: ${String(error)}\n`);
    }
  }
}

/** JSON-encodes log data; Error instances keep their name, message and stack. */
export function serialize(data: unknown, indent?: number): string {
  try {
    return JSON.stringify(
      data,
      (_key, value: unknown) => {
        if (value instanceof Error) {
          return { name: value.name, message: value.message, stack: value.stack };
        }
        if (typeof value === 'bigint') {
          return value.toString();
        }
        return value;
      },
      indent
    );
  } catch {
    return String(data);
  }
}
