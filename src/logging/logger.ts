import { appendFile, stat, rename, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Log levels in order of severity (higher = more severe)
 */
export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

/**
 * Context attached to log entries (component, tool name, iteration, ...)
 */
export interface LogContext {
  component?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * One line of the log file
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  stack?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  path: string;
  maxSize: number;
  maxFiles: number;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  path: 'toolweave.log',
  maxSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5,
};

/**
 * Write queue shared by a logger and its children
 */
interface WriteChain {
  tail: Promise<void>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Logger - Structured JSON-lines logger with level filtering and size-based rotation.
 *
 * Every component receives one through its constructor and derives a child
 * carrying its own `component` context.
 */
export class Logger {
  private config: LoggerConfig;
  private defaultContext: LogContext;
  private chain: WriteChain;

  constructor(config: Partial<LoggerConfig> = {}, defaultContext: LogContext = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.defaultContext = defaultContext;
    this.chain = { tail: Promise.resolve() };
  }

  get level(): LogLevel {
    return this.config.level;
  }

  set level(level: LogLevel) {
    this.config.level = level;
  }

  get path(): string {
    return this.config.path;
  }

  shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  /**
   * Creates a logger sharing this one's file and level with extra default context
   */
  child(context: LogContext): Logger {
    const child = new Logger(this.config, { ...this.defaultContext, ...context });
    child.config = this.config;
    child.chain = this.chain;
    return child;
  }

  formatEntry(level: LogLevel, message: string, context?: LogContext, error?: Error): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const mergedContext = { ...this.defaultContext, ...context };
    if (Object.keys(mergedContext).length > 0) {
      entry.context = mergedContext;
    }

    if (error?.stack) {
      entry.stack = error.stack;
    }

    return entry;
  }

  /**
   * Appends one entry. Writes from a logger and its children are applied in
   * call order, so rotation never interleaves with an append.
   */
  write(entry: LogEntry): Promise<void> {
    const line = JSON.stringify(entry) + '\n';
    const next = this.chain.tail.then(() => this.append(line));
    this.chain.tail = next.catch(() => {});
    return next;
  }

  /**
   * Resolves once every write queued so far has finished
   */
  flush(): Promise<void> {
    return this.chain.tail;
  }

  private async append(line: string): Promise<void> {
    const dir = dirname(this.config.path);
    if (dir && dir !== '.') {
      await mkdir(dir, { recursive: true });
    }

    await this.rotateIfNeeded();
    await appendFile(this.config.path, line, { encoding: 'utf-8' });
  }

  async debug(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('debug')) return;
    await this.write(this.formatEntry('debug', message, context));
  }

  async info(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('info')) return;
    await this.write(this.formatEntry('info', message, context));
  }

  async warn(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('warn')) return;
    await this.write(this.formatEntry('warn', message, context));
  }

  /**
   * Logs an error with its stack; non-Error values land in `context.errorDetails`
   */
  async error(message: string, error?: unknown, context?: LogContext): Promise<void> {
    if (!this.shouldLog('error')) return;

    const err = error instanceof Error ? error : undefined;
    const entry = this.formatEntry('error', message, context, err);

    if (error !== undefined && !(error instanceof Error)) {
      entry.context = {
        ...entry.context,
        errorDetails: String(error),
      };
    }

    await this.write(entry);
  }

  async rotateIfNeeded(): Promise<void> {
    let size: number;
    try {
      size = (await stat(this.config.path)).size;
    } catch (error) {
      if (isMissingFile(error)) return;
      throw error;
    }

    if (size >= this.config.maxSize) {
      await this.rotate();
    }
  }

  /**
   * Shifts `<path>.N` to `<path>.N+1`, dropping the oldest beyond `maxFiles`
   */
  async rotate(): Promise<void> {
    await this.removeIfPresent(`${this.config.path}.${this.config.maxFiles}`);

    for (let i = this.config.maxFiles - 1; i >= 1; i--) {
      await this.renameIfPresent(`${this.config.path}.${i}`, `${this.config.path}.${i + 1}`);
    }

    await this.renameIfPresent(this.config.path, `${this.config.path}.1`);
  }

  private async removeIfPresent(path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (error) {
      if (!isMissingFile(error)) throw error;
    }
  }

  private async renameIfPresent(from: string, to: string): Promise<void> {
    try {
      await rename(from, to);
    } catch (error) {
      if (!isMissingFile(error)) throw error;
    }
  }
}
