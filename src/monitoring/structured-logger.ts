/**
 * Structured logging for lock activity
 *
 * Every line carries a level, a message and key/value context (identity, owner,
 * attempt, ...). Output is either a terminal line or one JSON object per line.
 * Warnings and above go to stderr. With `stream: 'stderr'` everything does, which
 * keeps a wrapped command's stdout clean.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogFormat = 'pretty' | 'json';

export type LogContext = Record<string, unknown>;

/** `split`: debug and info on stdout, the rest on stderr */
export type LogStream = 'split' | 'stderr';

export interface LogEntry {
  /** ISO 8601 */
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  minLevel?: LogLevel;
  enableConsole?: boolean;
  format?: LogFormat;
  stream?: LogStream;
  serviceName?: string;
  version?: string;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.cyan,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
  fatal: chalk.bgRed.white,
};

/** Stack frames shown under an error on the terminal */
const TERMINAL_STACK_FRAMES = 3;

export class StructuredLogger {
  private readonly settings: Required<LoggerConfig>;

  /**
   * @param config - Output settings
   * @param bindings - Context merged into every entry (see {@link child})
   */
  constructor(config: LoggerConfig = {}, private readonly bindings: LogContext = {}) {
    this.settings = {
      minLevel: config.minLevel ?? 'info',
      enableConsole: config.enableConsole ?? true,
      format: config.format ?? 'pretty',
      stream: config.stream ?? 'split',
      serviceName: config.serviceName ?? 'statelock',
      version: config.version ?? '1.0.0',
    };
  }

  /**
   * Logger with the same settings that adds `bindings` to every entry
   *
   * @example
   * ```typescript
   * const log = getLogger().child({ identity: 'prod/app.tfstate' });
   * log.info('Lock acquired', { attempts: 2 });
   * // ... Lock acquired (identity="prod/app.tfstate" attempts=2)
   * ```
   */
  child(bindings: LogContext): StructuredLogger {
    return new StructuredLogger(this.settings, { ...this.bindings, ...bindings });
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.log('error', message, context, error);
  }

  fatal(message: string, error?: Error, context?: LogContext): void {
    this.log('fatal', message, context, error);
  }

  formatAsJson(entry: LogEntry): string {
    return JSON.stringify({
      ...entry,
      service: this.settings.serviceName,
      version: this.settings.version,
    });
  }

  /**
   * `[time] LEVEL message (key=value ...)`, followed by the error and its first frames
   */
  formatForTerminal(entry: LogEntry): string {
    const time = chalk.dim(`[${new Date(entry.timestamp).toLocaleTimeString()}]`);
    const level = LEVEL_STYLE[entry.level](entry.level.toUpperCase().padEnd(5));
    const lines = [`${time} ${level} ${entry.message}`];

    const pairs = Object.entries(entry.context ?? {}).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    if (pairs.length > 0) {
      lines[0] += chalk.dim(` (${pairs.join(' ')})`);
    }

    if (entry.error) {
      lines.push(`  ${chalk.red(`Error: ${entry.error.message}`)}`);
      const frames = entry.error.stack?.split('\n').slice(1, TERMINAL_STACK_FRAMES + 1) ?? [];
      if (frames.length > 0) {
        lines.push(chalk.dim(frames.join('\n')));
      }
    }

    return lines.join('\n');
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.settings.enableConsole || SEVERITY[level] < SEVERITY[this.settings.minLevel]) {
      return;
    }

    const merged = { ...this.bindings, ...context };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: Object.keys(merged).length > 0 ? merged : undefined,
      error: error ? { name: error.name, message: error.message, stack: error.stack } : undefined,
    };

    const line = this.settings.format === 'json' ? this.formatAsJson(entry) : this.formatForTerminal(entry);
    if (this.settings.stream === 'stderr' || SEVERITY[level] >= SEVERITY.warn) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

let globalLogger: StructuredLogger | null = null;

/**
 * Process-wide logger; `config` only applies to the call that creates it
 */
export function getLogger(config?: LoggerConfig): StructuredLogger {
  if (!globalLogger) {
    globalLogger = new StructuredLogger(config);
  }
  return globalLogger;
}

export function resetLogger(): void {
  globalLogger = null;
}
