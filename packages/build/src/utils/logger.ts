/**
 * Scoped console logging for the build engine
 */

import { LogLevel } from '../types';

const RESET = '\x1b[0m';

interface LevelStyle {
  rank: number;
  color: string;
  symbol: string;
}

/** Filtering rank, ANSI color and marker per level */
const LEVEL_STYLES: Record<LogLevel, LevelStyle> = {
  [LogLevel.Error]: { rank: 0, color: '\x1b[31m', symbol: '🚨' },
  [LogLevel.Warn]: { rank: 1, color: '\x1b[33m', symbol: '⚠️' },
  [LogLevel.Info]: { rank: 2, color: '\x1b[37m', symbol: 'ℹ️' },
  [LogLevel.Debug]: { rank: 3, color: '\x1b[34m', symbol: '🔍' },
  [LogLevel.Trace]: { rank: 4, color: '\x1b[2m', symbol: '🔬' }
};

const SUCCESS_STYLE: LevelStyle = { ...LEVEL_STYLES[LogLevel.Info], color: '\x1b[32m', symbol: '✅' };
const FAILURE_STYLE: LevelStyle = { ...LEVEL_STYLES[LogLevel.Error], symbol: '❌' };

export interface LoggerConfig {
  level: LogLevel;
  /** Wrap each line in its level's ANSI color */
  colors: boolean;
  /** Prefix each line with an ISO timestamp */
  timestamps: boolean;
  output: NodeJS.WritableStream;
}

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: LogLevel.Info,
  colors: Boolean(process.stderr.isTTY) && process.env.NODE_ENV !== 'test',
  timestamps: false,
  output: process.stderr
};

/**
 * Level-filtered logger writing one line per message.
 *
 * Child loggers share their parent's configuration object, so
 * {@link configureLogger} reaches every scoped logger already handed out.
 */
export class Logger {
  constructor(
    private readonly config: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG },
    private readonly scope?: string
  ) {}

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  error(message: string, ...args: unknown[]): void {
    this.write(LogLevel.Error, LEVEL_STYLES[LogLevel.Error], message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write(LogLevel.Warn, LEVEL_STYLES[LogLevel.Warn], message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write(LogLevel.Info, LEVEL_STYLES[LogLevel.Info], message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write(LogLevel.Debug, LEVEL_STYLES[LogLevel.Debug], message, args);
  }

  trace(message: string, ...args: unknown[]): void {
    this.write(LogLevel.Trace, LEVEL_STYLES[LogLevel.Trace], message, args);
  }

  /** Info-level line marked as a completed step */
  success(message: string, ...args: unknown[]): void {
    this.write(LogLevel.Info, SUCCESS_STYLE, message, args);
  }

  /** Error-level line for failures reported outside a failure report */
  failure(message: string, ...args: unknown[]): void {
    this.write(LogLevel.Error, FAILURE_STYLE, message, args);
  }

  child(scope: string): Logger {
    return new Logger(this.config, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private write(level: LogLevel, style: LevelStyle, message: string, args: unknown[]): void {
    if (style.rank > LEVEL_STYLES[this.config.level].rank) {
      return;
    }

    const parts = [
      ...(this.config.timestamps ? [`[${new Date().toISOString()}]`] : []),
      ...(this.scope ? [`[${this.scope}]`] : []),
      style.symbol,
      level.toUpperCase().padEnd(5),
      message,
      ...args.map(arg => (typeof arg === 'object' && arg !== null ? JSON.stringify(arg, null, 2) : String(arg)))
    ];
    const line = parts.join(' ');

    this.config.output.write(`${this.config.colors ? `${style.color}${line}${RESET}` : line}\n`);
  }
}

const rootConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

export const logger = new Logger(rootConfig);

/**
 * Update the shared configuration of every logger
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  Object.assign(rootConfig, config);
}

export function createLogger(scope: string): Logger {
  return logger.child(scope);
}

/**
 * Parse a log level name, falling back when the name is unknown
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.Info): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return Object.values(LogLevel).find(level => level === normalized) ?? fallback;
}
