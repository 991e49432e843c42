/**
 * Log level, in ascending severity
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  HIGHLIGHT = 'HIGHLIGHT',
}

const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.SUCCESS,
  LogLevel.WARNING,
  LogLevel.ERROR,
  LogLevel.HIGHLIGHT,
];

/**
 * Logger configuration
 */
export type LoggerConfig = {
  level: LogLevel;
  useColors: boolean;
  /** Prepended as `[prefix]` to every message */
  prefix?: string;
};

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
};

const LEVEL_STYLE: Record<LogLevel, { marker: string; color: string }> = {
  [LogLevel.DEBUG]: { marker: '🔍', color: colors.dim },
  [LogLevel.INFO]: { marker: 'ℹ️', color: colors.blue },
  [LogLevel.SUCCESS]: { marker: '✅', color: colors.green },
  [LogLevel.WARNING]: { marker: '⚠️', color: colors.yellow },
  [LogLevel.ERROR]: { marker: '❌', color: colors.red },
  [LogLevel.HIGHLIGHT]: { marker: '🌟', color: colors.bright + colors.magenta },
};

/**
 * Parse a level name (case-insensitive), falling back to INFO
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const upper = value?.toUpperCase();
  return LEVEL_ORDER.find((level) => level === upper) ?? LogLevel.INFO;
}

/**
 * Logger class with colored console output
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      useColors: config.useColors ?? true,
      prefix: config.prefix,
    };
  }

  /**
   * Create a logger sharing this one's settings with an added prefix.
   *
   * Level changes on the parent after this call do not propagate.
   */
  child(prefix: string): Logger {
    const combined = this.config.prefix ? `${this.config.prefix}] [${prefix}` : prefix;
    return new Logger({ ...this.config, prefix: combined });
  }

  /**
   * Format date as MM-DD HH:mm:ss
   */
  private formatDate(date: Date): string {
    const pad = (n: number) => n.toString().padStart(2, '0');
    return `${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  }

  private format(level: LogLevel, message: string): string {
    const { marker, color } = LEVEL_STYLE[level];
    const body = this.config.prefix ? `[${this.config.prefix}] ${message}` : message;
    const text = this.config.useColors ? `${color}${body}${colors.reset}` : body;
    return `${this.formatDate(new Date())} ${marker} ${text}`;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }

  private write(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) return;
    const line = this.format(level, message);
    if (level === LogLevel.ERROR) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  debug(message: string): void {
    this.write(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.write(LogLevel.INFO, message);
  }

  success(message: string): void {
    this.write(LogLevel.SUCCESS, message);
  }

  warning(message: string): void {
    this.write(LogLevel.WARNING, message);
  }

  error(message: string): void {
    this.write(LogLevel.ERROR, message);
  }

  highlight(message: string): void {
    this.write(LogLevel.HIGHLIGHT, message);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  setColors(useColors: boolean): void {
    this.config.useColors = useColors;
  }
}

// Default logger instance
export const logger: Logger = new Logger({ useColors: process.stdout.isTTY === true });
