// Leveled console logger shared by the stores, the sweeper and the CLI

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  timestamps?: boolean;
}

type LogContext = Record<string, unknown>;

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: '[retention]',
  timestamps: false
};

type EmittedLevel = LogLevel.DEBUG | LogLevel.INFO | LogLevel.WARN;

// Console method and label per emitted level
const SINKS: Record<EmittedLevel, { label: string; write: (line: string) => void }> = {
  [LogLevel.DEBUG]: { label: 'DEBUG', write: (line: string) => console.debug(line) },
  [LogLevel.INFO]: { label: 'INFO', write: (line: string) => console.info(line) },
  [LogLevel.WARN]: { label: 'WARN', write: (line: string) => console.warn(line) }
};

/**
 * Structured one-line logger. Components take an injected instance; the CLI tunes
 * the shared one through `Logger.configure`.
 */
export class Logger {
  private static instance: Logger | null = null;
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Reconfigure the shared instance in place, so modules already holding `logger` see the change
   */
  static configure(config: Partial<LoggerConfig>): void {
    Logger.getInstance().config = { ...DEFAULT_CONFIG, ...config };
  }

  debug(message: string, context?: LogContext): void {
    this.emit(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit(LogLevel.WARN, message, context);
  }

  private emit(level: EmittedLevel, message: string, context?: LogContext): void {
    if (level < this.config.level) return;

    const sink = SINKS[level];
    const parts = [
      this.config.timestamps ? `[${new Date().toISOString()}]` : '',
      this.config.prefix ?? '',
      `[${sink.label}]`,
      message,
      context && Object.keys(context).length > 0 ? JSON.stringify(context) : ''
    ];

    sink.write(parts.filter(part => part !== '').join(' '));
  }
}

export const logger = Logger.getInstance();
