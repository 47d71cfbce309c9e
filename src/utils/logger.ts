/**
 * Logger for the BVH toolkit
 *
 * Supports different log levels and timing operations.
 */

/**
 * Log Levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent'
}

/**
 * Logger Options Interface
 */
export interface LoggerOptions {
  level?: LogLevel;
  timestamp?: boolean;
  duration?: boolean;
  prefix?: string;
  sink?: (line: string, context?: LoggerContext) => void;
}

/**
 * Logger Context Interface
 */
export interface LoggerContext {
  operation?: string | undefined;
  stage?: string | undefined;
  filePath?: string | undefined;
  jointName?: string | undefined;
  frameCount?: number | undefined;
  duration?: number | undefined;
  [key: string]: unknown;
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR, LogLevel.SILENT];

/**
 * Internal Logger Class
 */
export class Logger {
  private options: Required<LoggerOptions>;
  private startTimes: Map<string, number> = new Map();

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level || LogLevel.INFO,
      timestamp: options.timestamp ?? true,
      duration: options.duration ?? true,
      prefix: options.prefix || 'BVH',
      sink: options.sink || defaultSink,
    };
  }

  /**
   * Format timestamp
   */
  private formatTimestamp(): string {
    if (!this.options.timestamp) return '';
    return new Date().toISOString().substring(11, 23);
  }

  /**
   * Get colors for terminal output
   */
  private getColor(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '\x1b[90m';
      case LogLevel.INFO:
        return '\x1b[36m';
      case LogLevel.WARN:
        return '\x1b[33m';
      case LogLevel.ERROR:
        return '\x1b[31m';
      default:
        return '\x1b[90m';
    }
  }

  /**
   * Check if should log based on level
   */
  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.options.level);
  }

  /**
   * Base log method
   */
  private log(level: LogLevel, message: string, context?: LoggerContext): void {
    if (!this.isEnabled(level)) return;

    const timestamp = this.formatTimestamp();
    const timeStr = timestamp ? ` @ ${timestamp}` : '';
    const line = `${this.getColor(level)}${this.options.prefix} [${level.toUpperCase()}]${timeStr} ${message}\x1b[0m`;

    this.options.sink(line, context);
  }

  debug(message: string, context?: LoggerContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  /**
   * Start timing an operation
   */
  startTiming(operation: string): void {
    this.startTimes.set(operation, Date.now());
    this.debug(`Starting operation: ${operation}`, { operation });
  }

  /**
   * End timing an operation
   */
  endTiming(operation: string, context?: LoggerContext): void {
    const startTime = this.startTimes.get(operation);
    if (startTime !== undefined) {
      this.startTimes.delete(operation);
      const duration = this.options.duration ? Date.now() - startTime : undefined;
      this.debug(`Completed operation: ${operation}`, {
        operation,
        duration,
        ...context
      });
    }
  }

  /**
   * Run a synchronous operation with timing
   */
  timed<T>(operation: string, fn: () => T, context?: LoggerContext): T {
    this.startTiming(operation);
    try {
      const result = fn();
      this.endTiming(operation, { ...context, success: true });
      return result;
    } catch (error) {
      this.endTiming(operation, { ...context, success: false, error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  }

  /**
   * Log file operation
   */
  logFileOperation(operation: string, filePath: string, fileSize?: number): void {
    this.info(`File operation: ${operation}`, { operation, filePath, fileSize });
  }
}

function defaultSink(line: string, context?: LoggerContext): void {
  if (context) {
    console.log(line, context);
  } else {
    console.log(line);
  }
}

/**
 * Create logger with custom options
 */
export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * Logger factory for specific operations
 */
export const LoggerFactory = {
  /**
   * Logger for parse and serialize passes
   */
  forCodec(debug: boolean = false): Logger {
    return createLogger({
      level: debug ? LogLevel.DEBUG : LogLevel.WARN,
      prefix: 'BVH-Codec'
    });
  },

  /**
   * Logger for capture sessions
   */
  forRecorder(debug: boolean = false): Logger {
    return createLogger({
      level: debug ? LogLevel.DEBUG : LogLevel.INFO,
      prefix: 'BVH-Recorder'
    });
  },

  /**
   * Logger for animation loading
   */
  forLoader(debug: boolean = false): Logger {
    return createLogger({
      level: debug ? LogLevel.DEBUG : LogLevel.INFO,
      prefix: 'BVH-Loader'
    });
  },

  /**
   * Logger that records nothing
   */
  silent(): Logger {
    return createLogger({ level: LogLevel.SILENT });
  }
};
