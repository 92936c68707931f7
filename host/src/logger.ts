// Structured logging system for the mic-remote host
// Provides file-based logging, an in-memory history, performance tracking, and debug modes

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export interface LogEntry {
  timestamp: string;
  level: string;
  context?: string;
  message: string;
  data?: unknown;
  error?: {
    message: string;
    stack?: string;
    code?: string;
  };
  performance?: {
    operation: string;
    duration: number;
    startTime: number;
  };
}

export interface LogRecord {
  timestamp: string;
  level: string;
  context?: string;
  message: string;
  line: string;
}

export interface LoggerConfig {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  logFile?: string;
  maxFileSize: number; // bytes
  maxBackups: number;
  enablePerformance: boolean;
  historySize: number;
}

export class Logger {
  private config: LoggerConfig;
  private logFile: string;
  private performanceTracking: Map<string, number> = new Map();
  private history: LogRecord[] = [];

  constructor(config: Partial<LoggerConfig> = {}) {
    const isDebugMode = process.env.MIC_REMOTE_DEBUG === 'true';

    this.config = {
      level: isDebugMode ? LogLevel.DEBUG : LogLevel.INFO,
      enableConsole: true,
      enableFile: true,
      maxFileSize: 10 * 1024 * 1024, // 10MB
      maxBackups: 5,
      enablePerformance: isDebugMode,
      historySize: 300,
      ...config
    };

    this.logFile = this.config.logFile || this.getDefaultLogFile();

    if (this.config.enableFile) {
      this.ensureLogDirectory();
    }

    this.info('Logger initialized', {
      debugMode: isDebugMode,
      logFile: this.config.enableFile ? this.logFile : null,
      level: LogLevel[this.config.level]
    });
  }

  private getDefaultLogFile(): string {
    const filename = 'mic-remote-host.log';

    switch (os.platform()) {
      case 'win32':
        return path.join(os.tmpdir(), filename);
      case 'darwin':
      case 'linux':
      default:
        return path.join('/tmp', filename);
    }
  }

  private ensureLogDirectory(): void {
    try {
      const logDir = path.dirname(this.logFile);
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
    } catch (error) {
      console.error('Failed to create log directory:', error);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return level <= this.config.level;
  }

  private formatLogEntry(entry: LogEntry): string {
    const parts = [`[${entry.timestamp}] [${entry.level}]`];

    if (entry.context) {
      parts.push(`[${entry.context}]`);
    }

    parts.push(entry.message);

    if (entry.data !== undefined) {
      try {
        parts.push(JSON.stringify(entry.data, safeJsonReplacer));
      } catch {
        parts.push('[Circular Reference]');
      }
    }

    if (entry.error) {
      parts.push(`ERROR: ${entry.error.message}`);
      if (entry.error.code) {
        parts.push(`CODE: ${entry.error.code}`);
      }
      if (entry.error.stack && this.config.level >= LogLevel.DEBUG) {
        parts.push(`STACK: ${entry.error.stack}`);
      }
    }

    if (entry.performance) {
      const { operation, duration } = entry.performance;
      parts.push(`PERF: ${operation} took ${duration}ms`);
    }

    return parts.join(' ');
  }

  private writeToFile(logLine: string): void {
    if (!this.config.enableFile) return;

    try {
      this.rotateLogIfNeeded();
      fs.appendFileSync(this.logFile, logLine + '\n', { encoding: 'utf8' });
    } catch (error) {
      // Only output to console if file logging fails
      if (this.config.enableConsole) {
        console.error('Failed to write to log file:', error);
      }
    }
  }

  private rotateLogIfNeeded(): void {
    try {
      if (!fs.existsSync(this.logFile)) return;

      const stats = fs.statSync(this.logFile);
      if (stats.size >= this.config.maxFileSize) {
        for (let i = this.config.maxBackups; i > 0; i--) {
          const oldFile = `${this.logFile}.${i}`;
          const newFile = `${this.logFile}.${i + 1}`;

          if (fs.existsSync(oldFile)) {
            if (i === this.config.maxBackups) {
              fs.unlinkSync(oldFile); // Delete oldest
            } else {
              fs.renameSync(oldFile, newFile);
            }
          }
        }

        fs.renameSync(this.logFile, `${this.logFile}.1`);
      }
    } catch (error) {
      console.error('Failed to rotate log file:', error);
    }
  }

  private remember(entry: LogEntry, line: string): void {
    if (this.config.historySize <= 0) return;

    this.history.push({
      timestamp: entry.timestamp,
      level: entry.level,
      context: entry.context,
      message: entry.message,
      line
    });
    if (this.history.length > this.config.historySize) {
      this.history.splice(0, this.history.length - this.config.historySize);
    }
  }

  private emit(entry: LogEntry, useStderr: boolean): void {
    const logLine = this.formatLogEntry(entry);

    if (this.config.enableConsole) {
      const consoleMethod = useStderr ? console.error : console.log;
      consoleMethod(logLine);
    }

    this.remember(entry, logLine);
    this.writeToFile(logLine);
  }

  private log(level: LogLevel, message: string, data?: unknown, context?: string): void {
    if (!this.shouldLog(level)) return;

    this.emit({
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      context,
      message,
      data
    }, level <= LogLevel.WARN);
  }

  public error(message: string, error?: unknown, context?: string): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'ERROR',
      context,
      message
    };

    if (error !== undefined) {
      if (error instanceof Error) {
        entry.error = {
          message: error.message,
          stack: error.stack,
          code: errorCode(error)
        };
      } else {
        entry.data = error;
      }
    }

    this.emit(entry, true);
  }

  public warn(message: string, data?: unknown, context?: string): void {
    this.log(LogLevel.WARN, message, data, context);
  }

  public info(message: string, data?: unknown, context?: string): void {
    this.log(LogLevel.INFO, message, data, context);
  }

  public debug(message: string, data?: unknown, context?: string): void {
    this.log(LogLevel.DEBUG, message, data, context);
  }

  // Most recent entries, oldest first
  public recent(limit: number = this.config.historySize): LogRecord[] {
    if (limit <= 0) return [];
    return this.history.slice(-limit);
  }

  public clearHistory(): void {
    this.history = [];
  }

  // Performance tracking methods
  public startTimer(operation: string): string {
    const timerId = `${operation}_${Date.now()}_${Math.random()}`;
    this.performanceTracking.set(timerId, Date.now());

    if (this.config.enablePerformance) {
      this.debug(`Started timer for ${operation}`, { timerId }, 'PERF');
    }

    return timerId;
  }

  public endTimer(timerId: string, operation: string, context?: string): number {
    const startTime = this.performanceTracking.get(timerId);
    if (startTime === undefined) {
      this.warn('Timer not found', { timerId, operation }, 'PERF');
      return 0;
    }

    const duration = Date.now() - startTime;
    this.performanceTracking.delete(timerId);

    if (this.config.enablePerformance) {
      this.emit({
        timestamp: new Date().toISOString(),
        level: 'DEBUG',
        context: context || 'PERF',
        message: 'Performance measurement',
        performance: {
          operation,
          duration,
          startTime
        }
      }, false);
    }

    return duration;
  }

  public async timeAsync<T>(operation: string, fn: () => Promise<T>, context?: string): Promise<T> {
    const timerId = this.startTimer(operation);
    try {
      const result = await fn();
      this.endTimer(timerId, operation, context);
      return result;
    } catch (error) {
      this.endTimer(timerId, operation, context);
      this.error(`Operation ${operation} failed`, error, context);
      throw error;
    }
  }

  public shutdown(): void {
    this.info('Logger shutting down');
    this.performanceTracking.clear();
  }
}

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'key', 'auth'];

function safeJsonReplacer(key: string, value: unknown): unknown {
  // Prevent logging sensitive information
  if (SENSITIVE_KEYS.some(sensitive => key.toLowerCase().includes(sensitive))) {
    return '[REDACTED]';
  }

  if (typeof value === 'function') {
    return '[Function]';
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  return value;
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// Shared logger instance for the process entry point
let logger: Logger | null = null;

export function getLogger(config?: Partial<LoggerConfig>): Logger {
  if (!logger) {
    logger = new Logger(config);
  }
  return logger;
}

export function setLogger(newLogger: Logger): void {
  if (logger) {
    logger.shutdown();
  }
  logger = newLogger;
}

export default getLogger;
