// File-based logging for blockcat
// Entries are buffered and appended to the log file, one structured line each

import { dirname } from 'node:path';
import { Env } from './env.ts';
import { mkdirSync, writeTextFileSync } from './runtime/mod.ts';

export type LogLevel = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
  source?: string;
}

export interface LoggerOptions {
  // Path to log file; empty string disables logging
  logFile?: string;
  level?: LogLevel;
  includeTimestamp?: boolean;
  bufferSize?: number;
  flushInterval?: number; // in milliseconds, 0 disables the timer
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Logger {
  private _options: Required<LoggerOptions>;
  private _buffer: LogEntry[] = [];
  private _entryCount = 0;
  private _flushTimer?: ReturnType<typeof setInterval>;
  private _currentLogFile?: string;
  private _disabled = false;
  private _sessionId: string;

  constructor(options: LoggerOptions = {}) {
    this._options = {
      logFile: options.logFile ?? '',
      level: options.level ?? 'INFO',
      includeTimestamp: options.includeTimestamp ?? true,
      bufferSize: options.bufferSize || 100,
      flushInterval: options.flushInterval ?? 1000,
    };
    this._sessionId = `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  }

  initializeSync(): void {
    if (this._currentLogFile || this._disabled) {
      return;
    }

    const logFile = this._options.logFile.trim();
    if (logFile === '') {
      this._disabled = true;
      return;
    }

    const logDir = dirname(logFile);
    if (logDir !== '.') {
      try {
        mkdirSync(logDir, { recursive: true });
      } catch (error) {
        this._disable(`Failed to create log directory "${logDir}": ${errorText(error)}`);
        return;
      }
    }
    this._currentLogFile = logFile;

    if (this._options.flushInterval > 0) {
      this._flushTimer = setInterval(() => this._flushSync(), this._options.flushInterval);
      // Don't hold the process open
      this._flushTimer.unref();
    }

    this._writeEntry({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session started',
      context: { sessionId: this._sessionId, logFile },
      source: 'Logger',
    });
  }

  /**
   * One line per entry: `<time> [LEVEL] source: message | key=value, ...`,
   * followed by indented error and stack lines when the entry carries an error.
   */
  formatEntry(entry: LogEntry): string {
    const parts: string[] = [];
    if (this._options.includeTimestamp) {
      parts.push(entry.timestamp.toISOString());
    }
    parts.push(`[${entry.level}]`);
    parts.push(entry.source ? `${entry.source}: ${entry.message}` : entry.message);

    let line = parts.join(' ');
    if (entry.context && Object.keys(entry.context).length > 0) {
      line += ' | ' + Object.entries(entry.context)
        .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
        .join(', ');
    }
    if (entry.error) {
      line += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        line += `\n  Stack: ${entry.error.stack}`;
      }
    }
    return line + '\n';
  }

  debug(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('DEBUG', message, context, source);
  }

  info(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('INFO', message, context, source);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>, source?: string): void {
    this._log('ERROR', message, context, source, error);
  }

  flush(): void {
    this._flushSync();
  }

  close(): void {
    if (this._disabled || !this._currentLogFile) {
      this._stopTimer();
      return;
    }

    this._buffer.push({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session ended',
      context: { sessionId: this._sessionId, totalEntries: this._entryCount },
      source: 'Logger',
    });
    this._flushSync();
    this._stopTimer();
    this._currentLogFile = undefined;
    this._disabled = true;
  }

  private _log(level: LogLevel, message: string, context?: Record<string, unknown>, source?: string, error?: Error): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this._options.level]) return;
    this._writeEntry({ timestamp: new Date(), level, message, error, context, source });
  }

  private _writeEntry(entry: LogEntry): void {
    if (!this._currentLogFile && !this._disabled) {
      this.initializeSync();
    }
    if (this._disabled) {
      return;
    }

    this._entryCount++;
    this._buffer.push(entry);
    if (this._buffer.length >= this._options.bufferSize) {
      this._flushSync();
    }
  }

  private _flushSync(): void {
    if (this._buffer.length === 0 || this._disabled || !this._currentLogFile) return;

    const content = this._buffer.splice(0).map((entry) => this.formatEntry(entry)).join('');
    try {
      writeTextFileSync(this._currentLogFile, content, { append: true });
    } catch (error) {
      this._disable(`Failed to write to log file "${this._currentLogFile}": ${errorText(error)}`);
    }
  }

  // Report once on stderr; later entries are dropped
  private _disable(reason: string): void {
    console.error(`${reason}. Logging disabled.`);
    this._stopTimer();
    this._buffer = [];
    this._currentLogFile = undefined;
    this._disabled = true;
  }

  private _stopTimer(): void {
    if (this._flushTimer) {
      clearInterval(this._flushTimer);
      this._flushTimer = undefined;
    }
  }
}

function getLogLevelFromEnv(): LogLevel | undefined {
  const envLevel = Env.get('BLOCKCAT_LOG_LEVEL')?.toUpperCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return undefined;
}

function createDefaultLoggerOptions(): LoggerOptions {
  return {
    level: getLogLevelFromEnv() ?? 'INFO',
    // Unset means disabled
    logFile: Env.get('BLOCKCAT_LOG_FILE') ?? '',
  };
}

let globalLogger: Logger | undefined;

export function createLogger(options?: LoggerOptions): Logger {
  const logger = new Logger({ ...createDefaultLoggerOptions(), ...options });
  logger.initializeSync();
  return logger;
}

export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

/**
 * Replace the global logger, closing the previous one.
 */
export function setGlobalLogger(logger: Logger): void {
  if (globalLogger && globalLogger !== logger) {
    globalLogger.close();
  }
  globalLogger = logger;
}

// Logger bound to a source name
export interface ComponentLogger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
}

/**
 * Resolves the global logger on every call, so module-level loggers follow a
 * later setGlobalLogger().
 */
export function getLogger(name: string): ComponentLogger {
  return {
    debug: (message, context) => getGlobalLogger().debug(message, context, name),
    info: (message, context) => getGlobalLogger().info(message, context, name),
    error: (message, error, context) => getGlobalLogger().error(message, error, context, name),
  };
}
