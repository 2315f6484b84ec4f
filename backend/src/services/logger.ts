import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { resolve } from 'path';
import { randomUUID } from 'crypto';

// ============================================================================
// TypeScript Interfaces
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'text';
export type LogOutput = 'console' | 'file' | 'both' | 'none';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  /** Service name (e.g., "event-gate", "node-locator", "flow-machine") */
  service: string;

  /** Event type/name */
  event: string;

  /** Severity level */
  severity: LogLevel;

  /** ISO timestamp */
  timestamp: string;

  /** Processing cycle correlation ID */
  trace_id?: string;

  /** Additional context-specific fields */
  [key: string]: unknown;
}

export interface LogEntry extends LogContext {
  /** Human-readable log message */
  message: string;

  /** Performance timing data (ms) */
  duration?: number;

  /** Error details if applicable */
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };

  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  /** Overall logging level */
  level: LogLevel;

  /** Output format */
  format: LogFormat;

  /** Where entries are written */
  output: LogOutput;

  /** Whether to include trace IDs */
  includeTrace: boolean;

  /** Log directory */
  logDir: string;

  /** Log file name */
  logFile: string;

  /** Service-specific log levels */
  serviceLevels: Record<string, LogLevel>;
}

export interface PerformanceTimer {
  startTime: number;
  operation: string;
  traceId?: string;
  context?: Record<string, unknown>;

  /** End the timer and log duration */
  end(additionalContext?: Record<string, unknown>): number;
}

// ============================================================================
// Environment Configuration
// ============================================================================

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && LOG_LEVELS.some(level => level === value);

const parseServiceLevels = (env?: string): Record<string, LogLevel> => {
  if (!env) return {};

  const levels: Record<string, LogLevel> = {};
  env.split(',').forEach(pair => {
    const [service, level] = pair.trim().split('=');
    const normalized = level?.trim();
    if (service && isLogLevel(normalized)) {
      levels[service.trim()] = normalized;
    }
  });
  return levels;
};

const parseOutput = (value: string | undefined): LogOutput => {
  switch (value) {
    case 'console':
    case 'file':
    case 'both':
    case 'none':
      return value;
    default:
      return 'both';
  }
};

export const readLoggerConfig = (env: NodeJS.ProcessEnv = process.env): LoggerConfig => {
  const level = env.LOG_LEVEL?.toLowerCase();

  return {
    level: isLogLevel(level) ? level : 'info',
    format: env.LOG_FORMAT === 'text' ? 'text' : 'json',
    output: parseOutput(env.LOG_OUTPUT),
    includeTrace: env.LOG_INCLUDE_TRACE !== 'false',
    logDir: resolve(env.LOG_DIR || resolve(process.cwd(), 'var', 'log')),
    logFile: env.LOG_FILE || 'share-pilot.log',
    serviceLevels: parseServiceLevels(env.SERVICE_LOG_LEVELS)
  };
};

// ============================================================================
// Logger Implementation
// ============================================================================

class StructuredLogger {
  private config: LoggerConfig;

  constructor(config: LoggerConfig = readLoggerConfig()) {
    this.config = config;
  }

  /**
   * Generate a new trace ID
   */
  generateTraceId(): string {
    return randomUUID().replace(/-/g, '').substring(0, 16);
  }

  /**
   * Create a performance timer for measuring operation duration
   */
  startTimer(operation: string, traceId?: string, context?: Record<string, unknown>): PerformanceTimer {
    const startTime = Date.now();

    return {
      startTime,
      operation,
      traceId,
      context,
      end: (additionalContext?: Record<string, unknown>) => {
        const duration = Date.now() - startTime;

        this.logEntry({
          service: 'performance-monitor',
          event: 'operation_duration',
          severity: 'debug',
          timestamp: new Date().toISOString(),
          trace_id: traceId,
          operation,
          duration,
          message: `Operation ${operation} completed in ${duration}ms`,
          ...context,
          ...additionalContext
        });

        return duration;
      }
    };
  }

  private shouldLog(service: string, severity: LogLevel): boolean {
    if (this.config.output === 'none') {
      return false;
    }

    const configLevel = this.config.serviceLevels[service] ?? this.config.level;
    return LOG_LEVELS.indexOf(severity) >= LOG_LEVELS.indexOf(configLevel);
  }

  /**
   * Format log entry based on configuration
   */
  format(entry: LogEntry): string {
    if (this.config.format === 'text') {
      const parts = [
        `[${entry.timestamp}]`,
        `[${entry.severity.toUpperCase()}]`,
        entry.service,
        entry.event,
        entry.message
      ];

      if (entry.trace_id && this.config.includeTrace) {
        parts.push(`[trace:${entry.trace_id}]`);
      }

      if (entry.duration !== undefined) {
        parts.push(`(${entry.duration}ms)`);
      }

      let formatted = parts.join(' ');

      if (entry.error) {
        formatted += ` Error: ${entry.error.name}: ${entry.error.message}`;
      }

      if (entry.metadata && Object.keys(entry.metadata).length > 0) {
        formatted += ` ${JSON.stringify(entry.metadata)}`;
      }

      return formatted;
    }

    const jsonEntry: LogEntry = { ...entry };

    if (!this.config.includeTrace || jsonEntry.trace_id === undefined) {
      delete jsonEntry.trace_id;
    }

    return JSON.stringify(jsonEntry);
  }

  private write(formattedEntry: string, severity: LogLevel): void {
    const { output } = this.config;

    if (output === 'file' || output === 'both') {
      try {
        if (!existsSync(this.config.logDir)) {
          mkdirSync(this.config.logDir, { recursive: true });
        }
        appendFileSync(resolve(this.config.logDir, this.config.logFile), formattedEntry + '\n');
      } catch (error) {
        console.error('Failed to write to log file:', error);
      }
    }

    if (output === 'console' || output === 'both') {
      if (severity === 'error') {
        console.error(formattedEntry);
      } else if (severity === 'warn') {
        console.warn(formattedEntry);
      } else {
        console.log(formattedEntry);
      }
    }
  }

  logEntry(entry: LogEntry): void {
    if (!this.shouldLog(entry.service, entry.severity)) {
      return;
    }

    this.write(this.format(entry), entry.severity);
  }

  private emit(
    severity: LogLevel,
    service: string,
    event: string,
    message: string,
    traceId?: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    this.logEntry({
      service,
      event,
      severity,
      timestamp: new Date().toISOString(),
      trace_id: this.config.includeTrace ? traceId : undefined,
      message,
      metadata,
      error: error ? describeError(error) : undefined
    });
  }

  debug(service: string, event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.emit('debug', service, event, message, traceId, metadata);
  }

  info(service: string, event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.emit('info', service, event, message, traceId, metadata);
  }

  warn(service: string, event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.emit('warn', service, event, message, traceId, metadata);
  }

  error(service: string, event: string, message: string, error?: Error, traceId?: string, metadata?: Record<string, unknown>): void {
    this.emit('error', service, event, message, traceId, metadata, error);
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }

  updateConfig(updates: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...updates };
  }
}

const describeError = (error: Error): NonNullable<LogEntry['error']> => {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    code
  };
};

/**
 * Normalise anything thrown into an Error for logging.
 */
export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

// ============================================================================
// Service-Specific Logger Factory
// ============================================================================

class ServiceLogger {
  constructor(
    private logger: StructuredLogger,
    private serviceName: string
  ) {}

  get service(): string {
    return this.serviceName;
  }

  generateTraceId(): string {
    return this.logger.generateTraceId();
  }

  startTimer(operation: string, traceId?: string, context?: Record<string, unknown>): PerformanceTimer {
    return this.logger.startTimer(`${this.serviceName}:${operation}`, traceId, context);
  }

  debug(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.debug(this.serviceName, event, message, traceId, metadata);
  }

  info(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.info(this.serviceName, event, message, traceId, metadata);
  }

  warn(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.warn(this.serviceName, event, message, traceId, metadata);
  }

  error(event: string, message: string, error?: Error, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.error(this.serviceName, event, message, error, traceId, metadata);
  }
}

// ============================================================================
// Export Instances
// ============================================================================

const structuredLogger = new StructuredLogger();

export const createServiceLogger = (serviceName: string): ServiceLogger => {
  return new ServiceLogger(structuredLogger, serviceName);
};

export const logger = {
  debug: (message: string, details?: Record<string, unknown>) => {
    structuredLogger.debug('share-pilot', 'debug', message, undefined, details);
  },

  info: (message: string, details?: Record<string, unknown>) => {
    structuredLogger.info('share-pilot', 'info', message, undefined, details);
  },

  warn: (message: string, details?: Record<string, unknown>) => {
    structuredLogger.warn('share-pilot', 'warn', message, undefined, details);
  },

  error: (message: string, details?: Record<string, unknown> | Error) => {
    if (details instanceof Error) {
      structuredLogger.error('share-pilot', 'error', message, details);
    } else {
      structuredLogger.error('share-pilot', 'error', message, undefined, undefined, details);
    }
  },

  createServiceLogger,

  startTimer: (operation: string, traceId?: string, context?: Record<string, unknown>) => {
    return structuredLogger.startTimer(operation, traceId, context);
  },

  generateTraceId: () => structuredLogger.generateTraceId(),

  getConfig: () => structuredLogger.getConfig(),
  updateConfig: (updates: Partial<LoggerConfig>) => structuredLogger.updateConfig(updates)
};

export { StructuredLogger, ServiceLogger };
