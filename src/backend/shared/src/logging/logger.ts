/**
 * Structured Logging Module
 *
 * JSON-line structured logging with correlation ids, PII masking and an
 * optional telemetry sink.
 */

import { z } from 'zod';

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * PII patterns masked inside free-text values.
 *
 * Phone numbers must be formatted (parentheses, spaces or a +1 prefix) so that
 * uuid segments are not mistaken for them.
 */
export const PII_PATTERNS = {
  email: /[a-zA-Z0-9][a-zA-Z0-9._%+-]*@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phone: /(?:\+1[-.\s]?[2-9]\d{2}[-.\s]?[2-9]\d{2}[-.\s]?\d{4}|\([2-9]\d{2}\)[-.\s]?[2-9]\d{2}[-.\s]?\d{4})/g,
} as const;

/**
 * Field names whose values are masked wholesale in metadata objects
 */
export const PII_FIELD_NAMES = [
  'email',
  'phone',
  'phoneNumber',
  'address',
  'name',
  'firstName',
  'lastName',
  'fullName',
  'password',
  'passwordHash',
  'secret',
  'token',
  'apiKey',
] as const;

/**
 * Structured log entry schema
 */
export const LogEntrySchema = z.object({
  timestamp: z.string(),
  level: LogLevelSchema,
  message: z.string(),
  correlationId: z.string().optional(),
  service: z.string(),
  operation: z.string().optional(),
  duration: z.number().optional(),
  metadata: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      stack: z.string().optional(),
    })
    .optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

/**
 * Summary logged once per recommendation request
 */
export interface RecommendationLogEntry {
  correlationId: string;
  jobId: string;
  requesterId: string;
  contractorListOnly: boolean;
  candidateCount: number;
  scoredCount: number;
  excludedCount: number;
  topScores: Array<{ contractorId: string; score: number }>;
  processingTimeMs: number;
}

/**
 * Telemetry sink interface (traces, exceptions, metrics, dependency calls)
 */
export interface TelemetryClient {
  trackTrace(message: string, severity: number, properties?: Record<string, string>): void;
  trackException(exception: Error, properties?: Record<string, string>): void;
  trackMetric(name: string, value: number, properties?: Record<string, string>): void;
  trackDependency(
    name: string,
    data: string,
    duration: number,
    success: boolean,
    dependencyType: string,
    properties?: Record<string, string>
  ): void;
  flush(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  serviceName: string;
  minLevel: LogLevel;
  enableConsole: boolean;
  telemetryClient?: TelemetryClient;
  maskPii: boolean;
  /** Most recent entries kept in memory; 0 keeps none */
  maxEntries: number;
}

export const defaultLoggerConfig: LoggerConfig = {
  serviceName: 'contractor-dispatch',
  minLevel: LogLevel.INFO,
  enableConsole: true,
  maskPii: true,
  maxEntries: 1000,
};

/**
 * Masks PII in a string value
 */
export function maskPiiInString(value: string): string {
  return value
    .replace(PII_PATTERNS.email, '[EMAIL_MASKED]')
    .replace(PII_PATTERNS.phone, '[PHONE_MASKED]');
}

/**
 * Checks if a field name is a PII field
 */
export function isPiiFieldName(fieldName: string): boolean {
  const lowerFieldName = fieldName.toLowerCase();
  return PII_FIELD_NAMES.some((piiField) => lowerFieldName === piiField.toLowerCase());
}

/**
 * Masks PII in an object recursively
 */
export function maskPiiInObject(obj: unknown, depth = 0): unknown {
  // Prevent infinite recursion
  if (depth > 10) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return maskPiiInString(obj);
  }

  if (typeof obj === 'number' || typeof obj === 'boolean') {
    return obj;
  }

  if (obj instanceof Date) {
    return obj.toISOString();
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => maskPiiInObject(item, depth + 1));
  }

  if (typeof obj === 'object') {
    const masked: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (isPiiFieldName(key) && value !== null && value !== undefined) {
        masked[key] = '[PII_MASKED]';
      } else {
        masked[key] = maskPiiInObject(value, depth + 1);
      }
    }
    return masked;
  }

  return obj;
}

function logLevelToSeverity(level: LogLevel): number {
  switch (level) {
    case LogLevel.DEBUG:
      return 0;
    case LogLevel.INFO:
      return 1;
    case LogLevel.WARN:
      return 2;
    case LogLevel.ERROR:
      return 3;
    default:
      return 1;
  }
}

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  const levels = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];
  return levels.indexOf(level) >= levels.indexOf(minLevel);
}

/**
 * Structured Logger class
 */
export class Logger {
  private config: LoggerConfig;
  private correlationId?: string;
  private logEntries: LogEntry[];

  constructor(config: Partial<LoggerConfig> = {}, sharedEntries: LogEntry[] = []) {
    this.config = { ...defaultLoggerConfig, ...config };
    this.logEntries = sharedEntries;
  }

  setCorrelationId(correlationId: string): void {
    this.correlationId = correlationId;
  }

  getCorrelationId(): string | undefined {
    return this.correlationId;
  }

  /**
   * Creates a child logger bound to a correlation id. Entries recorded by the
   * child are visible through the parent's getLogEntries().
   */
  child(correlationId: string): Logger {
    const childLogger = new Logger(this.config, this.logEntries);
    childLogger.setCorrelationId(correlationId);
    return childLogger;
  }

  /**
   * Gets all log entries (for testing)
   */
  getLogEntries(): LogEntry[] {
    return [...this.logEntries];
  }

  /**
   * Clears all log entries (for testing)
   */
  clearLogEntries(): void {
    this.logEntries.length = 0;
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.serviceName,
      correlationId: this.correlationId,
    };

    if (metadata) {
      const masked = this.config.maskPii ? maskPiiInObject(metadata) : metadata;
      entry.metadata = LogEntrySchema.shape.metadata.parse(masked);
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: this.config.maskPii ? maskPiiInString(error.message) : error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  private log(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!shouldLog(level, this.config.minLevel)) {
      return;
    }

    const entry = this.createLogEntry(level, message, metadata, error);
    this.logEntries.push(entry);
    const overflow = this.logEntries.length - Math.max(0, this.config.maxEntries);
    if (overflow > 0) {
      this.logEntries.splice(0, overflow);
    }

    if (this.config.enableConsole) {
      const logFn = level === LogLevel.ERROR ? console.error : console.log;
      logFn(JSON.stringify(entry));
    }

    const telemetry = this.config.telemetryClient;
    if (telemetry) {
      const properties: Record<string, string> = {
        service: this.config.serviceName,
      };

      if (this.correlationId) {
        properties.correlationId = this.correlationId;
      }

      if (entry.metadata) {
        properties.metadata = JSON.stringify(entry.metadata);
      }

      if (error) {
        telemetry.trackException(error, properties);
      } else {
        telemetry.trackTrace(message, logLevelToSeverity(level), properties);
      }
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.WARN, message, metadata, error);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, metadata, error);
  }

  /**
   * Logs the outcome of one recommendation request
   */
  logRecommendation(entry: RecommendationLogEntry): void {
    this.setCorrelationId(entry.correlationId);

    this.info('Recommendation request completed', {
      jobId: entry.jobId,
      requesterId: entry.requesterId,
      contractorListOnly: entry.contractorListOnly,
      candidateCount: entry.candidateCount,
      scoredCount: entry.scoredCount,
      excludedCount: entry.excludedCount,
      topScores: entry.topScores,
      processingTimeMs: entry.processingTimeMs,
    });
  }

  /**
   * Logs a call to an external dependency (distance matrix API, cache)
   */
  logDependency(
    name: string,
    data: string,
    duration: number,
    success: boolean,
    dependencyType: string
  ): void {
    const metadata: Record<string, unknown> = {
      dependencyName: name,
      dependencyData: data,
      duration,
      success,
      dependencyType,
    };

    if (success) {
      this.debug(`Dependency call to ${name} succeeded`, metadata);
    } else {
      this.warn(`Dependency call to ${name} failed`, metadata);
    }

    if (this.config.telemetryClient) {
      const properties: Record<string, string> = {
        service: this.config.serviceName,
      };

      if (this.correlationId) {
        properties.correlationId = this.correlationId;
      }

      this.config.telemetryClient.trackDependency(
        name,
        data,
        duration,
        success,
        dependencyType,
        properties
      );
    }
  }

  flush(): void {
    this.config.telemetryClient?.flush();
  }
}

export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  return new Logger(config);
}

/**
 * In-memory telemetry client for testing
 */
export class InMemoryTelemetryClient implements TelemetryClient {
  public traces: Array<{ message: string; severity: number; properties?: Record<string, string> }> =
    [];
  public exceptions: Array<{ exception: Error; properties?: Record<string, string> }> = [];
  public metrics: Array<{ name: string; value: number; properties?: Record<string, string> }> = [];
  public dependencies: Array<{
    name: string;
    data: string;
    duration: number;
    success: boolean;
    dependencyType: string;
    properties?: Record<string, string>;
  }> = [];

  trackTrace(message: string, severity: number, properties?: Record<string, string>): void {
    this.traces.push({ message, severity, properties });
  }

  trackException(exception: Error, properties?: Record<string, string>): void {
    this.exceptions.push({ exception, properties });
  }

  trackMetric(name: string, value: number, properties?: Record<string, string>): void {
    this.metrics.push({ name, value, properties });
  }

  trackDependency(
    name: string,
    data: string,
    duration: number,
    success: boolean,
    dependencyType: string,
    properties?: Record<string, string>
  ): void {
    this.dependencies.push({ name, data, duration, success, dependencyType, properties });
  }

  flush(): void {
    // Nothing buffered
  }

  clear(): void {
    this.traces = [];
    this.exceptions = [];
    this.metrics = [];
    this.dependencies = [];
  }
}

let globalLogger: Logger | null = null;

/**
 * Gets the global logger instance
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}
