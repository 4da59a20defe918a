/**
 * Shared record building for the console and buffer loggers
 */

import {
  DEFAULT_REDACT_PATTERNS,
  LogEvent,
  LogEventType,
  LogLevel,
  LogMetadata,
  Logger,
  levelForEvent,
  redactSecrets,
  shouldLog,
} from '../types/logger';

export interface ResolvedLoggerSettings {
  minLevel: LogLevel;
  redactPatterns: RegExp[];
  now: () => string;
}

export abstract class BaseLogger implements Logger {
  protected constructor(
    protected readonly settings: ResolvedLoggerSettings,
    protected readonly context: LogMetadata
  ) {}

  /**
   * Deliver a record that passed the level filter
   */
  protected abstract write(event: LogEvent): void;

  abstract child(context: LogMetadata): Logger;

  debug(message: string, metadata?: LogMetadata): void {
    this.record('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.record('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.record('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.record('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.record(levelForEvent(eventType), eventType, message, metadata);
  }

  protected childContext(context: LogMetadata): LogMetadata {
    return { ...this.context, ...context };
  }

  private record(
    level: LogLevel,
    eventType: LogEventType,
    message: string,
    metadata: LogMetadata | undefined
  ): void {
    if (!shouldLog(level, this.settings.minLevel)) {
      return;
    }

    const merged: LogMetadata = { ...this.context, ...metadata };
    for (const [key, value] of Object.entries(merged)) {
      if (typeof value === 'string') {
        merged[key] = this.redact(value);
      }
    }

    this.write({
      timestamp: this.settings.now(),
      level,
      eventType,
      message: this.redact(message),
      metadata: merged,
    });
  }

  private redact(text: string): string {
    return redactSecrets(text, this.settings.redactPatterns);
  }
}

export function resolveSettings(
  options: { minLevel?: LogLevel; redactPatterns?: RegExp[]; now?: () => string },
  defaultLevel: LogLevel
): ResolvedLoggerSettings {
  return {
    minLevel: options.minLevel ?? defaultLevel,
    redactPatterns: options.redactPatterns ?? DEFAULT_REDACT_PATTERNS,
    now: options.now ?? (() => new Date().toISOString()),
  };
}
