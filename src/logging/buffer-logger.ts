/**
 * Buffer Logger
 * Keeps records in memory for tests; children append to the parent's store
 */

import type { LogEvent, LogEventType, LogLevel, LogMetadata, Logger, LoggerOptions } from '../types/logger';
import { BaseLogger, ResolvedLoggerSettings, resolveSettings } from './base-logger';

export class BufferLogger extends BaseLogger {
  constructor(
    options: LoggerOptions = {},
    private readonly events: LogEvent[] = [],
    inherited?: { settings: ResolvedLoggerSettings; context: LogMetadata }
  ) {
    super(inherited?.settings ?? resolveSettings(options, 'debug'), inherited?.context ?? {});
  }

  child(context: LogMetadata): Logger {
    return new BufferLogger({}, this.events, {
      settings: this.settings,
      context: this.childContext(context),
    });
  }

  protected write(event: LogEvent): void {
    this.events.push(event);
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  getEventsByType(eventType: LogEventType): LogEvent[] {
    return this.events.filter((event) => event.eventType === eventType);
  }

  getEventsByLevel(level: LogLevel): LogEvent[] {
    return this.events.filter((event) => event.level === level);
  }

  hasLevel(level: LogLevel): boolean {
    return this.events.some((event) => event.level === level);
  }

  clear(): void {
    this.events.length = 0;
  }
}

export function createBufferLogger(options?: LoggerOptions): BufferLogger {
  return new BufferLogger(options);
}
