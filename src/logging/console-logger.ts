/**
 * Console Logger
 * Writes records to stderr so they never mix with progress output or the
 * --json snapshot on stdout
 */

import type { LogEvent, LogLevel, LogMetadata, Logger, LoggerOptions } from '../types/logger';
import { BaseLogger, ResolvedLoggerSettings, resolveSettings } from './base-logger';

export interface ConsoleLoggerOptions extends LoggerOptions {
  /** Defaults to process.stderr */
  stream?: NodeJS.WritableStream;
}

interface OutputSettings {
  stream: NodeJS.WritableStream;
  jsonOutput: boolean;
  includeTimestamp: boolean;
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

/**
 * Run-identifying fields shown after the message
 */
function describeContext(metadata: LogMetadata): string {
  const parts: string[] = [];
  if (typeof metadata.runId === 'string') {
    parts.push(`run=${metadata.runId}`);
  }
  if (typeof metadata.step === 'number') {
    parts.push(`step=${metadata.step + 1}`);
  }
  if (typeof metadata.phase === 'string') {
    parts.push(`phase=${metadata.phase}`);
  }
  return parts.length > 0 ? ` [${parts.join(' ')}]` : '';
}

export function formatPrettyLine(event: LogEvent, includeTimestamp: boolean): string {
  const time = includeTimestamp ? `${event.timestamp.slice(11, 23)} ` : '';
  const type = event.eventType === event.level ? '' : ` (${event.eventType})`;
  return `${time}${LEVEL_LABELS[event.level]} ${event.message}${type}${describeContext(event.metadata)}`;
}

export class ConsoleLogger extends BaseLogger {
  private readonly output: OutputSettings;

  constructor(
    options: ConsoleLoggerOptions = {},
    inherited?: { settings: ResolvedLoggerSettings; output: OutputSettings; context: LogMetadata }
  ) {
    super(inherited?.settings ?? resolveSettings(options, 'info'), inherited?.context ?? {});
    this.output = inherited?.output ?? {
      stream: options.stream ?? process.stderr,
      jsonOutput: options.jsonOutput ?? false,
      includeTimestamp: options.includeTimestamp ?? false,
    };
  }

  child(context: LogMetadata): Logger {
    return new ConsoleLogger(
      {},
      { settings: this.settings, output: this.output, context: this.childContext(context) }
    );
  }

  protected write(event: LogEvent): void {
    const line = this.output.jsonOutput
      ? JSON.stringify(event)
      : formatPrettyLine(event, this.output.includeTimestamp);
    this.output.stream.write(`${line}\n`);
  }
}

export function createConsoleLogger(options?: ConsoleLoggerOptions): ConsoleLogger {
  return new ConsoleLogger(options);
}
