/**
 * Logger contract
 * Every record carries an event type so runs can be followed by querying
 * for run_*, step_* and decision_* events rather than by parsing text.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogEventType =
  | 'run_started'
  | 'run_completed'
  | 'run_cancelled'
  | 'run_failed'
  | 'phase_started'
  | 'invalid_transition'
  | 'step_started'
  | 'step_completed'
  | 'step_failed'
  | 'decision_requested'
  | 'decision_fallback'
  | 'catalog_loaded'
  // Plain leveled messages use their level as the event type
  | LogLevel;

/**
 * Fields a record may carry; runId and recipe are normally supplied by a
 * child logger bound to the run
 */
export interface LogMetadata {
  runId?: string;
  recipe?: string;
  phase?: string;
  /** 0-based step ordinal */
  step?: number;
  [key: string]: unknown;
}

export interface LogEvent {
  /** ISO 8601 */
  timestamp: string;
  level: LogLevel;
  eventType: LogEventType;
  message: string;
  metadata: LogMetadata;
}

export interface LoggerOptions {
  /** Records below this level are dropped; defaults differ per logger */
  minLevel?: LogLevel;
  /** Prefix pretty lines with the local time */
  includeTimestamp?: boolean;
  /** One JSON object per line instead of pretty text */
  jsonOutput?: boolean;
  /** Applied to messages and string metadata before anything is kept */
  redactPatterns?: RegExp[];
  /** Source of record timestamps */
  now?: () => string;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;

  /**
   * Record a structured event at the level its type maps to
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Logger that adds the given fields to every record and shares this
   * logger's destination
   */
  child(context: LogMetadata): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function levelForEvent(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
    case 'run_failed':
      return 'error';
    case 'warn':
    case 'invalid_transition':
    case 'step_failed':
      return 'warn';
    case 'debug':
    case 'decision_requested':
      return 'debug';
    default:
      return 'info';
  }
}

/**
 * Positive when a is more severe than b
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  return LEVEL_RANK[a] - LEVEL_RANK[b];
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return compareLogLevels(level, minLevel) >= 0;
}

export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  /(?:api[_-]?key|apikey)[=:\s]*['"]?([a-zA-Z0-9_-]{20,})['"]?/gi,
  /Bearer\s+[a-zA-Z0-9._-]{16,}/gi,
  // openai project and user keys
  /sk-(?:proj-)?[a-zA-Z0-9_-]{20,}/g,
];

/**
 * Replace every match with a short visible prefix and [REDACTED]
 */
export function redactSecrets(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  return patterns.reduce((current, pattern) => {
    pattern.lastIndex = 0;
    return current.replace(pattern, (match) => `${match.slice(0, Math.min(4, Math.floor(match.length / 4)))}[REDACTED]`);
  }, text);
}
