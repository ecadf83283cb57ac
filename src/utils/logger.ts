/**
 * utils/logger.ts — Structured logging utility.
 *
 * Provides a lightweight logger for the CLI that outputs:
 *   - Text (default): Human-readable format with timestamps, level prefixes,
 *     and the current draft ID once one exists
 *   - JSON (LOG_FORMAT=json): Single-line JSON per log entry, for runs
 *     driven by scripts or CI jobs that collect logs
 *
 * All log output goes to stderr. stdout is reserved for the final result
 * (draft ID and URL) so it can be piped into other tools.
 *
 * Draft ID correlation:
 *   The submission service calls setLogContext() as soon as the draft record
 *   exists. Every log entry written afterwards carries the draftId field, so
 *   a failed run can be matched to the draft left behind on the repository.
 *
 * Log levels (lowest to highest):
 *   - debug: Per-request and per-part details (enabled by --verbose or LOG_LEVEL=debug)
 *   - info:  Normal progress events
 *   - warn:  Degraded conditions (e.g., TLS verification disabled)
 *   - error: Failures that end the run
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Structure of a JSON log entry */
interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  draftId?: string;
  data?: unknown;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

let threshold: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? 'info';

let jsonOutput = process.env.LOG_FORMAT === 'json';

// ─── Draft Context ───────────────────────────────────────────────
let currentDraftId: string | undefined;

export function setLogContext(draftId: string | undefined): void {
  currentDraftId = draftId;
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function setLogFormat(format: 'text' | 'json'): void {
  jsonOutput = format === 'json';
}

/**
 * Core log formatter — filters by level, builds the entry and writes it.
 * Text mode: [timestamp] [LEVEL] [draftId] message data
 * JSON mode: single-line JSON
 */
function formatLog(level: LogLevel, message: string, data?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: level.toUpperCase(),
    message,
    ...(currentDraftId && { draftId: currentDraftId }),
    ...(data !== undefined && { data }),
  };

  if (jsonOutput) {
    console.error(JSON.stringify(entry));
    return;
  }

  const prefix = entry.draftId
    ? `[${entry.timestamp}] [${entry.level}] [${entry.draftId}]`
    : `[${entry.timestamp}] [${entry.level}]`;
  if (data === undefined) {
    console.error(prefix, message);
  } else {
    console.error(prefix, message, data);
  }
}

/** Application logger — import and use throughout the codebase */
export const logger = {
  error: (message: string, data?: unknown) => formatLog('error', message, data),
  warn: (message: string, data?: unknown) => formatLog('warn', message, data),
  info: (message: string, data?: unknown) => formatLog('info', message, data),
  debug: (message: string, data?: unknown) => formatLog('debug', message, data),
};
