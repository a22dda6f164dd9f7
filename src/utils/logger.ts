/**
 * Structured Logger
 *
 * Diagnostics for the engine and its default collaborators. Everything goes
 * to stderr so that an embedding tool is free to use stdout for its own
 * report output.
 *
 * - `LOG_LEVEL` selects the minimum level (debug, info, warn, error; default info)
 * - `LOG_FORMAT=json` emits one JSON object per line
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_PREFIXES: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARN",
  error: "ERROR",
};

// ============================================================================
// Configuration
// ============================================================================

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getLogLevel(): LogLevel {
  const envLevel = process.env["LOG_LEVEL"]?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
}

function shouldOutputJson(): boolean {
  return process.env["LOG_FORMAT"] === "json";
}

// ============================================================================
// Core Logger
// ============================================================================

/**
 * Log a message with the specified level and optional context.
 */
export function log(level: LogLevel, message: string, context?: LogContext): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[getLogLevel()]) {
    return;
  }

  const timestamp = new Date().toISOString();
  const hasContext = context !== undefined && Object.keys(context).length > 0;

  if (shouldOutputJson()) {
    const entry: LogEntry = {
      level,
      message,
      timestamp,
      ...(hasContext ? { context } : {}),
    };
    console.error(JSON.stringify(entry));
  } else {
    const prefix = `[${timestamp}] [${LEVEL_PREFIXES[level]}]`;
    if (hasContext) {
      console.error(`${prefix} ${message}`, context);
    } else {
      console.error(`${prefix} ${message}`);
    }
  }
}

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Process-wide logger.
 *
 * @example
 * ```ts
 * logger.info("[LintEngine] Checking 2 projects", { scope: "[manifest, class-file]" });
 * logger.debug(`[LintEngine] No detectors enabled for ${dir}; skipping`);
 * ```
 */
export const logger = {
  debug(message: string, context?: LogContext): void {
    log("debug", message, context);
  },

  info(message: string, context?: LogContext): void {
    log("info", message, context);
  },

  warn(message: string, context?: LogContext): void {
    log("warn", message, context);
  },

  error(message: string, context?: LogContext): void {
    log("error", message, context);
  },
};

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format duration in human-readable form.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}
