/**
 * Logger Utility
 *
 * Provides diagnostic logging without crashing the host app.
 * Silent by default; `debug: true` turns on everything at or above `level`.
 * Errors and fatals are always printed.
 *
 * @module utils/logger
 */

/**
 * Diagnostic levels, lowest first
 */
export type DiagnosticLevel = "debug" | "info" | "warning" | "error" | "fatal";

const LEVEL_ORDER: Record<DiagnosticLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
  fatal: 4,
};

/**
 * Logger interface
 */
export interface Logger {
  logDebug(message: string, meta?: unknown): void;
  logInfo(message: string, meta?: unknown): void;
  logWarn(message: string, meta?: unknown): void;
  logError(message: string, error?: unknown): void;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  debug?: boolean;
  level?: DiagnosticLevel;
  prefix?: string;
}

export function isDiagnosticLevel(value: unknown): value is DiagnosticLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Create a logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const debugEnabled = options.debug === true;
  const threshold = LEVEL_ORDER[options.level ?? "debug"];
  const prefix = options.prefix ?? "[Tripwire]";

  // Guards against a console override that logs back into the SDK
  let writing = false;

  function shouldLog(level: DiagnosticLevel): boolean {
    if (LEVEL_ORDER[level] >= LEVEL_ORDER.error) {
      return true;
    }
    return debugEnabled && LEVEL_ORDER[level] >= threshold;
  }

  function write(level: DiagnosticLevel, message: string, meta: unknown): void {
    if (writing || typeof console === "undefined" || !shouldLog(level)) {
      return;
    }
    writing = true;
    try {
      const line = `${prefix} [${level}] ${message}`;
      const args: unknown[] = meta === undefined ? [line] : [line, meta];
      switch (level) {
        case "debug":
          console.debug(...args);
          break;
        case "info":
          console.info(...args);
          break;
        case "warning":
          console.warn(...args);
          break;
        default:
          console.error(...args);
      }
    } finally {
      writing = false;
    }
  }

  return {
    logDebug: (message, meta) => write("debug", message, meta),
    logInfo: (message, meta) => write("info", message, meta),
    logWarn: (message, meta) => write("warning", message, meta),
    logError: (message, error) => {
      // Stack traces only in debug mode
      if (!debugEnabled && error instanceof Error) {
        write("error", message, error.message);
        return;
      }
      write("error", message, error);
    },
  };
}

// Process-wide diagnostic logger, reconfigured on every start
let sdkLogger: Logger = createLogger();

/**
 * Reconfigure the SDK-wide logger from start options
 */
export function configureLogger(debug: boolean, level: DiagnosticLevel): Logger {
  sdkLogger = createLogger({ debug, level });
  return sdkLogger;
}

export function getLogger(): Logger {
  return sdkLogger;
}
