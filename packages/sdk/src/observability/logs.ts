/**
 * Structured logging for rule loading, index and selection events
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  type?: string;
  calibration?: string;
  message?: string;
  details?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Initial threshold: CALSEL_DEBUG forces debug, else CALSEL_LOG_LEVEL, else warn
 */
function levelFromEnv(): LogLevel {
  if (process.env.CALSEL_DEBUG) return "debug";
  const configured = process.env.CALSEL_LOG_LEVEL?.toLowerCase();
  return isLogLevel(configured) ? configured : "warn";
}

class Logger {
  #enabled = true;
  #level: LogLevel = levelFromEnv();

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.#level]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    // Format for console output
    const prefix = `[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`;
    const parts = [prefix];

    if (entry.type || entry.calibration) {
      parts.push(`${entry.type ?? ""}/${entry.calibration ?? ""}`);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    // Every level goes to stderr; stdout carries command output only.
    // console.debug and console.info would write to stdout.
    if (level === "warn") {
      console.warn(parts.join(" "));
    } else {
      console.error(parts.join(" "));
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  /**
   * Set the minimum level that is written
   */
  setLevel(level: LogLevel): void {
    this.#level = level;
  }

  get level(): LogLevel {
    return this.#level;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
