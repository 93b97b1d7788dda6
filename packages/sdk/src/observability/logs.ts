/**
 * Structured debug logging for registry operations
 *
 * Entries go to console.debug, and only while KEYED_REGISTRY_DEBUG is set.
 */

export interface LogEntry {
  timestamp: string;
  event: string;
  recordType?: string;
  key?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export class Logger {
  #enabled = true;

  /**
   * Log a debug event
   */
  debug(event: string, data?: Omit<Partial<LogEntry>, "timestamp" | "event">): void {
    if (!this.#enabled || !process.env.KEYED_REGISTRY_DEBUG) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      event,
      ...data,
    };

    console.debug(formatEntry(entry));
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Format an entry for console output:
 * `[timestamp] [DEBUG] [event] recordType/key message {details}`
 */
export function formatEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [DEBUG] [${entry.event}]`];

  if (entry.recordType || entry.key) {
    parts.push(`${entry.recordType ?? ""}/${entry.key ?? ""}`);
  }

  if (entry.message) {
    parts.push(entry.message);
  }

  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(" ");
}

/**
 * Global logger instance
 */
export const logger = new Logger();
