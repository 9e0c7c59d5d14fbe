export type LogFields = Record<string, string | number | boolean | null | undefined>;

/**
 * Sink for the audit report. Every line is human-readable on its own;
 * `fields` carries the same values for log processors.
 */
export interface AuditLogger {
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export const consoleLogger: AuditLogger = {
  info: (message, fields) => (fields ? console.log(message, fields) : console.log(message)),
  warn: (message, fields) => (fields ? console.warn(message, fields) : console.warn(message)),
  error: (message, fields) => (fields ? console.error(message, fields) : console.error(message)),
};
