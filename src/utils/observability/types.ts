export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Fields every record inside a run or domain carries. */
export type LogContext = {
  runId?: string;
  domain?: string;
  folder?: string;
  emailId?: string;
  [key: string]: unknown;
};

export type LogData = Record<string, unknown>;

/** One NDJSON line of the audit log. */
export type AppLogRecord = {
  timestamp: string;
  level: LogLevel;
  event: string;
} & LogContext & LogData;

export interface AppLogger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
  child(context: LogContext): AppLogger;
}

export type ObservabilityOptions = {
  /** Append-only NDJSON audit file; null turns the file sink off. */
  file: string | null;
  /** Mirror records to stdout (stderr for warn/error). */
  stdout: boolean;
};
