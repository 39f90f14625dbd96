import { WriteStream, createWriteStream, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { getLogContext } from './context.js';
import { redactSecrets } from './redaction.js';
import type {
  AppLogger,
  AppLogRecord,
  LogContext,
  LogData,
  LogLevel,
  ObservabilityOptions,
} from './types.js';

let options: ObservabilityOptions = { file: null, stdout: false };
let sinkHooksInstalled = false;
let fileSink: { path: string; stream: WriteStream } | null = null;

function closeFileSink(): void {
  if (!fileSink) return;
  fileSink.stream.end();
  fileSink = null;
}

function ensureFileSink(): WriteStream | null {
  const filePath = options.file;
  if (!filePath) return null;

  if (fileSink?.path === filePath) {
    return fileSink.stream;
  }

  closeFileSink();

  const dir = dirname(filePath);
  try {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    // A broken audit file turns the file sink off for the rest of the run.
    stream.on('error', () => {
      options = { ...options, file: null };
      if (fileSink?.stream === stream) fileSink = null;
    });
    fileSink = { path: filePath, stream };
    return stream;
  } catch {
    return null;
  }
}

function writeLineToFile(line: string): void {
  const sink = ensureFileSink();
  if (!sink) return;
  sink.write(`${line}\n`);
}

function writeToStd(level: LogLevel, line: string): void {
  if (!options.stdout) return;
  if (level === 'error' || level === 'warn') {
    process.stderr.write(`${line}\n`);
    return;
  }
  process.stdout.write(`${line}\n`);
}

function toRecord(
  level: LogLevel,
  event: string,
  baseContext: LogContext,
  data?: LogData,
): AppLogRecord {
  const context = getLogContext();
  const payload = data ? redactSecrets(data) : {};
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...context,
    ...baseContext,
    ...payload,
  };
}

function emitRecord(record: AppLogRecord): void {
  const line = JSON.stringify(record);
  writeToStd(record.level, line);
  writeLineToFile(line);
}

export function createLogger(baseContext: LogContext = {}): AppLogger {
  const log = (level: LogLevel, event: string, data?: LogData): void => {
    emitRecord(toRecord(level, event, baseContext, data));
  };

  return {
    debug: (event: string, data?: LogData) => log('debug', event, data),
    info: (event: string, data?: LogData) => log('info', event, data),
    warn: (event: string, data?: LogData) => log('warn', event, data),
    error: (event: string, data?: LogData) => log('error', event, data),
    child: (context: LogContext) => createLogger({ ...baseContext, ...context }),
  };
}

/**
 * Point the process-wide sinks at the configured audit file and console.
 * Loggers created before this call pick the new sinks up on their next record.
 */
export function initObservability(next: ObservabilityOptions): void {
  options = { ...next };

  if (fileSink && fileSink.path !== options.file) {
    closeFileSink();
  }

  if (!sinkHooksInstalled) {
    sinkHooksInstalled = true;
    process.once('exit', closeFileSink);
  }
}

/** Flush and close the audit file. Resolves once buffered lines are written. */
export async function shutdownObservability(): Promise<void> {
  if (!fileSink) return;
  const { stream } = fileSink;
  fileSink = null;
  await new Promise<void>((resolve) => stream.end(resolve));
}
