import { pino, type Logger, destination, multistream, type DestinationStream } from 'pino';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

export type UtilLogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly UtilLogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function resolveLogLevel(value: string | undefined): UtilLogLevel {
  return LOG_LEVELS.find(level => level === value) ?? 'warn';
}

const logLevel = resolveLogLevel(process.env['LOG_LEVEL']);

// stdout belongs to the operator-facing output of the CLI
const defaultLogDir = path.join(os.homedir(), '.vendormac', 'logs');
const logDir = process.env['VENDORMAC_LOG_DIR'] ?? defaultLogDir;
const logToFile = process.env['VENDORMAC_LOG_FILE'] === 'true';

let fileLoggingActive = false;
let resolvedLogPath = '';

function getLogFilePath(): string {
  const date = new Date().toISOString().split('T')[0];
  return path.join(logDir, `vendormac-${date}.log`);
}

const streams: Array<{ stream: DestinationStream }> = [
  { stream: process.stderr },
];

if (logToFile) {
  try {
    fs.mkdirSync(logDir, { recursive: true });
    resolvedLogPath = getLogFilePath();
    streams.push({ stream: destination({ dest: resolvedLogPath, sync: false, mkdir: true }) });
    fileLoggingActive = true;
  } catch (err) {
    process.stderr.write(`warning: file logging disabled (${err instanceof Error ? err.message : String(err)})\n`);
  }
}

export const logger: Logger = pino(
  {
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
  },
  multistream(streams)
);

const childLoggers = new Set<Logger>();

/** Children start at the current root level and follow later `setLogLevel` calls. */
export function createChildLogger(module: string): Logger {
  const child = logger.child({ module });
  childLoggers.add(child);
  return child;
}

export function setLogLevel(level: UtilLogLevel): void {
  logger.level = level;
  for (const child of childLoggers) {
    child.level = level;
  }
}

/**
 * Record the outcome of one tool run. Operator-facing messages are printed by
 * the CLI; this entry is for the log file.
 */
export function logOperation(
  operation: string,
  result: 'started' | 'success' | 'error',
  details?: Record<string, unknown>
): void {
  const runLogger = createChildLogger('operation');
  const logEntry = {
    operation,
    result,
    ...details,
    pid: process.pid,
  };

  if (result === 'error') {
    runLogger.error(logEntry, `${operation} failed`);
  } else if (result === 'started') {
    runLogger.info(logEntry, `${operation} started`);
  } else {
    runLogger.info(logEntry, `${operation} finished`);
  }
}

export function getCurrentLogFile(): string | null {
  return fileLoggingActive ? resolvedLogPath : null;
}
