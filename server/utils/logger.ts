import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogMeta {
  correlationId?: string;
  channel?: string;
  threadTs?: string;
  userId?: string;
  tool?: string;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

export interface LoggingOptions {
  level: LogLevel;
  /** Directory for daily JSON-line files; console only when omitted. */
  logDir?: string;
}

let currentLevel: LogLevel = 'info';
let logDir: string | undefined;

/**
 * Configure log level and optional file output. Called once at startup;
 * until then everything at info and above goes to the console only.
 */
export function configureLogging(options: LoggingOptions): void {
  currentLevel = options.level;
  logDir = options.logDir;
  if (logDir) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

export function writeLog(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) return;

  if (logDir) {
    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...meta
    };
    const dateStr = new Date().toISOString().split('T')[0];
    const logFile = path.join(logDir, `agent-${dateStr}.log`);

    try {
      fs.appendFileSync(logFile, JSON.stringify(logEntry) + '\n');
    } catch (err) {
      console.error('[Logger] Failed to write to log file:', err);
    }
  }

  const correlationPrefix = meta?.correlationId ? `[${meta.correlationId}] ` : '';
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
  const line = `[${level.toUpperCase()}] ${correlationPrefix}${message}${metaStr}`;
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function logInfo(message: string, meta?: LogMeta): void {
  writeLog('info', message, meta);
}

export function logError(message: string, meta?: LogMeta): void {
  writeLog('error', message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  writeLog('warn', message, meta);
}

export function logDebug(message: string, meta?: LogMeta): void {
  writeLog('debug', message, meta);
}

export function errorMeta(err: unknown): Pick<LogMeta, 'error' | 'stack'> {
  if (err instanceof Error) {
    return { error: err.message, stack: err.stack };
  }
  return err === undefined ? {} : { error: String(err) };
}

export class RequestLogger {
  private correlationId: string;
  private startTime: number;
  private channel?: string;
  private threadTs?: string;
  private userId?: string;
  private stages: Map<string, number> = new Map();

  constructor(channel?: string, threadTs?: string, userId?: string) {
    this.correlationId = generateCorrelationId();
    this.startTime = Date.now();
    this.channel = channel;
    this.threadTs = threadTs;
    this.userId = userId;
  }

  private getMeta(extra?: Partial<LogMeta>): LogMeta {
    return {
      correlationId: this.correlationId,
      channel: this.channel,
      threadTs: this.threadTs,
      userId: this.userId,
      duration: Date.now() - this.startTime,
      ...extra
    };
  }

  startStage(name: string): void {
    this.stages.set(name, Date.now());
  }

  endStage(name: string): number {
    const start = this.stages.get(name);
    if (start === undefined) return 0;
    const duration = Date.now() - start;
    this.stages.delete(name);
    return duration;
  }

  info(message: string, extra?: Partial<LogMeta>): void {
    logInfo(message, this.getMeta(extra));
  }

  error(message: string, err?: unknown, extra?: Partial<LogMeta>): void {
    logError(message, this.getMeta({ ...errorMeta(err), ...extra }));
  }

  debug(message: string, extra?: Partial<LogMeta>): void {
    logDebug(message, this.getMeta(extra));
  }
}
