/**
 * JSM Alerts: Logging Utilities
 *
 * Structured logging using Pino with redaction of sensitive fields and
 * consistent formatting. The terminal UI owns stdout, so log records only
 * ever go to a file: until configureLogging() runs, every logger is silent.
 *
 * @module utils/logger
 * @version 1.0.0
 */

import pino from 'pino';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { LogLevel } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// ROOT LOGGER
// ═══════════════════════════════════════════════════════════════════════════

const MAX_LOG_BYTES = 5 * 1024 * 1024;
const LOG_BACKUPS = 5;

let rootLogger: pino.Logger | null = null;
let destination: RotatingFileDestination | null = null;

function baseOptions(level: LogLevel): pino.LoggerOptions {
  return {
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    redact: {
      paths: ['headers.authorization', 'headers.Authorization', '*.token', '*.password'],
      censor: '[REDACTED]',
    },
  };
}

function getRootLogger(): pino.Logger {
  if (rootLogger === null) {
    rootLogger = pino(baseOptions('silent'));
  }
  return rootLogger;
}

export interface LoggingOptions {
  level: LogLevel;
  file: string;
  maxBytes?: number;
  backups?: number;
}

// ─── Rotation ────────────────────────────────────────────────────────────────

/** Shift `file` → `file.1` → … → `file.<backups>`, dropping the oldest. */
function shiftLogFiles(file: string, backups: number): void {
  fs.rmSync(`${file}.${backups}`, { force: true });
  for (let index = backups - 1; index >= 1; index--) {
    const from = `${file}.${index}`;
    if (fs.existsSync(from)) {
      fs.renameSync(from, `${file}.${index + 1}`);
    }
  }
  if (fs.existsSync(file)) {
    fs.renameSync(file, `${file}.1`);
  }
}

/** Rotate `file` if it has already grown past `maxBytes`. */
export function rotateLogFile(file: string, maxBytes = MAX_LOG_BYTES, backups = LOG_BACKUPS): boolean {
  if (!fs.existsSync(file) || fs.statSync(file).size <= maxBytes) {
    return false;
  }
  shiftLogFiles(file, backups);
  return true;
}

/**
 * Synchronous pino destination that rotates before a record would push the
 * file past `maxBytes`. Records are on disk as soon as `write` returns, so a
 * following `process.exit` loses nothing.
 */
export class RotatingFileDestination implements pino.DestinationStream {
  private readonly stream: ReturnType<typeof pino.destination>;
  private size: number;

  constructor(
    private readonly file: string,
    private readonly maxBytes = MAX_LOG_BYTES,
    private readonly backups = LOG_BACKUPS,
  ) {
    rotateLogFile(file, maxBytes, backups);
    this.stream = pino.destination({ dest: file, sync: true, append: true, mkdir: true });
    this.size = fs.existsSync(file) ? fs.statSync(file).size : 0;
  }

  write(msg: string): void {
    const bytes = Buffer.byteLength(msg);
    if (this.size > 0 && this.size + bytes > this.maxBytes) {
      shiftLogFiles(this.file, this.backups);
      this.stream.reopen();
      this.size = 0;
    }
    this.stream.write(msg);
    this.size += bytes;
  }

  end(): void {
    this.stream.end();
  }
}

// ─── Setup ───────────────────────────────────────────────────────────────────

/**
 * Point every logger at `file`. Loggers created earlier keep writing to the
 * previous destination, so call this before building any component.
 */
export function configureLogging(options: LoggingOptions): pino.Logger {
  const logsPath = path.dirname(options.file);
  if (!fs.existsSync(logsPath)) {
    fs.mkdirSync(logsPath, { recursive: true, mode: 0o700 });
  }

  closeLogging();
  destination = new RotatingFileDestination(options.file, options.maxBytes, options.backups);
  rootLogger = pino(baseOptions(options.level), destination);
  return rootLogger;
}

/** Close the file destination; loggers created afterwards are silent. */
export function closeLogging(): void {
  destination?.end();
  destination = null;
  rootLogger = null;
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER FACTORY
// ═══════════════════════════════════════════════════════════════════════════

export function createLogger(name: string): pino.Logger {
  return getRootLogger().child({ name });
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

const SENSITIVE_FIELDS = [
  'password',
  'secret',
  'token',
  'auth',
  'credential',
  'api_key',
  'apikey',
];

/** Replace values whose key names look secret, recursing into nested objects. */
export function redact(
  obj: Record<string, unknown>,
  additionalFields: string[] = [],
): Record<string, unknown> {
  const fieldsToRedact = [...SENSITIVE_FIELDS, ...additionalFields];
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (fieldsToRedact.some((field) => lowerKey.includes(field))) {
      result[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      result[key] = redact(Object.fromEntries(Object.entries(value)), additionalFields);
    } else {
      result[key] = value;
    }
  }

  return result;
}

export function formatError(error: unknown): {
  message: string;
  stack?: string;
  code?: string;
  name?: string;
} {
  if (error instanceof Error) {
    const result: { message: string; stack?: string; code?: string; name?: string } = {
      message: error.message,
      name: error.name,
    };
    if (error.stack !== undefined) {
      result.stack = error.stack;
    }
    if ('code' in error && typeof error.code === 'string') {
      result.code = error.code;
    }
    return result;
  }

  return { message: String(error) };
}
