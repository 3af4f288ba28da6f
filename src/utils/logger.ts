/**
 * Diagnostic logger for tether
 *
 * Stdout belongs to the output sink, so diagnostics go to stderr, or only to
 * TETHER_LOG_FILE when that is set. TETHER_LOG_LEVEL filters, TETHER_LOG_JSON=1
 * switches to one JSON object per line.
 */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type LogFields = Record<string, unknown>;

export interface LogEntry extends LogFields {
  ts: string;
  level: LogLevel;
  component: string;
  msg: string;
}

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

const LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

// Env is read per entry so the CLI can change it after modules load
function thresholdLevel(): LogLevel {
  const level = (process.env.TETHER_LOG_LEVEL ?? 'INFO').trim().toUpperCase();
  return isLogLevel(level) ? level : 'INFO';
}

function fieldValue(value: unknown): string {
  if (typeof value === 'string') {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

export function formatEntry(entry: LogEntry, json = process.env.TETHER_LOG_JSON === '1'): string {
  if (json) {
    return JSON.stringify(entry);
  }
  const { ts, level, component, msg, ...fields } = entry;
  const suffix = Object.entries(fields)
    .map(([key, value]) => ` ${key}=${fieldValue(value)}`)
    .join('');
  return `${ts} ${level.padEnd(5)} ${component}: ${msg}${suffix}`;
}

function write(level: LogLevel, component: string, msg: string, fields?: LogFields): void {
  if (LEVELS.indexOf(level) < LEVELS.indexOf(thresholdLevel())) return;

  const line = formatEntry({ ...fields, ts: new Date().toISOString(), level, component, msg }) + '\n';
  const logFile = process.env.TETHER_LOG_FILE;
  if (logFile) {
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
    fs.appendFileSync(logFile, line);
    return;
  }
  process.stderr.write(line);
}

export function createLogger(component: string): Logger {
  return {
    debug: (msg, fields) => write('DEBUG', component, msg, fields),
    info: (msg, fields) => write('INFO', component, msg, fields),
    warn: (msg, fields) => write('WARN', component, msg, fields),
    error: (msg, fields) => write('ERROR', component, msg, fields),
  };
}
