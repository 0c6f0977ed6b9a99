/**
 * Lightweight component logger for stress-bridge
 *
 * - Text or JSON lines (STRESS_BRIDGE_LOG_JSON=1)
 * - Level filter via STRESS_BRIDGE_LOG_LEVEL (DEBUG|INFO|WARN|ERROR)
 * - Optional append-only file via STRESS_BRIDGE_LOG_FILE
 */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  msg: string;
  [key: string]: unknown;
}

// Read env at call time: the CLI adjusts these after imports complete
function getLogFile(): string | undefined {
  return process.env.STRESS_BRIDGE_LOG_FILE;
}

function getLogLevel(): LogLevel {
  const raw = (process.env.STRESS_BRIDGE_LOG_LEVEL ?? 'INFO').toUpperCase();
  return isLogLevel(raw) ? raw : 'INFO';
}

function isLogJson(): boolean {
  return process.env.STRESS_BRIDGE_LOG_JSON === '1';
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

const createdLogDirs = new Set<string>();

function ensureLogDir(logFile: string): void {
  const logDir = path.dirname(logFile);
  if (!createdLogDirs.has(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
    createdLogDirs.add(logDir);
  }
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getLogLevel()];
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

export function formatEntry(entry: LogEntry, json: boolean): string {
  if (json) {
    return JSON.stringify(entry, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value
    );
  }
  const { ts, level, component, msg, ...extra } = entry;
  const extraStr = Object.keys(extra).length > 0
    ? ' ' + Object.entries(extra).map(([k, v]) => `${k}=${formatValue(v)}`).join(' ')
    : '';
  return `${ts} [${level}] [${component}] ${msg}${extraStr}`;
}

function log(level: LogLevel, component: string, msg: string, extra?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    ts: new Date().toISOString(),
    level,
    component,
    msg,
    ...extra,
  };

  const formatted = formatEntry(entry, isLogJson());

  const logFile = getLogFile();
  if (logFile) {
    ensureLogDir(logFile);
    fs.appendFileSync(logFile, formatted + '\n');
    return;
  }

  if (level === 'ERROR' || level === 'WARN') {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
}

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

/**
 * Create a logger for a specific component.
 * @param component - Component name (e.g., 'translator', 'runner', 'provisioner')
 */
export function createLogger(component: string): Logger {
  return {
    debug: (msg, extra) => log('DEBUG', component, msg, extra),
    info: (msg, extra) => log('INFO', component, msg, extra),
    warn: (msg, extra) => log('WARN', component, msg, extra),
    error: (msg, extra) => log('ERROR', component, msg, extra),
  };
}

export default createLogger;
