import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

const silent = process.env.NODE_ENV === 'test';
const consoleEnabled = silent ? false : process.env.DEBUG_RAG !== '0';
const fileEnabled = silent ? false : process.env.LOG_TO_FILE === '1';
const logFile = process.env.LOG_FILE ?? 'logs/rag.log';
const debugEnabled = process.env.LOG_LEVEL === 'debug';
let fileReady = false;

type Level = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

function pad(num: number, size = 2) {
  return num.toString().padStart(size, '0');
}

function localTs() {
  const d = new Date();
  const date = `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`;
  return `${date} ${time}`;
}

function color(level: Level) {
  const reset = '\x1b[0m';
  const colors: Record<Level, string> = {
    INFO: '\x1b[34m',
    DEBUG: '\x1b[95m',
    WARN: '\x1b[33m',
    ERROR: '\x1b[31m'
  };
  return `${colors[level]}[${level}]${reset}`;
}

function serialize(v: unknown): string {
  if (typeof v === 'string') return v;
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  try {
    return JSON.stringify(v);
  } catch {
    return String(v);
  }
}

function writeFileLog(level: Level, args: unknown[]) {
  if (!fileEnabled) return;
  if (!fileReady) {
    mkdirSync(dirname(logFile), { recursive: true });
    fileReady = true;
  }
  appendFileSync(logFile, `[${localTs()}] [${level}] ${args.map(serialize).join(' ')}\n`, 'utf8');
}

function emit(level: Level, sink: (...args: unknown[]) => void, args: unknown[]) {
  if (consoleEnabled) sink(`[${localTs()}] ${color(level)}`, ...args);
  writeFileLog(level, args);
}

export const logger = {
  info: (...args: unknown[]) => emit('INFO', console.log, args),
  warn: (...args: unknown[]) => emit('WARN', console.warn, args),
  error: (...args: unknown[]) => emit('ERROR', console.error, args),
  debug: (...args: unknown[]) => {
    if (debugEnabled) emit('DEBUG', console.log, args);
  }
};
