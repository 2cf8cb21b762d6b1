import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const LOG_DIR = path.resolve(process.cwd(), process.env.LOG_DIR || 'logs');
const LOG_FILE = path.join(LOG_DIR, 'app.log');
const MAX_BYTES = 2_000_000; // 2MB
const BACKUPS = 3;

function fileLoggingEnabled() {
  return process.env.LOG_TO_FILE !== '0' && process.env.NODE_ENV !== 'test';
}

function minLevel(): LogLevel {
  const raw = String(process.env.LOG_LEVEL || '').toLowerCase();
  return raw === 'debug' || raw === 'warn' || raw === 'error' ? raw : 'info';
}

function rotateIfNeeded(filePath: string) {
  if (!fs.existsSync(LOG_DIR)) fs.mkdirSync(LOG_DIR, { recursive: true });
  if (!fs.existsSync(filePath)) return;
  const stat = fs.statSync(filePath);
  if (stat.size < MAX_BYTES) return;
  for (let i = BACKUPS - 1; i >= 0; i--) {
    const src = i === 0 ? filePath : `${filePath}.${i}`;
    const dst = `${filePath}.${i + 1}`;
    if (fs.existsSync(src)) fs.renameSync(src, dst);
  }
}

function write(line: string) {
  if (!fileLoggingEnabled()) return;
  try {
    rotateIfNeeded(LOG_FILE);
    fs.appendFileSync(LOG_FILE, line + '\n', 'utf8');
  } catch (err) {
    // The console line has already been printed; the file sink is best effort.
    process.stderr.write(`log_file_write_failed ${String(err)}\n`);
  }
}

function ts() {
  return new Date().toISOString();
}

const errorReplacer = (_key: string, value: unknown) =>
  value instanceof Error ? { name: value.name, message: value.message } : value;

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.stack || arg.message;
  if (arg !== null && typeof arg === 'object') {
    try {
      return JSON.stringify(arg, errorReplacer);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

export function getLogger(name = 'app') {
  const prefix = (lvl: LogLevel) => `${ts()} | ${lvl.toUpperCase()} | ${name} |`;
  const emit = (lvl: LogLevel, sink: (msg: string) => void, args: unknown[]) => {
    if (LEVEL_ORDER[lvl] < LEVEL_ORDER[minLevel()]) return;
    const msg = `${prefix(lvl)} ${args.map(formatArg).join(' ')}`;
    write(msg);
    sink(msg);
  };
  return {
    debug: (...args: unknown[]) => emit('debug', console.debug, args),
    info: (...args: unknown[]) => emit('info', console.log, args),
    warn: (...args: unknown[]) => emit('warn', console.warn, args),
    error: (...args: unknown[]) => emit('error', console.error, args),
  };
}

export type Logger = ReturnType<typeof getLogger>;
