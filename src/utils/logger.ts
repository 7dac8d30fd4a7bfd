import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { resolve } from 'path';
import { readdirSync, unlinkSync, statSync } from 'fs';

const LOG_DIR = resolve(process.cwd(), 'data', 'logs');
const LOG_TO_FILE = (process.env.LOG_TO_FILE ?? 'true') !== 'false';

// One log file per run: verifier-YYYY-MM-DD_HHmmss.log
const SESSION_START = new Date();
const pad = (n: number) => String(n).padStart(2, '0');
const SESSION_TS = `${SESSION_START.getFullYear()}-${pad(SESSION_START.getMonth() + 1)}-${pad(SESSION_START.getDate())}_${pad(SESSION_START.getHours())}${pad(SESSION_START.getMinutes())}${pad(SESSION_START.getSeconds())}`;
const SESSION_LOG_FILE = `verifier-${SESSION_TS}.log`;

// Keep the last 14 days of run logs
function cleanupOldLogs(): void {
  let files: string[];
  try {
    files = readdirSync(LOG_DIR).filter((f) => f.startsWith('verifier-') && f.endsWith('.log'));
  } catch {
    return; // no log dir yet
  }
  const cutoff = Date.now() - 14 * 24 * 60 * 60 * 1000;
  for (const f of files) {
    const fpath = resolve(LOG_DIR, f);
    try {
      if (statSync(fpath).mtimeMs < cutoff) unlinkSync(fpath);
    } catch (err) {
      process.stderr.write(`log cleanup skipped ${f}: ${String(err)}\n`);
    }
  }
}

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    if (stack) {
      return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}\n${String(stack)}${metaStr}`;
    }
    return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${metaStr}`;
  }),
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length
      ? ` ${JSON.stringify(meta, null, 0)}`
      : '';
    return `${String(timestamp)} ${level} ${String(message)}${metaStr}`;
  }),
);

// Reports go to stdout, so log lines go to stderr
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
  }),
];

if (LOG_TO_FILE) {
  cleanupOldLogs();
  transports.push(
    new winston.transports.File({
      dirname: LOG_DIR,
      filename: SESSION_LOG_FILE,
      format: logFormat,
      maxsize: 50 * 1024 * 1024,
    }),
    new DailyRotateFile({
      dirname: LOG_DIR,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: '30d',
      format: logFormat,
    }),
  );
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  exitOnError: false,
  transports,
});
