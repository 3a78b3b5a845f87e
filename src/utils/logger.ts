import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { resolve } from 'path';
import { existsSync, readdirSync, statSync, unlinkSync } from 'fs';

const LOG_DIR = resolve(process.cwd(), process.env.LOG_DIR || 'logs');
const SESSION_PREFIX = 'bundler-';
const RETENTION_DAYS = Number(process.env.LOG_RETENTION_DAYS) || 14;

// Tests never write files; scripts can opt out with LOG_TO_FILE=false
const FILE_LOGGING = process.env.NODE_ENV !== 'test' && process.env.LOG_TO_FILE !== 'false';

function sessionFileName(start: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const day = `${start.getFullYear()}-${pad(start.getMonth() + 1)}-${pad(start.getDate())}`;
  const time = `${pad(start.getHours())}${pad(start.getMinutes())}${pad(start.getSeconds())}`;
  return `${SESSION_PREFIX}${day}_${time}.log`;
}

/** One file per analysis session, e.g. bundler-2024-03-01_141502.log */
const SESSION_LOG_PATH = resolve(LOG_DIR, sessionFileName(new Date()));

function pruneSessionLogs(): void {
  if (!existsSync(LOG_DIR)) return;
  const cutoff = Date.now() - RETENTION_DAYS * 24 * 60 * 60 * 1000;
  for (const name of readdirSync(LOG_DIR)) {
    if (!name.startsWith(SESSION_PREFIX) || !name.endsWith('.log')) continue;
    const path = resolve(LOG_DIR, name);
    if (statSync(path).mtimeMs < cutoff) unlinkSync(path);
  }
}

function metaSuffix(meta: object): string {
  return Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
}

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    const head = `${timestamp} [${level.toUpperCase()}] ${message}`;
    return stack ? `${head}\n${stack}${metaSuffix(meta)}` : `${head}${metaSuffix(meta)}`;
  }),
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => `${timestamp} ${level} ${message}${metaSuffix(meta)}`),
);

function buildTransports(): winston.transport[] {
  // Reports go to stdout, so console logging stays on stderr
  const transports: winston.transport[] = [
    new winston.transports.Console({ format: consoleFormat, stderrLevels: ['error', 'warn', 'info', 'debug'] }),
  ];
  if (!FILE_LOGGING) return transports;

  try {
    pruneSessionLogs();
  } catch (err) {
    process.stderr.write(`[logger] pruning ${LOG_DIR} failed: ${String(err)}\n`);
  }
  transports.push(
    new winston.transports.File({
      filename: SESSION_LOG_PATH,
      format: fileFormat,
      maxsize: 50 * 1024 * 1024,
    }),
    new DailyRotateFile({
      dirname: LOG_DIR,
      filename: 'bundler-error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: `${RETENTION_DAYS * 2}d`,
      format: fileFormat,
    }),
  );
  return transports;
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'error' : 'info'),
  exitOnError: false,
  transports: buildTransports(),
});
