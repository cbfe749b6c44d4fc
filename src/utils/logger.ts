import winston from 'winston';
import * as Sentry from '@sentry/node';

// Shown in the line prefix or not at all
const PREFIX_KEYS = new Set(['timestamp', 'level', 'message', 'service', 'stack', 'jobId', 'link']);

function formatValue(value: unknown): string {
  if (typeof value === 'string' && value.length > 0 && !/[\s"=]/.test(value)) {
    return value;
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * One console line per record: `HH:MM:SS level [job] message key=value ...`.
 * The job id (or link id) is the subject; a stack trace follows on its own lines.
 */
export function renderLogLine(info: Record<string, unknown>): string {
  const time = typeof info.timestamp === 'string' ? info.timestamp.slice(11, 19) : '';
  const subject = info.jobId ?? info.link;
  const fields = Object.entries(info)
    .filter(([key, value]) => !PREFIX_KEYS.has(key) && value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);

  const line = [
    time,
    String(info.level),
    subject === undefined ? '' : `[${String(subject)}]`,
    String(info.message),
    ...fields,
  ]
    .filter((part) => part.length > 0)
    .join(' ');

  return typeof info.stack === 'string' ? `${line}\n${info.stack}` : line;
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: 'tubefetch' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf((info) => renderLogLine(info)),
      ),
    }),
  ],
});

/**
 * Keep a JSON log of the run beside the other state files
 */
export function attachLogFile(filename: string): void {
  if (process.env.NODE_ENV === 'test') return;
  logger.add(new winston.transports.File({ filename }));
}

/**
 * Log an error with stack trace and forward it to Sentry
 */
export function logError(
  error: Error,
  context?: Record<string, unknown>,
): void {
  logger.error({
    message: error.message,
    stack: error.stack,
    ...context,
  });
  Sentry.captureException(error, { extra: context });
}

/**
 * First line of an error message, capped for report output
 */
export function summarizeError(error: unknown, maxLength: number = 180): string {
  const text = (error instanceof Error ? error.message : String(error)).trim();
  if (!text) {
    return error instanceof Error ? error.name : 'Unknown error';
  }
  const firstLine = text.split(/\r?\n/)[0];
  if (firstLine.length > maxLength) {
    return `${firstLine.slice(0, maxLength - 3)}...`;
  }
  return firstLine;
}
