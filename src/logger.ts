/**
 * Log sanitizer: strips credentials from all output.
 *
 * Google service account keys embed a PEM private key, and HTTP errors can echo
 * Authorization headers; both are redacted before anything reaches the terminal.
 *
 * Log lines go to stderr. stdout carries the live transcript, which relies on
 * carriage returns to overwrite the current line.
 */

import { inspect } from 'util';

const PRIVATE_KEY_PATTERN = /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g;
const AUTHORIZATION_HEADER_PATTERN = /(Authorization:\s*(?:Bearer\s+)?)\S+/gi;

export function sanitize(message: string): string {
  return message
    .replace(PRIVATE_KEY_PATTERN, '[REDACTED_PRIVATE_KEY]')
    .replace(AUTHORIZATION_HEADER_PATTERN, '$1[REDACTED]');
}

export function formatArgs(args: unknown[]): string {
  return args
    .map((arg) => {
      if (arg instanceof Error) {
        return sanitize(arg.stack ?? arg.message);
      }
      if (typeof arg === 'string') {
        return sanitize(arg);
      }
      return sanitize(inspect(arg, { depth: 3, breakLength: Infinity }));
    })
    .join(' ');
}

function emit(level: string, args: unknown[]): void {
  process.stderr.write(`[${new Date().toISOString()}] [${level}] ${formatArgs(args)}\n`);
}

export const logger = {
  info(...args: unknown[]): void {
    emit('INFO', args);
  },
  warn(...args: unknown[]): void {
    emit('WARN', args);
  },
  error(...args: unknown[]): void {
    emit('ERROR', args);
  },
  debug(...args: unknown[]): void {
    if (process.env.DEBUG) {
      emit('DEBUG', args);
    }
  },
};
