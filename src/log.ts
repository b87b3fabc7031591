import type { z } from 'zod';
import type { LogLevelSchema } from './config.js';

export type LogLevel = z.infer<typeof LogLevelSchema>;

export type Logger = {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
};

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

// stdout carries the MCP protocol, so every line goes to stderr
function writeStderr(line: string): void {
  console.error(line);
}

export function createLogger(scope: string, level: LogLevel = 'info', write: (line: string) => void = writeStderr): Logger {
  const emit = (lineLevel: LogLevel, message: string, fields?: Record<string, unknown>) => {
    if (RANK[lineLevel] < RANK[level]) return;
    const suffix = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
    write(`[${scope}] ${lineLevel} ${message}${suffix}`);
  };

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields)
  };
}

export const silentLogger: Logger = createLogger('silent', 'error', () => {});
