import pino from 'pino';
import { z } from 'zod';

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

// Keys that may carry knowledge-service or database credentials.
const REDACTED_PATHS = ['apiKey', '*.apiKey', 'password', '*.password'];

export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = LogLevelSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : 'info';
}

export const logger = pino({
  name: 'medgraph',
  level: resolveLogLevel(process.env['LOG_LEVEL']),
  redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
});

export function createChildLogger(component: string, bindings: pino.Bindings = {}): pino.Logger {
  return logger.child({ ...bindings, component });
}
