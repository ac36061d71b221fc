import { z } from 'zod';

export const LOG_LEVEL_ENV_VAR = 'SPN_BOXES_LOG_LEVEL';

export const logLevelSchema = z.enum(['debug', 'info', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

const DEFAULT_LOG_LEVEL: LogLevel = 'error';

const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  error: 2,
  silent: 3,
};

export function getLogLevel(): LogLevel {
  const parsed = logLevelSchema.safeParse(process.env[LOG_LEVEL_ENV_VAR]?.toLowerCase());
  return parsed.success ? parsed.data : DEFAULT_LOG_LEVEL;
}

export function isLogLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LOG_LEVEL_RANK[level] >= LOG_LEVEL_RANK[getLogLevel()];
}
