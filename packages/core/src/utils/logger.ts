import pino from 'pino';

/**
 * LOG_LEVEL if pino knows it (or it is `silent`), otherwise `info`.
 */
export function resolveLogLevel(value: string | undefined): string {
  if (value === 'silent' || (value !== undefined && value in pino.levels.values)) {
    return value;
  }
  return 'info';
}

export const logger = pino({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  base: { component: 'wavetap-core' },
});

export type Logger = typeof logger;
