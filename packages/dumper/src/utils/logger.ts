import pino from 'pino';
import { z } from 'zod';

const LoggerEnvSchema = z.object({
    LOG_LEVEL: z
        .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
        .catch('info'),
    NODE_ENV: z.string().optional(),
});

export interface LoggerSettings {
    level: pino.LevelWithSilent;
    /** Human-readable output through pino-pretty */
    pretty: boolean;
}

/**
 * Logging never prevents a dump: an unknown LOG_LEVEL falls back to `info`.
 * Pretty output only when NODE_ENV is exactly `development`.
 */
export function resolveLoggerSettings(env: NodeJS.ProcessEnv = process.env): LoggerSettings {
    const parsed = LoggerEnvSchema.parse(env);
    return {
        level: parsed.LOG_LEVEL,
        pretty: parsed.NODE_ENV === 'development',
    };
}

export function createLogger(settings: LoggerSettings): pino.Logger {
    return pino({
        level: settings.level,
        base: { component: 'wavetap-dumper' },
        transport: settings.pretty ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        } : undefined,
        formatters: {
            level: (label) => {
                return { level: label };
            }
        }
    });
}

export const logger = createLogger(resolveLoggerSettings());

export type Logger = typeof logger;
