import { z } from 'zod';
import { ConfigValidationError } from '../errors';
import { TimescaleSchema, formatIssues } from './options';

// Only the dump defaults are read here. LOG_LEVEL and NODE_ENV belong to the
// logger (utils/logger.ts) and never block an attach.
const EnvSchema = z.object({
    WAVETAP_OUTPUT_PATH: z.string().min(1).optional(),
    WAVETAP_TIMESCALE: TimescaleSchema.optional(),
});

export type DumperEnv = z.infer<typeof EnvSchema>;

export function loadDumperEnv(env: NodeJS.ProcessEnv = process.env): DumperEnv {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        throw new ConfigValidationError('Environment', formatIssues(result.error));
    }
    return result.data;
}
