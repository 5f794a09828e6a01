import { z } from 'zod';
import { sanitizeName } from '@wavetap/core';
import { ConfigValidationError } from '../errors';
import type { TraceSink } from '../sinks/TraceSink';
import {
    DEFAULT_OUTPUT_PATH,
    DEFAULT_TIMESCALE,
    WAVETAP_TOOL_NAME,
    WAVETAP_VERSION,
} from '../constants';
import type { DumperEnv } from './env-schema';

export const TimescaleSchema = z
    .string()
    .regex(
        /^(1|10|100)(s|ms|us|ns|ps|fs)$/,
        'Timescale must be 1, 10 or 100 followed by s, ms, us, ns, ps or fs'
    );

export const WaveDumperOptionsSchema = z.object({
    outputPath: z.string().min(1).default(DEFAULT_OUTPUT_PATH),
    timescale: TimescaleSchema.default(DEFAULT_TIMESCALE),
    tool: z.string().min(1).default(WAVETAP_TOOL_NAME),
    version: z.string().min(1).default(WAVETAP_VERSION),
    comment: z.string().default(`Generated by ${WAVETAP_TOOL_NAME}`),
});

export type TraceSettings = z.infer<typeof WaveDumperOptionsSchema>;

export type NameSanitizer = (name: string) => string;

export interface WaveDumperOptions extends z.input<typeof WaveDumperOptionsSchema> {
    /**
     * Destination for trace text.
     * Default: a FileTraceSink on `outputPath`
     */
    sink?: TraceSink;

    /**
     * Turns signal names into legal identifiers.
     * Default: sanitizeName from @wavetap/core
     */
    sanitize?: NameSanitizer;

    /**
     * Clock used for the header date.
     * Default: () => new Date()
     */
    now?: () => Date;
}

export interface ResolvedDumperOptions extends TraceSettings {
    sink: TraceSink | undefined;
    sanitize: NameSanitizer;
    now: () => Date;
}

export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Merge explicit options over environment values over defaults.
 */
export function resolveDumperOptions(
    options: WaveDumperOptions,
    env: DumperEnv
): ResolvedDumperOptions {
    const { sink, sanitize, now, ...settings } = options;

    const result = WaveDumperOptionsSchema.safeParse({
        ...settings,
        outputPath: settings.outputPath ?? env.WAVETAP_OUTPUT_PATH,
        timescale: settings.timescale ?? env.WAVETAP_TIMESCALE,
    });
    if (!result.success) {
        throw new ConfigValidationError('Dumper options', formatIssues(result.error));
    }

    return {
        ...result.data,
        sink,
        sanitize: sanitize ?? sanitizeName,
        now: now ?? (() => new Date()),
    };
}
