/**
 * Dumper configuration exports
 */

export { loadDumperEnv, type DumperEnv } from './env-schema';
export {
    TimescaleSchema,
    WaveDumperOptionsSchema,
    resolveDumperOptions,
    type NameSanitizer,
    type ResolvedDumperOptions,
    type TraceSettings,
    type WaveDumperOptions,
} from './options';
