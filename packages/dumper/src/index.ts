export { WaveDumper } from './WaveDumper';
export type { WaveDumperStats } from './WaveDumper';

export { SignalRegistry, MarkerTable } from './SignalRegistry';
export type { MarkerEntry } from './SignalRegistry';
export { NameUniquifier } from './NameUniquifier';
export type { UniqueNameRequest } from './NameUniquifier';
export { ChangeTracker } from './ChangeTracker';
export { TimestampScheduler, SchedulerState } from './TimestampScheduler';
export type { FlushHandler } from './TimestampScheduler';
export { TraceWriter } from './TraceWriter';
export type { TraceHeader, TraceWriterStats } from './TraceWriter';
export { encodeValueChange } from './value-encoding';

export * from './sinks';
export * from './config';
export {
    DumperError,
    HierarchyNotBuiltError,
    NameConflictError,
    TimestampOrderError,
    ConfigValidationError,
} from './errors';
export {
    WAVETAP_TOOL_NAME,
    WAVETAP_VERSION,
    DEFAULT_OUTPUT_PATH,
    DEFAULT_TIMESCALE,
} from './constants';
