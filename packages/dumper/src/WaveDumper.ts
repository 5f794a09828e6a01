import type {
    HierarchyNode,
    SimulationEvents,
    TraceableSignal,
    Unsubscribe,
} from '@wavetap/core';
import { ChangeTracker } from './ChangeTracker';
import { loadDumperEnv } from './config/env-schema';
import { resolveDumperOptions, type WaveDumperOptions } from './config/options';
import { SignalRegistry } from './SignalRegistry';
import { FileTraceSink } from './sinks/FileTraceSink';
import type { TraceSink } from './sinks/TraceSink';
import { SchedulerState, TimestampScheduler } from './TimestampScheduler';
import { TraceWriter } from './TraceWriter';
import { logger } from './utils/logger';

export interface WaveDumperStats {
    /** Signals with a marker */
    trackedSignals: number;
    /** Timestamp blocks written after the initial values */
    timestampsWritten: number;
    /** Value-change lines written in timestamp blocks */
    valueChangesWritten: number;
    /** Signals changed since the last flush */
    pendingChanges: number;
    /** Time currently being accumulated */
    currentTime: number;
    state: SchedulerState;
}

/**
 * Dumps the waveforms of a built module hierarchy to a VCD trace while a
 * simulation runs.
 *
 * Everything static (header, scopes, initial values) is written when the
 * dumper is constructed. After that, changes are collected per simulated
 * instant and written at each clock boundary. When the simulation ends the
 * last instant is flushed and the dumper detaches itself.
 *
 * @example
 * ```ts
 * const top = new Module('top');
 * const clk = top.addInput('clk');
 * top.build();
 *
 * const sim = new Simulator();
 * const dumper = new WaveDumper(top, sim, { outputPath: 'top.vcd' });
 * sim.registerAction(5, () => clk.put(1));
 * sim.run();
 * ```
 */
export class WaveDumper {
    readonly module: HierarchyNode;
    readonly outputPath: string;
    private readonly sink: TraceSink;
    private readonly registry: SignalRegistry;
    private readonly tracker: ChangeTracker = new ChangeTracker();
    private readonly writer: TraceWriter;
    private readonly scheduler: TimestampScheduler;
    private subscriptions: Unsubscribe[] = [];

    constructor(
        module: HierarchyNode,
        simulator: SimulationEvents,
        options: WaveDumperOptions = {}
    ) {
        const resolved = resolveDumperOptions(options, loadDumperEnv());

        // Fails before anything is written if the hierarchy is unbuilt or has port conflicts
        this.registry = new SignalRegistry(module, resolved.sanitize);

        this.module = module;
        this.outputPath = resolved.outputPath;
        this.sink = resolved.sink ?? new FileTraceSink(resolved.outputPath);
        this.writer = new TraceWriter(this.sink, this.registry);

        this.writer.writeHeader({
            date: resolved.now(),
            tool: resolved.tool,
            version: resolved.version,
            comment: resolved.comment,
            timescale: resolved.timescale,
        });
        this.writer.writeScope(module);
        this.writer.writeInitialValues();

        this.scheduler = new TimestampScheduler(
            simulator.time,
            this.tracker,
            (time, changed) => this.writer.writeTimestampBlock(time, changed)
        );

        this.subscriptions = [
            this.registry.subscribe((signal) => this.tracker.onChange(signal)),
            simulator.onPreTick((time) => this.scheduler.onClockBoundary(time)),
            simulator.onSimulationEnded((time) => this.finish(time)),
        ];

        logger.debug(
            {
                module: module.instanceName,
                trackedSignals: this.registry.markers.size,
                output: this.sink.location,
                startTime: simulator.time,
            },
            'WaveDumper attached'
        );
    }

    /**
     * Marker assigned to a signal, if it is tracked.
     */
    getMarker(signal: TraceableSignal): string | undefined {
        return this.registry.markers.get(signal)?.marker;
    }

    getStats(): WaveDumperStats {
        const writerStats = this.writer.getStats();
        return {
            trackedSignals: this.registry.markers.size,
            timestampsWritten: writerStats.timestampsWritten,
            valueChangesWritten: writerStats.valueChangesWritten,
            pendingChanges: this.tracker.size,
            currentTime: this.scheduler.currentTime,
            state: this.scheduler.getState(),
        };
    }

    private finish(time: number): void {
        this.detach();
        this.scheduler.onSimulationEnd(time);

        const stats = this.getStats();
        logger.info(
            {
                module: this.module.instanceName,
                output: this.sink.location,
                endTime: time,
                timestamps: stats.timestampsWritten,
                valueChanges: stats.valueChangesWritten,
            },
            'Wave dump complete'
        );
    }

    private detach(): void {
        for (const unsubscribe of this.subscriptions) {
            unsubscribe();
        }
        this.subscriptions = [];
    }
}
