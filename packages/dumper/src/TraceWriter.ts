import type { HierarchyNode, TraceableSignal } from '@wavetap/core';
import { DumperError, TimestampOrderError } from './errors';
import type { SignalRegistry } from './SignalRegistry';
import type { TraceSink } from './sinks/TraceSink';
import { encodeValueChange } from './value-encoding';

export interface TraceHeader {
    date: Date;
    tool: string;
    version: string;
    comment: string;
    timescale: string;
}

export interface TraceWriterStats {
    /** Timestamp blocks written */
    timestampsWritten: number;
    /** Value-change lines written in timestamp blocks */
    valueChangesWritten: number;
    /** Most recent timestamp written, if any */
    lastTimestamp: number | undefined;
}

const INDENT = '  ';

/**
 * Renders the VCD text for one dump. Each operation appends one block to the
 * sink with a single write.
 */
export class TraceWriter {
    private readonly sink: TraceSink;
    private readonly registry: SignalRegistry;
    private timestampsWritten = 0;
    private valueChangesWritten = 0;
    private lastTimestamp: number | undefined;

    constructor(sink: TraceSink, registry: SignalRegistry) {
        this.sink = sink;
        this.registry = registry;
    }

    writeHeader(header: TraceHeader): void {
        this.sink.write(
            '$date\n' +
            `${INDENT}${header.date.toISOString()}\n` +
            '$end\n' +
            '$version\n' +
            `${INDENT}${header.tool} v${header.version}\n` +
            '$end\n' +
            '$comment\n' +
            `${INDENT}${header.comment}\n` +
            '$end\n' +
            `$timescale ${header.timescale} $end\n`
        );
    }

    /**
     * Write the nested scope and variable declarations, then end the
     * definitions section.
     */
    writeScope(root: HierarchyNode): void {
        this.sink.write(this.renderScope(root, 0) + '$enddefinitions $end\n');
    }

    /**
     * Write every tracked signal's current value once, in marker order.
     */
    writeInitialValues(): void {
        let text = '$dumpvars\n';
        for (const { signal, marker } of this.registry.markers) {
            text += encodeValueChange(signal.value, signal.width, marker) + '\n';
        }
        text += '$end\n';
        this.sink.write(text);
    }

    writeTimestampBlock(time: number, changed: Iterable<TraceableSignal>): void {
        if (this.lastTimestamp !== undefined && time <= this.lastTimestamp) {
            throw new TimestampOrderError(this.lastTimestamp, time);
        }

        let text = `#${time}\n`;
        let changes = 0;
        for (const signal of changed) {
            text += this.renderValueChange(signal) + '\n';
            changes++;
        }
        this.sink.write(text);

        this.lastTimestamp = time;
        this.timestampsWritten++;
        this.valueChangesWritten += changes;
    }

    getStats(): TraceWriterStats {
        return {
            timestampsWritten: this.timestampsWritten,
            valueChangesWritten: this.valueChangesWritten,
            lastTimestamp: this.lastTimestamp,
        };
    }

    private renderValueChange(signal: TraceableSignal): string {
        const entry = this.registry.markers.get(signal);
        if (!entry) {
            throw new DumperError(`Signal "${signal.name}" is not tracked by this dump`);
        }
        return encodeValueChange(signal.value, signal.width, entry.marker);
    }

    /**
     * Empty string when neither the module nor any descendant declares a
     * tracked signal, so the parent omits the scope entirely.
     */
    private renderScope(module: HierarchyNode, depth: number): string {
        const padding = INDENT.repeat(depth);
        let inner = '';

        for (const signal of module.signals) {
            const entry = this.registry.markers.get(signal);
            if (!entry) {
                continue;
            }
            inner += `${padding}${INDENT}$var wire ${signal.width} ${entry.marker} ${entry.name} $end\n`;
        }

        for (const subModule of module.subModules) {
            if (!subModule.isOpaque) {
                inner += this.renderScope(subModule, depth + 1);
            }
        }

        if (inner.length === 0) {
            return '';
        }

        return (
            `${padding}$scope module ${this.registry.scopeName(module)} $end\n` +
            inner +
            `${padding}$upscope $end\n`
        );
    }
}
