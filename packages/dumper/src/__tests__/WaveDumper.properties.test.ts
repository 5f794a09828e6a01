/**
 * Property-based tests for WaveDumper
 *
 * For arbitrary designs and stimulus schedules the trace must satisfy:
 * 1. Markers are unique and `$dumpvars` lists each tracked signal once
 * 2. Timestamps are strictly increasing
 * 3. Only the end-of-simulation block may be empty
 * 4. Replaying the trace reproduces every signal's final value
 */

import * as fc from 'fast-check';
import { Logic, Module, Simulator } from '@wavetap/core';
import { WaveDumper } from '../WaveDumper';
import { MemoryTraceSink } from '../sinks/MemoryTraceSink';
import { encodeValueChange } from '../value-encoding';
import { fixedNow } from './utils/test-helpers';

interface Stimulus {
    time: number;
    signal: number;
    value: number;
}

interface ParsedTrace {
    markers: string[];
    initial: Map<string, string>;
    initialCount: number;
    blocks: Array<{ time: number; changes: Array<[string, string]> }>;
}

const arbWidths = fc.array(fc.integer({ min: 1, max: 4 }), { minLength: 1, maxLength: 5 });

const arbStimuli = (widths: number[]): fc.Arbitrary<Stimulus[]> =>
    fc.array(
        fc.integer({ min: 0, max: widths.length - 1 }).chain((signal) =>
            fc.record({
                time: fc.integer({ min: 0, max: 30 }),
                signal: fc.constant(signal),
                value: fc.integer({ min: 0, max: 2 ** widths[signal] - 1 }),
            })
        ),
        { maxLength: 40 }
    );

const arbScenario = arbWidths.chain((widths) =>
    fc.record({ widths: fc.constant(widths), stimuli: arbStimuli(widths) })
);

/**
 * Split a value-change line into marker and encoded value.
 */
function splitChange(line: string): [string, string] {
    if (line.startsWith('b')) {
        const [value, marker] = line.split(' ');
        return [marker, value];
    }
    return [line.slice(1), line.slice(0, 1)];
}

function parseTrace(text: string): ParsedTrace {
    const lines = text.replace(/\n$/, '').split('\n');
    const markers = lines
        .filter((line) => line.trimStart().startsWith('$var'))
        .map((line) => line.trim().split(' ')[3]);

    const dumpStart = lines.indexOf('$dumpvars');
    const dumpEnd = lines.indexOf('$end', dumpStart);
    const initialLines = lines.slice(dumpStart + 1, dumpEnd);
    const initial = new Map(initialLines.map(splitChange));

    const blocks: ParsedTrace['blocks'] = [];
    for (const line of lines.slice(dumpEnd + 1)) {
        if (line.startsWith('#')) {
            blocks.push({ time: Number(line.slice(1)), changes: [] });
        } else {
            blocks[blocks.length - 1].changes.push(splitChange(line));
        }
    }

    return { markers, initial, initialCount: initialLines.length, blocks };
}

function runScenario(widths: number[], stimuli: Stimulus[]) {
    const top = new Module('top');
    const child = top.addSubModule(new Module('child'));
    const signals = widths.map((width, i) => {
        const owner = i % 2 === 0 ? top : child;
        return owner.addSignal(new Logic(`sig${i}`, { width, initialValue: 0 }));
    });
    top.build();

    const sink = new MemoryTraceSink();
    const sim = new Simulator();
    const dumper = new WaveDumper(top, sim, { sink, now: fixedNow });
    for (const { time, signal, value } of stimuli) {
        sim.registerAction(time, () => signals[signal].put(value));
    }
    sim.run();

    return { signals, dumper, trace: parseTrace(sink.getText()), endTime: sim.time };
}

describe('WaveDumper properties', () => {
    it('should declare unique markers and dump each one initially', () => {
        fc.assert(
            fc.property(arbScenario, ({ widths, stimuli }) => {
                const { trace } = runScenario(widths, stimuli);

                expect(new Set(trace.markers).size).toBe(widths.length);
                expect(trace.initialCount).toBe(widths.length);
                expect([...trace.initial.keys()].sort()).toEqual([...trace.markers].sort());
            })
        );
    });

    it('should write strictly increasing timestamps', () => {
        fc.assert(
            fc.property(arbScenario, ({ widths, stimuli }) => {
                const { trace, endTime } = runScenario(widths, stimuli);
                const times = trace.blocks.map((block) => block.time);

                for (let i = 1; i < times.length; i++) {
                    expect(times[i]).toBeGreaterThan(times[i - 1]);
                }
                expect(times[times.length - 1]).toBe(endTime);
            })
        );
    });

    it('should only leave the final block empty', () => {
        fc.assert(
            fc.property(arbScenario, ({ widths, stimuli }) => {
                const { trace } = runScenario(widths, stimuli);

                for (const block of trace.blocks.slice(0, -1)) {
                    expect(block.changes.length).toBeGreaterThan(0);
                }
            })
        );
    });

    it('should replay to the final signal values', () => {
        fc.assert(
            fc.property(arbScenario, ({ widths, stimuli }) => {
                const { trace, signals, dumper } = runScenario(widths, stimuli);

                const replayed = new Map(trace.initial);
                for (const block of trace.blocks) {
                    for (const [marker, value] of block.changes) {
                        replayed.set(marker, value);
                    }
                }

                for (const signal of signals) {
                    const marker = dumper.getMarker(signal);
                    expect(marker).toBeDefined();
                    const expected = encodeValueChange(signal.value, signal.width, marker ?? '');
                    expect(splitChange(expected)[1]).toBe(replayed.get(marker ?? ''));
                }
            })
        );
    });
});
