import type { TraceableSignal } from '@wavetap/core';

/**
 * Signals that changed since the last flush, in first-change order.
 */
export class ChangeTracker {
    private pending: Set<TraceableSignal> = new Set();

    /**
     * Mark a signal as changed. Marking an already pending signal is a no-op.
     */
    onChange(signal: TraceableSignal): void {
        this.pending.add(signal);
    }

    /**
     * Take the pending set and start a new empty one.
     */
    drain(): ReadonlySet<TraceableSignal> {
        const drained = this.pending;
        this.pending = new Set();
        return drained;
    }

    isEmpty(): boolean {
        return this.pending.size === 0;
    }

    get size(): number {
        return this.pending.size;
    }
}
