import type { TraceableSignal } from '@wavetap/core';
import type { ChangeTracker } from './ChangeTracker';
import { TimestampOrderError } from './errors';
import { logger } from './utils/logger';

export type FlushHandler = (time: number, changed: ReadonlySet<TraceableSignal>) => void;

/**
 * Scheduler state.
 * FLUSHING only lasts for the duration of one flush call.
 */
export enum SchedulerState {
    ACCUMULATING = 'ACCUMULATING', // Collecting changes for the current time
    FLUSHING = 'FLUSHING',         // Writing out the current time
    TERMINATED = 'TERMINATED',     // Simulation ended, inert
}

/**
 * Decides when the changes collected for one simulated instant are written.
 *
 * Many change notifications may arrive for the same instant, so nothing is
 * flushed on a change itself. A clock boundary carrying a new time flushes the
 * previous time (only if something changed) and starts accumulating the new
 * one. Simulation end always flushes, even an empty set.
 */
export class TimestampScheduler {
    private state: SchedulerState = SchedulerState.ACCUMULATING;
    private _currentTime: number;
    private readonly tracker: ChangeTracker;
    private readonly onFlush: FlushHandler;

    constructor(initialTime: number, tracker: ChangeTracker, onFlush: FlushHandler) {
        this._currentTime = initialTime;
        this.tracker = tracker;
        this.onFlush = onFlush;
    }

    get currentTime(): number {
        return this._currentTime;
    }

    getState(): SchedulerState {
        return this.state;
    }

    onClockBoundary(now: number): void {
        if (this.state === SchedulerState.TERMINATED) {
            logger.debug({ time: now }, 'Ignoring clock boundary after simulation end');
            return;
        }
        if (now === this._currentTime) {
            return;
        }
        if (now < this._currentTime) {
            throw new TimestampOrderError(this._currentTime, now);
        }

        // Blank timestamps are never written
        if (!this.tracker.isEmpty()) {
            this.flush(this._currentTime);
        }
        this._currentTime = now;
    }

    onSimulationEnd(finalTime: number): void {
        if (this.state === SchedulerState.TERMINATED) {
            logger.debug({ time: finalTime }, 'Ignoring repeated simulation end');
            return;
        }
        // Changes still pending for an earlier instant keep their own timestamp
        this.onClockBoundary(finalTime);
        this.flush(finalTime);
        this.state = SchedulerState.TERMINATED;
    }

    private flush(time: number): void {
        this.state = SchedulerState.FLUSHING;
        try {
            const changed = this.tracker.drain();
            logger.trace({ time, changes: changed.size }, 'Flushing timestamp');
            this.onFlush(time, changed);
        } finally {
            this.state = SchedulerState.ACCUMULATING;
        }
    }
}
