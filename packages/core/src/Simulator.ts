import type { SimulationEvents, TimeListener, Unsubscribe } from './types';
import { logger } from './utils/logger';

export type SimulatorAction = () => void;

enum SimulatorState {
  IDLE,     // Accepting actions, not started
  RUNNING,  // Executing ticks
  ENDED,    // Finished, no further ticks
}

/**
 * Single-threaded discrete-event simulator.
 *
 * Actions are grouped by integer timestamp. Each distinct timestamp is one
 * tick: pre-tick listeners are notified with the new time, then the tick's
 * actions run in registration order. Once no actions remain (or the maximum
 * time or an explicit end is reached) simulation-ended listeners are notified
 * with the final time.
 */
export class Simulator implements SimulationEvents {
  private _time = 0;
  private readonly actions: Map<number, SimulatorAction[]> = new Map();
  private readonly preTickListeners: Set<TimeListener> = new Set();
  private readonly endListeners: Set<TimeListener> = new Set();
  private maxSimTime: number | undefined;
  private endRequested = false;
  private state: SimulatorState = SimulatorState.IDLE;

  get time(): number {
    return this._time;
  }

  get hasEnded(): boolean {
    return this.state === SimulatorState.ENDED;
  }

  onPreTick(listener: TimeListener): Unsubscribe {
    this.preTickListeners.add(listener);
    return () => {
      this.preTickListeners.delete(listener);
    };
  }

  onSimulationEnded(listener: TimeListener): Unsubscribe {
    this.endListeners.add(listener);
    return () => {
      this.endListeners.delete(listener);
    };
  }

  /**
   * Schedule an action. Timestamps earlier than the current time are rejected;
   * an action for the current time registered mid-tick runs later in the same tick.
   */
  registerAction(timestamp: number, action: SimulatorAction): void {
    if (this.state === SimulatorState.ENDED) {
      throw new Error('Cannot register actions after the simulation has ended');
    }
    if (!Number.isSafeInteger(timestamp) || timestamp < 0) {
      throw new Error(`Timestamp must be a non-negative integer, got ${timestamp}`);
    }
    if (timestamp < this._time) {
      throw new Error(`Cannot register action at ${timestamp}, current time is ${this._time}`);
    }

    const pending = this.actions.get(timestamp);
    if (pending) {
      pending.push(action);
    } else {
      this.actions.set(timestamp, [action]);
    }
  }

  /**
   * Ticks after `timestamp` are not executed.
   */
  setMaxSimTime(timestamp: number): void {
    if (!Number.isSafeInteger(timestamp) || timestamp < 0) {
      throw new Error(`Max simulation time must be a non-negative integer, got ${timestamp}`);
    }
    this.maxSimTime = timestamp;
  }

  /**
   * Stop after the current tick completes.
   */
  endSimulation(): void {
    this.endRequested = true;
  }

  /**
   * Run all scheduled ticks synchronously. May only be called once.
   */
  run(): void {
    if (this.state !== SimulatorState.IDLE) {
      throw new Error('Simulator has already run');
    }
    this.state = SimulatorState.RUNNING;
    logger.debug({ pendingTicks: this.actions.size }, 'Simulation started');

    let ticks = 0;
    while (!this.endRequested) {
      const next = this.nextTimestamp();
      if (next === undefined) {
        break;
      }
      if (this.maxSimTime !== undefined && next > this.maxSimTime) {
        break;
      }
      this.tick(next);
      ticks++;
    }

    this.state = SimulatorState.ENDED;
    logger.debug({ time: this._time, ticks }, 'Simulation ended');

    for (const listener of [...this.endListeners]) {
      listener(this._time);
    }
  }

  private tick(time: number): void {
    this._time = time;

    for (const listener of [...this.preTickListeners]) {
      listener(time);
    }

    const pending = this.actions.get(time) ?? [];
    this.actions.delete(time);
    for (const action of pending) {
      action();
    }
  }

  private nextTimestamp(): number | undefined {
    let next: number | undefined;
    for (const timestamp of this.actions.keys()) {
      if (next === undefined || timestamp < next) {
        next = timestamp;
      }
    }
    return next;
  }
}
