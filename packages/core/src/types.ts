/**
 * A single logic bit. `x` is unknown, `z` is high impedance.
 */
export type Bit = 0 | 1 | 'x' | 'z';

/**
 * Removes a previously registered listener.
 */
export type Unsubscribe = () => void;

export type SignalChangeListener = () => void;

export type TimeListener = (time: number) => void;

/**
 * A signal that can be observed while a simulation runs.
 * Identity is by reference: two signals with equal names and values are
 * still distinct signals.
 */
export interface TraceableSignal {
  readonly name: string;

  /** Number of bits, always >= 1 */
  readonly width: number;

  /** Current value, least-significant bit first */
  readonly value: readonly Bit[];

  /** Signal is an input or output of its module */
  readonly isPort: boolean;

  /** Signal never changes value */
  readonly isConstant: boolean;

  readonly parentModule: HierarchyNode | undefined;

  /**
   * Register a listener invoked synchronously after each value change.
   * Listeners run in registration order.
   */
  onChanged(listener: SignalChangeListener): Unsubscribe;
}

/**
 * One module instance in a design hierarchy.
 */
export interface HierarchyNode {
  readonly instanceName: string;

  /** Child modules, in declaration order */
  readonly subModules: readonly HierarchyNode[];

  /** Owned signals, in declaration order */
  readonly signals: readonly TraceableSignal[];

  /** Internals of this module are not observed */
  readonly isOpaque: boolean;

  readonly hasBuilt: boolean;
}

/**
 * Notifications a waveform observer needs from a simulation.
 */
export interface SimulationEvents {
  /** Current logical time */
  readonly time: number;

  /** Called each time the simulation is about to run a tick, with the tick's time */
  onPreTick(listener: TimeListener): Unsubscribe;

  /** Called once when the simulation finishes, with the final time */
  onSimulationEnded(listener: TimeListener): Unsubscribe;
}
