import type {
  Bit,
  HierarchyNode,
  SignalChangeListener,
  TraceableSignal,
  Unsubscribe,
} from './types';

/**
 * Accepted inputs for {@link Logic.put}.
 * Bit arrays are least-significant bit first.
 */
export type LogicValueInput = number | bigint | readonly Bit[];

export interface LogicOptions {
  /** Defaults to 1 */
  width?: number;

  /** Defaults to all bits unknown (`x`) */
  initialValue?: LogicValueInput;
}

/**
 * Convert a value input into a bit array of exactly `width` bits.
 */
export function toBits(value: LogicValueInput, width: number): Bit[] {
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new Error(`Cannot represent ${value} as an unsigned logic value`);
    }
    return toBits(BigInt(value), width);
  }

  if (typeof value === 'bigint') {
    if (value < 0n || value >= 1n << BigInt(width)) {
      throw new Error(`Value ${value} does not fit in ${width} bit(s)`);
    }
    const bits: Bit[] = [];
    for (let i = 0; i < width; i++) {
      bits.push((value >> BigInt(i)) & 1n ? 1 : 0);
    }
    return bits;
  }

  if (value.length !== width) {
    throw new Error(`Expected ${width} bit(s), got ${value.length}`);
  }
  return [...value];
}

function sameBits(a: readonly Bit[], b: readonly Bit[]): boolean {
  return a.length === b.length && a.every((bit, i) => bit === b[i]);
}

/**
 * A named, fixed-width signal whose value can be driven during simulation.
 */
export class Logic implements TraceableSignal {
  readonly name: string;
  readonly width: number;
  private _value: readonly Bit[];
  private _parentModule: HierarchyNode | undefined;
  private _isPort = false;
  private readonly listeners: Set<SignalChangeListener> = new Set();

  constructor(name: string, options: LogicOptions = {}) {
    const width = options.width ?? 1;
    if (!Number.isInteger(width) || width < 1) {
      throw new Error(`Width of signal "${name}" must be an integer >= 1, got ${width}`);
    }
    if (name.length === 0) {
      throw new Error('Signal name must not be empty');
    }

    this.name = name;
    this.width = width;
    this._value = options.initialValue === undefined
      ? new Array<Bit>(width).fill('x')
      : toBits(options.initialValue, width);
  }

  get value(): readonly Bit[] {
    return this._value;
  }

  get isPort(): boolean {
    return this._isPort;
  }

  get isConstant(): boolean {
    return false;
  }

  get parentModule(): HierarchyNode | undefined {
    return this._parentModule;
  }

  /**
   * Drive a new value. Listeners are notified only if the value changed.
   */
  put(value: LogicValueInput): void {
    const next = toBits(value, this.width);
    if (sameBits(next, this._value)) {
      return;
    }
    this._value = next;

    // Snapshot so listeners may unsubscribe while being notified
    for (const listener of [...this.listeners]) {
      listener();
    }
  }

  onChanged(listener: SignalChangeListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Number of registered change listeners.
   */
  listenerCount(): number {
    return this.listeners.size;
  }

  /**
   * Called by the owning module when the signal is declared in it.
   */
  bindToModule(module: HierarchyNode, isPort: boolean): void {
    if (this._parentModule !== undefined) {
      throw new Error(
        `Signal "${this.name}" already belongs to module "${this._parentModule.instanceName}"`
      );
    }
    this._parentModule = module;
    this._isPort = isPort;
  }
}

/**
 * A signal with a fixed value.
 */
export class Const extends Logic {
  constructor(value: LogicValueInput, width = 1, name = 'const') {
    super(name, { width, initialValue: value });
  }

  override get isConstant(): boolean {
    return true;
  }

  override put(): void {
    throw new Error(`Cannot drive constant signal "${this.name}"`);
  }
}
