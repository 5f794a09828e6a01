import { Logic } from './Logic';
import type { HierarchyNode } from './types';

export interface ModuleOptions {
  /**
   * Internals are a black box (e.g. a primitive cell) and are never expanded
   * by observers. Signals declared on the parent stay visible.
   */
  opaque?: boolean;
}

/**
 * A node in a design hierarchy: owns signals and child modules.
 *
 * Modules are assembled first and then frozen by {@link Module.build}.
 */
export class Module implements HierarchyNode {
  readonly instanceName: string;
  readonly isOpaque: boolean;
  private readonly _signals: Logic[] = [];
  private readonly _subModules: Module[] = [];
  private _hasBuilt = false;

  constructor(name: string, options: ModuleOptions = {}) {
    if (name.length === 0) {
      throw new Error('Module name must not be empty');
    }
    this.instanceName = name;
    this.isOpaque = options.opaque ?? false;
  }

  get signals(): readonly Logic[] {
    return this._signals;
  }

  get subModules(): readonly Module[] {
    return this._subModules;
  }

  get hasBuilt(): boolean {
    return this._hasBuilt;
  }

  addInput(name: string, width = 1): Logic {
    return this.declare(new Logic(name, { width }), true);
  }

  addOutput(name: string, width = 1): Logic {
    return this.declare(new Logic(name, { width }), true);
  }

  /**
   * Declare an internal (non-port) signal.
   */
  addSignal<T extends Logic>(signal: T): T {
    return this.declare(signal, false);
  }

  addSubModule<T extends Module>(module: T): T {
    this.assertMutable();
    const child: Module = module;
    if (child === this) {
      throw new Error(`Module "${this.instanceName}" cannot contain itself`);
    }
    if (this._subModules.includes(child)) {
      throw new Error(`Module "${child.instanceName}" is already a child of "${this.instanceName}"`);
    }
    this._subModules.push(child);
    return module;
  }

  /**
   * Freeze this module and every descendant.
   */
  build(): this {
    for (const child of this._subModules) {
      child.build();
    }
    this._hasBuilt = true;
    return this;
  }

  private declare<T extends Logic>(signal: T, isPort: boolean): T {
    this.assertMutable();
    signal.bindToModule(this, isPort);
    this._signals.push(signal);
    return signal;
  }

  private assertMutable(): void {
    if (this._hasBuilt) {
      throw new Error(`Module "${this.instanceName}" has already been built`);
    }
  }
}
