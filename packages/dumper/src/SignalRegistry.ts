import type { HierarchyNode, TraceableSignal, Unsubscribe } from '@wavetap/core';
import { HierarchyNotBuiltError } from './errors';
import { NameUniquifier } from './NameUniquifier';
import type { NameSanitizer } from './config/options';

/**
 * A tracked signal and how it appears in the trace.
 */
export interface MarkerEntry {
    readonly signal: TraceableSignal;

    /** Short identifier used in the trace body (`s0`, `s1`, ...) */
    readonly marker: string;

    /** Sanitized, scope-unique declaration name */
    readonly name: string;

    /** Module whose scope declares this signal */
    readonly scope: HierarchyNode;
}

/**
 * Bijection between tracked signals and their markers.
 * Iteration follows marker assignment order.
 */
export class MarkerTable {
    private readonly entries: Map<TraceableSignal, MarkerEntry> = new Map();

    add(signal: TraceableSignal, name: string, scope: HierarchyNode): MarkerEntry {
        if (this.entries.has(signal)) {
            throw new Error(`Signal "${signal.name}" already has a marker`);
        }
        const entry: MarkerEntry = { signal, marker: `s${this.entries.size}`, name, scope };
        this.entries.set(signal, entry);
        return entry;
    }

    get(signal: TraceableSignal): MarkerEntry | undefined {
        return this.entries.get(signal);
    }

    has(signal: TraceableSignal): boolean {
        return this.entries.has(signal);
    }

    get size(): number {
        return this.entries.size;
    }

    values(): IterableIterator<MarkerEntry> {
        return this.entries.values();
    }

    [Symbol.iterator](): IterableIterator<MarkerEntry> {
        return this.entries.values();
    }
}

/**
 * Walks a built hierarchy once, picks the signals worth observing, assigns
 * their markers and resolves their output names.
 *
 * Modules are visited breadth-first from the root. Each module's signals get
 * markers when the module is dequeued, in declaration order. Constants are
 * skipped, and opaque submodules are never expanded.
 */
export class SignalRegistry {
    readonly root: HierarchyNode;
    readonly markers: MarkerTable = new MarkerTable();
    private readonly visitOrder: HierarchyNode[] = [];
    private readonly scopeNames: Map<HierarchyNode, string> = new Map();

    constructor(root: HierarchyNode, sanitize: NameSanitizer) {
        if (!root.hasBuilt) {
            throw new HierarchyNotBuiltError(root.instanceName);
        }
        this.root = root;
        this.collect(sanitize);
    }

    /**
     * Modules in the order their signals received markers.
     */
    get modules(): readonly HierarchyNode[] {
        return this.visitOrder;
    }

    /**
     * Sanitized scope name of a visited module, unique among its siblings.
     */
    scopeName(module: HierarchyNode): string {
        const name = this.scopeNames.get(module);
        if (name === undefined) {
            throw new Error(`Module "${module.instanceName}" is not part of the traced hierarchy`);
        }
        return name;
    }

    /**
     * Register `onChange` on every tracked signal.
     * @returns Function removing all listeners installed by this call
     */
    subscribe(onChange: (signal: TraceableSignal) => void): Unsubscribe {
        const unsubscribers: Unsubscribe[] = [];
        for (const { signal } of this.markers) {
            unsubscribers.push(signal.onChanged(() => onChange(signal)));
        }
        return () => {
            for (const unsubscribe of unsubscribers) {
                unsubscribe();
            }
        };
    }

    private collect(sanitize: NameSanitizer): void {
        const queue: HierarchyNode[] = [this.root];
        this.scopeNames.set(this.root, sanitize(this.root.instanceName));

        for (let i = 0; i < queue.length; i++) {
            const module = queue[i];
            this.visitOrder.push(module);

            const tracked = module.signals.filter((signal) => !signal.isConstant);
            const uniquifier = new NameUniquifier(
                module.instanceName,
                tracked.filter((signal) => signal.isPort).map((signal) => sanitize(signal.name))
            );

            for (const signal of tracked) {
                const name = uniquifier.getUniqueName(sanitize(signal.name), {
                    reserved: signal.isPort,
                });
                this.markers.add(signal, name, module);
            }

            const childScopes = new NameUniquifier(module.instanceName);
            for (const subModule of module.subModules) {
                if (!subModule.isOpaque) {
                    this.scopeNames.set(
                        subModule,
                        childScopes.getUniqueName(sanitize(subModule.instanceName))
                    );
                    queue.push(subModule);
                }
            }
        }
    }
}
