import { Const, Logic, Module, sanitizeName } from '@wavetap/core';
import { SignalRegistry } from '../SignalRegistry';
import { HierarchyNotBuiltError, NameConflictError } from '../errors';

function buildDesign() {
    const top = new Module('top');
    const clk = top.addInput('clk');
    const rst = top.addInput('rst');
    top.addSignal(new Const(1, 1, 'one'));

    const alu = top.addSubModule(new Module('alu'));
    const acc = alu.addSignal(new Logic('acc', { width: 8 }));

    const ram = top.addSubModule(new Module('ram', { opaque: true }));
    const mem = ram.addSignal(new Logic('mem', { width: 16 }));

    const adder = alu.addSubModule(new Module('adder'));
    const sum = adder.addOutput('sum', 8);

    top.build();
    return { top, clk, rst, alu, acc, ram, mem, adder, sum };
}

describe('SignalRegistry', () => {
    describe('marker assignment', () => {
        it('should assign markers breadth-first in declaration order', () => {
            const { top, clk, rst, acc, sum } = buildDesign();
            const registry = new SignalRegistry(top, sanitizeName);

            expect(registry.markers.get(clk)?.marker).toBe('s0');
            expect(registry.markers.get(rst)?.marker).toBe('s1');
            expect(registry.markers.get(acc)?.marker).toBe('s2');
            expect(registry.markers.get(sum)?.marker).toBe('s3');
            expect(registry.markers.size).toBe(4);
        });

        it('should record the module visit order', () => {
            const { top, alu, adder } = buildDesign();
            const registry = new SignalRegistry(top, sanitizeName);

            expect(registry.modules).toEqual([top, alu, adder]);
        });

        it('should exclude constants and opaque module internals', () => {
            const { top, mem } = buildDesign();
            const registry = new SignalRegistry(top, sanitizeName);

            expect(registry.markers.has(mem)).toBe(false);
            const names = [...registry.markers].map((entry) => entry.name);
            expect(names).toEqual(['clk', 'rst', 'acc', 'sum']);
        });

        it('should record the declaring scope', () => {
            const { top, alu, acc } = buildDesign();
            const registry = new SignalRegistry(top, sanitizeName);

            expect(registry.markers.get(acc)?.scope).toBe(alu);
            expect([...registry.markers][0].scope).toBe(top);
        });
    });

    describe('names', () => {
        it('should sanitize names with the given function', () => {
            const top = new Module('top');
            const sig = top.addSignal(new Logic('data.valid'));
            top.build();

            expect(new SignalRegistry(top, sanitizeName).markers.get(sig)?.name).toBe('data_valid');
            expect(new SignalRegistry(top, (name) => name.toUpperCase()).markers.get(sig)?.name)
                .toBe('DATA.VALID');
        });

        it('should rename internal signals that collide with ports', () => {
            const top = new Module('top');
            const internal = top.addSignal(new Logic('q'));
            const port = top.addOutput('q');
            top.build();

            const registry = new SignalRegistry(top, sanitizeName);

            expect(registry.markers.get(internal)?.name).toBe('q_0');
            expect(registry.markers.get(port)?.name).toBe('q');
        });

        it('should reject ports that sanitize to the same name', () => {
            const top = new Module('top');
            top.addInput('a.b');
            top.addInput('a_b');
            top.build();

            expect(() => new SignalRegistry(top, sanitizeName)).toThrow(NameConflictError);
        });

        it('should give sibling scopes unique names', () => {
            const top = new Module('top');
            const first = top.addSubModule(new Module('unit'));
            const second = top.addSubModule(new Module('unit'));
            const hidden = top.addSubModule(new Module('cell', { opaque: true }));
            top.build();

            const registry = new SignalRegistry(top, sanitizeName);

            expect(registry.scopeName(top)).toBe('top');
            expect(registry.scopeName(first)).toBe('unit');
            expect(registry.scopeName(second)).toBe('unit_0');
            expect(() => registry.scopeName(hidden)).toThrow(
                'Module "cell" is not part of the traced hierarchy'
            );
        });
    });

    it('should reject an unbuilt hierarchy', () => {
        const top = new Module('top');
        top.addInput('clk');

        expect(() => new SignalRegistry(top, sanitizeName)).toThrow(HierarchyNotBuiltError);
        expect(() => new SignalRegistry(top, sanitizeName)).toThrow(
            'Module "top" must be built before attaching a dumper. Call build() first.'
        );
    });

    describe('subscribe', () => {
        it('should report changes of tracked signals only', () => {
            const { top, clk, mem } = buildDesign();
            const registry = new SignalRegistry(top, sanitizeName);
            const onChange = jest.fn();
            registry.subscribe(onChange);

            clk.put(1);
            mem.put(5);

            expect(onChange).toHaveBeenCalledTimes(1);
            expect(onChange).toHaveBeenCalledWith(clk);
        });

        it('should remove every listener on unsubscribe', () => {
            const { top, clk, acc } = buildDesign();
            const registry = new SignalRegistry(top, sanitizeName);
            const unsubscribe = registry.subscribe(() => undefined);

            expect(clk.listenerCount()).toBe(1);
            unsubscribe();

            expect(clk.listenerCount()).toBe(0);
            expect(acc.listenerCount()).toBe(0);
        });
    });
});
