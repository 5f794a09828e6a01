import type { Bit } from '@wavetap/core';

/**
 * Encode one value-change line (without the newline).
 *
 * Scalars are `<bit><marker>`. Vectors are `b<bits> <marker>` with the most
 * significant bit first; values are stored least-significant first, so the
 * bits are reversed here.
 */
export function encodeValueChange(value: readonly Bit[], width: number, marker: string): string {
    if (width > 1) {
        const bits = [...value].reverse().join('');
        return `b${bits} ${marker}`;
    }
    return `${value[0]}${marker}`;
}
