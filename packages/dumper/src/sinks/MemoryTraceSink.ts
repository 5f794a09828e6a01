import type { TraceSink } from './TraceSink';

/**
 * Collects trace text in memory.
 */
export class MemoryTraceSink implements TraceSink {
    readonly location = 'memory';
    private readonly chunks: string[] = [];

    write(text: string): void {
        this.chunks.push(text);
    }

    getText(): string {
        return this.chunks.join('');
    }

    getLines(): string[] {
        const text = this.getText();
        return text.length === 0 ? [] : text.replace(/\n$/, '').split('\n');
    }
}
