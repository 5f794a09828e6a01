/**
 * Append-only destination for trace text.
 * Writes are synchronous; failures propagate to the caller.
 */
export interface TraceSink {
    /** Human-readable location, used in logs */
    readonly location: string;

    write(text: string): void;
}
