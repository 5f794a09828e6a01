import * as fs from 'fs';
import * as path from 'path';
import type { TraceSink } from './TraceSink';

/**
 * Writes trace text to a file. The file is created (or truncated) when the
 * sink is constructed and only appended to afterwards.
 */
export class FileTraceSink implements TraceSink {
    readonly location: string;
    private bytesWritten = 0;

    constructor(outputPath: string) {
        this.location = path.resolve(outputPath);
        fs.writeFileSync(this.location, '');
    }

    write(text: string): void {
        fs.appendFileSync(this.location, text);
        this.bytesWritten += Buffer.byteLength(text);
    }

    getBytesWritten(): number {
        return this.bytesWritten;
    }
}
