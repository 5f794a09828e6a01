export type { TraceSink } from './TraceSink';
export { FileTraceSink } from './FileTraceSink';
export { MemoryTraceSink } from './MemoryTraceSink';
