export { FSError, Errno, isFSError } from './model/FSError';
export { Path } from './model/Path';
export type { ISimpleFS, ListEntry } from './model/ISimpleFS';
export { InMemoryFS } from './InMemory/InMemoryFS';
export { NodeFS } from './Node/NodeFS';
