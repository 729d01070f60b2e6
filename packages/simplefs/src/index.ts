export { FSError, Errno, isFSError } from './model/FSError';
export { Path } from './model/Path';
export { compareListEntries } from './model/ISimpleFS';
export type { ISimpleFS, ListEntry, ListOptions, WriteOptions } from './model/ISimpleFS';
export { InMemoryFS } from './InMemory/InMemoryFS';
export { NodeFS } from './Node/NodeFS';
export { FlystorageFS } from './Flystorage/FlystorageFS';
