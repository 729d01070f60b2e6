export { buildTree } from './buildTree';
export type { BuildOptions } from './buildTree';
export type { TreeSource, SourceEntry, SourceLeaf, SourceDirectory, SourceExisting } from './TreeSource';
export { WorkingTreeSource } from './WorkingTreeSource';
export type { ExpandedTree, ExistingTree, ExpandedFile, ExistingFile, WorkingTreeEntry, WorkingTreeFile, WorkingTreeFolder } from './WorkingTreeSource';
export { SimpleFSSource } from './SimpleFSSource';
export type { SimpleFSSourceOptions } from './SimpleFSSource';
