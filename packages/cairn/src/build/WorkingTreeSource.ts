import { Hash, Mode } from '../db/model';
import { SourceEntry, TreeSource } from './TreeSource';

/**
 * Describes a folder by its contents, as opposed to the digest of a tree already in the store.
 */
export interface ExpandedTree {
  type: 'tree';
  entries: {
    [name: string]: WorkingTreeEntry;
  };
}

/**
 * Describes an existing tree, indicated by its digest.
 */
export interface ExistingTree {
  type: 'tree';
  hash: Hash;
}
export type WorkingTreeFolder = ExpandedTree | ExistingTree;

export interface ExpandedFile {
  type: 'file';
  readonly isExecutable?: boolean;
  readonly body: Uint8Array;
}
export interface ExistingFile {
  type: 'file';
  readonly isExecutable?: boolean;
  readonly hash: Hash;
}
export type WorkingTreeFile = ExpandedFile | ExistingFile;

export type WorkingTreeEntry = WorkingTreeFolder | WorkingTreeFile;

/**
 * Exposes an in-memory working tree description to `buildTree`.
 * Entries are listed in insertion order; the resulting digest does not depend on it.
 */
export class WorkingTreeSource implements TreeSource<ExpandedTree> {
  constructor(readonly root: ExpandedTree) { }

  async listChildren(node: ExpandedTree): Promise<SourceEntry<ExpandedTree>[]> {
    return Object.entries(node.entries).map(([name, entry]) => toSourceEntry(name, entry));
  }
}

function toSourceEntry(name: string, entry: WorkingTreeEntry): SourceEntry<ExpandedTree> {
  if (entry.type === 'tree') {
    if ('hash' in entry) {
      return { kind: 'existing', name, mode: Mode.tree, hash: entry.hash };
    }

    return { kind: 'dir', name, node: entry };
  }

  const mode = entry.isExecutable ? Mode.exec : Mode.file;
  if ('hash' in entry) {
    return { kind: 'existing', name, mode, hash: entry.hash };
  }

  const body = entry.body;
  return { kind: 'leaf', name, mode, read: async () => body };
}
