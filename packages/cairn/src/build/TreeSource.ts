import { Hash, Mode } from '../db/model';

/**
 * Hierarchical input to `buildTree`: something that can list the children of a node.
 * Filesystems, archives and in-memory descriptions all plug in here.
 */
export interface TreeSource<TNode> {
  readonly root: TNode;
  listChildren(node: TNode): Promise<SourceEntry<TNode>[]>;
}

export type SourceLeaf = {
  readonly kind: 'leaf';
  readonly name: string;
  /**
   * Defaults to `Mode.file`.
   */
  readonly mode?: Mode.file | Mode.exec | Mode.symlink;
  read(): Promise<Uint8Array>;
};

export type SourceDirectory<TNode> = {
  readonly kind: 'dir';
  readonly name: string;
  readonly node: TNode;
};

/**
 * An object that is already in the store, e.g. an unchanged sub-tree of a previous snapshot.
 * It is referenced by digest without being read or rewritten.
 */
export type SourceExisting = {
  readonly kind: 'existing';
  readonly name: string;
  readonly mode: Mode;
  readonly hash: Hash;
};

export type SourceEntry<TNode> = SourceLeaf | SourceDirectory<TNode> | SourceExisting;
