import { ISimpleFS, Path } from '@cairn/simplefs';

import { Mode } from '../db/model';
import { SourceEntry, TreeSource } from './TreeSource';

export interface SimpleFSSourceOptions {
  /**
   * Directory to snapshot. Defaults to the root of the filesystem.
   */
  root?: Path;

  /**
   * Return true to leave a path (and everything below it) out of the snapshot.
   */
  ignore?: (path: Path) => boolean;
}

/**
 * Snapshots a directory of any `ISimpleFS`. File modes come from `ListEntry.isExecutable` when the backend reports it.
 */
export class SimpleFSSource implements TreeSource<Path> {
  readonly root: Path;
  private readonly _ignore: (path: Path) => boolean;

  constructor(private readonly _fs: ISimpleFS, options?: SimpleFSSourceOptions) {
    this.root = options?.root ?? new Path('');
    this._ignore = options?.ignore ?? (() => false);
  }

  async listChildren(node: Path): Promise<SourceEntry<Path>[]> {
    const children: SourceEntry<Path>[] = [];
    for (const entry of await this._fs.list(node)) {
      const path = entry.path;
      if (this._ignore(path)) {
        continue;
      }

      if (entry.kind === 'dir') {
        children.push({ kind: 'dir', name: path.leafName, node: path });
      } else {
        children.push({
          kind: 'leaf',
          name: path.leafName,
          mode: entry.isExecutable ? Mode.exec : Mode.file,
          read: () => this._fs.read(path),
        });
      }
    }

    return children;
  }
}
