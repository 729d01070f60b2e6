import { EntryKind, Kind, Mode } from './model';

const modes: ReadonlySet<number> = new Set([Mode.tree, Mode.file, Mode.exec, Mode.symlink]);

export function isMode(value: number): value is Mode {
  return modes.has(value);
}

export function kindOfMode(mode: Mode): EntryKind {
  return mode === Mode.tree ? Kind.tree : Kind.blob;
}

export function isKind(value: string): value is Kind {
  return value === Kind.blob || value === Kind.tree || value === Kind.commit;
}

/**
 * A tree entry name is exactly one path segment.
 */
export function isValidEntryName(name: string): boolean {
  return name !== '' && name !== '.' && name !== '..' && !name.includes('/') && !name.includes('\0');
}

export function errorToString(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

const encoder = new TextEncoder();

/**
 * Bytewise (memcmp-like) comparison of the UTF-8 encodings of two strings.
 */
export function compareBytewise(a: string, b: string): number {
  if (a === b) {
    return 0;
  }

  const aa = encoder.encode(a);
  const bb = encoder.encode(b);
  const length = Math.min(aa.length, bb.length);
  for (let i = 0; i < length; i++) {
    if (aa[i] !== bb[i]) {
      return aa[i] - bb[i];
    }
  }

  return aa.length - bb.length;
}

/**
 * Canonical order of entries inside a tree: bytewise by name, with trees compared as if their name ended in `/`.
 * Two trees holding the same entries therefore always encode identically.
 */
export function treeEntryComparer(a: { name: string; mode: Mode }, b: { name: string; mode: Mode }): number {
  return compareBytewise(sortKey(a), sortKey(b));
}

function sortKey(entry: { name: string; mode: Mode }): string {
  return entry.mode === Mode.tree ? `${entry.name}/` : entry.name;
}

export function joinPath(parent: string, name: string): string {
  return parent === '' ? name : `${parent}/${name}`;
}
