import { Hash } from '../db/model';
import { compareBytewise } from '../db/util';
import { DiffEntry, RenamedEntry, RenamePairing } from './model';

export type RenameResult = {
  added: DiffEntry[];
  removed: DiffEntry[];
  renamed: RenamedEntry[];
};

/**
 * Reclassifies removed/added pairs that carry the same digest as renames. Unpaired entries are returned unchanged.
 */
export function detectRenames(removed: DiffEntry[], added: DiffEntry[], pairing: RenamePairing = 'path-distance'): RenameResult {
  const removedByHash = groupByHash(removed);
  const addedByHash = groupByHash(added);

  const paired = new Set<DiffEntry>();
  const renamed: RenamedEntry[] = [];
  for (const [key, removedCandidates] of removedByHash) {
    const addedCandidates = addedByHash.get(key);
    if (addedCandidates === undefined) {
      continue;
    }

    for (const [from, to] of pairCandidates(removedCandidates, addedCandidates, pairing)) {
      paired.add(from);
      paired.add(to);
      renamed.push({
        oldPath: from.path,
        newPath: to.path,
        kind: from.kind,
        oldMode: from.mode,
        newMode: to.mode,
        hash: from.hash,
      });
    }
  }

  return {
    added: added.filter(entry => !paired.has(entry)),
    removed: removed.filter(entry => !paired.has(entry)),
    renamed,
  };
}

function pairCandidates(removed: DiffEntry[], added: DiffEntry[], pairing: RenamePairing): [DiffEntry, DiffEntry][] {
  if (pairing === 'unique') {
    return removed.length === 1 && added.length === 1 ? [[removed[0], added[0]]] : [];
  }

  const options: { from: DiffEntry; to: DiffEntry; distance: number }[] = [];
  for (const from of removed) {
    for (const to of added) {
      options.push({ from, to, distance: levenshteinDistance(from.path, to.path) });
    }
  }
  options.sort((a, b) =>
    a.distance - b.distance ||
    compareBytewise(a.from.path, b.from.path) ||
    compareBytewise(a.to.path, b.to.path));

  const used = new Set<DiffEntry>();
  const result: [DiffEntry, DiffEntry][] = [];
  for (const { from, to } of options) {
    if (!used.has(from) && !used.has(to)) {
      used.add(from);
      used.add(to);
      result.push([from, to]);
    }
  }

  return result;
}

// Entries only pair with entries of the same kind
function groupByHash(entries: DiffEntry[]): Map<string, DiffEntry[]> {
  const groups = new Map<string, DiffEntry[]>();
  for (const entry of entries) {
    const key = groupKey(entry.kind, entry.hash);
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, [entry]);
    } else {
      group.push(entry);
    }
  }

  return groups;
}

function groupKey(kind: string, hash: Hash): string {
  return `${kind} ${hash}`;
}

export function levenshteinDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      current[j] = a.charAt(i - 1) === b.charAt(j - 1)
        ? previous[j - 1]
        : Math.min(previous[j - 1], current[j - 1], previous[j]) + 1;
    }
    previous = current;
  }

  return previous[b.length];
}
