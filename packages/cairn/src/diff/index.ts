export { diffTrees, diffCommits } from './diffTrees';
export { detectRenames, levenshteinDistance } from './renames';
export type { RenameResult } from './renames';
export type { ChangeSet, DiffEntry, ModifiedEntry, RenamedEntry, DiffProblem, DiffOptions, RenamePairing } from './model';
