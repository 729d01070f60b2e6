import chalk from 'chalk';

import { ChangeSet, CommitBody, CorruptionReport, encodePerson, Hash, Kind, Mode, Problem } from '@cairn/cairn';

export function errorToString(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parses `Name <email>`.
 */
export function parseIdentity(value: string): { name: string; email: string } {
  const match = value.match(/^\s*([^<]*?)\s*<([^>]*)>\s*$/);
  if (!match) {
    throw new Error(`Expected identity in the form 'Name <email>', found '${value}'`);
  }

  return { name: match[1], email: match[2] };
}

export function formatMode(mode: Mode): string {
  return mode.toString(8).padStart(6, '0');
}

export function formatTreeEntry(entry: { mode: Mode; kind: Kind; hash: Hash }, path: string): string {
  return `${formatMode(entry.mode)} ${entry.kind} ${entry.hash}\t${path}`;
}

/**
 * Commit bodies are shown in their stored text form.
 */
export function formatCommitBody(commit: CommitBody): string {
  const lines = [`tree ${commit.tree}`];
  for (const parent of commit.parents) {
    lines.push(`parent ${parent}`);
  }
  lines.push(`author ${encodePerson(commit.author)}`);
  lines.push(`committer ${encodePerson(commit.committer)}`);
  lines.push('');
  lines.push(commit.message);
  return lines.join('\n') + '\n';
}

export function formatLogEntry(hash: Hash, commit: CommitBody, colors: chalk.Chalk = chalk): string {
  const lines = [
    colors.yellow(`commit ${hash}`),
    ...(commit.parents.length > 1 ? [`Merge: ${commit.parents.map(p => p.substring(0, 7)).join(' ')}`] : []),
    `Author: ${commit.author.name} <${commit.author.email}>`,
    `Date:   ${new Date(commit.author.date.seconds * 1000).toISOString()}`,
    '',
    ...commit.message.replace(/\n$/, '').split('\n').map(line => `    ${line}`),
    '',
  ];
  return lines.join('\n');
}

export function formatChangeSet(changes: ChangeSet, colors: chalk.Chalk = chalk): string[] {
  const lines: string[] = [];
  for (const entry of changes.added) {
    lines.push(colors.green(`A\t${entry.path}`));
  }
  for (const entry of changes.removed) {
    lines.push(colors.red(`D\t${entry.path}`));
  }
  for (const entry of changes.modified) {
    const modeChange = entry.oldMode !== entry.newMode ? ` (${formatMode(entry.oldMode)} -> ${formatMode(entry.newMode)})` : '';
    lines.push(colors.yellow(`M\t${entry.path}${modeChange}`));
  }
  for (const entry of changes.renamed) {
    lines.push(colors.cyan(`R\t${entry.oldPath} -> ${entry.newPath}`));
  }
  for (const problem of changes.problems) {
    lines.push(colors.magenta(`!\t${problem.path || '.'}: ${problem.message}`));
  }
  return lines;
}

export function formatProblem(problem: Problem): string {
  const where = problem.path.length === 0 ? '(root)' : problem.path.join('/');
  switch (problem.type) {
    case 'missing':
      return `missing ${problem.hash} at ${where}`;
    case 'hashMismatch':
      return problem.actualHash !== undefined
        ? `hash mismatch ${problem.hash} at ${where}: content hashes to ${problem.actualHash}`
        : `hash mismatch ${problem.hash} at ${where}`;
    case 'malformed':
      return `malformed ${problem.hash} at ${where}: ${problem.message}`;
    case 'kindMismatch':
      return `wrong kind ${problem.hash} at ${where}: expected ${problem.expected}, found ${problem.actual}`;
  }
}

export function formatReport(report: CorruptionReport, colors: chalk.Chalk = chalk): string[] {
  const lines = report.problems.map(problem => colors.red(formatProblem(problem)));
  if (report.aborted) {
    lines.push(colors.yellow(`Aborted after checking ${report.objectsChecked} objects`));
  } else if (report.ok) {
    lines.push(colors.green(`${report.objectsChecked} objects checked, no problems found`));
  } else {
    lines.push(`${report.objectsChecked} objects checked, ${report.problems.length} problems found`);
  }
  return lines;
}
