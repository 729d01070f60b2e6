import { createCommit } from './commits';
import { Hash, Kind } from './model';
import { ObjectStore } from './ObjectStore';
import { listFiles, walkCommits, walkTree } from './walkers';
import { buildTree } from '../build/buildTree';
import { WorkingTreeSource } from '../build/WorkingTreeSource';
import { createStore } from '../__testHelpers__/createStore';
import { dummyPerson } from '../__testHelpers__/dummyPerson';

const encoder = new TextEncoder();

describe('walkers', () => {
  let store: ObjectStore;
  let tree: Hash;
  beforeEach(async () => {
    store = await createStore();
    tree = await buildTree(store, new WorkingTreeSource({
      type: 'tree',
      entries: {
        b: {
          type: 'tree',
          entries: {
            'c.txt': { type: 'file', body: encoder.encode('cc') },
          },
        },
        'a.txt': { type: 'file', body: encoder.encode('aa') },
      },
    }));
  });

  test('walkTree visits entries depth first in canonical order', async () => {
    const visited: string[] = [];
    for await (const entry of walkTree(store, tree)) {
      visited.push(`${entry.kind} ${entry.path.join('/')}`);
    }

    expect(visited).toEqual(['blob a.txt', 'tree b', 'blob b/c.txt']);
  });

  test('walkTree skips sub-trees when told so', async () => {
    const gen = walkTree(store, tree);
    const visited: string[] = [];
    let result = await gen.next();
    while (!result.done) {
      visited.push(result.value.path.join('/'));
      result = await gen.next(result.value.kind !== Kind.tree);
    }

    expect(visited).toEqual(['a.txt', 'b']);
  });

  test('listFiles', async () => {
    const files: string[] = [];
    for await (const entry of listFiles(store, tree)) {
      files.push(entry.path.join('/'));
    }

    expect(files).toEqual(['a.txt', 'b/c.txt']);
  });

  test('walkCommits visits shared ancestors once', async () => {
    const c1 = await createCommit(store, tree, [], 'c1', dummyPerson(1));
    const c2 = await createCommit(store, tree, [c1], 'c2', dummyPerson(2));
    const c3 = await createCommit(store, tree, [c1], 'c3', dummyPerson(3));
    const c4 = await createCommit(store, tree, [c2, c3], 'c4', dummyPerson(4));

    const messages: string[] = [];
    for await (const { commit } of walkCommits(store, c4)) {
      messages.push(commit.message);
    }

    expect(messages).toEqual(['c4', 'c2', 'c3', 'c1']);
  });

  test('walkCommits rejects non-commits', async () => {
    await expect(walkCommits(store, tree).next()).rejects.toThrow(`Object ${tree} is not a commit, found tree`);
  });
});
