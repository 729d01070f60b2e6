import { InMemoryFS } from '@cairn/simplefs';
import { InitMode, ObjectStore, StoreOptions } from '../db';

export async function createStore(options?: StoreOptions, fs: InMemoryFS = new InMemoryFS()): Promise<ObjectStore> {
  const store = new ObjectStore(fs, options);
  await store.init(InitMode.CreateIfNotExists);
  return store;
}

export const encoder = new TextEncoder();
export const decoder = new TextDecoder();
