import { NodeFS } from '@cairn/simplefs';
import { InitMode, ObjectStore, StoreOptions } from '@cairn/cairn';

export async function openStore(storePath: string, options?: StoreOptions): Promise<ObjectStore> {
  const store = new ObjectStore(new NodeFS(storePath), options);
  await store.init(InitMode.Open);
  return store;
}
