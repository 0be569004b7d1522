import { RecallError, RecordStoreUnreachableError } from '../errors.js';
import type { RecordStore } from './StorageAdapter.js';

/** Runs one record-store call; any untyped rejection becomes RecordStoreUnreachableError. */
export async function storeCall<T>(operation: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof RecallError) throw error;
    throw new RecordStoreUnreachableError(operation, error);
  }
}

/** A RecordStore view whose failures surface as RecordStoreUnreachableError. */
export function guardedStore(store: RecordStore): RecordStore {
  return {
    persist: (r) => storeCall('persist', () => store.persist(r)),
    fetchById: (id) => storeCall('fetchById', () => store.fetchById(id)),
    update: (id, patch) => storeCall('update', () => store.update(id, patch)),
    lexicalSearch: (text, project, limit) => storeCall('lexicalSearch', () => store.lexicalSearch(text, project, limit)),
    vectorSearch: (embedding, project, categoryId, limit) =>
      storeCall('vectorSearch', () => store.vectorSearch(embedding, project, categoryId, limit)),
    listAll: () => storeCall('listAll', () => store.listAll()),
    initialize: async () => {
      await storeCall('initialize', async () => {
        await store.initialize?.();
      });
    },
    close: async () => {
      await storeCall('close', async () => {
        await store.close?.();
      });
    },
  };
}
