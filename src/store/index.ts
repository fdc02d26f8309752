import type { AppConfig } from '../config/index.js';
import { connectDB, disconnectDB } from '../config/database.js';
import { encodeSeedPasswords, readSeedFile } from '../utils/seedData.js';
import { MemoryStore } from './memoryStore.js';
import { createMongoStore } from './mongoStore.js';
import type { MobileStore } from './types.js';

export interface StoreHandle {
  store: MobileStore;
  close(): Promise<void>;
}

/**
 * Acquires the store for the configured driver. `close` must be called once at shutdown.
 * The memory driver starts from data/seed.json.
 */
export const openStore = async (config: AppConfig): Promise<StoreHandle> => {
  if (config.storeDriver === 'memory') {
    const seed = await readSeedFile();
    const store = new MemoryStore({
      products: seed.products,
      users: await encodeSeedPasswords(seed.users, config.passwordScheme),
    });
    console.log(`🧪 Using in-memory store (${seed.products.length} products, ${seed.users.length} users)`);
    return { store, close: async () => undefined };
  }

  const connection = await connectDB(config);
  return {
    store: createMongoStore(connection),
    close: () => disconnectDB(connection),
  };
};

export type { MobileStore } from './types.js';
