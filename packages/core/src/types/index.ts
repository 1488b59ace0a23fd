export type { DatabaseHandle, StorageInitializer } from './storage.js';
