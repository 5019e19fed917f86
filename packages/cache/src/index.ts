export {
  type CacheSnapshot,
  createResourceCache,
  type ResourceCache,
  type ResourceCacheOptions,
} from "./resource-cache";
export {
  connectResourceStore,
  type StoreSync,
  type StoreSyncOptions,
} from "./store-sync";
export {
  createInMemoryResourceStore,
  type InMemoryResourceStore,
} from "./memory-store";
