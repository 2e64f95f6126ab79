/**
 * bucketfs Storage Memory
 *
 * In-memory object store (testing and development).
 */

export {
  createMemoryObjectStore,
  type MemoryObjectStore,
  type MemoryObjectStoreConfig,
} from "./memory-object-store.ts";
